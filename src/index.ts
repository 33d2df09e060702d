/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * lesswright: compiles Less stylesheets into CSS artifacts
 */

export { StylesheetPipeline } from "./pipeline.ts";
export type { PipelineOptions, GenerateReport, CleanReport } from "./pipeline.ts";

export { createRequestHook, regeneratesPerRequest } from "./requestHook.ts";
export type { RequestHook } from "./requestHook.ts";

export {
  ENVIRONMENT_DEFAULTS,
  LesswrightOptionsSchema,
  createSampleConfig,
  defaultsFor,
  detectRestrictedFilesystem,
  loadConfig,
  resolveConfig,
} from "./config.ts";
export type {
  EffectiveConfig,
  EnvironmentDefaults,
  LesswrightOptions,
  LoadConfigOptions,
  LoadConfigResult,
} from "./config.ts";

export { LessCompiler } from "./compiler.ts";
export type { CompileContext, StylesheetCompiler } from "./compiler.ts";

export {
  catalogEntries,
  destinationFor,
  destinationForSource,
  formatSlug,
  parseSlug,
  resolveSource,
  slugFromSource,
  slugsFromCatalog,
  sourceExists,
} from "./pathMapper.ts";
export type { CatalogEntry, Slug } from "./pathMapper.ts";

export { listSources, PARTIAL_MARKER, SOURCE_EXTENSIONS } from "./sourceCatalog.ts";

export {
  HEADER_TEMPLATE,
  removeArtifact,
  renderArtifact,
  writeArtifact,
} from "./artifactWriter.ts";

export {
  CompileError,
  ConfigError,
  IOError,
  InvalidSlugError,
  LesswrightError,
  NotFoundError,
  getExitCode,
} from "./errors.ts";

export { Logger, LogLevel, createLogger, logger } from "./logger.ts";
export type { LogContext, LoggerOptions } from "./logger.ts";

export { runCli } from "./cli.ts";
