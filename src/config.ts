/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { cosmiconfig, type CosmiconfigResult } from "cosmiconfig";
import { isAbsolute, resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.ts";
import { createLogger } from "./logger.ts";

const configLogger = createLogger("config");

/**
 * User-facing options, as read from a config file, the CLI or the host
 */
export const LesswrightOptionsSchema = z
  .object({
    environment: z
      .string()
      .min(1)
      .optional()
      .describe("Deployment environment used to pick defaults"),
    projectRoot: z
      .string()
      .min(1)
      .optional()
      .describe("Project root; relative paths resolve against it"),
    sourcePath: z
      .string()
      .min(1)
      .optional()
      .describe("Directory scanned recursively for stylesheet sources"),
    publicPath: z
      .string()
      .min(1)
      .optional()
      .describe("Output root that generated stylesheets are written below"),
    destinationPath: z
      .string()
      .min(1)
      .refine((value) => !isAbsolute(value), {
        message: "destinationPath must be relative to publicPath",
      })
      .optional()
      .describe("Directory below publicPath for generated CSS"),
    compression: z
      .boolean()
      .optional()
      .describe("Strip line breaks from generated CSS"),
    header: z
      .boolean()
      .optional()
      .describe("Prepend a provenance comment naming the source file"),
    pageCache: z
      .boolean()
      .optional()
      .describe("Allow the host to page-cache generated stylesheets"),
    restrictedFilesystem: z
      .boolean()
      .optional()
      .describe("Deployment filesystem does not persist writes"),
  })
  .strict();

export type LesswrightOptions = z.infer<typeof LesswrightOptionsSchema>;

/**
 * Environment-keyed settings
 */
export interface EnvironmentDefaults {
  compression: boolean;
  header: boolean;
  pageCache: boolean;
  destinationPath: string;
}

export type KnownEnvironment = "production" | "development";

export const ENVIRONMENT_DEFAULTS: Record<KnownEnvironment, EnvironmentDefaults> = {
  production: {
    compression: true,
    header: false,
    pageCache: true,
    destinationPath: "stylesheets",
  },
  development: {
    compression: false,
    header: true,
    pageCache: true,
    destinationPath: "stylesheets",
  },
};

export const DEFAULT_SOURCE_PATH = "app/stylesheets";
export const DEFAULT_PUBLIC_PATH = "public";

/**
 * Environment variables that signal a filesystem whose writes do not persist
 */
export const RESTRICTED_FS_FLAGS = ["LESSWRIGHT_READONLY_FS", "HEROKU_ENV"] as const;

/**
 * Fully resolved configuration. Every field holds its final value.
 */
export interface EffectiveConfig {
  readonly environment: string;
  readonly projectRoot: string;
  readonly sourcePath: string;
  readonly publicPath: string;
  readonly destinationPath: string;
  readonly compression: boolean;
  readonly header: boolean;
  readonly pageCache: boolean;
  readonly restrictedFilesystem: boolean;
}

export type Env = Record<string, string | undefined>;

export function isKnownEnvironment(name: string): name is KnownEnvironment {
  return name === "production" || name === "development";
}

/**
 * Defaults for an environment; unknown names get the production set
 */
export function defaultsFor(environment: string): EnvironmentDefaults {
  return isKnownEnvironment(environment)
    ? ENVIRONMENT_DEFAULTS[environment]
    : ENVIRONMENT_DEFAULTS.production;
}

/**
 * Interpret an environment flag. Empty, "0", "false", "no" and "off" are false.
 */
export function isTruthyFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  return !["", "0", "false", "no", "off"].includes(normalized);
}

export function detectRestrictedFilesystem(env: Env): boolean {
  return RESTRICTED_FS_FLAGS.some((flag) => isTruthyFlag(env[flag]));
}

export function detectEnvironment(env: Env): string {
  return env.LESSWRIGHT_ENV || env.NODE_ENV || "development";
}

/**
 * Validate raw options, throwing ConfigError with every issue listed
 */
export function validateOptions(
  raw: unknown,
  filepath?: string,
): LesswrightOptions {
  const result = LesswrightOptionsSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new ConfigError(
    `Configuration validation failed${filepath ? ` for ${filepath}` : ""}: ${issues}`,
    filepath,
    result.error,
    { operation: "validateOptions" },
  );
}

/**
 * Merge options over the environment defaults
 */
export function resolveConfig(
  options: LesswrightOptions = {},
  env: Env = process.env,
): EffectiveConfig {
  const validated = validateOptions(options);
  const environment = validated.environment ?? detectEnvironment(env);
  const defaults = defaultsFor(environment);
  const restrictedFilesystem =
    validated.restrictedFilesystem ?? detectRestrictedFilesystem(env);
  const projectRoot = resolve(validated.projectRoot ?? process.cwd());

  const config: EffectiveConfig = {
    environment,
    projectRoot,
    sourcePath: resolve(projectRoot, validated.sourcePath ?? DEFAULT_SOURCE_PATH),
    publicPath: resolve(projectRoot, validated.publicPath ?? DEFAULT_PUBLIC_PATH),
    destinationPath: validated.destinationPath ?? defaults.destinationPath,
    compression: validated.compression ?? defaults.compression,
    header: validated.header ?? defaults.header,
    // writes on a restricted filesystem do not persist
    pageCache: !restrictedFilesystem && (validated.pageCache ?? defaults.pageCache),
    restrictedFilesystem,
  };

  configLogger.debug("Resolved configuration", { ...config, operation: "resolveConfig" });

  return Object.freeze(config);
}

export interface LoadConfigOptions {
  /** Directory to search for a config file */
  searchFrom?: string;
  /** Explicit config file; skips the search */
  configFile?: string;
}

export interface LoadConfigResult {
  options: LesswrightOptions;
  filepath?: string;
}

/**
 * Load options from a config file using cosmiconfig
 */
export async function loadConfig(
  { searchFrom, configFile }: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  const explorer = cosmiconfig("lesswright");

  let result: CosmiconfigResult;
  try {
    result = configFile
      ? await explorer.load(configFile)
      : await explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to load configuration${configFile ? ` from ${configFile}` : ""}`,
      configFile,
      error instanceof Error ? error : undefined,
      { operation: "loadConfig", searchFrom },
    );
  }

  if (!result || result.isEmpty) {
    configLogger.debug("No configuration file found, using defaults", { searchFrom });
    return { options: {} };
  }

  configLogger.info("Configuration file loaded", { filepath: result.filepath });

  return {
    options: validateOptions(result.config, result.filepath),
    filepath: result.filepath,
  };
}

/**
 * Sample `.lesswrightrc.json` content
 */
export function createSampleConfig(): string {
  const sample: LesswrightOptions = {
    sourcePath: DEFAULT_SOURCE_PATH,
    publicPath: DEFAULT_PUBLIC_PATH,
    destinationPath: ENVIRONMENT_DEFAULTS.production.destinationPath,
    compression: true,
    header: false,
  };
  return JSON.stringify(sample, null, 2);
}
