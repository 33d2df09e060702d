/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { performance } from "perf_hooks";
import {
  removeArtifact,
  renderArtifact,
  writeArtifact,
} from "./artifactWriter.ts";
import { LessCompiler, type StylesheetCompiler } from "./compiler.ts";
import {
  resolveConfig,
  type EffectiveConfig,
  type Env,
  type LesswrightOptions,
} from "./config.ts";
import { IOError, NotFoundError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import {
  catalogEntries,
  destinationForSource,
  isPartialSlug,
  resolveSource,
  sourceExists,
  type Slug,
} from "./pathMapper.ts";
import { listSources } from "./sourceCatalog.ts";

export interface PipelineOptions extends LesswrightOptions {
  /** Defaults to the Less compiler */
  compiler?: StylesheetCompiler;
  logger?: Logger;
  /** Environment variables consulted during resolution */
  env?: Env;
}

export interface GenerateReport {
  written: string[];
  duration: number;
}

export interface CleanReport {
  removed: string[];
  duration: number;
}

/**
 * Discovers, compiles and writes stylesheets.
 *
 * Passes run one file at a time. The pipeline does not serialize concurrent
 * calls; hosts that can trigger overlapping passes must queue them
 * (see `createRequestHook`).
 */
export class StylesheetPipeline {
  private options: LesswrightOptions;
  private resolved: EffectiveConfig;
  private readonly env: Env;
  private readonly compiler: StylesheetCompiler;
  private readonly logger: Logger;

  constructor({ compiler, logger, env, ...options }: PipelineOptions = {}) {
    this.env = env ?? process.env;
    this.options = options;
    this.resolved = resolveConfig(options, this.env);
    this.logger = logger ?? createLogger("pipeline");
    this.compiler = compiler ?? new LessCompiler();
  }

  get config(): EffectiveConfig {
    return this.resolved;
  }

  /**
   * Override settings; applies from the next operation on
   */
  configure(overrides: LesswrightOptions): EffectiveConfig {
    const merged = { ...this.options, ...overrides };
    this.resolved = resolveConfig(merged, this.env);
    this.options = merged;
    return this.resolved;
  }

  pageCacheAllowed(): boolean {
    return this.resolved.pageCache;
  }

  exists(slug: Slug): Promise<boolean> {
    return sourceExists(slug, this.resolved, this.logger);
  }

  /**
   * Compile one stylesheet and return the rendered CSS. Writes nothing.
   */
  async generateOne(slug: Slug): Promise<string> {
    const config = this.resolved;
    // partials are only reachable through imports
    const source = isPartialSlug(slug)
      ? undefined
      : await resolveSource(slug, config, this.logger);
    if (source === undefined) {
      throw new NotFoundError(slug, config.sourcePath);
    }

    return this.compileSource(source, config);
  }

  /**
   * Compile every non-partial source and write it to its destination.
   * The first failure aborts the pass.
   */
  async generateAll(): Promise<GenerateReport> {
    const start = performance.now();
    const config = this.resolved;
    const written: string[] = [];

    for (const { source, destination } of await catalogEntries(config, this.logger)) {
      const css = await this.compileSource(source, config);
      await writeArtifact(destination, css, this.logger);
      written.push(destination);
    }

    const duration = Math.round(performance.now() - start);
    this.logger.info(`Generated ${written.length} stylesheet(s) in ${duration}ms`, {
      operation: "generateAll",
      destination: join(config.publicPath, config.destinationPath),
    });

    return { written, duration };
  }

  /**
   * Delete the artifact of every catalogued source. Missing files are skipped.
   */
  async clean(): Promise<CleanReport> {
    const start = performance.now();
    const config = this.resolved;
    const removed: string[] = [];

    for (const source of await listSources(config)) {
      const destination = destinationForSource(source, config);
      if (await removeArtifact(destination, this.logger)) {
        removed.push(destination);
      }
    }

    const duration = Math.round(performance.now() - start);
    this.logger.info(`Removed ${removed.length} stylesheet(s) in ${duration}ms`, {
      operation: "clean",
    });

    return { removed, duration };
  }

  private async compileSource(source: string, config: EffectiveConfig): Promise<string> {
    let text: string;
    try {
      text = await readFile(source, "utf8");
    } catch (error) {
      throw IOError.from(error, source, "read");
    }

    const start = performance.now();
    const css = await this.compiler.compile(text, {
      filename: source,
      includePaths: [config.sourcePath],
    });
    this.logger.timing("compile", Math.round(performance.now() - start), {
      filePath: source,
      compiler: this.compiler.name,
    });

    return renderArtifact(css, source, config);
  }
}
