/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { resolve } from "path";
import yargs from "yargs";
import {
  createSampleConfig,
  loadConfig,
  type Env,
  type LesswrightOptions,
} from "./config.ts";
import { ErrorExitCodes, ErrorUtils, getExitCode } from "./errors.ts";
import { Logger, LogLevel, parseLogLevel } from "./logger.ts";
import { parseSlug } from "./pathMapper.ts";
import { StylesheetPipeline } from "./pipeline.ts";

/**
 * Options shared by every command
 */
export interface GlobalArgs {
  config?: string;
  env?: string;
  root?: string;
  source?: string;
  public?: string;
  destination?: string;
  compression?: boolean;
  header?: boolean;
  "log-level"?: string;
  verbose?: boolean;
  quiet?: boolean;
  "json-logs"?: boolean;
}

export interface CliIO {
  cwd?: string;
  env?: Env;
  version?: string;
  stdout?: (text: string) => void;
}

export function createCliLogger(argv: GlobalArgs): Logger {
  let level: LogLevel = LogLevel.INFO;
  if (argv["log-level"]) {
    level = parseLogLevel(argv["log-level"]);
  } else if (argv.verbose) {
    level = LogLevel.TRACE;
  }

  return new Logger({
    level,
    quiet: argv.quiet ?? false,
    outputFormat: argv["json-logs"] ? "json" : "human",
    colorize: process.stdout.isTTY ?? false,
    timestamp: false,
    component: "cli",
  });
}

/**
 * CLI flags that were actually given, as config options
 */
export function optionsFromArgs(argv: GlobalArgs): LesswrightOptions {
  const options: LesswrightOptions = {};
  if (argv.env !== undefined) options.environment = argv.env;
  if (argv.source !== undefined) options.sourcePath = argv.source;
  if (argv.public !== undefined) options.publicPath = argv.public;
  if (argv.destination !== undefined) options.destinationPath = argv.destination;
  if (argv.compression !== undefined) options.compression = argv.compression;
  if (argv.header !== undefined) options.header = argv.header;
  return options;
}

async function createPipeline(
  argv: GlobalArgs,
  logger: Logger,
  io: CliIO,
): Promise<StylesheetPipeline> {
  const cwd = io.cwd ?? process.cwd();
  const root = resolve(cwd, argv.root ?? ".");
  const loaded = await loadConfig({
    searchFrom: root,
    configFile: argv.config ? resolve(cwd, argv.config) : undefined,
  });

  return new StylesheetPipeline({
    ...loaded.options,
    ...optionsFromArgs(argv),
    projectRoot: argv.root !== undefined || !loaded.options.projectRoot
      ? root
      : resolve(root, loaded.options.projectRoot),
    env: io.env,
    logger,
  });
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCli(args: string[], io: CliIO = {}): Promise<number> {
  const stdout = io.stdout ?? ((text: string) => void process.stdout.write(text));
  let exitCode: number = ErrorExitCodes.SUCCESS;

  const run = async (
    argv: GlobalArgs,
    action: (pipeline: StylesheetPipeline) => Promise<number>,
  ): Promise<void> => {
    const logger = createCliLogger(argv);
    try {
      const pipeline = await createPipeline(argv, logger, io);
      exitCode = await action(pipeline);
    } catch (error) {
      logger.error(ErrorUtils.getErrorMessage(error), {
        code: ErrorUtils.getErrorCode(error),
      });
      exitCode = getExitCode(ErrorUtils.getErrorCode(error));
    }
  };

  const parser = yargs(args)
    .scriptName("lesswright")
    .usage("Usage: $0 <command> [options]")
    .version(io.version ?? "unknown")
    .option("config", {
      alias: "c",
      type: "string",
      description: "Path to configuration file",
    })
    .option("env", {
      alias: "e",
      type: "string",
      description: "Environment used to pick defaults (development, production)",
    })
    .option("root", {
      type: "string",
      description: "Project root directory",
    })
    .option("source", {
      type: "string",
      description: "Stylesheet source directory",
    })
    .option("public", {
      type: "string",
      description: "Output root directory",
    })
    .option("destination", {
      type: "string",
      description: "Directory below the output root for generated CSS",
    })
    .option("compression", {
      type: "boolean",
      description: "Strip line breaks from generated CSS",
    })
    .option("header", {
      type: "boolean",
      description: "Prepend a provenance comment",
    })
    .option("log-level", {
      type: "string",
      choices: ["trace", "debug", "info", "warn", "error", "fatal"],
      description: "Set the minimum log level",
    })
    .option("verbose", {
      type: "boolean",
      description: "Log every file operation",
    })
    .option("quiet", {
      type: "boolean",
      description: "Quiet mode (only warnings and errors)",
    })
    .option("json-logs", {
      type: "boolean",
      description: "Emit logs as JSON lines",
    })
    .command("build", "Compile every stylesheet into the output directory", (y) => y, (argv) =>
      run(argv, async (pipeline) => {
        await pipeline.generateAll();
        return ErrorExitCodes.SUCCESS;
      }),
    )
    .command(
      "compile <slug>",
      "Compile one stylesheet and print the CSS",
      (y) =>
        y.positional("slug", {
          type: "string",
          demandOption: true,
          description: "Stylesheet path without extension, e.g. admin/forms",
        }),
      (argv) =>
        run(argv, async (pipeline) => {
          stdout(await pipeline.generateOne(parseSlug(argv.slug)));
          return ErrorExitCodes.SUCCESS;
        }),
    )
    .command(
      "exists <slug>",
      "Exit with 0 when a compilable source exists for the slug",
      (y) =>
        y.positional("slug", {
          type: "string",
          demandOption: true,
        }),
      (argv) =>
        run(argv, async (pipeline) => {
          const found = await pipeline.exists(parseSlug(argv.slug));
          stdout(`${found}\n`);
          return found ? ErrorExitCodes.SUCCESS : ErrorExitCodes.GENERIC_ERROR;
        }),
    )
    .command("clean", "Remove generated stylesheets", (y) => y, (argv) =>
      run(argv, async (pipeline) => {
        await pipeline.clean();
        return ErrorExitCodes.SUCCESS;
      }),
    )
    .command("init-config", "Print a sample .lesswrightrc.json", {}, () => {
      stdout(`${createSampleConfig()}\n`);
    })
    .demandCommand(1, "Specify a command")
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      const logger = new Logger({ colorize: false, timestamp: false, component: "cli" });
      logger.error(message || ErrorUtils.getErrorMessage(error));
      exitCode = ErrorExitCodes.GENERIC_ERROR;
    });

  await parser.parseAsync();
  return exitCode;
}
