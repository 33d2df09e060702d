/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";

/**
 * Log levels following Log4j standard
 */
export const LogLevel = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
} as const;

export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

/**
 * Log level names for easy reference
 */
export const LogLevelNames: Record<LogLevel, string> = {
  [LogLevel.TRACE]: "TRACE",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
};

const LogLevelColors = {
  [LogLevel.TRACE]: chalk.gray,
  [LogLevel.DEBUG]: chalk.cyan,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.magenta,
};

/**
 * Configuration options for the logger
 */
export interface LoggerOptions {
  level?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
  silent?: boolean;
  outputFormat?: "human" | "json";
  colorize?: boolean;
  timestamp?: boolean;
  component?: string;
}

/**
 * Structured log entry for JSON output
 */
export interface LogEntry {
  level: string;
  message: string;
  timestamp: string;
  component?: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Extra fields attached to a log line
 */
export interface LogContext {
  component?: string;
  operation?: string;
  filePath?: string;
  slug?: string;
  processingTime?: number;
  fileSize?: number;
  [key: string]: unknown;
}

/**
 * Centralized logger for the stylesheet pipeline
 */
export class Logger {
  private level: LogLevel;
  private verbose: boolean;
  private quiet: boolean;
  private silent: boolean;
  private outputFormat: "human" | "json";
  private colorize: boolean;
  private timestamp: boolean;
  private component?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
    this.silent = options.silent ?? false;
    this.outputFormat = options.outputFormat ?? "human";
    this.colorize = options.colorize ?? true;
    this.timestamp = options.timestamp ?? true;
    this.component = options.component;

    if (this.verbose && this.level > LogLevel.DEBUG) {
      this.level = LogLevel.DEBUG;
    }

    // Quiet mode overrides verbose
    if (this.quiet) {
      this.verbose = false;
      if (this.level < LogLevel.WARN) {
        this.level = LogLevel.WARN;
      }
    }
  }

  /**
   * Trace a single file operation (write, remove, read)
   */
  fileOperation(
    operation: string,
    filePath: string,
    details?: { size?: number; processingTime?: number; result?: string },
  ): void {
    let message = `${operation}: ${filePath}`;
    const context: LogContext = { operation, filePath };

    if (details?.size !== undefined) {
      message += ` (${details.size} bytes)`;
      context.fileSize = details.size;
    }

    if (details?.processingTime !== undefined) {
      message += ` - ${details.processingTime}ms`;
      context.processingTime = details.processingTime;
    }

    if (details?.result) {
      message += ` → ${details.result}`;
    }

    this.trace(message, context);
  }

  /**
   * Create a child logger with additional context
   */
  child(component: string, options: Partial<LoggerOptions> = {}): Logger {
    return new Logger({
      level: this.level,
      verbose: this.verbose,
      quiet: this.quiet,
      silent: this.silent,
      outputFormat: this.outputFormat,
      colorize: this.colorize,
      timestamp: this.timestamp,
      component,
      ...options,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) return false;
    return level >= this.level;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      level: LogLevelNames[level],
      message,
      timestamp: new Date().toISOString(),
    };

    if (this.component) {
      entry.component = this.component;
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = { ...context };
    }

    if (error) {
      const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code,
      };
    }

    return entry;
  }

  /**
   * Format log entry for human-readable output
   */
  private formatHuman(level: LogLevel, entry: LogEntry): string {
    const levelName = entry.level.padEnd(5);
    const dim = (text: string): string => (this.colorize ? chalk.gray(text) : text);

    let output = "";

    if (this.timestamp) {
      output += dim(`[${entry.timestamp}] `);
    }

    output += this.colorize
      ? LogLevelColors[level](`${levelName} `)
      : `${levelName} `;

    if (entry.component) {
      output += dim(`[${entry.component}] `);
    }

    output += entry.message;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += dim(` ${JSON.stringify(entry.context)}`);
    }

    if (entry.error) {
      output +=
        "\n" +
        (entry.error.stack || `${entry.error.name}: ${entry.error.message}`);
    }

    return output;
  }

  private output(level: LogLevel, entry: LogEntry): void {
    const line =
      this.outputFormat === "json"
        ? JSON.stringify(entry)
        : this.formatHuman(level, entry);

    // errors to stderr, everything else to stdout
    if (level >= LogLevel.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) return;

    this.output(level, this.createLogEntry(level, message, context, error));
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(messageOrError: string | Error, context?: LogContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.ERROR, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.ERROR, messageOrError, context);
    }
  }

  fatal(messageOrError: string | Error, context?: LogContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.FATAL, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.FATAL, messageOrError, context);
    }
  }

  /**
   * Log performance timing
   */
  timing(operation: string, duration: number, context?: LogContext): void {
    this.debug(`Operation "${operation}" completed in ${duration}ms`, {
      ...context,
      operation,
      processingTime: duration,
    });
  }

  getState(): { level: LogLevel; verbose: boolean; quiet: boolean; silent: boolean } {
    return {
      level: this.level,
      verbose: this.verbose,
      quiet: this.quiet,
      silent: this.silent,
    };
  }
}

/**
 * Parse log level from string, falling back to INFO
 */
export function parseLogLevel(level?: string): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.toUpperCase()) {
    case "TRACE":
      return LogLevel.TRACE;
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: process.env.LESSWRIGHT_LOG_LEVEL
    ? parseLogLevel(process.env.LESSWRIGHT_LOG_LEVEL)
    : process.env.NODE_ENV === "development"
      ? LogLevel.DEBUG
      : LogLevel.INFO,
  quiet: process.env.LESSWRIGHT_QUIET === "true",
  colorize: process.stdout.isTTY ?? false,
  timestamp: true,
});

/**
 * Create a logger with specific component context
 */
export function createLogger(
  component: string,
  options?: Partial<LoggerOptions>,
): Logger {
  return logger.child(component, options);
}
