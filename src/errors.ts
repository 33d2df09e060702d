/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { LogContext } from "./logger.ts";

/**
 * Base error class for all pipeline errors
 */
export abstract class LesswrightError extends Error {
  public readonly timestamp: Date;
  public readonly errorId: string;
  public readonly code: string;
  public readonly context?: LogContext;
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: string,
    context?: LogContext,
    cause?: Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.cause = cause;
    this.timestamp = new Date();
    this.errorId = `${code}-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * Configuration-related errors
 */
export class ConfigError extends LesswrightError {
  public readonly filepath?: string;

  constructor(
    message: string,
    filepath?: string,
    cause?: Error,
    context?: LogContext,
  ) {
    super(
      message,
      "CONFIG_ERROR",
      {
        ...context,
        component: "Config",
        filePath: filepath,
      },
      cause,
    );
    this.filepath = filepath;
  }
}

/**
 * Raised when a slug has no matching source file
 */
export class NotFoundError extends LesswrightError {
  public readonly slug: readonly string[];

  constructor(slug: readonly string[], sourcePath: string, context?: LogContext) {
    super(
      `No stylesheet source found for "${slug.join("/")}" in ${sourcePath}`,
      "NOT_FOUND",
      {
        ...context,
        component: "PathMapper",
        slug: slug.join("/"),
        sourcePath,
      },
    );
    this.slug = slug;
  }
}

/**
 * Raised for slugs that cannot name a file below the source root
 */
export class InvalidSlugError extends LesswrightError {
  public readonly slug: readonly string[];

  constructor(message: string, slug: readonly string[]) {
    super(message, "INVALID_SLUG", {
      component: "PathMapper",
      slug: slug.join("/"),
    });
    this.slug = slug;
  }
}

/**
 * Diagnostic position reported by the stylesheet compiler
 */
export interface CompileDiagnostic {
  line?: number;
  column?: number;
  extract?: string[];
}

/**
 * The stylesheet compiler rejected a source
 */
export class CompileError extends LesswrightError {
  public readonly source: string;
  public readonly line?: number;
  public readonly column?: number;
  public readonly extract?: string[];

  constructor(
    message: string,
    source: string,
    diagnostic: CompileDiagnostic = {},
    cause?: Error,
  ) {
    const position =
      diagnostic.line !== undefined
        ? `:${diagnostic.line}${diagnostic.column !== undefined ? `:${diagnostic.column}` : ""}`
        : "";
    super(
      `${source}${position} ${message}`,
      "COMPILE_ERROR",
      {
        component: "Compiler",
        filePath: source,
        line: diagnostic.line,
        column: diagnostic.column,
      },
      cause,
    );
    this.source = source;
    this.line = diagnostic.line;
    this.column = diagnostic.column;
    this.extract = diagnostic.extract;
  }
}

/**
 * File system operation errors
 */
export class IOError extends LesswrightError {
  public readonly filePath: string;
  public readonly operation: string;

  constructor(
    message: string,
    filePath: string,
    operation: string,
    cause?: Error,
  ) {
    super(
      message,
      "IO_ERROR",
      {
        component: "FileSystem",
        filePath,
        operation,
      },
      cause,
    );
    this.filePath = filePath;
    this.operation = operation;
  }

  /**
   * Wrap a Node fs failure
   */
  static from(error: unknown, filePath: string, operation: string): IOError {
    const cause = error instanceof Error ? error : undefined;
    return new IOError(
      `Failed to ${operation} ${filePath}: ${ErrorUtils.getErrorMessage(error)}`,
      filePath,
      operation,
      cause,
    );
  }
}

/**
 * Utility functions for error handling
 */
export const ErrorUtils = {
  getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  },

  getErrorCode(error: unknown): string | undefined {
    if (error instanceof LesswrightError) {
      return error.code;
    }
    return undefined;
  },

  /**
   * Node fs errors carry a string `code` such as ENOENT
   */
  isErrnoCode(error: unknown, code: string): boolean {
    return (
      error instanceof Error &&
      "code" in error &&
      error.code === code
    );
  },
};

/**
 * Error exit codes for CLI
 */
export const ErrorExitCodes = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  CONFIG_ERROR: 2,
  IO_ERROR: 3,
  COMPILE_ERROR: 4,
  NOT_FOUND: 5,
  INVALID_SLUG: 6,
} as const;

/**
 * Map error codes to exit codes
 */
export function getExitCode(errorCode: string | undefined): number {
  switch (errorCode) {
    case "CONFIG_ERROR":
      return ErrorExitCodes.CONFIG_ERROR;
    case "IO_ERROR":
      return ErrorExitCodes.IO_ERROR;
    case "COMPILE_ERROR":
      return ErrorExitCodes.COMPILE_ERROR;
    case "NOT_FOUND":
      return ErrorExitCodes.NOT_FOUND;
    case "INVALID_SLUG":
      return ErrorExitCodes.INVALID_SLUG;
    default:
      return ErrorExitCodes.GENERIC_ERROR;
  }
}
