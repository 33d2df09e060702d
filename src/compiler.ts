/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import less from "less";
import { CompileError, type CompileDiagnostic } from "./errors.ts";

/**
 * Turns stylesheet source text into CSS text.
 * Implementations reject with CompileError on invalid input.
 */
export interface StylesheetCompiler {
  readonly name: string;
  compile(source: string, context: CompileContext): Promise<string>;
}

export interface CompileContext {
  /** Absolute path of the source; relative imports resolve from here */
  filename: string;
  /** Extra directories searched by `@import` */
  includePaths?: string[];
}

function readNumber(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

/**
 * Pull line, column and extract out of a Less error object
 */
export function toDiagnostic(error: unknown): CompileDiagnostic {
  if (typeof error !== "object" || error === null) {
    return {};
  }

  const extract: unknown = Reflect.get(error, "extract");
  return {
    line: readNumber(error, "line"),
    column: readNumber(error, "column"),
    extract: Array.isArray(extract)
      ? extract.filter((line): line is string => typeof line === "string")
      : undefined,
  };
}

function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null) {
    const message: unknown = Reflect.get(error, "message");
    if (typeof message === "string") return message;
  }
  return String(error);
}

/**
 * Compiler adapter backed by the `less` package
 */
export class LessCompiler implements StylesheetCompiler {
  readonly name = "less";

  async compile(
    source: string,
    { filename, includePaths = [] }: CompileContext,
  ): Promise<string> {
    try {
      const output = await less.render(source, {
        filename,
        paths: includePaths,
      });
      return output.css;
    } catch (error) {
      throw new CompileError(
        errorMessage(error),
        filename,
        toDiagnostic(error),
        error instanceof Error ? error : undefined,
      );
    }
  }
}
