/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { mkdir, unlink, writeFile } from "fs/promises";
import { dirname, relative, sep } from "path";
import type { EffectiveConfig } from "./config.ts";
import { ErrorUtils, IOError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";

const defaultLogger = createLogger("artifact-writer");

/**
 * Provenance comment; `%s` is replaced with the source path
 */
export const HEADER_TEMPLATE =
  "/*\n\tThis file was auto generated by lesswright. To change the contents of this file, edit %s instead.\n*/\n";

type RenderSettings = Pick<EffectiveConfig, "compression" | "header" | "projectRoot">;

/**
 * Source path as shown in the header: relative to the project root, forward slashes
 */
export function displayPath(sourceFile: string, projectRoot: string): string {
  return relative(projectRoot, sourceFile).split(sep).join("/");
}

export function renderHeader(sourceFile: string, config: RenderSettings): string {
  if (!config.header) {
    return "";
  }
  return HEADER_TEMPLATE.replace("%s", displayPath(sourceFile, config.projectRoot));
}

/**
 * Line-break stripping only; no structural minification
 */
export function compressCss(css: string): string {
  return css.replace(/[\r\n]/g, "");
}

/**
 * Final stylesheet text: optionally headed, optionally compressed.
 * Compression covers the header as well.
 */
export function renderArtifact(
  css: string,
  sourceFile: string,
  config: RenderSettings,
): string {
  const text = renderHeader(sourceFile, config) + css;
  return config.compression ? compressCss(text) : text;
}

/**
 * Write an artifact, creating parent directories first. Overwrites.
 */
export async function writeArtifact(
  destination: string,
  content: string,
  logger: Logger = defaultLogger,
): Promise<void> {
  const directory = dirname(destination);
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw IOError.from(error, directory, "create directory");
  }

  try {
    await writeFile(destination, content, "utf8");
  } catch (error) {
    throw IOError.from(error, destination, "write");
  }

  logger.fileOperation("write", destination, { size: Buffer.byteLength(content) });
}

/**
 * Delete an artifact. Returns false when there was nothing to delete.
 */
export async function removeArtifact(
  destination: string,
  logger: Logger = defaultLogger,
): Promise<boolean> {
  try {
    await unlink(destination);
  } catch (error) {
    if (ErrorUtils.isErrnoCode(error, "ENOENT")) {
      return false;
    }
    throw IOError.from(error, destination, "remove");
  }

  logger.fileOperation("remove", destination);
  return true;
}
