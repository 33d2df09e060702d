import { glob } from "glob";
import { basename, extname } from "path";
import type { EffectiveConfig } from "./config.ts";
import { IOError } from "./errors.ts";

/**
 * Extensions accepted for stylesheet sources, in tie-break order
 */
export const SOURCE_EXTENSIONS = [".less", ".lss"] as const;

/**
 * Filenames starting with this marker are partials
 */
export const PARTIAL_MARKER = "_";

/**
 * Brace alternation matching every accepted extension, e.g. `.{less,lss}`
 */
export const EXTENSION_GLOB = `.{${SOURCE_EXTENSIONS.map((ext) => ext.slice(1)).join(",")}}`;

export function isPartialName(name: string): boolean {
  return name.startsWith(PARTIAL_MARKER);
}

export function isPartialFile(filePath: string): boolean {
  return isPartialName(basename(filePath));
}

export function hasSourceExtension(filePath: string): boolean {
  const ext = extname(filePath);
  return SOURCE_EXTENSIONS.some((accepted) => accepted === ext);
}

/**
 * Every stylesheet source below the source root, partials included.
 * Scans again on each call.
 */
export async function listSources(config: EffectiveConfig): Promise<string[]> {
  let files: string[];
  try {
    files = await glob(`**/*${EXTENSION_GLOB}`, {
      cwd: config.sourcePath,
      absolute: true,
      nodir: true,
      follow: false,
    });
  } catch (error) {
    throw IOError.from(error, config.sourcePath, "scan");
  }

  return files.filter(hasSourceExtension).sort();
}
