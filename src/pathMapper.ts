/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { escape, glob } from "glob";
import { basename, extname, join, relative, sep } from "path";
import type { EffectiveConfig } from "./config.ts";
import { InvalidSlugError, IOError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";
import {
  EXTENSION_GLOB,
  isPartialFile,
  isPartialName,
  listSources,
} from "./sourceCatalog.ts";

/**
 * Extension-free path segments naming one logical stylesheet,
 * e.g. `["admin", "forms"]` for `admin/forms.less`
 */
export type Slug = readonly string[];

export const OUTPUT_EXTENSION = ".css";

const defaultLogger = createLogger("path-mapper");

/**
 * Returns a reason when the slug cannot name a file below the source root
 */
export function checkSlug(slug: Slug): string | undefined {
  if (slug.length === 0) {
    return "slug must have at least one segment";
  }

  for (const segment of slug) {
    if (segment.length === 0) {
      return "slug segments must not be empty";
    }
    if (segment === "." || segment === "..") {
      return `slug segment "${segment}" would leave the source root`;
    }
    if (/[\\/\0]/.test(segment)) {
      return `slug segment "${segment}" contains a path separator`;
    }
  }

  return undefined;
}

export function assertValidSlug(slug: Slug): void {
  const problem = checkSlug(slug);
  if (problem) {
    throw new InvalidSlugError(`Invalid slug "${formatSlug(slug)}": ${problem}`, slug);
  }
}

/**
 * `"admin/forms"` → `["admin", "forms"]`
 */
export function parseSlug(value: string): Slug {
  return value.split("/");
}

export function formatSlug(slug: Slug): string {
  return slug.join("/");
}

/**
 * Glob-escape a segment; braces too, which glob's escape leaves alone
 */
function escapeSegment(segment: string): string {
  return escape(segment).replace(/[{}]/g, "\\$&");
}

function lastSegment(slug: Slug): string {
  return slug[slug.length - 1] ?? "";
}

export function isPartialSlug(slug: Slug): boolean {
  return isPartialName(lastSegment(slug));
}

/**
 * Find the source file for a slug. When several accepted extensions match,
 * the lexicographically first path wins.
 */
export async function resolveSource(
  slug: Slug,
  config: EffectiveConfig,
  logger: Logger = defaultLogger,
): Promise<string | undefined> {
  assertValidSlug(slug);

  const segments = slug.map(escapeSegment);
  segments[segments.length - 1] += EXTENSION_GLOB;

  let matches: string[];
  try {
    matches = await glob(segments.join("/"), {
      cwd: config.sourcePath,
      absolute: true,
      nodir: true,
    });
  } catch (error) {
    throw IOError.from(error, config.sourcePath, "scan");
  }

  matches.sort();

  if (matches.length > 1) {
    logger.warn(`Several sources match "${formatSlug(slug)}", using ${matches[0]}`, {
      slug: formatSlug(slug),
      candidates: matches,
    });
  }

  return matches[0];
}

/**
 * True when a non-partial source exists for the slug
 */
export async function sourceExists(
  slug: Slug,
  config: EffectiveConfig,
  logger: Logger = defaultLogger,
): Promise<boolean> {
  if (checkSlug(slug) !== undefined || isPartialSlug(slug)) {
    return false;
  }

  return (await resolveSource(slug, config, logger)) !== undefined;
}

/**
 * `<publicPath>/<destinationPath>/<segments>.css`
 */
export function destinationFor(slug: Slug, config: EffectiveConfig): string {
  assertValidSlug(slug);

  return outputPath(slug, config);
}

function outputPath(slug: Slug, config: EffectiveConfig): string {
  return join(
    config.publicPath,
    config.destinationPath,
    ...slug.slice(0, -1),
    `${lastSegment(slug)}${OUTPUT_EXTENSION}`,
  );
}

/**
 * Inverse of resolveSource: strip the source root and the extension
 */
export function slugFromSource(filePath: string, config: EffectiveConfig): Slug {
  const segments = relative(config.sourcePath, filePath).split(sep);
  const fileName = lastSegment(segments);
  segments[segments.length - 1] = basename(fileName, extname(fileName));
  return segments;
}

/**
 * Artifact path of a catalogued source file. Catalog paths are trusted,
 * so no slug validation happens here.
 */
export function destinationForSource(filePath: string, config: EffectiveConfig): string {
  return outputPath(slugFromSource(filePath, config), config);
}

export interface CatalogEntry {
  slug: Slug;
  source: string;
  destination: string;
}

/**
 * Every compilable (non-partial) source with its artifact path. When two
 * sources share a destination the first in sort order wins, matching
 * resolveSource.
 */
export async function catalogEntries(
  config: EffectiveConfig,
  logger: Logger = defaultLogger,
): Promise<CatalogEntry[]> {
  const entries = new Map<string, CatalogEntry>();

  for (const source of await listSources(config)) {
    if (isPartialFile(source)) continue;

    const destination = destinationForSource(source, config);
    const existing = entries.get(destination);
    if (existing) {
      logger.warn(`Several sources map to ${destination}, using ${existing.source}`, {
        slug: formatSlug(existing.slug),
        candidates: [existing.source, source],
      });
      continue;
    }

    entries.set(destination, {
      slug: slugFromSource(source, config),
      source,
      destination,
    });
  }

  return [...entries.values()];
}

/**
 * Slugs of every compilable (non-partial) source, one per artifact
 */
export async function slugsFromCatalog(
  config: EffectiveConfig,
  logger: Logger = defaultLogger,
): Promise<Slug[]> {
  return (await catalogEntries(config, logger)).map((entry) => entry.slug);
}
