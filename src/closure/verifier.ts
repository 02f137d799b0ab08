/**
 * Closure verifier: parse -> serialize -> parse must be stable.
 *
 * The serialized copy goes to a scratch file next to the source
 * (`<dir>/_norm_test/<name>.norm` by default) and is removed afterwards
 * unless `keepScratch` is set.
 *
 * @module closure/verifier
 */

import { readdir, rm, rmdir } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { isDeepStrictEqual } from 'util';
import { parseMetadataFile, writeMetadataFile } from '../metadata/file-io.js';
import type { ParsedMetadata } from '../metadata/types.js';
import {
  gameKey,
  normalizeGame,
  normalizeHeader,
  sortByGameKey,
} from './normalize.js';
import type { NormalizedHeader } from './normalize.js';
import type {
  ClosureComparison,
  ClosureReport,
  GameMismatch,
  HeaderFieldDiff,
  VerifyClosureOptions,
} from './types.js';

export const DEFAULT_SCRATCH_DIR = '_norm_test';
export const DEFAULT_SCRATCH_SUFFIX = '.norm';

const HEADER_FIELDS: ReadonlyArray<keyof NormalizedHeader> = [
  'collection',
  'defaultSortKey',
  'launchBlock',
  'ignoreFiles',
  'extensions',
];

// ============================================================================
// Comparison (no I/O)
// ============================================================================

/**
 * Compare two parse results under closure normalization.
 */
export function compareParsed(original: ParsedMetadata, reparsed: ParsedMetadata): ClosureComparison {
  const headerA = normalizeHeader(original.header);
  const headerB = normalizeHeader(reparsed.header);

  const headerDiff: HeaderFieldDiff[] = [];
  for (const field of HEADER_FIELDS) {
    if (!isDeepStrictEqual(headerA[field], headerB[field])) {
      headerDiff.push({ field, original: headerA[field], reparsed: headerB[field] });
    }
  }

  const gamesA = sortByGameKey(original.games.map((game) => normalizeGame(game, original.header)));
  const gamesB = sortByGameKey(reparsed.games.map((game) => normalizeGame(game, reparsed.header)));

  let gameMismatch: GameMismatch | undefined;
  const count = Math.max(gamesA.length, gamesB.length);
  for (let i = 0; i < count; i++) {
    const a = gamesA[i];
    const b = gamesB[i];
    if (!isDeepStrictEqual(a, b)) {
      gameMismatch = {
        key: gameKey(a ?? b),
        original: a,
        reparsed: b,
      };
      break;
    }
  }

  const headerEqual = headerDiff.length === 0;
  const gamesEqual = gameMismatch === undefined;

  return {
    ok: headerEqual && gamesEqual,
    headerEqual,
    gamesEqual,
    headerDiff,
    gameMismatch,
    gameCounts: { original: original.games.length, reparsed: reparsed.games.length },
  };
}

// ============================================================================
// File-level verification
// ============================================================================

/**
 * Scratch file path for a source metadata file.
 */
export function scratchPathFor(
  sourcePath: string,
  scratchDirName: string = DEFAULT_SCRATCH_DIR,
  suffix: string = DEFAULT_SCRATCH_SUFFIX,
): string {
  return join(dirname(sourcePath), scratchDirName, basename(sourcePath) + suffix);
}

/**
 * Verify that a metadata file survives a serialize/reparse cycle.
 *
 * I/O failures on the source or the scratch write propagate as
 * MetadataFormatError. Failure to clean up the scratch file is only
 * logged.
 */
export async function verifyClosure(
  sourcePath: string,
  options: VerifyClosureOptions = {},
): Promise<ClosureReport> {
  const scratchDirName = options.scratchDirName ?? DEFAULT_SCRATCH_DIR;
  const scratchPath = scratchPathFor(sourcePath, scratchDirName, options.scratchSuffix);
  const keepScratch = options.keepScratch ?? false;

  const original = await parseMetadataFile(sourcePath);

  let comparison: ClosureComparison;
  try {
    await writeMetadataFile(scratchPath, original.header, original.games);
    const reparsed = await parseMetadataFile(scratchPath);
    comparison = compareParsed(original, reparsed);
  } finally {
    if (!keepScratch) {
      await removeScratch(scratchPath);
    }
  }

  return { ...comparison, sourcePath, scratchPath, scratchKept: keepScratch };
}

/**
 * Remove the scratch file, then its directory if nothing else is left.
 */
async function removeScratch(scratchPath: string): Promise<void> {
  try {
    await rm(scratchPath, { force: true });
    const scratchDir = dirname(scratchPath);
    const remaining = await readdir(scratchDir);
    if (remaining.length === 0) {
      await rmdir(scratchDir);
    }
  } catch (err) {
    // Scratch directory never created (the write failed first).
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return;
    }
    console.warn(`Could not remove closure scratch file ${scratchPath}:`, err);
  }
}
