/**
 * Semantic normalization for closure checks.
 *
 * Two parses of the same collection are compared after normalization,
 * not structurally: the serializer is canonical but hand-written input
 * is not, so indentation, rom order, game order and the spelling of
 * list fields are not meaningful.
 *
 * @module closure/normalize
 */

import { GAME_ATTRIBUTE_KEYS } from '../metadata/types.js';
import type { Game, GameAttributes, Header } from '../metadata/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Header as it may arrive from a parse or from downstream JSON:
 * list fields may be missing, and `extensions` may be comma-joined text.
 */
export interface HeaderLike {
  collection?: string;
  defaultSortKey?: string;
  launchBlock?: string;
  ignoreFiles?: string[];
  extensions?: string[] | string;
}

export interface NormalizedHeader {
  collection: string;
  defaultSortKey?: string;
  launchBlock?: string;
  ignoreFiles: string[];
  extensions: string[];
}

export interface NormalizedGame {
  title: string;
  /** Trimmed, de-duplicated and sorted. */
  roms: string[];
  sortKey?: string;
  developer?: string;
  description?: string;
  launchOverride?: string;
  coreOverride?: string;
  attributes: GameAttributes;
}

/** Stable pairing key: title and first (sorted) rom path. */
export type GameKey = readonly [title: string, firstRom: string];

// ============================================================================
// Normalization
// ============================================================================

export function normalizeHeader(header: HeaderLike | Header): NormalizedHeader {
  const normalized: NormalizedHeader = {
    collection: (header.collection ?? '').trim(),
    ignoreFiles: header.ignoreFiles ?? [],
    extensions: normalizeExtensions(header.extensions),
  };
  if (header.defaultSortKey) {
    normalized.defaultSortKey = header.defaultSortKey;
  }
  if (header.launchBlock) {
    normalized.launchBlock = stripIndentation(header.launchBlock);
  }
  return normalized;
}

/**
 * Only non-empty optional fields survive, so that "absent" and
 * "empty" compare equal after normalization. A launch override equal
 * to the header default is inherited, not overridden, and is dropped
 * together with the core derived from it.
 */
export function normalizeGame(game: Game, header?: HeaderLike | Header): NormalizedGame {
  const normalized: NormalizedGame = {
    title: game.title.trim(),
    roms: normalizeRoms(game.roms),
    attributes: normalizeAttributes(game.attributes),
  };
  if (game.sortKey) {
    normalized.sortKey = game.sortKey;
  }
  if (game.developer) {
    normalized.developer = game.developer;
  }
  if (game.description) {
    const description = cleanText(stripIndentation(game.description));
    if (description) {
      normalized.description = description;
    }
  }
  if (game.launchOverride && !isInheritedLaunch(game.launchOverride, header)) {
    normalized.launchOverride = stripIndentation(game.launchOverride);
    if (game.coreOverride) {
      normalized.coreOverride = game.coreOverride;
    }
  }
  return normalized;
}

export function gameKey(game: NormalizedGame): GameKey {
  return [game.title, game.roms[0] ?? ''];
}

/**
 * Order games by their pairing key so that block order does not matter.
 */
export function sortByGameKey(games: readonly NormalizedGame[]): NormalizedGame[] {
  return [...games].sort((a, b) => compareKeys(gameKey(a), gameKey(b)));
}

// ============================================================================
// Field helpers
// ============================================================================

/**
 * Split comma-joined text; trim and drop empty entries.
 * Missing input normalizes to an empty list.
 */
export function normalizeExtensions(extensions: string[] | string | undefined): string[] {
  if (extensions === undefined) {
    return [];
  }
  const parts = typeof extensions === 'string' ? extensions.split(',') : extensions;
  return parts.map((part) => part.trim()).filter((part) => part !== '');
}

export function normalizeRoms(roms: readonly string[] | undefined): string[] {
  const cleaned = (roms ?? [])
    .map((rom) => cleanText(rom))
    .filter((rom) => rom !== '');
  return [...new Set(cleaned)].sort();
}

/** Strip leading whitespace from every line. */
export function stripIndentation(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trimStart())
    .join('\n');
}

/**
 * NFKC-normalize, drop zero-width and invisible separator characters,
 * unify line breaks, trim trailing whitespace per line and outer blank
 * lines.
 */
export function cleanText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(/[\u200B\u200C\u200D\uFEFF\u2028\u2029]/g, '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
}

function isInheritedLaunch(launch: string, header: HeaderLike | Header | undefined): boolean {
  if (!header?.launchBlock) {
    return false;
  }
  return stripIndentation(launch).trim() === stripIndentation(header.launchBlock).trim();
}

function normalizeAttributes(attributes: GameAttributes): GameAttributes {
  const normalized: GameAttributes = {};
  for (const key of GAME_ATTRIBUTE_KEYS) {
    const value = attributes[key]?.trim();
    if (value) {
      normalized[key] = value;
    }
  }
  return normalized;
}

function compareKeys(a: GameKey, b: GameKey): number {
  if (a[0] !== b[0]) {
    return a[0] < b[0] ? -1 : 1;
  }
  if (a[1] !== b[1]) {
    return a[1] < b[1] ? -1 : 1;
  }
  return 0;
}
