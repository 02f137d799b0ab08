/**
 * Value model for collection metadata files.
 *
 * A metadata file holds one Header (collection-wide defaults) followed by
 * any number of Game blocks. Both are plain data: the parser builds them
 * once per call and downstream consumers clone before mutating.
 *
 * @module metadata/types
 */

// ============================================================================
// Header
// ============================================================================

/**
 * Collection-wide defaults shared by every game in one file.
 *
 * `ignoreFiles` and `extensions` are always present in parsed output;
 * a file that never mentions them yields empty arrays.
 */
export interface Header {
  collection: string;
  defaultSortKey?: string;
  /** Default launch command template, possibly multi-line. */
  launchBlock?: string;
  ignoreFiles: string[];
  /** Lower-case extension tokens without a leading dot. */
  extensions: string[];
}

// ============================================================================
// Game
// ============================================================================

/** Asset kinds the serializer emits in a fixed order before any others. */
export const KNOWN_ASSET_KINDS = ['box_front', 'logo', 'video'] as const;

export type KnownAssetKind = (typeof KNOWN_ASSET_KINDS)[number];

/** Asset kind to relative path. Open-ended: unknown kinds are kept. */
export type AssetMap = Record<string, string>;

/**
 * Verbatim game attributes with no dedicated field, in emission order.
 */
export const GAME_ATTRIBUTE_KEYS = [
  'publisher',
  'genre',
  'release',
  'players',
  'rating',
  'summary',
] as const;

export type GameAttributeKey = (typeof GAME_ATTRIBUTE_KEYS)[number];

export type GameAttributes = Partial<Record<GameAttributeKey, string>>;

/**
 * One library entry. The title is the block key and is never empty.
 */
export interface Game {
  title: string;
  /** First entry of `roms`, when any rom was declared. */
  primaryFile?: string;
  /** Relative rom paths in declaration order; duplicates are preserved. */
  roms: string[];
  sortKey?: string;
  developer?: string;
  description?: string;
  /** Verbatim per-game launch command block. */
  launchOverride?: string;
  /** Core file base name derived from `launchOverride`. */
  coreOverride?: string;
  assets: AssetMap;
  attributes: GameAttributes;
}

/** Result of parsing one metadata file. */
export interface ParsedMetadata {
  header: Header;
  games: Game[];
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Create an empty header. Used as the parser's starting point.
 */
export function createHeader(collection = ''): Header {
  return { collection, ignoreFiles: [], extensions: [] };
}
