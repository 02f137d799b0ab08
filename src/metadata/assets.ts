/**
 * Asset path conventions.
 *
 * Paths are handled as segment arrays so that `/` and `\` separated
 * inputs behave the same way. Output always uses `/`.
 *
 * @module metadata/assets
 */

import { KNOWN_ASSET_KINDS } from './types.js';
import type { AssetMap, Game, KnownAssetKind } from './types.js';

/** Root directory for per-game media. */
export const MEDIA_ROOT = 'media';

/** Conventional file name per known asset kind. */
export const DEFAULT_ASSET_FILES: Record<KnownAssetKind, string> = {
  box_front: 'boxFront.jpg',
  logo: 'logo.png',
  video: 'video.mp4',
};

/**
 * Split a relative path into its non-empty segments.
 * `.` segments are dropped; `..` is kept verbatim.
 */
export function splitPathSegments(path: string): string[] {
  return path
    .split(/[\\/]+/)
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '' && segment !== '.');
}

export function joinPathSegments(segments: readonly string[]): string {
  return segments.join('/');
}

/**
 * Build the conventional asset map for a game title:
 * `media/<title>/<kind file>` for each known kind.
 */
export function defaultAssets(title: string): AssetMap {
  const titleSegments = splitPathSegments(title);
  const assets: AssetMap = {};
  for (const kind of KNOWN_ASSET_KINDS) {
    assets[kind] = joinPathSegments([MEDIA_ROOT, ...titleSegments, DEFAULT_ASSET_FILES[kind]]);
  }
  return assets;
}

/**
 * A game whose content spans more than one rom file.
 */
export function isMultiDisc(game: Pick<Game, 'roms'>): boolean {
  return game.roms.length > 1;
}

/**
 * Leading directory shared by a multi-disc game's roms, taken from the
 * first rom path. Undefined when the first rom sits at the collection root.
 */
export function sharedRomDirectory(roms: readonly string[]): string | undefined {
  if (roms.length === 0) {
    return undefined;
  }
  const segments = splitPathSegments(roms[0]);
  return segments.length > 1 ? segments[0] : undefined;
}

/**
 * Re-home an asset under the rom directory, keeping only its file name.
 *
 * rewriteAssetPath('media/Old Title/cover.png', '009') -> 'media/009/cover.png'
 */
export function rewriteAssetPath(assetPath: string, romDirectory: string): string {
  const segments = splitPathSegments(assetPath);
  if (segments.length === 0) {
    return assetPath;
  }
  const fileName = segments[segments.length - 1];
  return joinPathSegments([MEDIA_ROOT, romDirectory, fileName]);
}

/**
 * Asset kinds of a map in emission order: known kinds first, then the
 * remaining kinds alphabetically.
 */
export function orderedAssetKinds(assets: AssetMap): string[] {
  const known: string[] = KNOWN_ASSET_KINDS.filter((kind) => kind in assets);
  const extra = Object.keys(assets)
    .filter((kind) => !known.includes(kind))
    .sort();
  return [...known, ...extra];
}

/**
 * Normalize an asset kind as written after `assets.` in a key line.
 * camelCase and hyphens become snake_case: `boxFront` -> `box_front`.
 */
export function normalizeAssetKind(kind: string): string {
  return kind
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}
