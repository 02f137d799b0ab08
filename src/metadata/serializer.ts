/**
 * Canonical metadata writer.
 *
 * Field order, indentation and blank lines are fixed here, never taken
 * from the data, so equal input always produces byte-identical text.
 *
 * @module metadata/serializer
 */

import {
  isMultiDisc,
  orderedAssetKinds,
  rewriteAssetPath,
  sharedRomDirectory,
} from './assets.js';
import { GAME_ATTRIBUTE_KEYS } from './types.js';
import type { Game, Header } from './types.js';

/** Indentation used for every block line. */
export const BLOCK_INDENT = '  ';

/**
 * Serialize a header and its games to metadata text.
 */
export function serializeMetadata(header: Header, games: readonly Game[]): string {
  const lines: string[] = [...serializeHeader(header)];
  for (const game of games) {
    lines.push(...serializeGame(game, header));
  }
  return lines.join('\n') + '\n';
}

/**
 * Header lines, ending with one blank line.
 */
export function serializeHeader(header: Header): string[] {
  const lines: string[] = [];

  if (header.collection) {
    lines.push(`collection: ${header.collection}`);
  }
  if (header.defaultSortKey) {
    lines.push(`sort-by: ${header.defaultSortKey}`);
  }
  if (header.launchBlock) {
    lines.push(...textProperty('launch', header.launchBlock));
  }
  if (header.ignoreFiles.length > 0) {
    lines.push(...listBlock('ignore-files', header.ignoreFiles));
  }
  if (header.extensions.length > 0) {
    lines.push(...listBlock('extension', header.extensions));
  }

  lines.push('');
  return lines;
}

/**
 * Lines for one game block, ending with one blank line.
 *
 * The launch line is left out when it would repeat the header default.
 * Assets are only written for multi-disc games; single-file games get
 * theirs back from the `media/<title>/` convention on the next parse.
 */
export function serializeGame(game: Game, header?: Header): string[] {
  const title = game.title.trim();
  if (!title) {
    return [];
  }

  const lines: string[] = [`game: ${title}`];

  if (game.roms.length === 1) {
    lines.push(`file: ${game.roms[0]}`);
  } else if (game.roms.length > 1) {
    lines.push(...listBlock('files', game.roms));
  }

  if (game.sortKey) {
    lines.push(`sort-by: ${game.sortKey}`);
  }
  if (game.developer) {
    lines.push(`developer: ${game.developer}`);
  }
  for (const key of GAME_ATTRIBUTE_KEYS) {
    const value = game.attributes[key];
    if (value) {
      lines.push(`${key}: ${value}`);
    }
  }

  if (isMultiDisc(game)) {
    lines.push(...assetLines(game));
  }

  if (game.description) {
    lines.push(...textProperty('description', game.description));
  }

  const launch = game.launchOverride;
  if (launch && launch.trim() !== (header?.launchBlock ?? '').trim()) {
    lines.push(...textProperty('launch', launch));
  }

  lines.push('');
  return lines;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * `key: value` for one-line text, otherwise `key:` and an indented block.
 */
function textProperty(key: string, text: string): string[] {
  const body = text.split('\n').map((line) => line.trim());
  if (body.length === 1) {
    return [`${key}: ${body[0]}`];
  }
  return [`${key}:`, ...body.map(indent)];
}

function listBlock(key: string, items: readonly string[]): string[] {
  return [`${key}:`, ...items.map(indent)];
}

function indent(line: string): string {
  return line === '' ? '' : `${BLOCK_INDENT}${line}`;
}

/**
 * `assets.<kind>: <path>` lines for a multi-disc game, re-homed under
 * the directory its roms share.
 */
function assetLines(game: Game): string[] {
  const romDirectory = sharedRomDirectory(game.roms);
  return orderedAssetKinds(game.assets).map((kind) => {
    const path = game.assets[kind];
    const written = romDirectory ? rewriteAssetPath(path, romDirectory) : path;
    return `assets.${kind}: ${written}`;
  });
}
