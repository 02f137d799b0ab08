/**
 * Programmatic game edits on a metadata file.
 *
 * A game is located by one of its rom paths (or, failing that, by a
 * title equal to the path); otherwise a new game is appended. The file
 * is rewritten in canonical form.
 *
 * @module editor/upsert
 */

import { isDeepStrictEqual } from 'util';
import { defaultAssets } from '../metadata/assets.js';
import { parseMetadataFile, writeMetadataFile } from '../metadata/file-io.js';
import { GAME_ATTRIBUTE_KEYS } from '../metadata/types.js';
import type { Game, GameAttributes } from '../metadata/types.js';

/** Fields to set; undefined leaves the current value alone. */
export interface GamePatch {
  title?: string;
  sortKey?: string;
  developer?: string;
  description?: string;
  attributes?: GameAttributes;
}

export interface UpsertResult {
  games: Game[];
  game: Game;
  created: boolean;
}

/**
 * Index of the game owning `romPath`, or titled `romPath`, or -1.
 */
export function findGameIndex(games: readonly Game[], romPath: string): number {
  const byRom = games.findIndex((game) => game.roms.includes(romPath));
  if (byRom >= 0) {
    return byRom;
  }
  return games.findIndex((game) => game.title === romPath);
}

/**
 * Insert or update the game for `romPath`. The input array and its
 * games are left untouched.
 */
export function upsertGame(
  games: readonly Game[],
  romPath: string,
  patch: GamePatch = {},
): UpsertResult {
  const index = findGameIndex(games, romPath);
  const created = index < 0;

  const base: Game = created
    ? createGameForRom(hasTitle(patch.title) ? patch.title : romPath, romPath)
    : cloneGame(games[index]);

  if (!base.roms.includes(romPath)) {
    base.roms.push(romPath);
  }
  if (!base.primaryFile) {
    base.primaryFile = base.roms[0];
  }

  const game = applyPatch(base, patch);
  const next = [...games];
  if (created) {
    next.push(game);
  } else {
    next[index] = game;
  }

  return { games: next, game, created };
}

/**
 * Upsert against a file on disk and rewrite it.
 *
 * @throws {MetadataFormatError} On read or write failure
 */
export async function upsertGameInFile(
  path: string,
  romPath: string,
  patch: GamePatch = {},
): Promise<UpsertResult> {
  const { header, games } = await parseMetadataFile(path);
  const result = upsertGame(games, romPath, patch);
  await writeMetadataFile(path, header, result.games);
  return result;
}

// ============================================================================
// Helpers
// ============================================================================

function applyPatch(game: Game, patch: GamePatch): Game {
  if (hasTitle(patch.title) && patch.title !== game.title) {
    // Conventional asset paths follow the title; explicit ones stay put.
    if (isDeepStrictEqual(game.assets, defaultAssets(game.title))) {
      game.assets = defaultAssets(patch.title);
    }
    game.title = patch.title;
  }
  if (patch.sortKey !== undefined) {
    game.sortKey = patch.sortKey;
  }
  if (patch.developer !== undefined) {
    game.developer = patch.developer;
  }
  if (patch.description !== undefined) {
    game.description = patch.description;
  }
  const attributes = patch.attributes;
  if (attributes) {
    for (const key of GAME_ATTRIBUTE_KEYS) {
      const value = attributes[key];
      if (value !== undefined) {
        game.attributes[key] = value;
      }
    }
  }
  return game;
}

/** Blank titles are treated as absent: a game needs a non-empty title. */
function hasTitle(title: string | undefined): title is string {
  return title !== undefined && title.trim() !== '';
}

function createGameForRom(title: string, romPath: string): Game {
  return {
    title,
    primaryFile: romPath,
    roms: [romPath],
    assets: defaultAssets(title),
    attributes: {},
  };
}

function cloneGame(game: Game): Game {
  return {
    ...game,
    roms: [...game.roms],
    assets: { ...game.assets },
    attributes: { ...game.attributes },
  };
}
