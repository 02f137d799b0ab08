import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { findGameIndex, upsertGame, upsertGameInFile } from './upsert.js';
import { defaultAssets } from '../metadata/assets.js';
import { parseMetadata } from '../metadata/parser.js';
import { serializeMetadata } from '../metadata/serializer.js';
import { createHeader } from '../metadata/types.js';
import type { Game } from '../metadata/types.js';

function game(overrides: Partial<Game> & Pick<Game, 'title'>): Game {
  return { roms: [], assets: {}, attributes: {}, ...overrides };
}

describe('findGameIndex', () => {
  const games = [
    game({ title: 'a.iso' }),
    game({ title: 'Saga', roms: ['009/disc1.chd', '009/disc2.chd'] }),
  ];

  it('matches by rom before title', () => {
    expect(findGameIndex(games, '009/disc2.chd')).toBe(1);
    expect(findGameIndex(games, 'a.iso')).toBe(0);
    expect(findGameIndex(games, 'none.iso')).toBe(-1);
  });
});

describe('upsertGame', () => {
  it('appends a new game with default assets', () => {
    const { games, game: created, created: isNew } = upsertGame([], 'roms/ct.cdi', {
      title: 'Crazy Taxi',
      attributes: { genre: 'Racing' },
    });

    expect(isNew).toBe(true);
    expect(games).toEqual([created]);
    expect(created).toEqual({
      title: 'Crazy Taxi',
      primaryFile: 'roms/ct.cdi',
      roms: ['roms/ct.cdi'],
      assets: defaultAssets('Crazy Taxi'),
      attributes: { genre: 'Racing' },
    });
  });

  it('titles a new game after the rom when the patch title is blank', () => {
    const { games, game: created } = upsertGame([], 'new.iso', { title: '  ' });

    expect(created.title).toBe('new.iso');
    expect(created.assets).toEqual(defaultAssets('new.iso'));

    const reparsed = parseMetadata(serializeMetadata(createHeader('X'), games));
    expect(reparsed.games.map((g) => g.roms)).toEqual([['new.iso']]);
  });

  it('keeps the current title when the patch title is blank', () => {
    const original = [game({ title: 'Saga', roms: ['s.chd'] })];

    const { game: updated } = upsertGame(original, 's.chd', { title: '' });

    expect(updated.title).toBe('Saga');
  });

  it('updates in place without mutating the input', () => {
    const original = [game({ title: 'Saga', roms: ['s.chd'], primaryFile: 's.chd', developer: 'Old' })];

    const result = upsertGame(original, 's.chd', { developer: 'New', sortKey: '009' });

    expect(result.created).toBe(false);
    expect(result.game.developer).toBe('New');
    expect(result.game.sortKey).toBe('009');
    expect(original[0].developer).toBe('Old');
    expect(original[0].sortKey).toBeUndefined();
  });

  it('moves default assets with a title change', () => {
    const original = [game({ title: 'Old', roms: ['x.iso'], assets: defaultAssets('Old') })];

    const { game: renamed } = upsertGame(original, 'x.iso', { title: 'New' });

    expect(renamed.title).toBe('New');
    expect(renamed.assets).toEqual(defaultAssets('New'));
  });

  it('keeps explicit assets on a title change', () => {
    const assets = { box_front: 'media/custom/front.png' };
    const original = [game({ title: 'Old', roms: ['x.iso'], assets })];

    const { game: renamed } = upsertGame(original, 'x.iso', { title: 'New' });

    expect(renamed.assets).toEqual(assets);
  });

  it('adds the rom to a game matched by title', () => {
    const original = [game({ title: 'loose.iso' })];

    const { game: updated } = upsertGame(original, 'loose.iso');

    expect(updated.roms).toEqual(['loose.iso']);
    expect(updated.primaryFile).toBe('loose.iso');
  });
});

describe('upsertGameInFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `upsert-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('rewrites the file in canonical form', async () => {
    const path = join(dir, 'metadata.pegasus.txt');
    await writeFile(path, 'collection: GBA\ngame: Golden Sun\nfile: gs.gba\n', 'utf-8');

    const result = await upsertGameInFile(path, 'gs.gba', { developer: 'Camelot' });

    expect(result.created).toBe(false);
    expect(await readFile(path, 'utf-8')).toBe(
      'collection: GBA\n\ngame: Golden Sun\nfile: gs.gba\ndeveloper: Camelot\n\n',
    );
  });
});
