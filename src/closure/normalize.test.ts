import { describe, it, expect } from 'vitest';
import {
  cleanText,
  normalizeExtensions,
  normalizeGame,
  normalizeHeader,
  normalizeRoms,
  sortByGameKey,
  stripIndentation,
} from './normalize.js';
import type { Game } from '../metadata/types.js';

function game(overrides: Partial<Game> & Pick<Game, 'title'>): Game {
  return { roms: [], assets: {}, attributes: {}, ...overrides };
}

describe('normalizeHeader', () => {
  it('fills missing list fields and splits comma-joined extensions', () => {
    expect(normalizeHeader({ collection: ' DC ', extensions: 'chd, cdi,' })).toEqual({
      collection: 'DC',
      ignoreFiles: [],
      extensions: ['chd', 'cdi'],
    });
  });

  it('strips launch block indentation', () => {
    const header = normalizeHeader({ collection: 'PS1', launchBlock: '  am start\n    -e ROM {file.path}' });

    expect(header.launchBlock).toBe('am start\n-e ROM {file.path}');
  });
});

describe('normalizeGame', () => {
  it('drops empty optional fields and assets', () => {
    const normalized = normalizeGame(
      game({
        title: ' Shenmue ',
        roms: ['b.cdi', 'a.cdi'],
        developer: '',
        assets: { logo: 'media/Shenmue/logo.png' },
        attributes: { genre: ' Adventure ', players: '' },
      }),
    );

    expect(normalized).toEqual({
      title: 'Shenmue',
      roms: ['a.cdi', 'b.cdi'],
      attributes: { genre: 'Adventure' },
    });
  });

  it('cleans description text', () => {
    const normalized = normalizeGame(game({ title: 'G', description: '  Line\u200B one  \r\n  two\n\n' }));

    expect(normalized.description).toBe('Line one\ntwo');
  });

  it('keeps a launch override that differs from the header', () => {
    const normalized = normalizeGame(
      game({ title: 'G', launchOverride: 'retroarch -L a_libretro.so', coreOverride: 'a_libretro.so' }),
      { collection: 'X', launchBlock: 'redream {file.path}' },
    );

    expect(normalized.launchOverride).toBe('retroarch -L a_libretro.so');
    expect(normalized.coreOverride).toBe('a_libretro.so');
  });

  it('drops a launch override inherited from the header', () => {
    const normalized = normalizeGame(
      game({ title: 'G', launchOverride: '  redream {file.path}', coreOverride: 'x_libretro.so' }),
      { collection: 'X', launchBlock: 'redream {file.path}' },
    );

    expect(normalized.launchOverride).toBeUndefined();
    expect(normalized.coreOverride).toBeUndefined();
  });
});

describe('field helpers', () => {
  it('normalizes roms: clean, de-duplicate, sort', () => {
    expect(normalizeRoms([' b.iso', 'a.iso', 'b.iso', '', '\uFEFF'])).toEqual(['a.iso', 'b.iso']);
    expect(normalizeRoms(undefined)).toEqual([]);
  });

  it('applies NFKC to text', () => {
    expect(cleanText('\uFF21\uFF22')).toBe('AB');
  });

  it('normalizes extension lists', () => {
    expect(normalizeExtensions([' zip ', ''])).toEqual(['zip']);
    expect(normalizeExtensions(undefined)).toEqual([]);
  });

  it('strips leading whitespace from every line', () => {
    expect(stripIndentation('\ta\n  b\r\nc')).toBe('a\nb\nc');
  });

  it('sorts games by title then first rom', () => {
    const games = [
      normalizeGame(game({ title: 'B', roms: ['b.iso'] })),
      normalizeGame(game({ title: 'A', roms: ['z.iso'] })),
      normalizeGame(game({ title: 'A', roms: ['a.iso'] })),
    ];

    expect(sortByGameKey(games).map((g) => [g.title, g.roms[0]])).toEqual([
      ['A', 'a.iso'],
      ['A', 'z.iso'],
      ['B', 'b.iso'],
    ]);
  });
});
