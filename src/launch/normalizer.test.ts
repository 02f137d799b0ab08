import { describe, it, expect } from 'vitest';
import { normalizeLaunch, identifyEmulator, hasRomPlaceholder } from './normalizer.js';
import { extractCore } from './core.js';

describe('extractCore', () => {
  it('returns the base name of a quoted core path', () => {
    expect(
      extractCore('retroarch -L "/path/cores/mednafen_psx_hw_libretro_android.so" "%ROM%"'),
    ).toBe('mednafen_psx_hw_libretro_android.so');
  });

  it('handles Windows core paths', () => {
    expect(extractCore('retroarch.exe -L C:\\RA\\cores\\snes9x_libretro.dll %ROM%')).toBe(
      'snes9x_libretro.dll',
    );
  });

  it('returns undefined when no core is referenced', () => {
    expect(extractCore('redream {file.path}')).toBeUndefined();
    expect(extractCore(undefined)).toBeUndefined();
  });
});

describe('normalizeLaunch', () => {
  it('extracts emulator, binary, core and rom index', () => {
    const raw = 'retroarch -L "/path/cores/mednafen_psx_hw_libretro_android.so" "%ROM%"';

    expect(normalizeLaunch(raw)).toEqual({
      raw,
      emulator: 'retroarch',
      binary: 'retroarch',
      core: 'mednafen_psx_hw_libretro_android.so',
      romArgIndex: 3,
    });
  });

  it('recognizes an Android intent launch', () => {
    const raw = [
      'am start --user 0',
      '  -n com.retroarch.aarch64/com.retroarch.browser.retroactivity.RetroActivityFuture',
      '  -e ROM {file.path}',
      '  -e LIBRETRO /data/data/com.retroarch.aarch64/cores/flycast_libretro_android.so',
    ].join('\n');

    const result = normalizeLaunch(raw);

    expect(result.emulator).toBe('retroarch');
    expect(result.binary).toBe(
      'com.retroarch.aarch64/com.retroarch.browser.retroactivity.RetroActivityFuture',
    );
    expect(result.core).toBe('flycast_libretro_android.so');
    expect(result.romArgIndex).toBe(8);
  });

  it('recognizes a Windows executable path', () => {
    const result = normalizeLaunch('"C:\\Emulators\\PCSX2\\pcsx2-qt.exe" -- {file.path}');

    expect(result.emulator).toBe('pcsx2');
    expect(result.binary).toBe('C:\\Emulators\\PCSX2\\pcsx2-qt.exe');
    expect(result.romArgIndex).toBe(2);
  });

  it('finds the rom after a quoted directory with a trailing backslash', () => {
    const result = normalizeLaunch('retroarch --appendconfig "C:\\RetroArch\\" "%ROM%"');

    expect(result.emulator).toBe('retroarch');
    expect(result.romArgIndex).toBe(3);
  });

  it('keeps only raw and core when quoting is unbalanced', () => {
    const raw = 'retroarch -L cores/genesis_plus_gx_libretro.so "%ROM%';

    expect(normalizeLaunch(raw)).toEqual({ raw, core: 'genesis_plus_gx_libretro.so' });
  });

  it('returns only raw for an unknown command', () => {
    expect(normalizeLaunch('mystery-tool --flag')).toEqual({ raw: 'mystery-tool --flag' });
  });
});

describe('identifyEmulator', () => {
  it('ignores unknown Android packages', () => {
    expect(identifyEmulator('com.example.app/.Main')).toBeUndefined();
  });

  it('does not match prototype keys', () => {
    expect(identifyEmulator('constructor')).toBeUndefined();
  });
});

describe('hasRomPlaceholder', () => {
  it('matches embedded and case-variant placeholders', () => {
    expect(hasRomPlaceholder('--rom={file.path}')).toBe(true);
    expect(hasRomPlaceholder('%rom%')).toBe(true);
    expect(hasRomPlaceholder('{file.uri}')).toBe(true);
    expect(hasRomPlaceholder('-L')).toBe(false);
  });
});
