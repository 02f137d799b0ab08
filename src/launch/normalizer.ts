/**
 * Launch command normalizer.
 *
 * Turns a free-form launch command (desktop binary invocation or an
 * Android `am start` intent) into a NormalizedLaunch. Never throws:
 * anything unrecognized is simply left out of the result.
 *
 * @module launch/normalizer
 */

import { extractCore } from './core.js';
import { tokenizeCommand } from './tokenizer.js';
import type { NormalizedLaunch } from './types.js';

// ============================================================================
// Known front-ends
// ============================================================================

/** Executable base names (lower case, no extension) to emulator id. */
export const EMULATOR_BINARIES: Readonly<Record<string, string>> = {
  retroarch: 'retroarch',
  ppsspp: 'ppsspp',
  ppssppsdl: 'ppsspp',
  dolphin: 'dolphin',
  'dolphin-emu': 'dolphin',
  pcsx2: 'pcsx2',
  'pcsx2-qt': 'pcsx2',
  duckstation: 'duckstation',
  'duckstation-qt': 'duckstation',
  flycast: 'flycast',
  redream: 'redream',
  mame: 'mame',
  citra: 'citra',
  'citra-qt': 'citra',
  mednafen: 'mednafen',
};

/** Android package name prefixes to emulator id. */
export const EMULATOR_PACKAGES: Readonly<Record<string, string>> = {
  'com.retroarch': 'retroarch',
  'org.ppsspp.ppsspp': 'ppsspp',
  'org.dolphinemu.dolphinemu': 'dolphin',
  'com.github.stenzek.duckstation': 'duckstation',
  'xyz.aethersx2.android': 'pcsx2',
  'com.flycast.emulator': 'flycast',
  'io.recompiled.redream': 'redream',
  'org.citra.citra_emu': 'citra',
};

/** Placeholder spellings standing for the current rom file. */
export const ROM_PLACEHOLDERS = [
  '{file.path}',
  '{file.uri}',
  '{file.documenturi}',
  '{file.name}',
  '{file.basename}',
  '{file}',
  '%ROM%',
  '%ROMPATH%',
] as const;

const EXECUTABLE_SUFFIX = /\.(exe|appimage|app|sh|bat)$/i;

/** `package/activity` component names as passed to `am start -n`. */
const ANDROID_COMPONENT_REGEX = /^([A-Za-z][\w]*(?:\.[\w]+)+)\/[\w.$]+$/;

// ============================================================================
// Public API
// ============================================================================

/**
 * Normalize a raw launch command.
 *
 * An unbalanced quote yields no tokens, so only `raw` and `core`
 * (which is matched on the whole string) can be present.
 */
export function normalizeLaunch(raw: string): NormalizedLaunch {
  const result: NormalizedLaunch = { raw };
  const tokens = tokenizeCommand(raw) ?? [];

  for (const token of tokens) {
    const emulator = identifyEmulator(token);
    if (emulator) {
      result.emulator = emulator;
      result.binary = token;
      break;
    }
  }

  const core = extractCore(raw);
  if (core) {
    result.core = core;
  }

  const romArgIndex = tokens.findIndex(hasRomPlaceholder);
  if (romArgIndex >= 0) {
    result.romArgIndex = romArgIndex;
  }

  return result;
}

/**
 * Identify the emulator a single token refers to, either as an
 * executable path or as an Android component name.
 */
export function identifyEmulator(token: string): string | undefined {
  const component = token.match(ANDROID_COMPONENT_REGEX);
  const fromPackage = component ? lookupPackage(component[1]) : undefined;
  if (fromPackage) {
    return fromPackage;
  }

  const segments = token.split(/[\\/]/);
  const baseName = segments[segments.length - 1].toLowerCase().replace(EXECUTABLE_SUFFIX, '');
  return Object.hasOwn(EMULATOR_BINARIES, baseName) ? EMULATOR_BINARIES[baseName] : undefined;
}

/**
 * True when the token carries any rom placeholder spelling.
 * Placeholders are matched case-insensitively and may be embedded,
 * as in `--rom={file.path}`.
 */
export function hasRomPlaceholder(token: string): boolean {
  const lower = token.toLowerCase();
  return ROM_PLACEHOLDERS.some((placeholder) => lower.includes(placeholder.toLowerCase()));
}

function lookupPackage(packageName: string): string | undefined {
  for (const [prefix, emulator] of Object.entries(EMULATOR_PACKAGES)) {
    if (packageName === prefix || packageName.startsWith(`${prefix}.`)) {
      return emulator;
    }
  }
  return undefined;
}
