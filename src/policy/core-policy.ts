/**
 * Pluggable emulator core selection.
 *
 * Core choice is product policy, not format: callers compose the
 * policies they want and the first one with an answer wins. Nothing in
 * the parser or serializer consults these.
 *
 * @module policy/core-policy
 */

import { extname } from 'path';
import { extractCore } from '../launch/core.js';
import type { CoreContext, CorePolicy } from './types.js';

/**
 * Run policies in order and return the first non-empty answer.
 */
export function resolveCore(
  policies: readonly CorePolicy[],
  context: CoreContext,
): string | undefined {
  for (const policy of policies) {
    const core = policy(context);
    if (core) {
      return core;
    }
  }
  return undefined;
}

/** The game's own launch override names a core. */
export const gameOverrideCore: CorePolicy = ({ game }) => game.coreOverride;

/** The collection's default launch block names a core. */
export const headerLaunchCore: CorePolicy = ({ header }) => extractCore(header.launchBlock);

/**
 * Look the platform key up in a static table.
 */
export function platformTableCore(table: Readonly<Record<string, string>>): CorePolicy {
  return ({ platformKey }) => (Object.hasOwn(table, platformKey) ? table[platformKey] : undefined);
}

/**
 * Guess from the primary file's extension. Table keys include the dot
 * and are lower case: `{ '.cue': 'mednafen_psx_hw' }`.
 */
export function extensionTableCore(table: Readonly<Record<string, string>>): CorePolicy {
  return ({ game }) => {
    const file = game.primaryFile ?? game.roms[0];
    if (!file) {
      return undefined;
    }
    const ext = extname(file).toLowerCase();
    return Object.hasOwn(table, ext) ? table[ext] : undefined;
  };
}

export interface CoreChainOptions {
  platformCores?: Readonly<Record<string, string>>;
  extensionCores?: Readonly<Record<string, string>>;
}

/**
 * Override, then header default, then the optional platform and
 * extension tables.
 */
export function createCoreChain(options: CoreChainOptions = {}): CorePolicy[] {
  const chain: CorePolicy[] = [gameOverrideCore, headerLaunchCore];
  if (options.platformCores) {
    chain.push(platformTableCore(options.platformCores));
  }
  if (options.extensionCores) {
    chain.push(extensionTableCore(options.extensionCores));
  }
  return chain;
}
