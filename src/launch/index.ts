// Barrel exports for launch module

export type { NormalizedLaunch } from './types.js';
export { extractCore } from './core.js';
export { tokenizeCommand } from './tokenizer.js';
export {
  normalizeLaunch,
  identifyEmulator,
  hasRomPlaceholder,
  EMULATOR_BINARIES,
  EMULATOR_PACKAGES,
  ROM_PLACEHOLDERS,
} from './normalizer.js';
