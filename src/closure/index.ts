// Barrel exports for closure module

export type {
  ClosureComparison,
  ClosureReport,
  GameMismatch,
  HeaderFieldDiff,
  VerifyClosureOptions,
} from './types.js';
export type { GameKey, HeaderLike, NormalizedGame, NormalizedHeader } from './normalize.js';
export {
  normalizeHeader,
  normalizeGame,
  normalizeExtensions,
  normalizeRoms,
  stripIndentation,
  cleanText,
  gameKey,
  sortByGameKey,
} from './normalize.js';
export {
  compareParsed,
  verifyClosure,
  scratchPathFor,
  DEFAULT_SCRATCH_DIR,
  DEFAULT_SCRATCH_SUFFIX,
} from './verifier.js';
