import type { GameKey, NormalizedGame, NormalizedHeader } from './normalize.js';

/** One header field whose normalized values differ. */
export interface HeaderFieldDiff {
  field: keyof NormalizedHeader;
  original: NormalizedHeader[keyof NormalizedHeader];
  reparsed: NormalizedHeader[keyof NormalizedHeader];
}

/**
 * First pair of games (in pairing-key order) that differ.
 * One side is missing when the game counts differ.
 */
export interface GameMismatch {
  key: GameKey;
  original?: NormalizedGame;
  reparsed?: NormalizedGame;
}

export interface ClosureComparison {
  ok: boolean;
  headerEqual: boolean;
  gamesEqual: boolean;
  headerDiff: HeaderFieldDiff[];
  gameMismatch?: GameMismatch;
  gameCounts: { original: number; reparsed: number };
}

export interface ClosureReport extends ClosureComparison {
  sourcePath: string;
  scratchPath: string;
  scratchKept: boolean;
}

export interface VerifyClosureOptions {
  /** Keep the serialized scratch file for inspection. */
  keepScratch?: boolean;
  scratchDirName?: string;
  scratchSuffix?: string;
}
