import type { Game, Header } from '../metadata/types.js';

/** What a core policy may look at for one game. */
export interface CoreContext {
  /** Slugified platform key, e.g. `dc` or `ss_hack`. */
  platformKey: string;
  header: Header;
  game: Game;
}

/**
 * Answers with a core name, or undefined to defer to the next policy.
 */
export type CorePolicy = (context: CoreContext) => string | undefined;

export interface HackContext {
  platformKey: string;
  game: Game;
}

/** True when the policy considers the game modified content. */
export type HackPolicy = (context: HackContext) => boolean;
