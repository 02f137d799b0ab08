/**
 * Pluggable detection of modified ("hack") content.
 *
 * @module policy/hack-policy
 */

import type { HackContext, HackPolicy } from './types.js';

/**
 * True when any policy says so.
 */
export function isHack(policies: readonly HackPolicy[], context: HackContext): boolean {
  return policies.some((policy) => policy(context));
}

/** Whole platform is hacks: key ends with the suffix. */
export function platformSuffixHack(suffix = '_hack'): HackPolicy {
  return ({ platformKey }) => platformKey.endsWith(suffix);
}

/**
 * Case-insensitive keyword match on the title and primary file.
 */
export function keywordHack(keywords: readonly string[]): HackPolicy {
  const needles = keywords.map((keyword) => keyword.toLowerCase()).filter((k) => k !== '');
  return ({ game }) => {
    const title = game.title.toLowerCase();
    const file = (game.primaryFile ?? '').toLowerCase();
    return needles.some((needle) => title.includes(needle) || file.includes(needle));
  };
}
