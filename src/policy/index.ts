// Barrel exports for policy module

export type { CoreContext, CorePolicy, HackContext, HackPolicy } from './types.js';
export type { CoreChainOptions } from './core-policy.js';
export {
  resolveCore,
  gameOverrideCore,
  headerLaunchCore,
  platformTableCore,
  extensionTableCore,
  createCoreChain,
} from './core-policy.js';
export { isHack, platformSuffixHack, keywordHack } from './hack-policy.js';
