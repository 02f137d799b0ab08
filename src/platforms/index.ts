// Barrel exports for platforms module

export type { PlatformEntry } from './discover.js';
export { slugifyPlatform, discoverPlatforms } from './discover.js';
