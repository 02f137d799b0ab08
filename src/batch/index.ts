// Barrel exports for batch module

export type {
  BatchSummary,
  PlatformVerification,
  VerifyCollectionsOptions,
} from './verify-collections.js';
export { verifyCollections } from './verify-collections.js';
