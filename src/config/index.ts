/**
 * Config module — barrel exports.
 *
 * @module config
 */

export type { CollectionConfig } from './types.js';
export { CollectionConfigSchema, DEFAULT_COLLECTION_CONFIG } from './schema.js';
export type { InferredCollectionConfig } from './schema.js';
export {
  readCollectionConfig,
  validateCollectionConfig,
  CollectionConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
