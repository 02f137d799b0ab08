/**
 * Zod schema for the collection tool configuration.
 *
 * Every field has a `.default()` so that `CollectionConfigSchema.parse({})`
 * returns a complete config and a missing or partial file just works.
 *
 * @module config/schema
 */

import { z } from 'zod';
import type { CollectionConfig } from './types.js';

/**
 * Usage:
 * ```typescript
 * const config = CollectionConfigSchema.parse({ resourceRoot: 'Roms' });
 * ```
 */
export const CollectionConfigSchema = z.object({
  resourceRoot: z.string().min(1).default('Resource'),
  metadataFileName: z.string().min(1).default('metadata.pegasus.txt'),
  scratchDirName: z.string().min(1).default('_norm_test'),
  scratchSuffix: z.string().min(1).default('.norm'),
  keepScratch: z.boolean().default(false),
});

export type InferredCollectionConfig = z.infer<typeof CollectionConfigSchema>;

/** Config produced by parsing an empty object. */
export const DEFAULT_COLLECTION_CONFIG: CollectionConfig = CollectionConfigSchema.parse({});
