/**
 * Collection tool configuration, read from `collection-meta.json`.
 *
 * @module config/types
 */
export interface CollectionConfig {
  /** Directory with one sub-directory per platform. */
  resourceRoot: string;
  /** Metadata file name looked up in each platform directory. */
  metadataFileName: string;
  /** Closure verifier scratch directory, created beside the source. */
  scratchDirName: string;
  scratchSuffix: string;
  /** Keep closure scratch files after verification. */
  keepScratch: boolean;
}
