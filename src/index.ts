// Metadata model, parser and serializer
export type {
  Header,
  Game,
  AssetMap,
  GameAttributes,
  GameAttributeKey,
  KnownAssetKind,
  ParsedMetadata,
  ParserState,
  BlockKey,
} from './metadata/index.js';
export {
  KNOWN_ASSET_KINDS,
  GAME_ATTRIBUTE_KEYS,
  createHeader,
  MetadataParserContext,
  parseMetadata,
  parseMetadataFile,
  serializeMetadata,
  serializeHeader,
  serializeGame,
  writeMetadataFile,
  MetadataFormatError,
  defaultAssets,
  isMultiDisc,
  sharedRomDirectory,
  rewriteAssetPath,
} from './metadata/index.js';

// Launch commands
export type { NormalizedLaunch } from './launch/index.js';
export { normalizeLaunch, extractCore, tokenizeCommand } from './launch/index.js';

// Closure verification
export type {
  ClosureReport,
  ClosureComparison,
  GameMismatch,
  HeaderFieldDiff,
  VerifyClosureOptions,
  NormalizedGame,
  NormalizedHeader,
} from './closure/index.js';
export { verifyClosure, compareParsed, normalizeHeader, normalizeGame } from './closure/index.js';

// Batch, platforms, editing
export type { BatchSummary, PlatformVerification } from './batch/index.js';
export { verifyCollections } from './batch/index.js';
export type { PlatformEntry } from './platforms/index.js';
export { discoverPlatforms, slugifyPlatform } from './platforms/index.js';
export type { GamePatch, UpsertResult } from './editor/index.js';
export { upsertGame, upsertGameInFile, findGameIndex } from './editor/index.js';

// Policies
export type { CorePolicy, CoreContext, HackPolicy, HackContext } from './policy/index.js';
export {
  resolveCore,
  createCoreChain,
  isHack,
  platformSuffixHack,
  keywordHack,
} from './policy/index.js';

// Configuration
export type { CollectionConfig } from './config/index.js';
export {
  readCollectionConfig,
  validateCollectionConfig,
  CollectionConfigError,
  DEFAULT_COLLECTION_CONFIG,
} from './config/index.js';
