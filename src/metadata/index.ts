// Barrel exports for metadata module

export type {
  Header,
  Game,
  AssetMap,
  GameAttributes,
  GameAttributeKey,
  KnownAssetKind,
  ParsedMetadata,
} from './types.js';
export { KNOWN_ASSET_KINDS, GAME_ATTRIBUTE_KEYS, createHeader } from './types.js';
export type { ParserState, BlockKey } from './parser.js';
export { MetadataParserContext, parseMetadata, normalizeKey, splitExtensions } from './parser.js';
export { serializeMetadata, serializeHeader, serializeGame, BLOCK_INDENT } from './serializer.js';
export { parseMetadataFile, writeMetadataFile } from './file-io.js';
export { MetadataFormatError } from './errors.js';
export {
  MEDIA_ROOT,
  DEFAULT_ASSET_FILES,
  defaultAssets,
  isMultiDisc,
  sharedRomDirectory,
  rewriteAssetPath,
  orderedAssetKinds,
  normalizeAssetKind,
  splitPathSegments,
  joinPathSegments,
} from './assets.js';
