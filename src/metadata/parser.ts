/**
 * Collection metadata parser.
 *
 * Line-oriented state machine over the metadata text format:
 *
 *   collection: DC
 *   extension: chd, cdi
 *   launch:
 *     am start -n com.retroarch/.browser.retroactivity.RetroActivityFuture
 *     -e ROM {file.path}
 *
 *   game: Shenmue
 *   file: shenmue.cdi
 *   sort-by: 001
 *
 * Column-0 lines are `key: value` lines; indented lines continue the
 * active multi-line block. Nothing in the content is fatal: lines the
 * parser cannot place are dropped and parsing continues.
 *
 * @module metadata/parser
 */

import { extractCore } from '../launch/core.js';
import { defaultAssets, normalizeAssetKind } from './assets.js';
import { GAME_ATTRIBUTE_KEYS, createHeader } from './types.js';
import type { Game, GameAttributeKey, Header, ParsedMetadata } from './types.js';

// ============================================================================
// State
// ============================================================================

/** Which record key lines currently apply to. */
export type ParserState = 'header' | 'game';

/** Multi-line properties, by internal name. */
export type BlockKey = 'launch' | 'description' | 'ignore_files' | 'extensions' | 'files';

/** Normalized key name to the block it opens. */
const BLOCK_KEYS: ReadonlyMap<string, BlockKey> = new Map<string, BlockKey>([
  ['launch', 'launch'],
  ['description', 'description'],
  ['ignore_files', 'ignore_files'],
  ['extension', 'extensions'],
  ['extensions', 'extensions'],
  ['files', 'files'],
]);

/**
 * Key line: `key: value`. The key ends at the first colon so values
 * such as `C:\roms\game.iso` stay intact.
 *
 * Groups: 1=key, 2=value (untrimmed)
 */
const KEY_LINE_REGEX = /^([A-Za-z][\w.-]*)\s*:(.*)$/;

/** A `files:` marker repeated inside its own block. */
const STRAY_FILES_MARKER = /^files\s*:\s*$/i;

const ASSET_KEY_PREFIX = 'assets.';

const ATTRIBUTE_KEYS: ReadonlySet<string> = new Set(GAME_ATTRIBUTE_KEYS);

// ============================================================================
// Parser context
// ============================================================================

/**
 * Owns all mutable parsing state for one input.
 *
 * Feed lines in order with `feed()`, then call `finish()` once to flush
 * the last block and collect the result.
 */
export class MetadataParserContext {
  state: ParserState = 'header';
  activeBlock: BlockKey | null = null;
  buffer: string[] = [];
  current: Game | null = null;

  private readonly header: Header = createHeader();
  private readonly games: Game[] = [];
  private result: ParsedMetadata | null = null;

  /**
   * Process one line of input (without its line terminator).
   */
  feed(rawLine: string): void {
    if (this.result) {
      return;
    }

    const line = rawLine.replace(/\r$/, '');
    if (line.trim() === '') {
      return;
    }

    // Continuation line
    if (/^[ \t]/.test(line)) {
      if (this.activeBlock) {
        this.buffer.push(line.trim());
      }
      return;
    }

    if (line.startsWith('#') || line.startsWith('//')) {
      return;
    }

    this.flush();

    const match = line.match(KEY_LINE_REGEX);
    if (!match) {
      return;
    }
    this.applyKey(match[1], match[2].trim());
  }

  /**
   * End of input: flush the pending block, finalize the last game and
   * derive core overrides. Idempotent.
   */
  finish(): ParsedMetadata {
    if (this.result) {
      return this.result;
    }

    this.flush();
    this.finalizeGame();

    for (const game of this.games) {
      const core = extractCore(game.launchOverride);
      if (core) {
        game.coreOverride = core;
      }
    }

    this.result = { header: this.header, games: this.games };
    return this.result;
  }

  // --------------------------------------------------------------------------
  // Key lines
  // --------------------------------------------------------------------------

  private applyKey(rawKey: string, value: string): void {
    const key = normalizeKey(rawKey);

    if (key === 'game') {
      this.finalizeGame();
      this.state = 'game';
      this.current = value ? createGame(value) : null;
      return;
    }

    const block = BLOCK_KEYS.get(key);
    if (block) {
      if (this.blockApplies(block)) {
        this.activeBlock = block;
        this.buffer = value ? [value] : [];
      }
      return;
    }

    if (this.state === 'header') {
      this.applyHeaderKey(key, value);
    } else if (this.current) {
      this.applyGameKey(this.current, key, rawKey, value);
    }
  }

  private applyHeaderKey(key: string, value: string): void {
    switch (key) {
      case 'collection':
        this.header.collection = value;
        break;
      case 'sort_by':
        if (value) {
          this.header.defaultSortKey = value;
        }
        break;
      default:
        break;
    }
  }

  private applyGameKey(game: Game, key: string, rawKey: string, value: string): void {
    if (!value) {
      return;
    }

    if (key.startsWith(ASSET_KEY_PREFIX)) {
      const kind = normalizeAssetKind(rawKey.slice(ASSET_KEY_PREFIX.length));
      if (kind) {
        game.assets[kind] = value;
      }
      return;
    }

    switch (key) {
      case 'file':
        game.roms.push(value);
        break;
      case 'sort_by':
        game.sortKey = value;
        break;
      case 'developer':
        game.developer = value;
        break;
      default:
        if (isAttributeKey(key)) {
          game.attributes[key] = value;
        }
        break;
    }
  }

  private blockApplies(block: BlockKey): boolean {
    switch (block) {
      case 'launch':
        return this.state === 'header' || this.current !== null;
      case 'description':
      case 'files':
        return this.state === 'game' && this.current !== null;
      case 'ignore_files':
      case 'extensions':
        return this.state === 'header';
    }
  }

  // --------------------------------------------------------------------------
  // Block commit
  // --------------------------------------------------------------------------

  /**
   * Commit the buffered block to the header or the current game.
   */
  private flush(): void {
    const block = this.activeBlock;
    const lines = this.buffer;
    this.activeBlock = null;
    this.buffer = [];

    if (!block) {
      return;
    }

    switch (block) {
      case 'launch': {
        const text = joinBlock(lines);
        if (!text) break;
        if (this.state === 'header') {
          this.header.launchBlock = text;
        } else if (this.current) {
          this.current.launchOverride = text;
        }
        break;
      }
      case 'description': {
        const text = joinBlock(lines);
        if (text && this.current) {
          this.current.description = text;
        }
        break;
      }
      case 'ignore_files':
        this.header.ignoreFiles.push(...lines.filter((line) => line !== ''));
        break;
      case 'extensions':
        for (const line of lines) {
          this.header.extensions.push(...splitExtensions(line));
        }
        break;
      case 'files':
        if (this.current) {
          this.current.roms.push(
            ...lines.filter((line) => line !== '' && !STRAY_FILES_MARKER.test(line)),
          );
        }
        break;
    }
  }

  /**
   * Close the current game block and append it to the result.
   */
  private finalizeGame(): void {
    const game = this.current;
    this.current = null;
    if (!game) {
      return;
    }

    if (game.roms.length === 0 && game.primaryFile) {
      game.roms = [game.primaryFile];
    } else if (game.roms.length > 0 && !game.primaryFile) {
      game.primaryFile = game.roms[0];
    }

    if (Object.keys(game.assets).length === 0) {
      game.assets = defaultAssets(game.title);
    }

    this.games.push(game);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse metadata text into a header and its games, in source order.
 */
export function parseMetadata(content: string): ParsedMetadata {
  const context = new MetadataParserContext();
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  for (const line of text.split(/\r\n|\r|\n/)) {
    context.feed(line);
  }
  return context.finish();
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Lower-case a key and use `_` as the only word separator:
 * `Sort-By` -> `sort_by`.
 */
export function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/-/g, '_');
}

/**
 * Split one extension line: `7z, .ZIP` -> ['7z', 'zip'].
 */
export function splitExtensions(line: string): string[] {
  return line
    .split(',')
    .map((part) => part.trim().replace(/^\./, '').toLowerCase())
    .filter((part) => part !== '');
}

function joinBlock(lines: string[]): string | undefined {
  const text = lines.filter((line) => line !== '').join('\n');
  return text === '' ? undefined : text;
}

function createGame(title: string): Game {
  return { title, roms: [], assets: {}, attributes: {} };
}

function isAttributeKey(key: string): key is GameAttributeKey {
  return ATTRIBUTE_KEYS.has(key);
}
