/**
 * Metadata file reading and writing.
 *
 * Thin I/O layer over the pure parser and serializer. Every file-system
 * failure is rethrown as a MetadataFormatError carrying the path.
 *
 * @module metadata/file-io
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { MetadataFormatError } from './errors.js';
import { parseMetadata } from './parser.js';
import { serializeMetadata } from './serializer.js';
import type { Game, Header, ParsedMetadata } from './types.js';

/**
 * Read and parse a UTF-8 metadata file.
 *
 * @throws {MetadataFormatError} When the file cannot be read
 */
export async function parseMetadataFile(path: string): Promise<ParsedMetadata> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new MetadataFormatError(
      `Could not read metadata file ${path}: ${describeError(err)}`,
      path,
      'read',
      { cause: err },
    );
  }
  return parseMetadata(content);
}

/**
 * Serialize and write a metadata file, creating parent directories.
 *
 * @throws {MetadataFormatError} When the file cannot be written
 */
export async function writeMetadataFile(
  path: string,
  header: Header,
  games: readonly Game[],
): Promise<void> {
  const content = serializeMetadata(header, games);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (err) {
    throw new MetadataFormatError(
      `Could not write metadata file ${path}: ${describeError(err)}`,
      path,
      'write',
      { cause: err },
    );
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
