import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { parseMetadataFile, writeMetadataFile } from './file-io.js';
import { MetadataFormatError } from './errors.js';
import { createHeader } from './types.js';

describe('metadata file I/O', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `metadata-io-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('parses a file from disk', async () => {
    const path = join(tempDir, 'metadata.pegasus.txt');
    await writeFile(path, 'collection: GBA\ngame: Golden Sun\nfile: gs.gba\n', 'utf-8');

    const { header, games } = await parseMetadataFile(path);

    expect(header.collection).toBe('GBA');
    expect(games[0].title).toBe('Golden Sun');
  });

  it('wraps a missing file in MetadataFormatError', async () => {
    const path = join(tempDir, 'missing.txt');

    const error = await parseMetadataFile(path).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MetadataFormatError);
    expect(error).toMatchObject({ path, operation: 'read', name: 'MetadataFormatError' });
  });

  it('writes canonical text and creates parent directories', async () => {
    const path = join(tempDir, 'nested', 'out.txt');

    await writeMetadataFile(path, createHeader('GBA'), [
      { title: 'Golden Sun', roms: ['gs.gba'], assets: {}, attributes: {} },
    ]);

    expect(await readFile(path, 'utf-8')).toBe('collection: GBA\n\ngame: Golden Sun\nfile: gs.gba\n\n');
  });

  it('wraps a write failure in MetadataFormatError', async () => {
    const blocker = join(tempDir, 'blocker');
    await writeFile(blocker, '', 'utf-8');

    const error = await writeMetadataFile(join(blocker, 'out.txt'), createHeader('X'), []).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(MetadataFormatError);
    expect(error).toMatchObject({ operation: 'write' });
  });
});
