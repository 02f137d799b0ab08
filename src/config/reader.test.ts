/**
 * Tests for the collection config reader.
 *
 * Covers:
 * - Missing file returns all defaults
 * - Partial override merges with defaults
 * - Invalid JSON and schema failures throw CollectionConfigError
 * - Non-ENOENT errors propagate
 * - Pure validateCollectionConfig function
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  readCollectionConfig,
  validateCollectionConfig,
  CollectionConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
import { DEFAULT_COLLECTION_CONFIG } from './schema.js';

// Mock fs/promises for controlled file reading
vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
}));

import { readFile } from 'fs/promises';

const mockReadFile = vi.mocked(readFile);

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(code);
  err.code = code;
  return err;
}

describe('readCollectionConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns defaults when the file does not exist', async () => {
    mockReadFile.mockRejectedValue(errnoError('ENOENT'));

    const config = await readCollectionConfig();

    expect(config).toEqual(DEFAULT_COLLECTION_CONFIG);
    expect(config).toEqual({
      resourceRoot: 'Resource',
      metadataFileName: 'metadata.pegasus.txt',
      scratchDirName: '_norm_test',
      scratchSuffix: '.norm',
      keepScratch: false,
    });
    expect(mockReadFile).toHaveBeenCalledWith(DEFAULT_CONFIG_PATH, 'utf-8');
  });

  it('merges a partial file with defaults', async () => {
    mockReadFile.mockResolvedValue(JSON.stringify({ resourceRoot: 'Roms', keepScratch: true }));

    const config = await readCollectionConfig('custom.json');

    expect(config.resourceRoot).toBe('Roms');
    expect(config.keepScratch).toBe(true);
    expect(config.metadataFileName).toBe('metadata.pegasus.txt');
    expect(mockReadFile).toHaveBeenCalledWith('custom.json', 'utf-8');
  });

  it('throws CollectionConfigError on invalid JSON', async () => {
    mockReadFile.mockResolvedValue('{ not json');

    await expect(readCollectionConfig()).rejects.toThrow(CollectionConfigError);
  });

  it('reports the failing field on a schema error', async () => {
    mockReadFile.mockResolvedValue(JSON.stringify({ keepScratch: 'yes' }));

    await expect(readCollectionConfig()).rejects.toMatchObject({
      name: 'CollectionConfigError',
      field: 'keepScratch',
    });
  });

  it('propagates other read errors', async () => {
    mockReadFile.mockRejectedValue(errnoError('EACCES'));

    await expect(readCollectionConfig()).rejects.toMatchObject({ code: 'EACCES' });
  });
});

describe('validateCollectionConfig', () => {
  it('accepts an empty object', () => {
    expect(validateCollectionConfig({})).toEqual({ valid: true, config: DEFAULT_COLLECTION_CONFIG });
  });

  it('rejects an empty resource root', () => {
    const result = validateCollectionConfig({ resourceRoot: '' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.firstField).toBe('resourceRoot');
      expect(result.errors).toHaveLength(1);
    }
  });
});
