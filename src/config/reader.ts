/**
 * Collection config file reader with Zod validation.
 *
 * Missing file = all defaults. Invalid input = CollectionConfigError
 * with the offending field path.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { CollectionConfigSchema, DEFAULT_COLLECTION_CONFIG } from './schema.js';
import type { CollectionConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG_PATH = 'collection-meta.json';

// ============================================================================
// Error type
// ============================================================================

export class CollectionConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'CollectionConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read and validate the config from disk.
 *
 * - ENOENT returns the defaults.
 * - Invalid JSON or a schema failure throws CollectionConfigError.
 * - Any other read error propagates unchanged.
 */
export async function readCollectionConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<CollectionConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_COLLECTION_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new CollectionConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validateCollectionConfig(raw);
  if (!result.valid) {
    throw new CollectionConfigError(
      `Config validation failed:\n${result.errors.join('\n')}`,
      result.firstField,
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateCollectionConfig(
  raw: unknown,
):
  | { valid: true; config: CollectionConfig }
  | { valid: false; errors: string[]; firstField?: string } {
  const result = CollectionConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { valid: false, errors, firstField: result.error.issues[0]?.path.join('.') };
}
