/**
 * Platform discovery under a resource root.
 *
 * Layout: `<root>/<Platform Name>/<metadata file>`. Each immediate
 * sub-directory holding a metadata file is one platform.
 *
 * @module platforms/discover
 */

import { readdir, stat } from 'fs/promises';
import { join } from 'path';

export interface PlatformEntry {
  /** Slug used on the command line, e.g. `fbneo_act`. */
  key: string;
  /** Directory name as written, e.g. `FBNEO ACT`. */
  name: string;
  metadataPath: string;
}

/**
 * Last path segment, trimmed, lower-cased, spaces to underscores:
 * `Resource/FBNEO ACT` -> `fbneo_act`.
 */
export function slugifyPlatform(name: string): string {
  const segments = name.replace(/\\/g, '/').split('/');
  return segments[segments.length - 1].trim().toLowerCase().replace(/ /g, '_');
}

/**
 * List platforms sorted by key. A missing resource root yields an
 * empty list; other read errors propagate.
 */
export async function discoverPlatforms(
  resourceRoot: string,
  metadataFileName: string,
): Promise<PlatformEntry[]> {
  let entries: string[];
  try {
    entries = await readdir(resourceRoot);
  } catch (err: unknown) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return [];
    }
    throw err;
  }

  const platforms: PlatformEntry[] = [];
  for (const entry of entries) {
    const platformDir = join(resourceRoot, entry);
    const metadataPath = join(platformDir, metadataFileName);
    if (!(await isDirectory(platformDir)) || !(await isFile(metadataPath))) {
      continue;
    }
    platforms.push({ key: slugifyPlatform(entry), name: entry, metadataPath });
  }

  return platforms.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
