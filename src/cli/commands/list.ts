/**
 * CLI command: `collection-meta list`
 *
 * Lists the platforms found under the configured resource root.
 *
 * @module cli/commands/list
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readCollectionConfig, DEFAULT_CONFIG_PATH } from '../../config/reader.js';
import { discoverPlatforms } from '../../platforms/discover.js';

/**
 * @param args - CLI arguments after `list`
 * @returns Exit code (0 = ok, 1 = no platforms found)
 */
export async function listCommand(args: string[]): Promise<number> {
  const jsonMode = args.includes('--json');
  const configArg = args.find((a) => a.startsWith('--config='));
  const config = await readCollectionConfig(
    configArg ? configArg.slice('--config='.length) : DEFAULT_CONFIG_PATH,
  );

  const platforms = await discoverPlatforms(config.resourceRoot, config.metadataFileName);

  if (jsonMode) {
    console.log(JSON.stringify(platforms, null, 2));
    return platforms.length > 0 ? 0 : 1;
  }

  if (platforms.length === 0) {
    p.log.warn(`No ${config.metadataFileName} found under ${config.resourceRoot}`);
    return 1;
  }

  p.intro(pc.bgCyan(pc.black(' Platforms ')));
  const width = Math.max(...platforms.map((platform) => platform.key.length));
  for (const platform of platforms) {
    p.log.message(`${pc.bold(platform.key.padEnd(width))}  ${platform.name} ${pc.dim(`(${platform.metadataPath})`)}`);
  }
  p.outro(`${platforms.length} platform(s)`);
  return 0;
}
