#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { listCommand } from './cli/commands/list.js';
import { verifyCommand } from './cli/commands/verify.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`collection-meta  v${pkg.version}`);
  console.log(`Node.js          ${process.version}`);
  console.log(`Platform         ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  switch (command) {
    case 'list':
    case 'ls': {
      process.exitCode = await listCommand(args.slice(1));
      break;
    }

    case 'verify':
    case 'v': {
      process.exitCode = await verifyCommand(args.slice(1));
      break;
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      break;

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      process.exitCode = 1;
  }
}

function showHelp() {
  console.log(`
collection-meta - Check and maintain collection metadata files

Usage:
  collection-meta <command> [options]

Commands:
  list, ls          List platforms under the resource root
  verify, v         Round-trip check one platform key, or all

Options:
  --config=PATH     Config file (default: collection-meta.json)
  --json            Machine-readable output
  --version, -V     Show version information

Layout:
  <resourceRoot>/<Platform Name>/metadata.pegasus.txt
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
