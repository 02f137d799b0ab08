/**
 * CLI command: `collection-meta verify [key|all]`
 *
 * Runs the closure check (parse -> serialize -> parse) on one platform
 * or on all of them and reports per-file status plus summary counts.
 *
 * Exit codes:
 * - 0: every file passed
 * - 1: at least one mismatch or error, or unknown platform key
 *
 * @module cli/commands/verify
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { diffLines } from 'diff';
import { verifyCollections } from '../../batch/verify-collections.js';
import type { BatchSummary, PlatformVerification } from '../../batch/verify-collections.js';
import type { ClosureReport } from '../../closure/types.js';
import { readCollectionConfig, DEFAULT_CONFIG_PATH } from '../../config/reader.js';
import { discoverPlatforms } from '../../platforms/discover.js';

export async function verifyCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');
  const configArg = args.find((a) => a.startsWith('--config='));
  const target = args.find((a) => !a.startsWith('-')) ?? 'all';

  const config = await readCollectionConfig(
    configArg ? configArg.slice('--config='.length) : DEFAULT_CONFIG_PATH,
  );
  const keepScratch = args.includes('--keep') || config.keepScratch;

  const discovered = await discoverPlatforms(config.resourceRoot, config.metadataFileName);
  const platforms = target === 'all'
    ? discovered
    : discovered.filter((platform) => platform.key === target);

  if (platforms.length === 0) {
    const message = target === 'all'
      ? `No ${config.metadataFileName} found under ${config.resourceRoot}`
      : `Unknown platform key: ${target}`;
    if (jsonMode) {
      console.log(JSON.stringify({ error: message, available: discovered.map((d) => d.key) }, null, 2));
    } else {
      p.log.error(message);
      if (discovered.length > 0) {
        p.log.message(pc.dim(`Available: ${discovered.map((d) => d.key).join(', ')}`));
      }
    }
    return 1;
  }

  if (!jsonMode) {
    p.intro(pc.bgCyan(pc.black(' Closure check: parse -> serialize -> parse ')));
  }

  const summary = await verifyCollections(platforms, {
    keepScratch,
    scratchDirName: config.scratchDirName,
    scratchSuffix: config.scratchSuffix,
    onResult: jsonMode ? undefined : displayResult,
  });

  if (jsonMode) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    displaySummary(summary);
  }

  return summary.failed === 0 && summary.errored === 0 ? 0 : 1;
}

// ============================================================================
// Display
// ============================================================================

function displayResult(result: PlatformVerification): void {
  const label = `${result.platform.key} (${result.platform.name})`;

  if (result.status === 'error') {
    p.log.error(`${label}: ${result.error}`);
    return;
  }

  if (result.status === 'passed') {
    p.log.success(`${label}: round-trip stable`);
  } else {
    p.log.error(`${label}: round-trip mismatch`);
    displayMismatch(result.report);
  }

  if (result.report.scratchKept) {
    p.log.message(pc.dim(`  scratch: ${result.report.scratchPath}`));
  }
}

function displayMismatch(report: ClosureReport): void {
  for (const diff of report.headerDiff) {
    p.log.message(`  ${pc.yellow('header')} ${diff.field}:`);
    p.log.message(renderDiff(diff.original, diff.reparsed));
  }

  const mismatch = report.gameMismatch;
  if (mismatch) {
    p.log.message(`  ${pc.yellow('game')} ${mismatch.key[0]} ${pc.dim(mismatch.key[1])}`);
    p.log.message(renderDiff(mismatch.original ?? null, mismatch.reparsed ?? null));
  }

  if (report.gameCounts.original !== report.gameCounts.reparsed) {
    p.log.message(
      `  games: ${report.gameCounts.original} parsed, ${report.gameCounts.reparsed} after round-trip`,
    );
  }
}

/**
 * Line diff of two JSON renderings; removals red, additions green.
 */
export function renderDiff(original: unknown, reparsed: unknown): string {
  const before = JSON.stringify(original ?? null, null, 2) + '\n';
  const after = JSON.stringify(reparsed ?? null, null, 2) + '\n';
  const out: string[] = [];
  for (const part of diffLines(before, after)) {
    const lines = part.value.replace(/\n$/, '').split('\n');
    for (const line of lines) {
      if (part.added) {
        out.push(pc.green(`    + ${line}`));
      } else if (part.removed) {
        out.push(pc.red(`    - ${line}`));
      } else {
        out.push(pc.dim(`      ${line}`));
      }
    }
  }
  return out.join('\n');
}

function displaySummary(summary: BatchSummary): void {
  const text = `${summary.passed} passed, ${summary.failed} failed, ${summary.errored} error(s)`;
  if (summary.failed === 0 && summary.errored === 0) {
    p.outro(pc.green(text));
  } else {
    p.outro(pc.red(text));
  }
}

function showHelp(): void {
  console.log(`
collection-meta verify - Check that metadata files survive a round-trip

Usage:
  collection-meta verify [platform-key|all] [options]

Options:
  --keep          Keep the serialized scratch files
  --config=PATH   Path to config file (default: ${DEFAULT_CONFIG_PATH})
  --json          Output results as JSON
  --help, -h      Show this help message
`);
}
