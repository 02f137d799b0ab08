/**
 * Sequential closure verification over many platforms.
 *
 * One platform's failure, whether a mismatch or an I/O error, is
 * recorded and the loop moves on.
 *
 * @module batch/verify-collections
 */

import { verifyClosure } from '../closure/verifier.js';
import type { ClosureReport, VerifyClosureOptions } from '../closure/types.js';
import type { PlatformEntry } from '../platforms/discover.js';

export type PlatformVerification =
  | { platform: PlatformEntry; status: 'passed' | 'failed'; report: ClosureReport }
  | { platform: PlatformEntry; status: 'error'; error: string };

export interface BatchSummary {
  results: PlatformVerification[];
  passed: number;
  failed: number;
  errored: number;
}

export interface VerifyCollectionsOptions extends VerifyClosureOptions {
  /** Called after each platform, in order. */
  onResult?: (result: PlatformVerification) => void;
}

export async function verifyCollections(
  platforms: readonly PlatformEntry[],
  options: VerifyCollectionsOptions = {},
): Promise<BatchSummary> {
  const { onResult, ...closureOptions } = options;
  const summary: BatchSummary = { results: [], passed: 0, failed: 0, errored: 0 };

  for (const platform of platforms) {
    let result: PlatformVerification;
    try {
      const report = await verifyClosure(platform.metadataPath, closureOptions);
      result = { platform, status: report.ok ? 'passed' : 'failed', report };
    } catch (err) {
      result = {
        platform,
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
      };
    }

    if (result.status === 'passed') {
      summary.passed++;
    } else if (result.status === 'failed') {
      summary.failed++;
    } else {
      summary.errored++;
    }
    summary.results.push(result);
    onResult?.(result);
  }

  return summary;
}
