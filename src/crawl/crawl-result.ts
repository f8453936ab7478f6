import type { CrawlResult, CrawlStatus, JobOutcome } from './types';

export const ERROR_LOG_SEPARATOR = ';\n';

/** Unique error texts collected over one crawl. */
export class ErrorSet {
  private readonly entries = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const entry of initial) this.add(entry);
  }

  get size(): number {
    return this.entries.size;
  }

  add(error: string): void {
    const text = error.trim();
    if (text) this.entries.add(text);
  }

  merge(other: Iterable<string>): void {
    for (const entry of other) this.add(entry);
  }

  values(): string[] {
    return [...this.entries].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.entries[Symbol.iterator]();
  }

  /** Sorted so the log never depends on the order errors arrived in. */
  format(maxLength: number): string {
    return this.values().join(ERROR_LOG_SEPARATOR).slice(0, Math.max(0, maxLength));
  }
}

export interface CrawlTally {
  successCount: number;
  failedCount: number;
  errors: ErrorSet;
}

export function emptyTally(successCount = 0, failedCount = 0): CrawlTally {
  return { successCount, failedCount, errors: new ErrorSet() };
}

/** Commutative fold of per-job outcomes into a running tally. */
export function foldOutcomes(outcomes: Iterable<JobOutcome>, seed: CrawlTally = emptyTally()): CrawlTally {
  let successCount = seed.successCount;
  let failedCount = seed.failedCount;
  const errors = new ErrorSet(seed.errors);

  for (const outcome of outcomes) {
    successCount += outcome.successCount;
    failedCount += outcome.failedCount;
    errors.merge(outcome.errors);
  }

  return { successCount, failedCount, errors };
}

export function finalizeCrawlResult(tally: CrawlTally, maxErrorLogLength: number, forceFailed = false): CrawlResult {
  const status: CrawlStatus = forceFailed || tally.failedCount > 0 ? 'Failed' : 'Success';
  return Object.freeze({
    status,
    successCount: tally.successCount,
    failedCount: tally.failedCount,
    errorLog: tally.errors.format(maxErrorLogLength),
  });
}
