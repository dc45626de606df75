import type { SubmissionOutcome } from '../engine/SubmissionRunner.js';

export interface TallySnapshot {
  successful: number;
  failed: number;
  total: number;
  /** Successful submissions with a confirmation signal */
  confirmed: number;
  /** Successful submissions assumed from the absence of a failure */
  unconfirmed: number;
}

/**
 * Run-level counters shared by every worker. record() has no await, so
 * each update completes before another worker can resume.
 */
export class BatchTally {
  private counts: TallySnapshot = { successful: 0, failed: 0, total: 0, confirmed: 0, unconfirmed: 0 };

  record(outcome: Pick<SubmissionOutcome, 'status'>): void {
    const next = { ...this.counts, total: this.counts.total + 1 };
    switch (outcome.status) {
      case 'confirmed':
        next.successful++;
        next.confirmed++;
        break;
      case 'unconfirmed':
        next.successful++;
        next.unconfirmed++;
        break;
      case 'failed':
        next.failed++;
        break;
    }
    this.counts = next;
  }

  snapshot(): TallySnapshot {
    return { ...this.counts };
  }
}

/** Percentage of successful submissions, 0 when nothing ran. */
export function successRate(tally: Pick<TallySnapshot, 'successful' | 'total'>): number {
  return tally.total === 0 ? 0 : (tally.successful / tally.total) * 100;
}
