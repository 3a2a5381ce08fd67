/**
 * Collects per-item outcomes into an index-ordered batch report
 */

import type { BatchReport, BatchSummary, UploadOutcome } from '../types/batch.js';

export class ResultAggregator {
  private readonly slots: Array<UploadOutcome | undefined>;
  private received = 0;

  constructor(
    readonly batchId: string,
    readonly size: number
  ) {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid batch size: ${size}`);
    }
    this.slots = new Array<UploadOutcome | undefined>(size).fill(undefined);
  }

  /**
   * Store an outcome in its slot. Each slot is written exactly once.
   */
  record(outcome: UploadOutcome): void {
    const { index } = outcome;
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Outcome index ${index} outside batch of ${this.size}`);
    }
    if (this.slots[index] !== undefined) {
      throw new Error(`Duplicate outcome for item ${index}`);
    }
    this.slots[index] = outcome;
    this.received++;
  }

  has(index: number): boolean {
    return this.slots[index] !== undefined;
  }

  get isComplete(): boolean {
    return this.received === this.size;
  }

  /**
   * Build the report; every index must have been recorded
   */
  collect(durationMs: number): BatchReport {
    const outcomes: UploadOutcome[] = [];
    const missing: number[] = [];

    this.slots.forEach((outcome, index) => {
      if (outcome === undefined) {
        missing.push(index);
      } else {
        outcomes.push(outcome);
      }
    });

    if (missing.length > 0) {
      throw new Error(`Batch ${this.batchId} is missing outcomes for items: ${missing.join(', ')}`);
    }

    return {
      batchId: this.batchId,
      outcomes,
      summary: summarize(outcomes),
      durationMs,
    };
  }
}

export function summarize(outcomes: readonly UploadOutcome[]): BatchSummary {
  const summary: BatchSummary = { total: outcomes.length, succeeded: 0, failed: 0, cancelled: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      summary.succeeded++;
    } else if (outcome.errorKind === 'Cancelled') {
      summary.cancelled++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}
