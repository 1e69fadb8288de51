import type { BatchSummary, ItemOutcome } from './types.js';

/** Tally item statuses. */
export function summarize(items: readonly ItemOutcome[]): BatchSummary {
  const summary: BatchSummary = { total: items.length, succeeded: 0, skipped: 0, failed: 0 };
  for (const item of items) {
    if (item.status === 'ok') summary.succeeded++;
    else if (item.status === 'skipped') summary.skipped++;
    else summary.failed++;
  }
  return summary;
}
