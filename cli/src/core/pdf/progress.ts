/**
 * Progress sinks. Engines report integer percentages (0–100) through a
 * ProgressSink; "no reporting" is the silent sink, not a missing callback.
 */

export interface ProgressSink {
  report(percent: number): void;
}

export const silentProgress: ProgressSink = {
  report() { /* no-op */ },
};

export function callbackProgress(onProgress: (percent: number) => void): ProgressSink {
  return { report: onProgress };
}

/**
 * Clamp to 0–100 and drop any value below the last one delivered.
 * Repeats of the same value pass through.
 */
export function monotonicProgress(sink: ProgressSink): ProgressSink {
  let last = 0;
  return {
    report(percent: number) {
      const clamped = Math.min(100, Math.max(0, Math.round(percent)));
      if (clamped < last) return;
      last = clamped;
      sink.report(clamped);
    },
  };
}

/** round(100 × done / total); 100 for an empty batch. */
export function percentOf(done: number, total: number): number {
  if (total <= 0) return 100;
  return Math.round((100 * done) / total);
}
