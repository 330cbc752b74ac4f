/**
 * One row of the progress interval table: sources with fewer than `below`
 * items report every `every` items.
 */
export interface ProgressTier {
  readonly below: number;
  readonly every: number;
}

export type ProgressCallback = (fraction: number) => void;

export const DEFAULT_PROGRESS_INTERVALS: readonly ProgressTier[] = [
  { below: 100, every: 5 },
  { below: 1_000, every: 25 },
  { below: 10_000, every: 100 },
  { below: 100_000, every: 500 },
  { below: Number.POSITIVE_INFINITY, every: 1_000 },
];

/**
 * How many items to process between two progress reports for a source of
 * `total` items.
 *
 * @example
 * ```typescript
 * progressInterval(50);     // 5
 * progressInterval(5_000);  // 100
 * progressInterval(250_000); // 1000
 * ```
 *
 * @group Progress
 * @public
 */
export const progressInterval = (
  total: number,
  tiers: readonly ProgressTier[] = DEFAULT_PROGRESS_INTERVALS
): number => {
  const tier = tiers.find((candidate) => total < candidate.below);
  const every = tier?.every ?? tiers[tiers.length - 1]?.every ?? 1;
  return Math.max(1, Math.floor(every));
};

export interface ProgressReporter {
  /** Items counted so far. */
  readonly processed: () => number;
  /** Counts one item; returns true when a report was emitted. */
  readonly tick: () => boolean;
  /** Emits the final report of `1`. Only the first call reports. */
  readonly complete: () => void;
}

/**
 * Counts processed items and reports the completed fraction every
 * `progressInterval(total)` items. Fractions never exceed 1 and never
 * decrease.
 */
export const makeProgressReporter = (
  total: number,
  onProgress?: ProgressCallback,
  tiers?: readonly ProgressTier[]
): ProgressReporter => {
  const interval = progressInterval(total, tiers);
  let processed = 0;
  let completed = false;

  return {
    processed: () => processed,

    tick: () => {
      processed++;
      if (!onProgress || processed % interval !== 0 || total <= 0) {
        return false;
      }
      onProgress(Math.min(1, processed / total));
      return true;
    },

    complete: () => {
      if (completed) return;
      completed = true;
      onProgress?.(1);
    },
  };
};
