/**
 * Summary statistics over historical peak-ROI samples (percent values).
 * Every function expects a non-empty input and throws otherwise; callers pick
 * the fallback.
 */

function assertNonEmpty(values: number[], label: string): void {
  if (values.length === 0) {
    throw new Error(`Cannot compute ${label} of empty values`);
  }
}

/** Samples that ended in profit; only these inform take-profit targets. */
export function winningSamples(samples: number[]): number[] {
  return samples.filter((value) => Number.isFinite(value) && value > 0);
}

export function mean(values: number[]): number {
  assertNonEmpty(values, 'mean');
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: number[]): number {
  assertNonEmpty(values, 'median');
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;

  if (sorted.length % 2 === 1) {
    return upper;
  }

  const lower = sorted[middle - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Most frequent whole-percent bucket, each sample rounded to the nearest
 * percent. Ties resolve to the lowest bucket.
 */
export function mode(values: number[]): number {
  assertNonEmpty(values, 'mode');
  const counts = new Map<number, number>();

  for (const value of values) {
    const bucket = Math.round(value);
    counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
  }

  let best = Number.POSITIVE_INFINITY;
  let bestCount = 0;
  for (const [bucket, count] of counts) {
    if (count > bestCount || (count === bestCount && bucket < best)) {
      best = bucket;
      bestCount = count;
    }
  }

  return best;
}

/**
 * Largest value that at least `reach` of the samples reached or exceeded.
 *
 * Samples are ranked from highest to lowest and the value at rank
 * `ceil(reach * n)` is returned, so for `[10, 20, 30, 40]` and `reach = 0.75`
 * three of four samples are at or above 20 and the result is 20.
 */
export function reachQuantile(values: number[], reach: number): number {
  assertNonEmpty(values, 'reach quantile');

  if (!(reach > 0 && reach <= 1)) {
    throw new Error(`reach must be in (0, 1], got ${reach}`);
  }

  const descending = [...values].sort((a, b) => b - a);
  const index = Math.min(descending.length, Math.ceil(reach * descending.length - 1e-9)) - 1;

  return descending[Math.max(0, index)] ?? 0;
}
