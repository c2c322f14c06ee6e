export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  return values.reduce((s, n) => s + n, 0) / values.length;
}

export function maxOf(values: Iterable<number>): number | null {
  let max: number | null = null;
  for (const v of values) {
    if (max === null || v > max) max = v;
  }
  return max;
}

export function minOf(values: Iterable<number>): number | null {
  let min: number | null = null;
  for (const v of values) {
    if (min === null || v < min) min = v;
  }
  return min;
}

/**
 * Range of the series relative to its mean: (max - min) / |mean|.
 * Null when there are fewer than two values or the mean is zero.
 */
export function normalizedRange(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  if (Math.abs(m) < 1e-12) return null;

  const max = maxOf(values);
  const min = minOf(values);
  if (max === null || min === null) return null;
  return (max - min) / Math.abs(m);
}
