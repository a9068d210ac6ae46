// Presentation Analyzer - Numeric helpers shared by the front end and scorers

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population standard deviation. */
export function std(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) * (v - m);
  return Math.sqrt(acc / values.length);
}

/**
 * Percentile with linear interpolation between closest ranks
 * (rank = p/100 × (n − 1)). Returns NaN for an empty input.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function median(values: readonly number[]): number {
  return percentile(values, 50);
}

/** Linear map of `value` from [lo, hi] onto [0, 1], clamped. */
export function normalize(value: number, lo: number, hi: number): number {
  if (hi <= lo) return 0;
  return Math.min(1, Math.max(0, (value - lo) / (hi - lo)));
}

export function round(value: number, digits: number = 2): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}
