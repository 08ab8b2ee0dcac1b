export type Stats = { mean: number; stdDev: number };

/** Mean and Bessel-corrected (N − 1) standard deviation. */
export function computeStats(values: ArrayLike<number>): Stats {
  const n = values.length;
  if (n === 0) return { mean: NaN, stdDev: NaN };
  let sum = 0;
  for (let i = 0; i < n; i++) sum += values[i];
  const mean = sum / n;
  if (n < 2) return { mean, stdDev: 0 };
  let sq = 0;
  for (let i = 0; i < n; i++) {
    const d = values[i] - mean;
    sq += d * d;
  }
  return { mean, stdDev: Math.sqrt(sq / (n - 1)) };
}

/** Z-score; 0 when the spread is degenerate or any operand is non-finite. */
export function standardize(value: number, stats: Stats): number {
  if (!(stats.stdDev > 0) || !Number.isFinite(stats.stdDev)) return 0;
  if (!Number.isFinite(value) || !Number.isFinite(stats.mean)) return 0;
  return (value - stats.mean) / stats.stdDev;
}
