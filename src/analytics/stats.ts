/** Decimal places every serialized number is rounded to. */
export const REPORT_DECIMALS = 12;

/**
 * Compensated (Neumaier) summation.
 */
export function stableSum(values: readonly number[]): number {
  let sum = 0;
  let compensation = 0;
  for (const v of values) {
    const t = sum + v;
    if (Math.abs(sum) >= Math.abs(v)) {
      compensation += sum - t + v;
    } else {
      compensation += v - t + sum;
    }
    sum = t;
  }
  return sum + compensation;
}

/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return stableSum(values) / values.length;
}

/**
 * Population variance.
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return stableSum(values.map((v) => (v - avg) ** 2)) / values.length;
}

/**
 * Calculate population standard deviation.
 */
export function stdDev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

export function minOf(values: readonly number[]): number {
  let out = Infinity;
  for (const v of values) if (v < out) out = v;
  return values.length === 0 ? 0 : out;
}

export function maxOf(values: readonly number[]): number {
  let out = -Infinity;
  for (const v of values) if (v > out) out = v;
  return values.length === 0 ? 0 : out;
}

export function sortedAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Quantile by linear interpolation between order statistics.
 * `sorted` must be ascending. q ≤ 0 → min, q ≥ 1 → max, empty → 0.
 */
export function quantile(sorted: readonly number[], q: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  if (q <= 0) return sorted[0];
  if (q >= 1) return sorted[n - 1];
  const pos = (n - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  const w = pos - lo;
  return sorted[lo] * (1 - w) + sorted[hi] * w;
}

/**
 * Median absolute deviation around `median` (unscaled).
 */
export function medianAbsoluteDeviation(values: readonly number[], median: number): number {
  if (values.length === 0) return 0;
  return quantile(sortedAscending(values.map((v) => Math.abs(v - median))), 0.5);
}

/**
 * Pearson correlation over the common prefix of x and y.
 * Fewer than two points or a zero-variance side gives 0.
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = Math.min(x.length, y.length);
  if (n < 2) return 0;
  let sx = 0;
  let sy = 0;
  for (let i = 0; i < n; i++) {
    sx += x[i];
    sy += y[i];
  }
  const mx = sx / n;
  const my = sy / n;
  let vx = 0;
  let vy = 0;
  let cov = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    vx += dx * dx;
    vy += dy * dy;
    cov += dx * dy;
  }
  if (vx <= 0 || vy <= 0) return 0;
  return cov / Math.sqrt(vx * vy);
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = REPORT_DECIMALS): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;
  const out = Number(value.toFixed(decimals));
  return out === 0 ? 0 : out;
}
