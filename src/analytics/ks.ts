import type { KsResult } from "../shared/types.js";
import { round, sortedAscending } from "./stats.js";

const KOLMOGOROV_TERMS = 100;

/**
 * Asymptotic Kolmogorov survival function Q(λ), clamped to [0, 1].
 */
export function kolmogorovPValue(lambda: number): number {
  if (lambda <= 0) return 1;
  let sum = 0;
  for (let k = 1; k <= KOLMOGOROV_TERMS; k++) {
    const sign = k % 2 === 1 ? 1 : -1;
    sum += sign * Math.exp(-2 * k * k * lambda * lambda);
  }
  return Math.max(0, Math.min(1, 2 * sum));
}

/**
 * Two-sample Kolmogorov–Smirnov statistic with the asymptotic p-value.
 *
 * Both sorted samples are merge-walked; equal values advance both cursors
 * before the ECDF gap is measured, so identical samples give D = 0.
 */
export function ksTwoSample(x: readonly number[], y: readonly number[]): KsResult {
  if (x.length === 0 || y.length === 0) return { D: 0, p_value: 1 };

  const xs = sortedAscending(x);
  const ys = sortedAscending(y);
  const nx = xs.length;
  const ny = ys.length;

  let i = 0;
  let j = 0;
  let d = 0;
  while (i < nx && j < ny) {
    const v = Math.min(xs[i], ys[j]);
    while (i < nx && xs[i] === v) i++;
    while (j < ny && ys[j] === v) j++;
    d = Math.max(d, Math.abs(i / nx - j / ny));
  }

  const en = Math.sqrt((nx * ny) / (nx + ny));
  const lambda = (en + 0.12 + 0.11 / en) * d;
  return { D: round(d), p_value: round(kolmogorovPValue(lambda)) };
}
