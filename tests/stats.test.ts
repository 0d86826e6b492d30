import { describe, it, expect } from "vitest";
import {
  maxOf,
  mean,
  medianAbsoluteDeviation,
  minOf,
  pearson,
  quantile,
  round,
  sortedAscending,
  stableSum,
  stdDev,
  variance,
} from "../src/analytics/stats.js";

describe("Statistics", () => {
  it("mean of empty array is 0", () => {
    expect(mean([])).toBe(0);
  });

  it("mean calculates correctly", () => {
    expect(mean([1, 2, 3, 4, 5])).toBe(3);
    expect(mean([10, 20, 30])).toBe(20);
  });

  it("stableSum compensates for cancellation", () => {
    expect(stableSum([1e16, 1, -1e16])).toBe(1);
  });

  it("variance and stdDev are population statistics", () => {
    // Population std dev of [2, 4, 4, 4, 5, 5, 7, 9] = 2.0
    const values = [2, 4, 4, 4, 5, 5, 7, 9];
    expect(variance(values)).toBe(4);
    expect(stdDev(values)).toBe(2);
  });

  it("stdDev of identical values is 0", () => {
    expect(stdDev([5, 5, 5, 5])).toBe(0);
    expect(stdDev([])).toBe(0);
  });

  it("min and max of empty arrays are 0", () => {
    expect(minOf([])).toBe(0);
    expect(maxOf([])).toBe(0);
    expect(minOf([3, -1, 2])).toBe(-1);
    expect(maxOf([3, -1, 2])).toBe(3);
  });
});

describe("quantile", () => {
  const sorted = [1, 2, 3, 4];

  it("returns the extremes at q ≤ 0 and q ≥ 1", () => {
    expect(quantile(sorted, 0)).toBe(1);
    expect(quantile(sorted, -0.5)).toBe(1);
    expect(quantile(sorted, 1)).toBe(4);
    expect(quantile(sorted, 2)).toBe(4);
  });

  it("interpolates between order statistics", () => {
    expect(quantile(sorted, 0.5)).toBe(2.5);
    expect(quantile([10, 20, 30], 0.5)).toBe(20);
  });

  it("is 0 for an empty sample", () => {
    expect(quantile([], 0.5)).toBe(0);
  });

  it("is non-decreasing in q", () => {
    const data = sortedAscending([7, 1, 9, 3, 3, 12, 5]);
    let prev = -Infinity;
    for (let q = 0; q <= 1; q += 0.05) {
      const v = quantile(data, q);
      expect(v).toBeGreaterThanOrEqual(prev);
      prev = v;
    }
  });
});

describe("medianAbsoluteDeviation", () => {
  it("is the median of absolute deviations", () => {
    // deviations from 3: [2, 1, 0, 1, 97] → median 1
    expect(medianAbsoluteDeviation([1, 2, 3, 4, 100], 3)).toBe(1);
  });

  it("is 0 for an empty sample", () => {
    expect(medianAbsoluteDeviation([], 0)).toBe(0);
  });
});

describe("pearson", () => {
  it("is exactly 1 and -1 for perfect linear relations", () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBe(1);
    expect(pearson([1, 2, 3], [3, 2, 1])).toBe(-1);
  });

  it("is 0 when either side has zero variance", () => {
    expect(pearson([1, 1, 1], [1, 2, 3])).toBe(0);
    expect(pearson([1, 2, 3], [4, 4, 4])).toBe(0);
  });

  it("uses the common prefix and needs two points", () => {
    expect(pearson([1, 2, 3, 100], [2, 4, 6])).toBe(1);
    expect(pearson([1], [1])).toBe(0);
  });
});

describe("round", () => {
  it("rounds to 12 decimals by default", () => {
    expect(round(0.1 + 0.2)).toBe(0.3);
    expect(round(1 / 3)).toBe(0.333333333333);
  });

  it("honours explicit precision", () => {
    expect(round(3.14159, 2)).toBe(3.14);
    expect(round(3.14159, 0)).toBe(3);
  });

  it("normalizes negative zero", () => {
    expect(Object.is(round(-1e-13), 0)).toBe(true);
  });

  it("passes non-finite values through", () => {
    expect(round(Infinity)).toBe(Infinity);
    expect(round(NaN)).toBeNaN();
  });
});
