import { describe, expect, it } from "vitest";
import { TrialQuery, calcStats, emptyStats, percentile } from "../src/sim/stats";

describe("calcStats()", () => {
  it("should return all zeros for no samples", () => {
    expect(calcStats([])).toEqual(emptyStats());
    expect(calcStats([]).samples).toEqual([]);
  });

  it("should compute population moments and interpolated percentiles", () => {
    const stats = calcStats([4, 1, 3, 2]);

    expect(stats.count).toBe(4);
    expect(stats.mean).toBe(2.5);
    expect(stats.variance).toBe(1.25);
    expect(stats.stddev).toBeCloseTo(Math.sqrt(1.25), 12);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(4);
    // pos = q · (n - 1)
    expect(stats.p50).toBe(2.5);
    expect(stats.p90).toBeCloseTo(3.7, 12);
    expect(stats.p99).toBeCloseTo(3.97, 12);
  });

  it("should collapse to the single value for one sample", () => {
    expect(calcStats([7])).toEqual({
      count: 1,
      mean: 7,
      variance: 0,
      stddev: 0,
      min: 7,
      max: 7,
      p50: 7,
      p90: 7,
      p99: 7,
      samples: [7],
    });
  });

  it("should keep the raw samples in their original order", () => {
    expect(calcStats([5, 1, 3]).samples).toEqual([5, 1, 3]);
  });
});

describe("percentile()", () => {
  const sorted = [1, 3, 5];

  it("should hit order statistics exactly at their positions", () => {
    expect(percentile(sorted, 0.5)).toBe(3);
  });

  it("should clamp to the ends outside (0, 1)", () => {
    expect(percentile(sorted, 0)).toBe(1);
    expect(percentile(sorted, -1)).toBe(1);
    expect(percentile(sorted, 1)).toBe(5);
    expect(percentile(sorted, 2)).toBe(5);
  });

  it("should interpolate between neighbours", () => {
    expect(percentile(sorted, 0.25)).toBe(2);
    expect(percentile(sorted, 0.75)).toBe(4);
  });

  it("should return 0 for an empty array", () => {
    expect(percentile([], 0.5)).toBe(0);
  });
});

describe("TrialQuery", () => {
  const query = new TrialQuery([1, 1, 2, 4]);

  it("should answer tail probabilities", () => {
    expect(query.probAtMost(2)).toBe(0.75);
    expect(query.cdf(0)).toBe(0);
    expect(query.probAtLeast(2)).toBe(0.5);
    expect(query.ccdf(5)).toBe(0);
  });

  it("should build the empirical distribution", () => {
    expect(query.distribution()).toEqual({ 1: 0.5, 2: 0.25, 4: 0.25 });
  });

  it("should return several percentiles at once", () => {
    // sorted 1,1,2,4: q = 0.5 → pos 1.5 → 1.5
    expect(query.percentiles([0, 0.5, 1])).toEqual([1, 1.5, 4]);
  });

  it("should treat an empty sample set as all zeros", () => {
    const empty = new TrialQuery([]);
    expect(empty.mean()).toBe(0);
    expect(empty.variance()).toBe(0);
    expect(empty.probAtMost(3)).toBe(0);
    expect(empty.distribution()).toEqual({});
  });
});
