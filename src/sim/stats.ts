import type { Stats } from "../types";

/** Percentile of an ascending array, interpolating linearly between order statistics. */
export function percentile(sorted: ArrayLike<number>, q: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  if (n === 1 || q <= 0) return sorted[0];
  if (q >= 1) return sorted[n - 1];

  const pos = q * (n - 1);
  const i = Math.floor(pos);
  const f = pos - i;
  if (i + 1 >= n) return sorted[i];
  return sorted[i] * (1 - f) + sorted[i + 1] * f;
}

export function emptyStats(): Stats {
  return {
    count: 0,
    mean: 0,
    variance: 0,
    stddev: 0,
    min: 0,
    max: 0,
    p50: 0,
    p90: 0,
    p99: 0,
    samples: [],
  };
}

/**
 * Query interface over the integer samples of a simulation run.
 *
 * Mirrors the questions asked of a distribution:
 * - Basic statistics (mean, population variance, min/max, percentiles)
 * - Tail probabilities (at most / at least a value)
 * - The empirical distribution itself
 */
export class TrialQuery {
  public readonly samples: readonly number[];
  private _sorted?: Float64Array;
  private _mean?: number;
  private _variance?: number;

  constructor(samples: readonly number[]) {
    this.samples = samples;
  }

  get count(): number {
    return this.samples.length;
  }

  private sorted(): Float64Array {
    if (this._sorted === undefined) {
      this._sorted = Float64Array.from(this.samples).sort();
    }
    return this._sorted;
  }

  /**
   * Average sample value.
   *
   * Example: draws until the first hit at p = 0.3 → about 3.33
   */
  mean(): number {
    if (this._mean === undefined) {
      let sum = 0;
      for (const x of this.samples) sum += x;
      this._mean = this.count === 0 ? 0 : sum / this.count;
    }
    return this._mean;
  }

  /** Population variance (divides by n). */
  variance(): number {
    if (this._variance === undefined) {
      const meanValue = this.mean();
      let acc = 0;
      for (const x of this.samples) {
        const deviationFromMean = x - meanValue;
        acc += deviationFromMean * deviationFromMean;
      }
      this._variance = this.count === 0 ? 0 : acc / this.count;
    }
    return this._variance;
  }

  stddev(): number {
    return Math.sqrt(this.variance());
  }

  min(): number {
    return this.count === 0 ? 0 : this.sorted()[0];
  }

  max(): number {
    return this.count === 0 ? 0 : this.sorted()[this.count - 1];
  }

  percentile(q: number): number {
    return percentile(this.sorted(), q);
  }

  /**
   * Example: `query.percentiles([0.5, 0.9])` → [62, 84]
   * Use case: "How many draws does an unlucky player need?"
   */
  percentiles(qs: number[]): number[] {
    return qs.map((q) => this.percentile(q));
  }

  /** Share of samples at or below `x`. */
  probAtMost(x: number): number {
    if (this.count === 0) return 0;
    let hits = 0;
    for (const v of this.samples) if (v <= x) hits++;
    return hits / this.count;
  }

  /** Share of samples at or above `x`. */
  probAtLeast(x: number): number {
    if (this.count === 0) return 0;
    let hits = 0;
    for (const v of this.samples) if (v >= x) hits++;
    return hits / this.count;
  }

  cdf(x: number): number {
    return this.probAtMost(x);
  }

  ccdf(x: number): number {
    return this.probAtLeast(x);
  }

  /** Empirical distribution: sample value → share of trials. */
  distribution(): Record<number, number> {
    const out: Record<number, number> = {};
    if (this.count === 0) return out;
    for (const v of this.samples) out[v] = (out[v] ?? 0) + 1;
    for (const key of Object.keys(out)) {
      const v = Number(key);
      out[v] = out[v] / this.count;
    }
    return out;
  }

  toStats(): Stats {
    if (this.count === 0) return emptyStats();
    return {
      count: this.count,
      mean: this.mean(),
      variance: this.variance(),
      stddev: this.stddev(),
      min: this.min(),
      max: this.max(),
      p50: this.percentile(0.5),
      p90: this.percentile(0.9),
      p99: this.percentile(0.99),
      samples: this.samples,
    };
  }
}

/** Summary statistics for a closed set of integer samples. */
export function calcStats(samples: readonly number[]): Stats {
  return new TrialQuery(samples).toStats();
}
