import type { Stats } from "../types";
import { calcStats } from "./stats";

/** Currency spent per draw, with an optional discounted multi-draw bundle. */
export interface TokenSpec {
  /** e.g. "Stellar Jade" */
  name: string;
  perDraw: number;
  /** Draws in one bundle, e.g. 10 for a ten-pull. */
  bundleSize?: number;
  /** Price of one full bundle. */
  perBundle?: number;
}

/** Tokens needed for `n` draws, buying full bundles first. */
export function tokensForDraws(spec: TokenSpec, n: number): number {
  if (!(n > 0)) return 0;
  const draws = Math.ceil(n);
  const size = spec.bundleSize ?? 0;
  const bundlePrice = spec.perBundle ?? 0;

  if (size > 1 && bundlePrice > 0) {
    const bundles = Math.floor(draws / size);
    return bundles * bundlePrice + (draws - bundles * size) * spec.perDraw;
  }
  return draws * spec.perDraw;
}

/**
 * Statistics of the token cost per trial, for runs whose samples are draw
 * counts (first_hit, first_up).
 */
export function costStats(stats: Stats, spec: TokenSpec): Stats {
  return calcStats(stats.samples.map((draws) => tokensForDraws(spec, draws)));
}
