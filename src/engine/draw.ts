import type { RandomSource } from "../common/random";
import { defaultRandomSource } from "../common/random";
import { InvalidProbabilityError } from "../errors";

/** Throws unless `p` is a finite number in [0, 1]. */
export function validateProbability(p: number): void {
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new InvalidProbabilityError(p);
  }
}

/**
 * One Bernoulli trial.
 *
 * The extremes never touch the source: `p <= 0` is always a miss and `p >= 1`
 * always a hit. Anything in between consumes exactly one value.
 */
export function draw(
  p: number,
  source: RandomSource = defaultRandomSource()
): boolean {
  validateProbability(p);
  if (p <= 0) return false;
  if (p >= 1) return true;
  return source.next() < p;
}
