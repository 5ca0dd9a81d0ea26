import type { DrawOutcome } from "../types";
import { DEFAULT_OFF_PROB, PROBABILITY_CEILING } from "../types";
import { draw } from "./draw";
import type { SoftPitySystem } from "./soft-pity";

function normalizeOffProbs(offProbs: readonly number[]): number[] {
  if (offProbs.length === 0) return [DEFAULT_OFF_PROB];
  return offProbs.map((p) => (p > 0 && p < 1 ? p : DEFAULT_OFF_PROB));
}

/**
 * Banner layer over a {@link SoftPitySystem}. The wrapped system decides
 * whether a draw hits; on a hit this layer decides between the featured (UP)
 * reward and an off-banner one.
 *
 * - The off probability depends on the current off streak; the last entry of
 *   `offProbs` repeats for longer streaks.
 * - Once the off streak exceeds `maxOff`, the next hit is guaranteed UP. The
 *   hit that crosses the threshold itself stays off-banner.
 * - A miss leaves the off streak and the guarantee untouched.
 */
export class BannerSystem {
  readonly softPity: SoftPitySystem;
  readonly offProbs: readonly number[];
  /** Consecutive offs tolerated before the guarantee flips; may be changed between draws. */
  maxOff: number;
  private offs = 0;
  private guaranteed = false;

  constructor(softPity: SoftPitySystem, offProbs: readonly number[], maxOff = 0) {
    this.softPity = softPity;
    this.offProbs = normalizeOffProbs(offProbs);
    this.maxOff = maxOff > 0 ? maxOff : this.offProbs.length;
  }

  get offStreak(): number {
    return this.offs;
  }

  get guaranteedNext(): boolean {
    return this.guaranteed;
  }

  get missStreak(): number {
    return this.softPity.missStreak;
  }

  /** Off-banner probability for the next hit, strictly inside (0, 1). */
  currentOffProb(): number {
    const idx = Math.min(this.offs, this.offProbs.length - 1);
    const p = this.offProbs[idx];
    if (p <= 0) return Number.MIN_VALUE;
    if (p >= 1) return PROBABILITY_CEILING;
    return p;
  }

  snapshot(hit = false, isUp = false): DrawOutcome {
    return {
      hit,
      isUp,
      missStreak: this.softPity.missStreak,
      guaranteedNext: this.guaranteed,
      offStreak: this.offs,
    };
  }

  draw(pBase: number): DrawOutcome {
    if (!this.softPity.draw(pBase)) return this.snapshot();

    if (this.guaranteed) {
      this.guaranteed = false;
      this.offs = 0;
      return this.snapshot(true, true);
    }

    if (draw(this.currentOffProb(), this.softPity.source)) {
      this.offs += 1;
      if (this.offs > this.maxOff) this.guaranteed = true;
      return this.snapshot(true, false);
    }

    this.offs = 0;
    this.guaranteed = false;
    return this.snapshot(true, true);
  }
}
