import { InvalidPityConfigError } from "../errors";
import type { Easing, SoftPityConfig } from "../types";
import { EASINGS, PROBABILITY_CEILING } from "../types";
import { draw, validateProbability } from "./draw";
import type { PityOptions } from "./pity";
import { PitySystem } from "./pity";

/** Easing curves mapping ramp progress t ∈ [0, 1] onto [0, 1]. */
export const EASING_FUNCTIONS: Record<Easing, (t: number) => number> = {
  linear: (t) => t,
  easeOutQuad: (t) => 1 - (1 - t) * (1 - t),
  easeInOutCubic: (t) =>
    t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2,
};

/** A soft-pity config after validation, with every default filled in. */
export type ResolvedRamp =
  | {
      mode: "target_ramp";
      rampStart: number;
      targetProb: number;
      easing: Easing;
    }
  | { mode: "per_draw_increment"; rampStart: number; increment: number };

function isEasing(value: string): value is Easing {
  return EASINGS.some((easing) => easing === value);
}

/**
 * Validate a ramp against its hard pity threshold. The ramp ends at miss
 * streak `pity - 1`, so it must start strictly before that.
 */
export function resolveRamp(pity: number, soft: SoftPityConfig): ResolvedRamp {
  if (!Number.isInteger(pity) || pity <= 1) {
    throw new InvalidPityConfigError(
      `pity must be an integer greater than 1 (got ${pity})`
    );
  }
  if (!Number.isInteger(soft.rampStart)) {
    throw new InvalidPityConfigError(
      `rampStart must be an integer (got ${soft.rampStart})`
    );
  }
  const rampStart = Math.max(0, soft.rampStart);
  if (rampStart >= pity - 1) {
    throw new InvalidPityConfigError(
      `rampStart ${rampStart} leaves no room to ramp before pity ${pity}`
    );
  }

  if (soft.mode === "per_draw_increment") {
    if (!Number.isFinite(soft.increment) || soft.increment <= 0) {
      throw new InvalidPityConfigError(
        `increment must be greater than 0 (got ${soft.increment})`
      );
    }
    return { mode: "per_draw_increment", rampStart, increment: soft.increment };
  }

  if (!(soft.targetProb > 0 && soft.targetProb < 1)) {
    throw new InvalidPityConfigError(
      `targetProb must be in (0, 1) (got ${soft.targetProb})`
    );
  }
  const easing = soft.easing ?? "linear";
  if (!isEasing(easing)) {
    throw new InvalidPityConfigError(`unknown easing "${String(easing)}"`);
  }
  return {
    mode: "target_ramp",
    rampStart,
    targetProb: soft.targetProb,
    easing,
  };
}

/**
 * Hard pity plus an optional ramp that raises the hit probability as the miss
 * streak approaches the cap. Without a ramp it behaves exactly like
 * {@link PitySystem}.
 *
 * Example: pity 90, rampStart 73, targetProb 0.5. Draws with a miss streak
 * of 73..89 ramp from the base probability up to 0.5; the 90th is forced.
 */
export class SoftPitySystem extends PitySystem {
  readonly ramp: ResolvedRamp | undefined;

  constructor(pity: number, soft?: SoftPityConfig, options: PityOptions = {}) {
    super(pity, options);
    this.ramp = soft === undefined ? undefined : resolveRamp(pity, soft);
  }

  /** Probability the next draw will use for a given base probability. */
  effectiveProbability(pBase: number): number {
    if (this.atHardCap()) return 1;

    const ramp = this.ramp;
    if (ramp === undefined || this.streak < ramp.rampStart) return pBase;

    let p: number;
    if (ramp.mode === "per_draw_increment") {
      p = pBase + ramp.increment * (this.streak - ramp.rampStart + 1);
    } else {
      const length = this.pity - 1 - ramp.rampStart;
      const t = Math.min(1, Math.max(0, (this.streak - ramp.rampStart) / length));
      p = pBase + (ramp.targetProb - pBase) * EASING_FUNCTIONS[ramp.easing](t);
    }

    // Stay below 1 so only the hard cap ever guarantees a hit.
    if (p < 0) return 0;
    if (p > PROBABILITY_CEILING) return PROBABILITY_CEILING;
    return p;
  }

  override draw(pBase: number): boolean {
    if (!this.enabled) return draw(pBase, this.source);

    if (this.atHardCap()) {
      this.streak = 0;
      return true;
    }

    validateProbability(pBase);
    return this.record(draw(this.effectiveProbability(pBase), this.source));
  }
}
