import type { RandomSource } from "../common/random";
import type { DrawOutcome, SimParams, SoftPityConfig } from "../types";
import { BannerSystem } from "./banner";
import { SoftPitySystem } from "./soft-pity";

/** Anything the simulator and session store can advance draw by draw. */
export type Engine = SoftPitySystem | BannerSystem;

/**
 * Resolve where the ramp starts. An explicit index wins; otherwise the
 * fraction of `pity` is rounded up and kept below the threshold.
 */
export function resolveRampStart(
  pity: number,
  rampStart?: number,
  rampStartPct?: number
): number | undefined {
  if (rampStart !== undefined) return rampStart;
  if (rampStartPct === undefined) return undefined;

  const pct = Math.min(1, Math.max(0, rampStartPct));
  const start = Math.ceil(pct * pity);
  return start >= pity ? pity - 1 : start;
}

/** Soft-pity config described by `params`, or undefined when it names no ramp. */
export function softPityConfigFrom(params: SimParams): SoftPityConfig | undefined {
  const rampStart = resolveRampStart(
    params.pity,
    params.rampStart,
    params.rampStartPct
  );
  if (rampStart === undefined) return undefined;

  if (params.softMode === "per_draw_increment") {
    if (params.increment === undefined) return undefined;
    return { mode: "per_draw_increment", rampStart, increment: params.increment };
  }

  if (params.targetProb === undefined) return undefined;
  return {
    mode: "target_ramp",
    rampStart,
    targetProb: params.targetProb,
    easing: params.easing,
  };
}

/**
 * Build a fresh engine for one trial or session. The banner layer is added
 * only when `offProbs` is non-empty. Throws {@link InvalidPityConfigError}
 * for a ramp that cannot be built.
 */
export function createEngine(params: SimParams, source?: RandomSource): Engine {
  const softPity = new SoftPitySystem(params.pity, softPityConfigFrom(params), {
    source,
    initialMissStreak: params.cushion ?? 0,
  });

  if (params.offProbs === undefined || params.offProbs.length === 0) {
    return softPity;
  }
  return new BannerSystem(softPity, params.offProbs, params.maxOff ?? 0);
}

/** Advance any engine by one draw and report the post-state. */
export function drawOutcome(engine: Engine, pBase: number): DrawOutcome {
  if (engine instanceof BannerSystem) return engine.draw(pBase);

  const hit = engine.draw(pBase);
  return {
    hit,
    isUp: hit,
    missStreak: engine.missStreak,
    guaranteedNext: false,
    offStreak: 0,
  };
}
