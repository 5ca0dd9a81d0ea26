import type { DrawOutcome } from "../types";
import { BannerSystem } from "./banner";
import type { Engine } from "./factory";
import { drawOutcome } from "./factory";

export type BatchResult = {
  outcomes: DrawOutcome[];
  hits: number;
  ups: number;
  /** Counters after the last draw. */
  state: Omit<DrawOutcome, "hit" | "isUp">;
};

function counters(engine: Engine): BatchResult["state"] {
  if (engine instanceof BannerSystem) {
    return {
      missStreak: engine.missStreak,
      guaranteedNext: engine.guaranteedNext,
      offStreak: engine.offStreak,
    };
  }
  return { missStreak: engine.missStreak, guaranteedNext: false, offStreak: 0 };
}

/** Perform `n` draws on one engine, keeping a per-draw log. */
export function drawMany(engine: Engine, pBase: number, n: number): BatchResult {
  const outcomes: DrawOutcome[] = [];
  let hits = 0;
  let ups = 0;

  for (let i = 0; i < n; i++) {
    const outcome = drawOutcome(engine, pBase);
    if (outcome.hit) hits++;
    if (outcome.isUp) ups++;
    outcomes.push(outcome);
  }

  return { outcomes, hits, ups, state: counters(engine) };
}
