import { config } from "../common/config";
import type { LoggerLike } from "../common/logger";
import { logger as defaultLogger } from "../common/logger";
import type { RandomSource } from "../common/random";
import { SeededRandomSource } from "../common/random";
import type { Engine } from "../engine/factory";
import { createEngine, drawOutcome } from "../engine/factory";
import type { DrawOutcome, SimBudget, SimParams, Stats, TrialGoal } from "../types";
import { calcStats, emptyStats } from "./stats";

export type MonteCarloOptions = {
  /** One stream shared by every trial, consumed in trial order. */
  source?: RandomSource;
  /** Gives trial `i` its own stream seeded with `${seed}:${i}`; ignored when `source` is set. */
  seed?: string | number;
  /** Cap on draws for the draw-until goals; a capped trial records the cap. */
  maxDrawsPerTrial?: number;
  logger?: LoggerLike;
};

export type TrialResult = {
  value: number;
  /** True when a draw-until goal hit `maxDrawsPerTrial` first. */
  capped: boolean;
};

function drawUntil(
  engine: Engine,
  pBase: number,
  done: (outcome: DrawOutcome) => boolean,
  maxDraws: number
): TrialResult {
  for (let draws = 1; draws <= maxDraws; draws++) {
    if (done(drawOutcome(engine, pBase))) return { value: draws, capped: false };
  }
  return { value: maxDraws, capped: true };
}

/**
 * Run one trial on a freshly built engine.
 *
 * - first_hit: draws until the first hit
 * - first_up: draws until the first UP; without a banner every hit is UP, so
 *   this is the same as first_hit
 * - fixed_budget: hits (or UPs with a banner) within `budget.numDraws` draws
 */
export function simulateTrial(
  params: SimParams,
  goal: TrialGoal,
  budget?: SimBudget,
  source?: RandomSource,
  maxDraws: number = config.maxDrawsPerTrial
): TrialResult {
  const engine = createEngine(params, source);

  switch (goal) {
    case "first_hit":
      return drawUntil(engine, params.pBase, (o) => o.hit, maxDraws);
    case "first_up":
      return drawUntil(engine, params.pBase, (o) => o.hit && o.isUp, maxDraws);
    case "fixed_budget": {
      const n = budget?.numDraws ?? 0;
      let count = 0;
      for (let i = 0; i < n; i++) {
        if (drawOutcome(engine, params.pBase).isUp) count++;
      }
      return { value: count, capped: false };
    }
  }
}

/**
 * Repeat `trials` independent trials and summarize the per-trial samples.
 *
 * Every trial builds its own engine from `params`, so nothing but the random
 * stream (when `options.source` is given) is shared between trials. A config
 * the engine rejects aborts the whole run.
 */
export function runMonteCarlo(
  params: SimParams,
  goal: TrialGoal,
  trials: number,
  budget?: SimBudget,
  options: MonteCarloOptions = {}
): Stats {
  if (!Number.isFinite(trials) || trials < 1) return emptyStats();

  const log = options.logger ?? defaultLogger;
  const maxDraws = options.maxDrawsPerTrial ?? config.maxDrawsPerTrial;
  const count = Math.floor(trials);
  const samples = new Array<number>(count);
  let capped = 0;

  log.debug({ goal, trials: count, params }, "monte-carlo-start");

  for (let i = 0; i < count; i++) {
    const source =
      options.source ??
      (options.seed !== undefined
        ? new SeededRandomSource(`${options.seed}:${i}`)
        : undefined);
    const result = simulateTrial(params, goal, budget, source, maxDraws);
    if (result.capped) capped++;
    samples[i] = result.value;
  }

  if (capped > 0) {
    log.warn({ goal, capped, maxDraws }, "monte-carlo-trials-capped");
  }

  const stats = calcStats(samples);
  log.debug({ goal, mean: stats.mean, p90: stats.p90 }, "monte-carlo-done");
  return stats;
}
