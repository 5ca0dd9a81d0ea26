/** Largest probability a ramp may produce before the hard cap takes over. */
export const PROBABILITY_CEILING = 1 - 1e-12;

/** Off-banner probability used in place of missing or out-of-range entries. */
export const DEFAULT_OFF_PROB = 0.5;

/** Easing curves supported by the target ramp. */
export const EASINGS = ["linear", "easeOutQuad", "easeInOutCubic"] as const;
export type Easing = (typeof EASINGS)[number];

/** How the soft-pity ramp raises the probability. */
export const SOFT_PITY_MODES = ["target_ramp", "per_draw_increment"] as const;
export type SoftPityMode = (typeof SOFT_PITY_MODES)[number];

/** What one simulated trial measures. */
export const TRIAL_GOALS = ["first_hit", "first_up", "fixed_budget"] as const;
export type TrialGoal = (typeof TRIAL_GOALS)[number];

export type TargetRampConfig = {
  mode?: "target_ramp";
  /** Miss streak at which the ramp begins. */
  rampStart: number;
  /** Probability reached at miss streak `pity - 1`. */
  targetProb: number;
  easing?: Easing;
};

export type IncrementRampConfig = {
  mode: "per_draw_increment";
  rampStart: number;
  /** Probability added for every draw at or past `rampStart`. */
  increment: number;
};

export type SoftPityConfig = TargetRampConfig | IncrementRampConfig;

/** Post-state snapshot after one draw. */
export interface DrawOutcome {
  hit: boolean;
  /** Featured reward. Without a banner layer every hit counts as UP. */
  isUp: boolean;
  missStreak: number;
  guaranteedNext: boolean;
  offStreak: number;
}

/** Flat description of one trial configuration. */
export interface SimParams {
  readonly pBase: number;
  /** Hard pity threshold; `<= 0` disables pity. */
  readonly pity: number;
  readonly softMode?: SoftPityMode;
  readonly rampStart?: number;
  /** Ramp start as a fraction of `pity`; ignored when `rampStart` is set. */
  readonly rampStartPct?: number;
  readonly targetProb?: number;
  readonly increment?: number;
  readonly easing?: Easing;
  /** Miss streak carried in from a previous pool. */
  readonly cushion?: number;
  /** Enables the banner layer when non-empty. */
  readonly offProbs?: readonly number[];
  readonly maxOff?: number;
}

export interface SimBudget {
  numDraws: number;
}

/** Summary of a closed set of per-trial integer samples. */
export interface Stats {
  count: number;
  mean: number;
  /** Population variance. */
  variance: number;
  stddev: number;
  min: number;
  max: number;
  p50: number;
  p90: number;
  p99: number;
  samples: readonly number[];
}
