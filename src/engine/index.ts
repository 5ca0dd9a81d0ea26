export { BannerSystem } from "./banner";
export { drawMany } from "./batch";
export { draw, validateProbability } from "./draw";
export {
  createEngine,
  drawOutcome,
  resolveRampStart,
  softPityConfigFrom,
} from "./factory";
export { PitySystem, clampMissStreak } from "./pity";
export { EASING_FUNCTIONS, SoftPitySystem, resolveRamp } from "./soft-pity";

export type { BatchResult } from "./batch";
export type { Engine } from "./factory";
export type { PityOptions } from "./pity";
export type { ResolvedRamp } from "./soft-pity";
