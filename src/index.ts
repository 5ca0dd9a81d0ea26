export { config, loadConfig } from "./common/config";
export { logger } from "./common/logger";
export { LRUCache } from "./common/lru-cache";
export {
  CryptoRandomSource,
  SeededRandomSource,
  defaultRandomSource,
} from "./common/random";
export * from "./engine";
export {
  InvalidPityConfigError,
  InvalidProbabilityError,
  ParamsValidationError,
  PityEngineError,
} from "./errors";
export { SessionStore } from "./session/session-store";
export { costStats, tokensForDraws } from "./sim/cost";
export { runMonteCarlo, simulateTrial } from "./sim/monte-carlo";
export {
  parseSimParams,
  parseSimulationRequest,
  simParamsSchema,
  simulationRequestSchema,
} from "./sim/params";
export { TrialQuery, calcStats, emptyStats, percentile } from "./sim/stats";
export * from "./types";

export type { EngineConfig, LogLevel } from "./common/config";
export type { LoggerLike } from "./common/logger";
export type { RandomSource } from "./common/random";
export type { PityEngineErrorCode } from "./errors";
export type { Session, SessionStoreOptions } from "./session/session-store";
export type { TokenSpec } from "./sim/cost";
export type { MonteCarloOptions, TrialResult } from "./sim/monte-carlo";
export type { SimulationRequest } from "./sim/params";
