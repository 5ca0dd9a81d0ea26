import pino from "pino";
import { config } from "./config";

/** The slice of a pino logger the engine writes to. */
export type LoggerLike = {
  debug: (payload: unknown, message?: string) => void;
  info: (payload: unknown, message?: string) => void;
  warn: (payload: unknown, message?: string) => void;
};

export const logger = pino({
  name: "pity-engine",
  level: config.logLevel,
});
