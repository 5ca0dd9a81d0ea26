import { z } from "zod";

type RawEnv = Record<string, string | undefined>;

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function cleanValue(value: string | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PITY_ENGINE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  PITY_ENGINE_MAX_DRAWS_PER_TRIAL: z.coerce
    .number()
    .int()
    .min(1)
    .default(1_000_000),
  PITY_ENGINE_SESSION_CAPACITY: z.coerce.number().int().min(1).default(1000),
});

export interface EngineConfig {
  logLevel: LogLevel;
  /** Upper bound on draws in one draw-until trial. */
  maxDrawsPerTrial: number;
  /** Live sessions kept before the least recently used one is evicted. */
  sessionCapacity: number;
}

export function loadConfig(raw: RawEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse({
    NODE_ENV: cleanValue(raw.NODE_ENV),
    PITY_ENGINE_LOG_LEVEL: cleanValue(raw.PITY_ENGINE_LOG_LEVEL),
    PITY_ENGINE_MAX_DRAWS_PER_TRIAL: cleanValue(
      raw.PITY_ENGINE_MAX_DRAWS_PER_TRIAL
    ),
    PITY_ENGINE_SESSION_CAPACITY: cleanValue(raw.PITY_ENGINE_SESSION_CAPACITY),
  });

  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${fields}`);
  }

  const env = parsed.data;
  return {
    logLevel:
      env.PITY_ENGINE_LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
    maxDrawsPerTrial: env.PITY_ENGINE_MAX_DRAWS_PER_TRIAL,
    sessionCapacity: env.PITY_ENGINE_SESSION_CAPACITY,
  };
}

export const config: EngineConfig = loadConfig();
