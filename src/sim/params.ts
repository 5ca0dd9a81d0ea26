import { z } from "zod";
import { ParamsValidationError } from "../errors";
import type { SimBudget, SimParams, TrialGoal } from "../types";
import { EASINGS, SOFT_PITY_MODES, TRIAL_GOALS } from "../types";

// Query strings and merged config files both arrive as loose values: blank
// strings mean "absent", numbers may be strings, lists may be comma-joined.
function blankToUndefined(value: unknown): unknown {
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

function splitList(value: unknown): unknown {
  const v = blankToUndefined(value);
  if (typeof v !== "string") return v;
  return v
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, schema.optional());

export const simParamsSchema = z.object({
  pBase: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1)),
  pity: z.preprocess(blankToUndefined, z.coerce.number().int()),
  softMode: z.preprocess(blankToUndefined, z.enum(SOFT_PITY_MODES).optional()),
  rampStart: optionalNumber(z.coerce.number().int().min(0)),
  rampStartPct: optionalNumber(z.coerce.number().min(0).max(1)),
  targetProb: optionalNumber(z.coerce.number().gt(0).lt(1)),
  increment: optionalNumber(z.coerce.number().positive()),
  easing: z.preprocess(blankToUndefined, z.enum(EASINGS).optional()),
  cushion: optionalNumber(z.coerce.number().int().min(0)),
  offProbs: z.preprocess(
    splitList,
    z.array(z.coerce.number().gt(0).lt(1)).optional()
  ),
  maxOff: optionalNumber(z.coerce.number().int().min(0)),
});

export const simulationRequestSchema = simParamsSchema
  .extend({
    goal: z.preprocess(
      blankToUndefined,
      z.enum(TRIAL_GOALS).default("first_up")
    ),
    trials: z.preprocess(blankToUndefined, z.coerce.number().int().positive()),
    budgetDraws: optionalNumber(z.coerce.number().int().positive()),
    seed: z.preprocess(
      blankToUndefined,
      z.union([z.string(), z.number()]).optional()
    ),
  })
  .superRefine((value, ctx) => {
    if (value.goal === "fixed_budget" && value.budgetDraws === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["budgetDraws"],
        message: "budgetDraws is required for goal=fixed_budget",
      });
    }
  });

export type SimulationRequest = {
  params: SimParams;
  goal: TrialGoal;
  trials: number;
  budget?: SimBudget;
  seed?: string | number;
};

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ParamsValidationError(parsed.error.flatten());
  }
  return parsed.data;
}

/** Validate loose collaborator input into {@link SimParams}. */
export function parseSimParams(input: unknown): SimParams {
  return parseOrThrow(simParamsSchema, input);
}

/** Validate a full simulation request: params plus goal, trials, budget and seed. */
export function parseSimulationRequest(input: unknown): SimulationRequest {
  const { goal, trials, budgetDraws, seed, ...params } = parseOrThrow(
    simulationRequestSchema,
    input
  );
  return {
    params,
    goal,
    trials,
    budget: budgetDraws === undefined ? undefined : { numDraws: budgetDraws },
    seed,
  };
}
