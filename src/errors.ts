export type PityEngineErrorCode =
  | "INVALID_PROBABILITY"
  | "INVALID_PITY_CONFIG"
  | "INVALID_PARAMS";

/** Base class for every error the engine raises on caller input. */
export class PityEngineError extends Error {
  readonly code: PityEngineErrorCode;

  constructor(code: PityEngineErrorCode, message: string) {
    super(message);
    this.name = "PityEngineError";
    this.code = code;
  }
}

/** A probability outside [0, 1], NaN or infinite. */
export class InvalidProbabilityError extends PityEngineError {
  readonly value: number;

  constructor(value: number) {
    super(
      "INVALID_PROBABILITY",
      `invalid probability ${value}; must be a finite number in [0, 1]`
    );
    this.name = "InvalidProbabilityError";
    this.value = value;
  }
}

/** A soft-pity configuration that cannot produce a valid ramp. */
export class InvalidPityConfigError extends PityEngineError {
  readonly reason: string;

  constructor(reason: string) {
    super("INVALID_PITY_CONFIG", `invalid soft pity config: ${reason}`);
    this.name = "InvalidPityConfigError";
    this.reason = reason;
  }
}

/**
 * Raised by the parameter parsers when loose collaborator input does not
 * describe a valid simulation. `details` holds the flattened zod issues.
 */
export class ParamsValidationError extends PityEngineError {
  readonly details: {
    formErrors: string[];
    fieldErrors: Record<string, string[] | undefined>;
  };

  constructor(details: ParamsValidationError["details"]) {
    const fields = Object.entries(details.fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(", ")}`)
      .concat(details.formErrors);
    super("INVALID_PARAMS", `validation failed: ${fields.join("; ")}`);
    this.name = "ParamsValidationError";
    this.details = details;
  }
}
