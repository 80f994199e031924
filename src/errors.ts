export type ErrorCode =
  | "validation_error"
  | "incomplete_profile"
  | "estimation_error"
  | "not_found"
  | "config_error";

export class HealthCoachError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Entry or request data that fails validation. Nothing is applied. */
export class ValidationError extends HealthCoachError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super("validation_error", message);
    this.field = field;
  }
}

export class IncompleteProfileError extends HealthCoachError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("incomplete_profile", `Profile is incomplete: missing ${missing.join(", ")}`);
    this.missing = missing;
  }
}

/** The estimation service failed, timed out or returned unusable output. */
export class EstimationError extends HealthCoachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("estimation_error", message, options);
  }
}

export class NotFoundError extends HealthCoachError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class ConfigError extends HealthCoachError {
  constructor(message: string) {
    super("config_error", message);
  }
}

export function httpStatusFor(err: unknown): number {
  if (!(err instanceof HealthCoachError)) {
    return 500;
  }
  switch (err.code) {
    case "validation_error":
      return 400;
    case "not_found":
      return 404;
    case "incomplete_profile":
      return 409;
    case "estimation_error":
      return 502;
    case "config_error":
      return 500;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
