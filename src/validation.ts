import { Ajv, type ValidateFunction } from "ajv";

export const ajv = new Ajv({ allErrors: true, strict: false });

export function formatValidationErrors(validate: ValidateFunction): string {
  return (
    validate.errors
      ?.map((e) => `${e.instancePath || "<root>"} ${e.message || "invalid"}`)
      .join("; ") ?? "invalid"
  );
}
