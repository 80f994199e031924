import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import fs from "node:fs";
import { ConfigError } from "./errors.js";
import { DEFAULT_GEMINI_MODEL } from "./gemini.js";
import { DEFAULT_ESTIMATION_TIMEOUT_MS } from "./estimation.js";
import { DEFAULT_SESSION_TTL_MS } from "./session.js";
import { formatValidationErrors } from "./validation.js";

export const ConfigSchema = Type.Object(
  {
    apiKey: Type.String({ minLength: 1 }),
    model: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
    estimationTimeoutMs: Type.Integer({ minimum: 1 }),
    sessionTtlMs: Type.Integer({ minimum: 1 }),
    logLevel: Type.Union([
      Type.Literal("debug"),
      Type.Literal("info"),
      Type.Literal("warn"),
      Type.Literal("error"),
    ]),
  },
  { additionalProperties: false },
);

export type HealthCoachConfig = Static<typeof ConfigSchema>;

const ajv = new Ajv({ allErrors: true, strict: false, coerceTypes: true });
const validateConfig = ajv.compile<HealthCoachConfig>(ConfigSchema);

type Env = Record<string, string | undefined>;

function firstSet(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

function readApiKey(env: Env): string {
  const direct = firstSet(env.GEMINI_API_KEY, env.GOOGLE_API_KEY);
  if (direct) {
    return direct;
  }

  const keyFile = firstSet(env.GEMINI_API_KEY_FILE);
  if (keyFile) {
    let contents: string;
    try {
      contents = fs.readFileSync(keyFile, "utf-8");
    } catch (err) {
      throw new ConfigError(`Could not read GEMINI_API_KEY_FILE (${keyFile}): ${String(err)}`);
    }
    const fromFile = contents.trim();
    if (fromFile) {
      return fromFile;
    }
  }

  throw new ConfigError(
    "Missing API key: set GEMINI_API_KEY (or GOOGLE_API_KEY, or GEMINI_API_KEY_FILE)",
  );
}

/**
 * Reads configuration from the environment. A missing API key or any invalid
 * value throws `ConfigError`; the server treats that as fatal at start-up.
 */
export function loadConfig(env: Env = process.env): HealthCoachConfig {
  const raw: Record<string, unknown> = {
    apiKey: readApiKey(env),
    model: firstSet(env.HEALTH_COACH_MODEL) ?? DEFAULT_GEMINI_MODEL,
    port: firstSet(env.HEALTH_COACH_PORT, env.PORT) ?? "3000",
    estimationTimeoutMs:
      firstSet(env.HEALTH_COACH_ESTIMATION_TIMEOUT_MS) ?? String(DEFAULT_ESTIMATION_TIMEOUT_MS),
    sessionTtlMs: firstSet(env.HEALTH_COACH_SESSION_TTL_MS) ?? String(DEFAULT_SESSION_TTL_MS),
    logLevel: firstSet(env.HEALTH_COACH_LOG_LEVEL)?.toLowerCase() ?? "info",
  };

  // coerceTypes rewrites the numeric strings in place.
  if (!validateConfig(raw)) {
    throw new ConfigError(`Invalid configuration: ${formatValidationErrors(validateConfig)}`);
  }
  return raw;
}
