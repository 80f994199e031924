import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { EstimationError } from "./errors.js";
import type {
  Estimate,
  EstimationRequest,
  MealEstimate,
  ProfileContext,
  WorkoutEstimate,
} from "./types.js";
import {
  MAX_MACRO_GRAMS,
  MAX_MEAL_CALORIES,
  MAX_WORKOUT_CALORIES,
} from "./types.js";
import { formatValidationErrors } from "./validation.js";

// ── Prompts ─────────────────────────────────────────────────────────────────

export const MEAL_SYSTEM_PROMPT = [
  "You are a nutrition analysis function.",
  "Given a description of a meal, estimate its nutritional content.",
  "Return ONLY a valid JSON object. Do not wrap in markdown fences. Do not include commentary.",
  "",
  "The JSON must have this exact structure:",
  "{",
  '  "calories": <number in kcal>,',
  '  "protein_g": <number in grams>,',
  '  "carbs_g": <number in grams>,',
  '  "fat_g": <number in grams>',
  "}",
  "",
  "Guidelines:",
  "- Estimate the whole meal, summing every item described",
  "- If quantity is unclear, assume a typical single serving",
  "- Round to reasonable precision (1 decimal place max)",
].join("\n");

export const WORKOUT_SYSTEM_PROMPT = [
  "You are a fitness analysis function.",
  "Given a description of a workout and the person's profile, estimate the calories burned.",
  "Return ONLY a valid JSON object. Do not wrap in markdown fences. Do not include commentary.",
  "",
  "The JSON must have this exact structure:",
  "{",
  '  "calories_burned": <number in kcal>',
  "}",
].join("\n");

export function describeProfile(profile: ProfileContext | undefined): string {
  if (!profile) {
    return "unknown";
  }
  const parts: string[] = [];
  if (profile.weight_kg !== null) parts.push(`Weight: ${profile.weight_kg}kg`);
  if (profile.age !== null) parts.push(`Age: ${profile.age}`);
  parts.push(`Gender: ${profile.gender}`);
  return parts.join(", ");
}

export function buildEstimationPrompt(request: EstimationRequest): string {
  if (request.kind === "meal") {
    return `${MEAL_SYSTEM_PROMPT}\n\nMEAL DESCRIPTION:\n${request.text}\n`;
  }
  return [
    WORKOUT_SYSTEM_PROMPT,
    "",
    `PROFILE: ${describeProfile(request.profile)}`,
    "",
    "WORKOUT DESCRIPTION:",
    request.text,
    "",
  ].join("\n");
}

// ── Schemas ─────────────────────────────────────────────────────────────────

export const MealEstimateSchema = Type.Object(
  {
    calories: Type.Number({ minimum: 0, maximum: MAX_MEAL_CALORIES }),
    protein_g: Type.Number({ minimum: 0, maximum: MAX_MACRO_GRAMS }),
    carbs_g: Type.Number({ minimum: 0, maximum: MAX_MACRO_GRAMS }),
    fat_g: Type.Number({ minimum: 0, maximum: MAX_MACRO_GRAMS }),
  },
  { additionalProperties: false },
);

export const WorkoutEstimateSchema = Type.Object(
  {
    calories_burned: Type.Number({ minimum: 0, maximum: MAX_WORKOUT_CALORIES }),
  },
  { additionalProperties: false },
);

type MealEstimatePayload = Static<typeof MealEstimateSchema>;
type WorkoutEstimatePayload = Static<typeof WorkoutEstimateSchema>;

// Models sometimes add keys such as fiber_g; those are dropped, not rejected.
const estimateAjv = new Ajv({ allErrors: true, strict: false, removeAdditional: true });

const validateMeal = estimateAjv.compile<MealEstimatePayload>(MealEstimateSchema);
const validateWorkout = estimateAjv.compile<WorkoutEstimatePayload>(WorkoutEstimateSchema);

// ── Parsing ─────────────────────────────────────────────────────────────────

export function stripCodeFences(s: string): string {
  const trimmed = s.trim();
  const m = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (m) {
    return (m[1] ?? "").trim();
  }
  return trimmed;
}

/** The outermost `{ ... }` span, so chatter around the object is ignored. */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

export function parseEstimate(kind: "meal", text: string): MealEstimate;
export function parseEstimate(kind: "workout", text: string): WorkoutEstimate;
export function parseEstimate(kind: Estimate["kind"], text: string): Estimate;
export function parseEstimate(kind: Estimate["kind"], text: string): Estimate {
  const json = extractJsonObject(stripCodeFences(text));
  if (!json) {
    throw new EstimationError(`Model returned no JSON object for ${kind} estimation`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new EstimationError(`Model returned invalid JSON for ${kind} estimation`, {
      cause: err,
    });
  }

  if (kind === "meal") {
    if (!validateMeal(parsed)) {
      throw new EstimationError(
        `Meal estimation failed validation: ${formatValidationErrors(validateMeal)}`,
      );
    }
    return { kind: "meal", ...parsed };
  }

  if (!validateWorkout(parsed)) {
    throw new EstimationError(
      `Workout estimation failed validation: ${formatValidationErrors(validateWorkout)}`,
    );
  }
  return { kind: "workout", ...parsed };
}
