import { describe, expect, it } from "vitest";
import { EstimationError } from "./errors.js";
import {
  MEAL_SYSTEM_PROMPT,
  WORKOUT_SYSTEM_PROMPT,
  buildEstimationPrompt,
  describeProfile,
  extractJsonObject,
  parseEstimate,
  stripCodeFences,
} from "./extraction.js";

describe("stripCodeFences", () => {
  it("unwraps a json fence", () => {
    expect(stripCodeFences('```json\n{"calories": 1}\n```')).toBe('{"calories": 1}');
  });

  it("leaves unfenced text trimmed", () => {
    expect(stripCodeFences('  {"calories": 1}\n')).toBe('{"calories": 1}');
  });
});

describe("extractJsonObject", () => {
  it("takes the outermost braces", () => {
    expect(extractJsonObject('Sure! {"a": {"b": 1}} Enjoy.')).toBe('{"a": {"b": 1}}');
  });

  it("returns null without an object", () => {
    expect(extractJsonObject("no json here")).toBeNull();
    expect(extractJsonObject("} backwards {")).toBeNull();
  });
});

describe("prompts", () => {
  it("embeds the meal description", () => {
    expect(buildEstimationPrompt({ kind: "meal", text: "a bowl of ramen" })).toBe(
      `${MEAL_SYSTEM_PROMPT}\n\nMEAL DESCRIPTION:\na bowl of ramen\n`,
    );
  });

  it("includes the profile context for workouts", () => {
    const prompt = buildEstimationPrompt({
      kind: "workout",
      text: "45 minutes cycling",
      profile: { weight_kg: 70, age: 30, gender: "male" },
    });
    expect(prompt).toBe(
      `${WORKOUT_SYSTEM_PROMPT}\n\nPROFILE: Weight: 70kg, Age: 30, Gender: male\n\nWORKOUT DESCRIPTION:\n45 minutes cycling\n`,
    );
  });

  it("describes unknown metrics by omission", () => {
    expect(describeProfile({ weight_kg: null, age: 41, gender: "female" })).toBe(
      "Age: 41, Gender: female",
    );
    expect(describeProfile(undefined)).toBe("unknown");
  });
});

describe("parseEstimate", () => {
  it("parses a meal estimate", () => {
    expect(
      parseEstimate("meal", '{"calories": 520, "protein_g": 32, "carbs_g": 48.5, "fat_g": 21}'),
    ).toEqual({ kind: "meal", calories: 520, protein_g: 32, carbs_g: 48.5, fat_g: 21 });
  });

  it("parses a fenced workout estimate", () => {
    expect(parseEstimate("workout", '```json\n{"calories_burned": 410}\n```')).toEqual({
      kind: "workout",
      calories_burned: 410,
    });
  });

  it("drops keys it does not use", () => {
    expect(
      parseEstimate(
        "meal",
        '{"calories": 300, "protein_g": 20, "carbs_g": 30, "fat_g": 10, "fiber_g": 3}',
      ),
    ).toEqual({ kind: "meal", calories: 300, protein_g: 20, carbs_g: 30, fat_g: 10 });
  });

  it("rejects implausibly large values", () => {
    expect(() =>
      parseEstimate("meal", '{"calories": 50000, "protein_g": 1, "carbs_g": 1, "fat_g": 1}'),
    ).toThrow("Meal estimation failed validation: /calories must be <= 20000");
  });

  it("rejects output without an object", () => {
    expect(() => parseEstimate("meal", "I cannot help with that")).toThrow(
      new EstimationError("Model returned no JSON object for meal estimation"),
    );
  });

  it("rejects malformed JSON", () => {
    expect(() => parseEstimate("workout", "{calories_burned: 410}")).toThrow(
      "Model returned invalid JSON for workout estimation",
    );
  });

  it("rejects negative values", () => {
    expect(() =>
      parseEstimate("meal", '{"calories": -5, "protein_g": 1, "carbs_g": 1, "fat_g": 1}'),
    ).toThrow("Meal estimation failed validation: /calories must be >= 0");
  });

  it("rejects missing fields", () => {
    expect(() => parseEstimate("meal", '{"calories": 100, "protein_g": 1, "carbs_g": 1}')).toThrow(
      EstimationError,
    );
  });

  it("rejects non-numeric values", () => {
    expect(() => parseEstimate("workout", '{"calories_burned": "lots"}')).toThrow(
      "Workout estimation failed validation: /calories_burned must be number",
    );
  });
});
