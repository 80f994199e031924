import { Type } from "@sinclair/typebox";
import { ValidationError } from "./errors.js";
import { isProfileComplete, targetCalories } from "./goals.js";
import { silentLogger, type Logger } from "./logger.js";
import { stringEnum, textResult, type TrackerTool } from "./tool.js";
import type { Profile, ProfileUpdate } from "./types.js";
import { ACTIVITY_LEVELS, GENDERS, WEIGHT_GOALS } from "./types.js";

// null clears a body metric.
const metric = (description: string, minimum: number, maximum: number) =>
  Type.Optional(
    Type.Union([Type.Number({ minimum, maximum }), Type.Null()], { description }),
  );

const UpdateProfileParams = Type.Object(
  {
    height_cm: metric("Height in centimetres.", 50, 272),
    weight_kg: metric("Body weight in kilograms.", 20, 400),
    age: metric("Age in years.", 1, 120),
    gender: Type.Optional(stringEnum(GENDERS)),
    activity_level: Type.Optional(stringEnum(ACTIVITY_LEVELS)),
    goal: Type.Optional(stringEnum(WEIGHT_GOALS, { description: "lose, maintain or gain weight" })),
    hydration_goal_ml: Type.Optional(
      Type.Union([Type.Number({ exclusiveMinimum: 0, maximum: 20_000 }), Type.Null()], {
        description: "Daily water goal in millilitres. null falls back to 35 ml per kg.",
      }),
    ),
  },
  { additionalProperties: false },
);

export function createUpdateProfileTool(
  deps: { logger?: Logger } = {},
): TrackerTool<typeof UpdateProfileParams, { profile: Profile; complete: boolean }> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "update_profile",
    description:
      "Set or update body metrics and goal (height, weight, age, gender, activity level, goal, hydration goal). Only provided values are updated; others are preserved.",
    parameters: UpdateProfileParams,

    async execute(session, params) {
      const updates: ProfileUpdate = params;
      const fields = Object.entries(updates)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key);
      if (fields.length === 0) {
        throw new ValidationError("At least one profile value must be provided");
      }

      const profile = session.updateProfile(updates);
      const complete = isProfileComplete(profile);
      logger.info("profile updated", { session: session.id, fields });

      const text = [
        "✅ Profile updated:",
        `  Height:   ${profile.height_cm ?? "-"} cm`,
        `  Weight:   ${profile.weight_kg ?? "-"} kg`,
        `  Age:      ${profile.age ?? "-"}`,
        `  Gender:   ${profile.gender}`,
        `  Activity: ${profile.activity_level}`,
        `  Goal:     ${profile.goal}`,
        complete
          ? `\nDaily calorie target: ${Math.round(targetCalories(profile))} kcal`
          : "\n(Set height, weight and age to compute targets)",
      ].join("\n");

      return textResult(text, { profile, complete });
    },
  };
}
