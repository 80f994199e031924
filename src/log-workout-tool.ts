import { Type } from "@sinclair/typebox";
import { EstimationError, ValidationError } from "./errors.js";
import type { EstimationGateway } from "./estimation.js";
import { silentLogger, type Logger } from "./logger.js";
import { textResult, type TrackerTool } from "./tool.js";
import type { DailyTotals, WorkoutEntry } from "./types.js";
import { MAX_WORKOUT_CALORIES } from "./types.js";

const LogWorkoutParams = Type.Object(
  {
    description: Type.String({
      description: "Natural language description of the workout (e.g. '30 minutes of jogging')",
    }),
    calories_burned: Type.Optional(
      Type.Number({
        maximum: MAX_WORKOUT_CALORIES,
        description: "Known calories burned. When given, no estimate is requested.",
      }),
    ),
  },
  { additionalProperties: false },
);

export type LogWorkoutDetails = { entry: WorkoutEntry; totals: DailyTotals };

export function createLogWorkoutTool(deps: {
  gateway: EstimationGateway;
  logger?: Logger;
}): TrackerTool<typeof LogWorkoutParams, LogWorkoutDetails> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "log_workout",
    description:
      "Log a workout from a free-text description. Calories burned are estimated from the description and the profile unless given explicitly.",
    parameters: LogWorkoutParams,

    async execute(session, params) {
      const description = params.description.trim();
      if (!description) {
        throw new ValidationError("description required", "description");
      }

      let caloriesBurned = params.calories_burned;
      const source = caloriesBurned === undefined ? "estimated" : "manual";
      if (caloriesBurned === undefined) {
        const { weight_kg, age, gender } = session.profile;
        const estimate = await deps.gateway.estimate({
          text: description,
          kind: "workout",
          profile: { weight_kg, age, gender },
        });
        if (estimate.kind !== "workout") {
          throw new EstimationError("Estimation returned a meal result for a workout");
        }
        caloriesBurned = estimate.calories_burned;
      }

      session.assertOpen();
      const entry = session.log.addWorkout({
        description,
        source,
        calories_burned: caloriesBurned,
      });
      const totals = session.log.totals();

      logger.info("workout logged", {
        session: session.id,
        entry: entry.id,
        source,
        caloriesBurned: entry.calories_burned,
      });

      const text = [
        `✅ Workout logged: ${entry.description}`,
        `  Approx. ${Math.round(entry.calories_burned)} kcal burned`,
        `\nBurned today: ${Math.round(totals.caloriesBurned)} kcal`,
      ].join("\n");

      return textResult(text, { entry, totals });
    },
  };
}
