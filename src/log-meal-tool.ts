import { Type } from "@sinclair/typebox";
import { EstimationError, ValidationError } from "./errors.js";
import type { EstimationGateway } from "./estimation.js";
import { silentLogger, type Logger } from "./logger.js";
import { stringEnum, textResult, type TrackerTool } from "./tool.js";
import type { DailyTotals, MealEntry } from "./types.js";
import { MAX_MACRO_GRAMS, MAX_MEAL_CALORIES, MEAL_TYPE_LABELS, MEAL_TYPES } from "./types.js";

const LogMealParams = Type.Object(
  {
    description: Type.String({
      description:
        "Natural language description of the meal (e.g. 'a bowl of oatmeal with berries and a coffee')",
    }),
    meal_type: Type.Optional(
      stringEnum(MEAL_TYPES, { description: "Which meal of the day this was." }),
    ),
    nutrition: Type.Optional(
      Type.Object(
        {
          calories: Type.Number({ maximum: MAX_MEAL_CALORIES }),
          protein_g: Type.Number({ maximum: MAX_MACRO_GRAMS }),
          carbs_g: Type.Number({ maximum: MAX_MACRO_GRAMS }),
          fat_g: Type.Number({ maximum: MAX_MACRO_GRAMS }),
        },
        {
          additionalProperties: false,
          description: "Known nutrition values. When given, no estimate is requested.",
        },
      ),
    ),
  },
  { additionalProperties: false },
);

export type LogMealDetails = { entry: MealEntry; totals: DailyTotals };

export function createLogMealTool(deps: {
  gateway: EstimationGateway;
  logger?: Logger;
}): TrackerTool<typeof LogMealParams, LogMealDetails> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "log_meal",
    description:
      "Log a meal from a free-text description. Nutrition (calories, protein, carbs, fat) is estimated by the language model unless given explicitly.",
    parameters: LogMealParams,

    async execute(session, params) {
      const description = params.description.trim();
      if (!description) {
        throw new ValidationError("description required", "description");
      }

      // Estimate first: a failed estimate must leave the log untouched.
      let nutrition = params.nutrition;
      const source = nutrition ? "manual" : "estimated";
      if (!nutrition) {
        const estimate = await deps.gateway.estimate({ text: description, kind: "meal" });
        if (estimate.kind !== "meal") {
          throw new EstimationError("Estimation returned a workout result for a meal");
        }
        nutrition = {
          calories: estimate.calories,
          protein_g: estimate.protein_g,
          carbs_g: estimate.carbs_g,
          fat_g: estimate.fat_g,
        };
      }

      // The session may have been closed while the estimate was running.
      session.assertOpen();
      const entry = session.log.addMeal({
        description,
        meal_type: params.meal_type ?? null,
        source,
        ...nutrition,
      });
      const totals = session.log.totals();

      logger.info("meal logged", {
        session: session.id,
        entry: entry.id,
        source,
        calories: entry.calories,
      });

      const label = entry.meal_type ? MEAL_TYPE_LABELS[entry.meal_type] : "Meal";
      const text = [
        `✅ ${label} logged: ${entry.description}`,
        `  ${entry.calories} kcal, ${entry.protein_g}g protein, ${entry.carbs_g}g carbs, ${entry.fat_g}g fat`,
        `\nToday so far: ${Math.round(totals.caloriesConsumed)} kcal consumed, ${Math.round(totals.caloriesBurned)} kcal burned`,
      ].join("\n");

      return textResult(text, { entry, totals });
    },
  };
}
