import { EstimationError, ValidationError, errorMessage } from "./errors.js";
import { DEFAULT_ESTIMATION_TIMEOUT_MS, withTimeout } from "./estimation.js";
import type { TextGenerator } from "./gemini.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  CompleteProfile,
  DailyTotals,
  MealEntry,
  WeightGoal,
  WorkoutEntry,
} from "./types.js";
import { MEAL_TYPE_LABELS } from "./types.js";

export type CoachContext = {
  profile: CompleteProfile;
  calorieTarget: number;
  totals: DailyTotals;
  meals: MealEntry[];
  workouts: WorkoutEntry[];
};

export interface CoachAdvisor {
  advise(context: CoachContext): Promise<string>;
}

const GOAL_LABELS: Record<WeightGoal, string> = {
  lose: "Weight loss",
  maintain: "Maintenance",
  gain: "Weight gain",
};

function kcal(value: number): string {
  return `${Math.round(value)} kcal`;
}

export function buildCoachPrompt(context: CoachContext): string {
  const { profile, totals } = context;
  const meals = context.meals
    .map((m) => `${m.meal_type ? MEAL_TYPE_LABELS[m.meal_type] : "Meal"}: ${m.description}`)
    .join("; ");
  const workouts = context.workouts.map((w) => w.description).join("; ") || "None";

  return [
    "You are an encouraging diet coach. Give actionable suggestions based on the person's progress today.",
    "Keep the tone positive and motivating.",
    "",
    "Today's data:",
    `Profile: Age: ${profile.age}, Gender: ${profile.gender}, Weight: ${profile.weight_kg}kg`,
    `Primary goal: ${GOAL_LABELS[profile.goal]}`,
    `Daily calorie target: ${kcal(context.calorieTarget)}`,
    `Workouts: ${workouts}`,
    `Calories burned: ${kcal(totals.caloriesBurned)}`,
    `Adjusted calorie target (target + burned): ${kcal(context.calorieTarget + totals.caloriesBurned)}`,
    `Meals: ${meals}`,
    `Consumed: ${kcal(totals.caloriesConsumed)}, ${Math.round(totals.proteinTotal)}g protein, ${Math.round(totals.carbsTotal)}g carbs, ${Math.round(totals.fatTotal)}g fat`,
    "",
    "Reply in Markdown with three short sections:",
    "1. **Insight**: how today is going against the adjusted calorie target, mentioning any workout.",
    "2. **Next meal**: one specific meal or snack that fits the remaining calories.",
    "3. **Recovery tip**: one tip related to the workout, such as stretching or hydration.",
  ].join("\n");
}

export class LlmCoachAdvisor implements CoachAdvisor {
  private readonly generate: TextGenerator;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    generate: TextGenerator,
    options: { timeoutMs?: number; logger?: Logger } = {},
  ) {
    this.generate = generate;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ESTIMATION_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async advise(context: CoachContext): Promise<string> {
    if (context.meals.length === 0) {
      throw new ValidationError("Log at least one meal before asking for advice");
    }

    let advice: string;
    try {
      advice = await withTimeout(
        (signal) => this.generate(buildCoachPrompt(context), { signal }),
        this.timeoutMs,
        "coach advice",
      );
    } catch (err) {
      this.logger.warn("coach request failed", { error: err });
      if (err instanceof EstimationError) {
        throw err;
      }
      throw new EstimationError(`Coach request failed: ${errorMessage(err)}`, { cause: err });
    }

    const trimmed = advice.trim();
    if (!trimmed) {
      throw new EstimationError("Model returned empty advice");
    }
    return trimmed;
  }
}
