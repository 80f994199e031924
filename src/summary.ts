import {
  adjustedCalorieTarget,
  calorieProgress,
  dailyTargets,
  hydrationProgress,
  isProfileComplete,
  macroRemaining,
  missingProfileFields,
  remainingCalories,
} from "./goals.js";
import type { TrackerSession } from "./session.js";
import type {
  DailyTargets,
  DailyTotals,
  HydrationEntry,
  MacroGrams,
  MealEntry,
  MealType,
  Profile,
  WorkoutEntry,
} from "./types.js";
import { MEAL_TYPE_LABELS, MEAL_TYPES } from "./types.js";

export type MealGroupKey = MealType | "other";

const MEAL_GROUP_ORDER: MealGroupKey[] = [...MEAL_TYPES, "other"];

// ── Dashboard view model ────────────────────────────────────────────────────
export type DailySummary = {
  date: string;
  profile: Profile;
  profile_complete: boolean;
  missing_profile_fields: string[];
  totals: DailyTotals;
  targets: DailyTargets | null;
  adjusted_calorie_target: number | null;
  remaining_calories: number | null;
  macro_remaining: MacroGrams | null;
  calorie_progress: number | null;
  hydration_progress: number | null;
  meals_by_type: Partial<Record<MealGroupKey, MealEntry[]>>;
  workouts: WorkoutEntry[];
  hydration: HydrationEntry[];
  entry_count: number;
};

export function groupMealsByType(meals: MealEntry[]): Partial<Record<MealGroupKey, MealEntry[]>> {
  const groups: Partial<Record<MealGroupKey, MealEntry[]>> = {};
  for (const key of MEAL_GROUP_ORDER) {
    const matching = meals.filter((m) => (m.meal_type ?? "other") === key);
    if (matching.length > 0) {
      groups[key] = matching;
    }
  }
  return groups;
}

export function buildDailySummary(session: TrackerSession): DailySummary {
  const { log, profile } = session;
  const meals = log.meals();
  const workouts = log.workouts();
  const hydration = log.hydration();
  const totals = log.totals();
  const complete = isProfileComplete(profile);

  return {
    date: log.date,
    profile,
    profile_complete: complete,
    missing_profile_fields: missingProfileFields(profile),
    totals,
    targets: complete ? dailyTargets(profile) : null,
    adjusted_calorie_target: complete ? adjustedCalorieTarget(profile, totals) : null,
    remaining_calories: complete ? remainingCalories(profile, totals) : null,
    macro_remaining: complete ? macroRemaining(profile, totals) : null,
    calorie_progress: complete ? calorieProgress(profile, totals) : null,
    hydration_progress: complete ? hydrationProgress(profile, totals) : null,
    meals_by_type: groupMealsByType(meals),
    workouts,
    hydration,
    entry_count: meals.length + workouts.length + hydration.length,
  };
}

// ── Text rendering ──────────────────────────────────────────────────────────

function round(value: number): number {
  return Math.round(value);
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function formatDailySummary(summary: DailySummary): string {
  const { totals } = summary;
  const lines = [
    `📊 Daily Summary for ${summary.date}`,
    `Entries: ${summary.entry_count}`,
    "",
    "Totals:",
    `  Consumed: ${round(totals.caloriesConsumed)} kcal`,
    `  Burned:   ${round(totals.caloriesBurned)} kcal`,
    `  Protein:  ${round(totals.proteinTotal)}g`,
    `  Carbs:    ${round(totals.carbsTotal)}g`,
    `  Fat:      ${round(totals.fatTotal)}g`,
    `  Water:    ${round(totals.hydrationTotal)} ml`,
  ];

  if (
    summary.targets &&
    summary.adjusted_calorie_target !== null &&
    summary.remaining_calories !== null &&
    summary.macro_remaining !== null &&
    summary.calorie_progress !== null &&
    summary.hydration_progress !== null
  ) {
    const { targets, macro_remaining: macros } = summary;
    lines.push(
      "",
      "Goal Progress:",
      `  Target:    ${round(targets.calories)} kcal (adjusted ${round(summary.adjusted_calorie_target)} kcal)`,
      `  Remaining: ${round(summary.remaining_calories)} kcal (${percent(summary.calorie_progress)} of adjusted target eaten)`,
      `  Protein:   ${round(macros.protein_g)}g left of ${round(targets.protein_g)}g`,
      `  Carbs:     ${round(macros.carbs_g)}g left of ${round(targets.carbs_g)}g`,
      `  Fat:       ${round(macros.fat_g)}g left of ${round(targets.fat_g)}g`,
      `  Water:     ${percent(summary.hydration_progress)} of ${round(targets.hydration_ml)} ml`,
    );
  } else {
    lines.push(
      "",
      `(Profile incomplete: set ${summary.missing_profile_fields.join(", ")} to see goal progress)`,
    );
  }

  const mealLines: string[] = [];
  for (const key of MEAL_GROUP_ORDER) {
    const meals = summary.meals_by_type[key];
    if (!meals) {
      continue;
    }
    mealLines.push(`  ${key === "other" ? "Other" : MEAL_TYPE_LABELS[key]}:`);
    for (const meal of meals) {
      mealLines.push(`    • ${meal.description} (${round(meal.calories)} kcal)`);
    }
  }
  if (mealLines.length > 0) {
    lines.push("", "Meals:", ...mealLines);
  }

  if (summary.workouts.length > 0) {
    lines.push("", "Workouts:");
    for (const workout of summary.workouts) {
      lines.push(`  • ${workout.description} (${round(workout.calories_burned)} kcal burned)`);
    }
  }

  return lines.join("\n");
}
