import { IncompleteProfileError } from "./errors.js";
import type {
  ActivityLevel,
  CompleteProfile,
  DailyTargets,
  DailyTotals,
  MacroGrams,
  Profile,
  WeightGoal,
} from "./types.js";

// Targets are fixed so results are reproducible:
//
//   BMR (Mifflin-St Jeor)  10·kg + 6.25·cm − 5·age + 5   (male)
//                          10·kg + 6.25·cm − 5·age − 161 (female)
//   TDEE                   BMR × ACTIVITY_MULTIPLIERS[activity_level]
//   calories               TDEE + GOAL_CALORIE_OFFSETS[goal]
//   protein                kg × PROTEIN_G_PER_KG[goal]
//   fat                    calories × 25% ÷ 9
//   carbs                  (calories − protein·4 − fat·9) ÷ 4, at least 0
//   hydration              hydration_goal_ml, else kg × 35 ml

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  lightly_active: 1.375,
  moderately_active: 1.55,
  very_active: 1.725,
};

export const GOAL_CALORIE_OFFSETS: Record<WeightGoal, number> = {
  lose: -500,
  maintain: 0,
  gain: 500,
};

export const PROTEIN_G_PER_KG: Record<WeightGoal, number> = {
  lose: 2.0,
  maintain: 1.6,
  gain: 1.8,
};

export const FAT_CALORIE_SHARE = 0.25;
export const HYDRATION_ML_PER_KG = 35;

const KCAL_PER_G = { protein: 4, carbs: 4, fat: 9 } as const;

export function missingProfileFields(profile: Profile): string[] {
  const missing: string[] = [];
  if (profile.height_cm === null) missing.push("height_cm");
  if (profile.weight_kg === null) missing.push("weight_kg");
  if (profile.age === null) missing.push("age");
  return missing;
}

export function isProfileComplete(profile: Profile): profile is CompleteProfile {
  return missingProfileFields(profile).length === 0;
}

export function requireCompleteProfile(profile: Profile): CompleteProfile {
  if (!isProfileComplete(profile)) {
    throw new IncompleteProfileError(missingProfileFields(profile));
  }
  return profile;
}

// ── Targets ─────────────────────────────────────────────────────────────────

export function basalMetabolicRate(profile: Profile): number {
  const { weight_kg, height_cm, age, gender } = requireCompleteProfile(profile);
  const base = 10 * weight_kg + 6.25 * height_cm - 5 * age;
  return gender === "male" ? base + 5 : base - 161;
}

export function totalDailyEnergyExpenditure(profile: Profile): number {
  return basalMetabolicRate(profile) * ACTIVITY_MULTIPLIERS[profile.activity_level];
}

export function targetCalories(profile: Profile): number {
  return totalDailyEnergyExpenditure(profile) + GOAL_CALORIE_OFFSETS[profile.goal];
}

export function targetMacros(profile: Profile): MacroGrams {
  const complete = requireCompleteProfile(profile);
  const calories = targetCalories(complete);
  const protein_g = complete.weight_kg * PROTEIN_G_PER_KG[complete.goal];
  const fat_g = (calories * FAT_CALORIE_SHARE) / KCAL_PER_G.fat;
  const carbKcal = calories - protein_g * KCAL_PER_G.protein - fat_g * KCAL_PER_G.fat;
  return {
    protein_g,
    carbs_g: Math.max(0, carbKcal / KCAL_PER_G.carbs),
    fat_g,
  };
}

export function hydrationGoal(profile: Profile): number {
  const complete = requireCompleteProfile(profile);
  return complete.hydration_goal_ml ?? complete.weight_kg * HYDRATION_ML_PER_KG;
}

export function dailyTargets(profile: Profile): DailyTargets {
  return {
    calories: targetCalories(profile),
    ...targetMacros(profile),
    hydration_ml: hydrationGoal(profile),
  };
}

// ── Deltas ──────────────────────────────────────────────────────────────────

export function remainingCalories(profile: Profile, totals: DailyTotals): number {
  return targetCalories(profile) - totals.caloriesConsumed + totals.caloriesBurned;
}

/** Negative values mean the target has been exceeded. */
export function macroRemaining(profile: Profile, totals: DailyTotals): MacroGrams {
  const target = targetMacros(profile);
  return {
    protein_g: target.protein_g - totals.proteinTotal,
    carbs_g: target.carbs_g - totals.carbsTotal,
    fat_g: target.fat_g - totals.fatTotal,
  };
}

/** Not capped: 1.5 means the goal was exceeded by half. */
export function hydrationProgress(profile: Profile, totals: DailyTotals): number {
  const goal = hydrationGoal(profile);
  if (goal <= 0) {
    return 0;
  }
  return Math.max(0, totals.hydrationTotal / goal);
}

export function adjustedCalorieTarget(profile: Profile, totals: DailyTotals): number {
  return targetCalories(profile) + totals.caloriesBurned;
}

/** Share of the workout-adjusted target eaten so far, clamped to [0, 1]. */
export function calorieProgress(profile: Profile, totals: DailyTotals): number {
  const adjusted = adjustedCalorieTarget(profile, totals);
  if (adjusted <= 0) {
    return 0;
  }
  return Math.min(Math.max(totals.caloriesConsumed / adjusted, 0), 1);
}
