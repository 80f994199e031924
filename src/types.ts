// ── Profile ─────────────────────────────────────────────────────────────────
export const GENDERS = ["male", "female"] as const;
export type Gender = (typeof GENDERS)[number];

export const ACTIVITY_LEVELS = [
  "sedentary",
  "lightly_active",
  "moderately_active",
  "very_active",
] as const;
export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

export const WEIGHT_GOALS = ["lose", "maintain", "gain"] as const;
export type WeightGoal = (typeof WEIGHT_GOALS)[number];

export type Profile = {
  height_cm: number | null;
  weight_kg: number | null;
  age: number | null;
  gender: Gender;
  activity_level: ActivityLevel;
  goal: WeightGoal;
  hydration_goal_ml: number | null;
  updated_at: string;
};

export type CompleteProfile = Profile & {
  height_cm: number;
  weight_kg: number;
  age: number;
};

export type ProfileUpdate = Partial<Omit<Profile, "updated_at">>;

// ── Entries (one logged event each, never mutated) ──────────────────────────
export const MEAL_TYPES = [
  "breakfast",
  "breakfast_snack",
  "lunch",
  "evening_snack",
  "dinner",
  "dessert",
] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export const MEAL_TYPE_LABELS: Record<MealType, string> = {
  breakfast: "Breakfast",
  breakfast_snack: "Breakfast snack",
  lunch: "Lunch",
  evening_snack: "Evening snack",
  dinner: "Dinner",
  dessert: "Dessert",
};

export type EntrySource = "estimated" | "manual";

// Upper bounds for a single entry, so daily sums stay finite.
export const MAX_MEAL_CALORIES = 20_000;
export const MAX_MACRO_GRAMS = 2_000;
export const MAX_WORKOUT_CALORIES = 10_000;
export const MAX_HYDRATION_ML = 10_000;

export type MealEntry = {
  id: string;
  description: string;
  meal_type: MealType | null;
  source: EntrySource;
  calories: number;
  protein_g: number;
  carbs_g: number;
  fat_g: number;
  timestamp: string;
};

export type WorkoutEntry = {
  id: string;
  description: string;
  source: EntrySource;
  calories_burned: number;
  timestamp: string;
};

export type HydrationEntry = {
  id: string;
  amount_ml: number;
  timestamp: string;
};

export type LoggedEntry =
  | ({ kind: "meal" } & MealEntry)
  | ({ kind: "workout" } & WorkoutEntry)
  | ({ kind: "hydration" } & HydrationEntry);

// Input shapes: id is assigned on insert, timestamp defaults to now.
export type NewMealEntry = Omit<MealEntry, "id" | "timestamp" | "meal_type" | "source"> & {
  meal_type?: MealType | null;
  source?: EntrySource;
  timestamp?: string;
};

export type NewWorkoutEntry = Omit<WorkoutEntry, "id" | "timestamp" | "source"> & {
  source?: EntrySource;
  timestamp?: string;
};

export type NewHydrationEntry = Omit<HydrationEntry, "id" | "timestamp"> & {
  timestamp?: string;
};

// ── Aggregates ──────────────────────────────────────────────────────────────
export type DailyTotals = {
  caloriesConsumed: number;
  proteinTotal: number;
  carbsTotal: number;
  fatTotal: number;
  caloriesBurned: number;
  hydrationTotal: number;
};

export type MacroGrams = {
  protein_g: number;
  carbs_g: number;
  fat_g: number;
};

export type DailyTargets = MacroGrams & {
  calories: number;
  hydration_ml: number;
};

// ── Estimation ──────────────────────────────────────────────────────────────
export type EstimationKind = "meal" | "workout";

export type ProfileContext = Pick<Profile, "weight_kg" | "age" | "gender">;

export type EstimationRequest = {
  text: string;
  kind: EstimationKind;
  profile?: ProfileContext;
};

export type MealEstimate = {
  kind: "meal";
  calories: number;
  protein_g: number;
  carbs_g: number;
  fat_g: number;
};

export type WorkoutEstimate = {
  kind: "workout";
  calories_burned: number;
};

export type Estimate = MealEstimate | WorkoutEstimate;
