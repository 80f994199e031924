import { TrackerDb } from "./db.js";
import { ValidationError } from "./errors.js";
import type {
  DailyTotals,
  HydrationEntry,
  LoggedEntry,
  MealEntry,
  NewHydrationEntry,
  NewMealEntry,
  NewWorkoutEntry,
  WorkoutEntry,
} from "./types.js";
import { MEAL_TYPES } from "./types.js";

export type Clock = () => Date;

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ── Validation ──────────────────────────────────────────────────────────────

function requireAmount(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
  if (value < 0) {
    throw new ValidationError(`${field} must be non-negative`, field);
  }
  return value;
}

function requireDescription(value: unknown): string {
  if (typeof value !== "string") {
    throw new ValidationError("description must be a string", "description");
  }
  return value;
}

function resolveTimestamp(value: string | undefined, now: Date): string {
  if (value === undefined) {
    return now.toISOString();
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`timestamp is not a valid date: ${value}`, "timestamp");
  }
  return parsed.toISOString();
}

// ── Daily log ───────────────────────────────────────────────────────────────

/**
 * The current day's meals, workouts and hydration.
 *
 * Entries are append-only and never edited. Totals are folded from the
 * stored entries on every read; nothing derived is kept. The log is bound to
 * a UTC date and clears itself on the first access after that date passes.
 */
export class DailyLog {
  private readonly db: TrackerDb;
  private readonly clock: Clock;
  private currentDate: string;

  constructor(db: TrackerDb, clock: Clock = () => new Date()) {
    this.db = db;
    this.clock = clock;
    this.currentDate = toDateKey(clock());
  }

  get date(): string {
    this.rollover();
    return this.currentDate;
  }

  addMeal(entry: NewMealEntry): MealEntry {
    const now = this.rollover();
    const mealType = entry.meal_type ?? null;
    if (mealType !== null && !MEAL_TYPES.includes(mealType)) {
      throw new ValidationError(`Unknown meal_type: ${String(mealType)}`, "meal_type");
    }
    const row = {
      description: requireDescription(entry.description),
      meal_type: mealType,
      source: entry.source ?? "estimated",
      calories: requireAmount(entry.calories, "calories"),
      protein_g: requireAmount(entry.protein_g, "protein_g"),
      carbs_g: requireAmount(entry.carbs_g, "carbs_g"),
      fat_g: requireAmount(entry.fat_g, "fat_g"),
      timestamp: resolveTimestamp(entry.timestamp, now),
    };
    return this.db.insertMeal(row);
  }

  addWorkout(entry: NewWorkoutEntry): WorkoutEntry {
    const now = this.rollover();
    const row = {
      description: requireDescription(entry.description),
      source: entry.source ?? "estimated",
      calories_burned: requireAmount(entry.calories_burned, "calories_burned"),
      timestamp: resolveTimestamp(entry.timestamp, now),
    };
    return this.db.insertWorkout(row);
  }

  addHydration(entry: NewHydrationEntry): HydrationEntry {
    const now = this.rollover();
    const row = {
      amount_ml: requireAmount(entry.amount_ml, "amount_ml"),
      timestamp: resolveTimestamp(entry.timestamp, now),
    };
    return this.db.insertHydration(row);
  }

  meals(): MealEntry[] {
    this.rollover();
    return this.db.listMeals();
  }

  workouts(): WorkoutEntry[] {
    this.rollover();
    return this.db.listWorkouts();
  }

  hydration(): HydrationEntry[] {
    this.rollover();
    return this.db.listHydration();
  }

  totals(): DailyTotals {
    const totals: DailyTotals = {
      caloriesConsumed: 0,
      proteinTotal: 0,
      carbsTotal: 0,
      fatTotal: 0,
      caloriesBurned: 0,
      hydrationTotal: 0,
    };

    for (const meal of this.meals()) {
      totals.caloriesConsumed += meal.calories;
      totals.proteinTotal += meal.protein_g;
      totals.carbsTotal += meal.carbs_g;
      totals.fatTotal += meal.fat_g;
    }
    for (const workout of this.workouts()) {
      totals.caloriesBurned += workout.calories_burned;
    }
    for (const drink of this.hydration()) {
      totals.hydrationTotal += drink.amount_ml;
    }

    return totals;
  }

  /** Removes one entry of any kind. Returns the removed entry, or null. */
  removeEntry(id: string): LoggedEntry | null {
    this.rollover();

    const meal = this.db.getMeal(id);
    if (meal) {
      this.db.deleteEntry("meals", id);
      return { kind: "meal", ...meal };
    }
    const workout = this.db.getWorkout(id);
    if (workout) {
      this.db.deleteEntry("workouts", id);
      return { kind: "workout", ...workout };
    }
    const drink = this.db.getHydration(id);
    if (drink) {
      this.db.deleteEntry("hydration", id);
      return { kind: "hydration", ...drink };
    }
    return null;
  }

  reset(): void {
    this.db.clearEntries();
    this.currentDate = toDateKey(this.clock());
  }

  private rollover(): Date {
    const now = this.clock();
    if (toDateKey(now) !== this.currentDate) {
      this.db.clearEntries();
      this.currentDate = toDateKey(now);
    }
    return now;
  }
}
