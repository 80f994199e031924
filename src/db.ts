import Database from "better-sqlite3";
import crypto from "node:crypto";
import type {
  ActivityLevel,
  EntrySource,
  Gender,
  HydrationEntry,
  MealEntry,
  MealType,
  Profile,
  ProfileUpdate,
  WeightGoal,
  WorkoutEntry,
} from "./types.js";

// ── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS meals (
  id          TEXT PRIMARY KEY,
  timestamp   TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  meal_type   TEXT,
  source      TEXT NOT NULL DEFAULT 'estimated',
  calories    REAL NOT NULL DEFAULT 0,
  protein_g   REAL NOT NULL DEFAULT 0,
  carbs_g     REAL NOT NULL DEFAULT 0,
  fat_g       REAL NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS workouts (
  id              TEXT PRIMARY KEY,
  timestamp       TEXT NOT NULL,
  description     TEXT NOT NULL DEFAULT '',
  source          TEXT NOT NULL DEFAULT 'estimated',
  calories_burned REAL NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS hydration (
  id        TEXT PRIMARY KEY,
  timestamp TEXT NOT NULL,
  amount_ml REAL NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS profile (
  id                TEXT PRIMARY KEY DEFAULT 'default',
  height_cm         REAL,
  weight_kg         REAL,
  age               REAL,
  gender            TEXT NOT NULL DEFAULT 'male',
  activity_level    TEXT NOT NULL DEFAULT 'sedentary',
  goal              TEXT NOT NULL DEFAULT 'lose',
  hydration_goal_ml REAL,
  updated_at        TEXT NOT NULL
);
`;

// Rows come back with plain TEXT columns; enum columns are only ever written
// from typed values, so they are read back as those unions.
type MealRow = Omit<MealEntry, "meal_type" | "source"> & {
  meal_type: MealType | null;
  source: EntrySource;
};

type ProfileRow = {
  height_cm: number | null;
  weight_kg: number | null;
  age: number | null;
  gender: Gender;
  activity_level: ActivityLevel;
  goal: WeightGoal;
  hydration_goal_ml: number | null;
  updated_at: string;
};

export const DEFAULT_PROFILE: Omit<Profile, "updated_at"> = {
  height_cm: null,
  weight_kg: null,
  age: null,
  gender: "male",
  activity_level: "sedentary",
  goal: "lose",
  hydration_goal_ml: null,
};

// ── Database class ──────────────────────────────────────────────────────────

/**
 * Storage for one tracking session. Defaults to a private in-memory
 * database, so closing the session discards everything it logged.
 */
export class TrackerDb {
  private db: Database.Database;

  constructor(dbPath = ":memory:") {
    this.db = new Database(dbPath);
    this.db.exec(SCHEMA_SQL);
  }

  // ── Inserts ─────────────────────────────────────────────────────────────

  insertMeal(params: Omit<MealEntry, "id">): MealEntry {
    const entry: MealEntry = { id: crypto.randomUUID(), ...params };
    this.db
      .prepare(
        `INSERT INTO meals (id, timestamp, description, meal_type, source,
           calories, protein_g, carbs_g, fat_g)
         VALUES (@id, @timestamp, @description, @meal_type, @source,
           @calories, @protein_g, @carbs_g, @fat_g)`,
      )
      .run(entry);
    return entry;
  }

  insertWorkout(params: Omit<WorkoutEntry, "id">): WorkoutEntry {
    const entry: WorkoutEntry = { id: crypto.randomUUID(), ...params };
    this.db
      .prepare(
        `INSERT INTO workouts (id, timestamp, description, source, calories_burned)
         VALUES (@id, @timestamp, @description, @source, @calories_burned)`,
      )
      .run(entry);
    return entry;
  }

  insertHydration(params: Omit<HydrationEntry, "id">): HydrationEntry {
    const entry: HydrationEntry = { id: crypto.randomUUID(), ...params };
    this.db
      .prepare(
        `INSERT INTO hydration (id, timestamp, amount_ml)
         VALUES (@id, @timestamp, @amount_ml)`,
      )
      .run(entry);
    return entry;
  }

  // ── Reads (insertion order) ─────────────────────────────────────────────

  listMeals(): MealEntry[] {
    return this.db
      .prepare<[], MealRow>(
        `SELECT id, timestamp, description, meal_type, source,
           calories, protein_g, carbs_g, fat_g
         FROM meals ORDER BY rowid ASC`,
      )
      .all();
  }

  listWorkouts(): WorkoutEntry[] {
    return this.db
      .prepare<[], WorkoutEntry>(
        `SELECT id, timestamp, description, source, calories_burned
         FROM workouts ORDER BY rowid ASC`,
      )
      .all();
  }

  listHydration(): HydrationEntry[] {
    return this.db
      .prepare<[], HydrationEntry>(
        "SELECT id, timestamp, amount_ml FROM hydration ORDER BY rowid ASC",
      )
      .all();
  }

  getMeal(id: string): MealEntry | null {
    return (
      this.db
        .prepare<[string], MealRow>(
          `SELECT id, timestamp, description, meal_type, source,
             calories, protein_g, carbs_g, fat_g
           FROM meals WHERE id = ?`,
        )
        .get(id) ?? null
    );
  }

  getWorkout(id: string): WorkoutEntry | null {
    return (
      this.db
        .prepare<[string], WorkoutEntry>(
          `SELECT id, timestamp, description, source, calories_burned
           FROM workouts WHERE id = ?`,
        )
        .get(id) ?? null
    );
  }

  getHydration(id: string): HydrationEntry | null {
    return (
      this.db
        .prepare<[string], HydrationEntry>(
          "SELECT id, timestamp, amount_ml FROM hydration WHERE id = ?",
        )
        .get(id) ?? null
    );
  }

  // ── Removal ─────────────────────────────────────────────────────────────

  deleteEntry(table: "meals" | "workouts" | "hydration", id: string): boolean {
    const result = this.db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  clearEntries(): void {
    const txn = this.db.transaction(() => {
      this.db.prepare("DELETE FROM meals").run();
      this.db.prepare("DELETE FROM workouts").run();
      this.db.prepare("DELETE FROM hydration").run();
    });
    txn();
  }

  // ── Profile ─────────────────────────────────────────────────────────────

  getProfile(): Profile | null {
    return (
      this.db
        .prepare<[], ProfileRow>(
          `SELECT height_cm, weight_kg, age, gender, activity_level, goal,
             hydration_goal_ml, updated_at
           FROM profile WHERE id = 'default'`,
        )
        .get() ?? null
    );
  }

  updateProfile(params: ProfileUpdate, now = new Date()): Profile {
    const existing = this.getProfile() ?? { ...DEFAULT_PROFILE };

    // `null` clears a metric, `undefined` keeps the stored value.
    const profile: Profile = {
      height_cm: params.height_cm !== undefined ? params.height_cm : existing.height_cm,
      weight_kg: params.weight_kg !== undefined ? params.weight_kg : existing.weight_kg,
      age: params.age !== undefined ? params.age : existing.age,
      gender: params.gender ?? existing.gender,
      activity_level: params.activity_level ?? existing.activity_level,
      goal: params.goal ?? existing.goal,
      hydration_goal_ml:
        params.hydration_goal_ml !== undefined
          ? params.hydration_goal_ml
          : existing.hydration_goal_ml,
      updated_at: now.toISOString(),
    };

    this.db
      .prepare(
        `INSERT INTO profile (id, height_cm, weight_kg, age, gender, activity_level, goal,
           hydration_goal_ml, updated_at)
         VALUES ('default', @height_cm, @weight_kg, @age, @gender, @activity_level, @goal,
           @hydration_goal_ml, @updated_at)
         ON CONFLICT(id) DO UPDATE SET
           height_cm = excluded.height_cm,
           weight_kg = excluded.weight_kg,
           age = excluded.age,
           gender = excluded.gender,
           activity_level = excluded.activity_level,
           goal = excluded.goal,
           hydration_goal_ml = excluded.hydration_goal_ml,
           updated_at = excluded.updated_at`,
      )
      .run(profile);

    return profile;
  }

  // ── Cleanup ─────────────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
