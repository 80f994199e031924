import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createResetDayTool } from "./reset-day-tool.js";
import { TrackerSession } from "./session.js";

let session: TrackerSession;

beforeEach(() => {
  session = new TrackerSession({ clock: () => new Date("2026-01-15T10:00:00.000Z") });
});

afterEach(() => {
  session.close();
});

describe("reset_day tool", () => {
  it("clears the log and keeps the profile", async () => {
    session.updateProfile({ weight_kg: 70 });
    session.log.addMeal({ description: "toast", calories: 200, protein_g: 6, carbs_g: 30, fat_g: 5 });
    session.log.addMeal({ description: "soup", calories: 250, protein_g: 8, carbs_g: 20, fat_g: 9 });
    session.log.addHydration({ amount_ml: 500 });
    const tool = createResetDayTool();

    const result = await tool.execute(session, {});

    expect(result.content[0]?.text).toBe("🧹 Cleared 2 meal(s), 0 workout(s) and 1 drink(s)");
    expect(result.details.cleared).toEqual({ meals: 2, workouts: 0, hydration: 1 });
    expect(result.details.totals.caloriesConsumed).toBe(0);
    expect(session.profile.weight_kg).toBe(70);
  });
});
