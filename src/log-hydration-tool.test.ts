import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "./errors.js";
import { createLogHydrationTool } from "./log-hydration-tool.js";
import { TrackerSession } from "./session.js";

let session: TrackerSession;

beforeEach(() => {
  session = new TrackerSession({ clock: () => new Date("2026-01-15T10:00:00.000Z") });
});

afterEach(() => {
  session.close();
});

describe("log_hydration tool", () => {
  it("reports the running total without a goal", async () => {
    const tool = createLogHydrationTool();

    await tool.execute(session, { amount_ml: 250 });
    const result = await tool.execute(session, { amount_ml: 500 });

    expect(result.content[0]?.text).toBe("💧 Logged 500 ml. Today: 750 ml");
    expect(result.details.totals.hydrationTotal).toBe(750);
  });

  it("reports progress against the goal for a complete profile", async () => {
    session.updateProfile({ height_cm: 170, weight_kg: 70, age: 30 });
    const tool = createLogHydrationTool();

    const result = await tool.execute(session, { amount_ml: 600 });

    expect(result.content[0]?.text).toBe("💧 Logged 600 ml. Today: 600/2450 ml");
  });

  it("rejects negative amounts", async () => {
    const tool = createLogHydrationTool();

    await expect(tool.execute(session, { amount_ml: -100 })).rejects.toThrow(ValidationError);
    expect(session.log.hydration()).toEqual([]);
  });
});
