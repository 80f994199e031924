import { afterEach, describe, expect, it } from "vitest";
import { NotFoundError } from "./errors.js";
import { SessionStore, TrackerSession } from "./session.js";

const clock = () => new Date("2026-01-15T09:00:00.000Z");

describe("TrackerSession", () => {
  it("starts with the default profile and an empty log", () => {
    const session = new TrackerSession({ id: "s1", clock });
    try {
      expect(session.id).toBe("s1");
      expect(session.createdAt).toBe("2026-01-15T09:00:00.000Z");
      expect(session.profile).toEqual({
        height_cm: null,
        weight_kg: null,
        age: null,
        gender: "male",
        activity_level: "sedentary",
        goal: "lose",
        hydration_goal_ml: null,
        updated_at: "2026-01-15T09:00:00.000Z",
      });
      expect(session.log.totals().caloriesConsumed).toBe(0);
    } finally {
      session.close();
    }
  });

  it("merges profile updates", () => {
    const session = new TrackerSession({ clock });
    try {
      session.updateProfile({ weight_kg: 65, goal: "maintain" });
      session.updateProfile({ height_cm: 168 });

      expect(session.profile).toMatchObject({ weight_kg: 65, height_cm: 168, goal: "maintain" });
    } finally {
      session.close();
    }
  });
});

describe("TrackerSession.close", () => {
  it("is idempotent and blocks later writes", () => {
    const session = new TrackerSession({ id: "s2", clock });

    session.close();
    session.close();

    expect(session.isClosed).toBe(true);
    expect(() => session.assertOpen()).toThrow(new NotFoundError("Session closed: s2"));
  });
});

describe("SessionStore idle expiry", () => {
  it("closes sessions that were not used within the ttl", () => {
    let now = new Date("2026-01-15T09:00:00.000Z").getTime();
    const store = new SessionStore({ clock: () => new Date(now), ttlMs: 60_000 });
    try {
      const idle = store.create();
      now += 30_000;
      const active = store.create();
      expect(store.size).toBe(2);

      now += 31_000;
      expect(store.get(active.id)).toBe(active);
      expect(store.has(idle.id)).toBe(false);
      expect(idle.isClosed).toBe(true);
      expect(store.size).toBe(1);

      now += 60_000;
      expect(() => store.get(active.id)).toThrow(NotFoundError);
      expect(active.isClosed).toBe(true);
    } finally {
      store.closeAll();
    }
  });

  it("counts swept sessions", () => {
    let now = 0;
    const store = new SessionStore({ clock: () => new Date(now), ttlMs: 1_000 });
    store.create();
    store.create();

    now = 1_000;

    expect(store.sweep()).toBe(2);
    expect(store.size).toBe(0);
  });
});

describe("SessionStore", () => {
  const store = new SessionStore({ clock });

  afterEach(() => {
    store.closeAll();
  });

  it("keeps sessions isolated", () => {
    const a = store.create();
    const b = store.create();

    a.log.addHydration({ amount_ml: 500 });
    a.updateProfile({ weight_kg: 90 });

    expect(a.id).not.toBe(b.id);
    expect(store.get(b.id).log.hydration()).toEqual([]);
    expect(store.get(b.id).profile.weight_kg).toBeNull();
    expect(store.size).toBe(2);
  });

  it("throws for unknown sessions", () => {
    expect(() => store.get("missing")).toThrow(new NotFoundError("Session not found: missing"));
  });

  it("closes a session once", () => {
    const session = store.create();

    expect(store.close(session.id)).toBe(true);
    expect(store.close(session.id)).toBe(false);
    expect(store.has(session.id)).toBe(false);
  });
});
