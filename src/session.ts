import crypto from "node:crypto";
import { DailyLog, type Clock } from "./daily-log.js";
import { DEFAULT_PROFILE, TrackerDb } from "./db.js";
import { NotFoundError } from "./errors.js";
import type { Profile, ProfileUpdate } from "./types.js";

/**
 * Everything one user touches: their profile and today's log, backed by a
 * database nobody else can see.
 */
export class TrackerSession {
  readonly id: string;
  readonly createdAt: string;
  readonly log: DailyLog;
  private readonly db: TrackerDb;
  private readonly clock: Clock;
  private closed = false;

  constructor(params: { id?: string; clock?: Clock; db?: TrackerDb } = {}) {
    this.clock = params.clock ?? (() => new Date());
    this.id = params.id ?? crypto.randomUUID();
    this.createdAt = this.clock().toISOString();
    this.db = params.db ?? new TrackerDb();
    this.log = new DailyLog(this.db, this.clock);
    this.db.updateProfile({ ...DEFAULT_PROFILE }, this.clock());
  }

  get profile(): Profile {
    const profile = this.db.getProfile();
    if (!profile) {
      return this.db.updateProfile({ ...DEFAULT_PROFILE }, this.clock());
    }
    return profile;
  }

  updateProfile(update: ProfileUpdate): Profile {
    return this.db.updateProfile(update, this.clock());
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** For callers that awaited something and are about to write. */
  assertOpen(): void {
    if (this.closed) {
      throw new NotFoundError(`Session closed: ${this.id}`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }
}

export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

/**
 * Open sessions by id. A session not looked up for `ttlMs` is closed on the
 * next `create()` or `get()`.
 */
export class SessionStore {
  private readonly sessions = new Map<string, TrackerSession>();
  private readonly lastSeen = new Map<string, number>();
  private readonly clock: Clock;
  private readonly ttlMs: number;

  constructor(params: { clock?: Clock; ttlMs?: number } = {}) {
    this.clock = params.clock ?? (() => new Date());
    this.ttlMs = params.ttlMs ?? DEFAULT_SESSION_TTL_MS;
  }

  create(): TrackerSession {
    this.sweep();
    const session = new TrackerSession({ clock: this.clock });
    this.sessions.set(session.id, session);
    this.lastSeen.set(session.id, this.clock().getTime());
    return session;
  }

  get(id: string): TrackerSession {
    this.sweep();
    const session = this.sessions.get(id);
    if (!session) {
      throw new NotFoundError(`Session not found: ${id}`);
    }
    this.lastSeen.set(id, this.clock().getTime());
    return session;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  close(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    session.close();
    this.sessions.delete(id);
    this.lastSeen.delete(id);
    return true;
  }

  /** Closes idle sessions and returns how many were closed. */
  sweep(): number {
    const cutoff = this.clock().getTime() - this.ttlMs;
    let closed = 0;
    for (const [id, seen] of this.lastSeen) {
      if (seen <= cutoff && this.close(id)) {
        closed += 1;
      }
    }
    return closed;
  }

  closeAll(): void {
    for (const session of this.sessions.values()) {
      session.close();
    }
    this.sessions.clear();
    this.lastSeen.clear();
  }
}
