import type { IncomingMessage, ServerResponse } from "node:http";
import {
  ENTRY_PATH_PATTERN,
  createApiRoutes,
  createDeleteEntryHandler,
  type ApiRoute,
  type ApiTools,
} from "./src/api.js";
import { LlmCoachAdvisor, type CoachAdvisor } from "./src/coach.js";
import { createCoachTool } from "./src/coach-tool.js";
import type { HealthCoachConfig } from "./src/config.js";
import type { Clock } from "./src/daily-log.js";
import { createDeleteEntryTool } from "./src/delete-entry-tool.js";
import { LlmEstimationGateway, type EstimationGateway } from "./src/estimation.js";
import { createGeminiGenerator } from "./src/gemini.js";
import { createGetSummaryTool } from "./src/get-summary-tool.js";
import { createLogHydrationTool } from "./src/log-hydration-tool.js";
import { createLogMealTool } from "./src/log-meal-tool.js";
import { createLogWorkoutTool } from "./src/log-workout-tool.js";
import { silentLogger, type Logger } from "./src/logger.js";
import { createResetDayTool } from "./src/reset-day-tool.js";
import { SessionStore } from "./src/session.js";
import { createUpdateProfileTool } from "./src/update-profile-tool.js";

export type HealthCoachOptions = {
  gateway: EstimationGateway;
  advisor: CoachAdvisor;
  logger?: Logger;
  clock?: Clock;
  /** Idle time after which a session is closed. */
  sessionTtlMs?: number;
};

export type HealthCoachApp = {
  sessions: SessionStore;
  tools: ApiTools;
  routes: ApiRoute[];
  /** Resolves false when the request is not for this app. */
  handle(req: IncomingMessage, res: ServerResponse): Promise<boolean>;
  close(): void;
};

export function createHealthCoach(options: HealthCoachOptions): HealthCoachApp {
  const logger = options.logger ?? silentLogger;
  const sessions = new SessionStore({ clock: options.clock, ttlMs: options.sessionTtlMs });

  // ── Tools ───────────────────────────────────────────────────────────────
  const tools: ApiTools = {
    logMeal: createLogMealTool({ gateway: options.gateway, logger }),
    logWorkout: createLogWorkoutTool({ gateway: options.gateway, logger }),
    logHydration: createLogHydrationTool({ logger }),
    getSummary: createGetSummaryTool(),
    updateProfile: createUpdateProfileTool({ logger }),
    deleteEntry: createDeleteEntryTool({ logger }),
    resetDay: createResetDayTool({ logger }),
    coach: createCoachTool({ advisor: options.advisor, logger }),
  };

  // ── HTTP API routes ─────────────────────────────────────────────────────
  const deps = { sessions, tools, logger };
  const routes = createApiRoutes(deps);
  const deleteEntry = createDeleteEntryHandler(deps);

  return {
    sessions,
    tools,
    routes,

    async handle(req, res) {
      const url = new URL(req.url ?? "/", "http://localhost");

      const route = routes.find((r) => r.path === url.pathname);
      if (route) {
        await route.handler(req, res);
        return true;
      }

      // DELETE /health-coach/api/entries/:id
      if (req.method === "DELETE" && ENTRY_PATH_PATTERN.test(url.pathname)) {
        await deleteEntry(req, res);
        return true;
      }

      return false;
    },

    close() {
      sessions.closeAll();
    },
  };
}

/** Wires the Gemini-backed gateway and coach from loaded configuration. */
export function createHealthCoachFromConfig(
  config: HealthCoachConfig,
  logger: Logger,
): HealthCoachApp {
  const generate = createGeminiGenerator({ apiKey: config.apiKey, model: config.model });
  const timeoutMs = config.estimationTimeoutMs;
  return createHealthCoach({
    gateway: new LlmEstimationGateway(generate, { timeoutMs, logger }),
    advisor: new LlmCoachAdvisor(generate, { timeoutMs, logger }),
    logger,
    sessionTtlMs: config.sessionTtlMs,
  });
}

export type { EstimationGateway } from "./src/estimation.js";
export type { CoachAdvisor } from "./src/coach.js";
export { DailyLog } from "./src/daily-log.js";
export { TrackerSession, SessionStore } from "./src/session.js";
export * from "./src/goals.js";
export * from "./src/errors.js";
export type * from "./src/types.js";
