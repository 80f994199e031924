import type { Static, TSchema } from "@sinclair/typebox";
import type { IncomingMessage, ServerResponse } from "node:http";
import { ValidationError, errorMessage, httpStatusFor, HealthCoachError } from "./errors.js";
import { isProfileComplete, missingProfileFields } from "./goals.js";
import { silentLogger, type Logger } from "./logger.js";
import type { SessionStore, TrackerSession } from "./session.js";
import type { createCoachTool } from "./coach-tool.js";
import type { createDeleteEntryTool } from "./delete-entry-tool.js";
import type { createGetSummaryTool } from "./get-summary-tool.js";
import type { createLogHydrationTool } from "./log-hydration-tool.js";
import type { createLogMealTool } from "./log-meal-tool.js";
import type { createLogWorkoutTool } from "./log-workout-tool.js";
import type { createResetDayTool } from "./reset-day-tool.js";
import type { TrackerTool } from "./tool.js";
import type { createUpdateProfileTool } from "./update-profile-tool.js";
import { ajv, formatValidationErrors } from "./validation.js";

export const API_PREFIX = "/health-coach/api";
export const SESSION_HEADER = "x-session-id";

const MAX_BODY_BYTES = 1_000_000;

export type HttpHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export type ApiRoute = { path: string; handler: HttpHandler };

export type ApiTools = {
  logMeal: ReturnType<typeof createLogMealTool>;
  logWorkout: ReturnType<typeof createLogWorkoutTool>;
  logHydration: ReturnType<typeof createLogHydrationTool>;
  getSummary: ReturnType<typeof createGetSummaryTool>;
  updateProfile: ReturnType<typeof createUpdateProfileTool>;
  deleteEntry: ReturnType<typeof createDeleteEntryTool>;
  resetDay: ReturnType<typeof createResetDayTool>;
  coach: ReturnType<typeof createCoachTool>;
};

export type ApiDeps = {
  sessions: SessionStore;
  tools: ApiTools;
  logger?: Logger;
};

// ── Helpers ─────────────────────────────────────────────────────────────────

function jsonResponse(res: ServerResponse, status: number, data: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(data));
}

export function errorResponse(
  res: ServerResponse,
  status: number,
  message: string,
  code = "error",
): void {
  jsonResponse(res, status, { error: message, code });
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    let bytes = 0;
    let tooLarge = false;
    req.setEncoding("utf-8");
    req.on("data", (chunk: string) => {
      if (tooLarge) {
        return;
      }
      bytes += Buffer.byteLength(chunk, "utf-8");
      if (bytes > MAX_BODY_BYTES) {
        tooLarge = true;
        reject(new ValidationError("Request body too large"));
        req.destroy();
        return;
      }
      body += chunk;
    });
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  if (!body.trim()) {
    return {};
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

function parseUrl(req: IncomingMessage): URL {
  return new URL(req.url ?? "/", "http://localhost");
}

function resolveSession(req: IncomingMessage, sessions: SessionStore): TrackerSession {
  const header = req.headers[SESSION_HEADER];
  const id = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!id) {
    throw new ValidationError(`Missing ${SESSION_HEADER} header`);
  }
  return sessions.get(id);
}

function sendError(res: ServerResponse, err: unknown, logger: Logger): void {
  const status = httpStatusFor(err);
  if (status >= 500 && !(err instanceof HealthCoachError && err.code === "estimation_error")) {
    logger.error("request failed", { error: err });
  }
  const code = err instanceof HealthCoachError ? err.code : "internal_error";
  errorResponse(res, status, errorMessage(err), code);
}

function methodNotAllowed(res: ServerResponse): void {
  errorResponse(res, 405, "Method not allowed", "method_not_allowed");
}

/**
 * Validates `params` against the tool's schema, runs it against the request's
 * session and writes the tool's details as the JSON response.
 */
function toolHandler<TParams extends TSchema, TDetails>(
  tool: TrackerTool<TParams, TDetails>,
  deps: ApiDeps,
  params: (req: IncomingMessage) => Promise<unknown>,
  format: (req: IncomingMessage) => "json" | "text" = () => "json",
): HttpHandler {
  const validate = ajv.compile<Static<TParams>>(tool.parameters);
  const logger = deps.logger ?? silentLogger;

  return async (req, res) => {
    try {
      const session = resolveSession(req, deps.sessions);
      const input = await params(req);
      if (!validate(input)) {
        throw new ValidationError(`Invalid parameters: ${formatValidationErrors(validate)}`);
      }
      const result = await tool.execute(session, input);
      if (format(req) === "text") {
        res.statusCode = 200;
        res.setHeader("Content-Type", "text/plain; charset=utf-8");
        res.end(result.content.map((c) => c.text).join("\n"));
        return;
      }
      jsonResponse(res, 200, result.details);
    } catch (err) {
      sendError(res, err, logger);
    }
  };
}

const noParams = async () => ({});

// ── Route registration ──────────────────────────────────────────────────────

export function createApiRoutes(deps: ApiDeps): ApiRoute[] {
  const { sessions, tools } = deps;
  const logger = deps.logger ?? silentLogger;

  const logMeal = toolHandler(tools.logMeal, deps, readJsonBody);
  const logWorkout = toolHandler(tools.logWorkout, deps, readJsonBody);
  const logHydration = toolHandler(tools.logHydration, deps, readJsonBody);
  const getSummary = toolHandler(tools.getSummary, deps, noParams, (req) =>
    parseUrl(req).searchParams.get("format") === "text" ? "text" : "json",
  );
  const updateProfile = toolHandler(tools.updateProfile, deps, readJsonBody);
  const resetDay = toolHandler(tools.resetDay, deps, noParams);
  const coach = toolHandler(tools.coach, deps, noParams);

  const postOnly =
    (handler: HttpHandler): HttpHandler =>
    async (req, res) => {
      if (req.method !== "POST") {
        methodNotAllowed(res);
        return;
      }
      await handler(req, res);
    };

  return [
    {
      path: `${API_PREFIX}/sessions`,
      handler: async (req, res) => {
        if (req.method === "POST") {
          const session = sessions.create();
          logger.info("session created", { session: session.id });
          jsonResponse(res, 201, { session_id: session.id, created_at: session.createdAt });
        } else if (req.method === "DELETE") {
          try {
            const session = resolveSession(req, sessions);
            sessions.close(session.id);
            logger.info("session closed", { session: session.id });
            jsonResponse(res, 200, { closed: true });
          } catch (err) {
            sendError(res, err, logger);
          }
        } else {
          methodNotAllowed(res);
        }
      },
    },
    {
      path: `${API_PREFIX}/profile`,
      handler: async (req, res) => {
        if (req.method === "GET") {
          try {
            const { profile } = resolveSession(req, sessions);
            jsonResponse(res, 200, {
              profile,
              complete: isProfileComplete(profile),
              missing: missingProfileFields(profile),
            });
          } catch (err) {
            sendError(res, err, logger);
          }
        } else if (req.method === "PUT") {
          await updateProfile(req, res);
        } else {
          methodNotAllowed(res);
        }
      },
    },
    { path: `${API_PREFIX}/meals`, handler: postOnly(logMeal) },
    { path: `${API_PREFIX}/workouts`, handler: postOnly(logWorkout) },
    { path: `${API_PREFIX}/hydration`, handler: postOnly(logHydration) },
    {
      path: `${API_PREFIX}/summary`,
      handler: async (req, res) => {
        if (req.method !== "GET") {
          methodNotAllowed(res);
          return;
        }
        await getSummary(req, res);
      },
    },
    { path: `${API_PREFIX}/reset`, handler: postOnly(resetDay) },
    { path: `${API_PREFIX}/coach`, handler: postOnly(coach) },
  ];
}

// DELETE /health-coach/api/entries/:id needs path-param matching, so it is
// dispatched separately in index.ts.
export const ENTRY_PATH_PATTERN = /^\/health-coach\/api\/entries\/([^/]+)$/;

function decodeEntryId(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new ValidationError("Invalid entry id", "entry_id");
  }
}

export function createDeleteEntryHandler(deps: ApiDeps): HttpHandler {
  return toolHandler(deps.tools.deleteEntry, deps, async (req) => {
    const match = parseUrl(req).pathname.match(ENTRY_PATH_PATTERN);
    return { entry_id: decodeEntryId(match?.[1] ?? "") };
  });
}
