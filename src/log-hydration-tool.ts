import { Type } from "@sinclair/typebox";
import { hydrationGoal, isProfileComplete } from "./goals.js";
import { silentLogger, type Logger } from "./logger.js";
import { textResult, type TrackerTool } from "./tool.js";
import type { DailyTotals, HydrationEntry } from "./types.js";
import { MAX_HYDRATION_ML } from "./types.js";

const LogHydrationParams = Type.Object(
  {
    amount_ml: Type.Number({
      maximum: MAX_HYDRATION_ML,
      description: "Amount drunk, in millilitres.",
    }),
  },
  { additionalProperties: false },
);

export type LogHydrationDetails = { entry: HydrationEntry; totals: DailyTotals };

export function createLogHydrationTool(
  deps: { logger?: Logger } = {},
): TrackerTool<typeof LogHydrationParams, LogHydrationDetails> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "log_hydration",
    description: "Log water or another drink by volume in millilitres.",
    parameters: LogHydrationParams,

    async execute(session, params) {
      const entry = session.log.addHydration({ amount_ml: params.amount_ml });
      const totals = session.log.totals();

      logger.debug("hydration logged", { session: session.id, amountMl: entry.amount_ml });

      const profile = session.profile;
      const progress = isProfileComplete(profile)
        ? `${Math.round(totals.hydrationTotal)}/${Math.round(hydrationGoal(profile))} ml`
        : `${Math.round(totals.hydrationTotal)} ml`;

      return textResult(`💧 Logged ${entry.amount_ml} ml. Today: ${progress}`, {
        entry,
        totals,
      });
    },
  };
}
