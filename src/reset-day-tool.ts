import { Type } from "@sinclair/typebox";
import { silentLogger, type Logger } from "./logger.js";
import { textResult, type TrackerTool } from "./tool.js";
import type { DailyTotals } from "./types.js";

const ResetDayParams = Type.Object({}, { additionalProperties: false });

export type ResetDayDetails = {
  cleared: { meals: number; workouts: number; hydration: number };
  totals: DailyTotals;
};

export function createResetDayTool(
  deps: { logger?: Logger } = {},
): TrackerTool<typeof ResetDayParams, ResetDayDetails> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "reset_day",
    description: "Clear every meal, workout and hydration entry logged today. Cannot be undone.",
    parameters: ResetDayParams,

    async execute(session) {
      const cleared = {
        meals: session.log.meals().length,
        workouts: session.log.workouts().length,
        hydration: session.log.hydration().length,
      };
      session.log.reset();

      logger.info("day reset", { session: session.id, ...cleared });

      return textResult(
        `🧹 Cleared ${cleared.meals} meal(s), ${cleared.workouts} workout(s) and ${cleared.hydration} drink(s)`,
        { cleared, totals: session.log.totals() },
      );
    },
  };
}
