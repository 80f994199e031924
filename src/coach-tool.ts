import { Type } from "@sinclair/typebox";
import type { CoachAdvisor } from "./coach.js";
import { requireCompleteProfile, targetCalories } from "./goals.js";
import { silentLogger, type Logger } from "./logger.js";
import { textResult, type TrackerTool } from "./tool.js";

const CoachParams = Type.Object({}, { additionalProperties: false });

export function createCoachTool(deps: {
  advisor: CoachAdvisor;
  logger?: Logger;
}): TrackerTool<typeof CoachParams, { advice: string }> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "get_coach_advice",
    description:
      "Ask the diet coach for an insight on today's progress, a next-meal suggestion and a recovery tip.",
    parameters: CoachParams,

    async execute(session) {
      const profile = requireCompleteProfile(session.profile);
      const advice = await deps.advisor.advise({
        profile,
        calorieTarget: targetCalories(profile),
        totals: session.log.totals(),
        meals: session.log.meals(),
        workouts: session.log.workouts(),
      });

      logger.debug("coach advice generated", { session: session.id, length: advice.length });

      return textResult(advice, { advice });
    },
  };
}
