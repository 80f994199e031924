import { Type } from "@sinclair/typebox";
import { buildDailySummary, formatDailySummary, type DailySummary } from "./summary.js";
import { textResult, type TrackerTool } from "./tool.js";

const GetSummaryParams = Type.Object({}, { additionalProperties: false });

export function createGetSummaryTool(): TrackerTool<typeof GetSummaryParams, DailySummary> {
  return {
    name: "get_daily_summary",
    description:
      "Get today's dashboard: totals, targets, remaining calories and macros, hydration progress and the logged entries.",
    parameters: GetSummaryParams,

    async execute(session) {
      const summary = buildDailySummary(session);
      return textResult(formatDailySummary(summary), summary);
    },
  };
}
