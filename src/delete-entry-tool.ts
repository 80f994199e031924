import { Type } from "@sinclair/typebox";
import { NotFoundError, ValidationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { textResult, type TrackerTool } from "./tool.js";
import type { DailyTotals, LoggedEntry } from "./types.js";

const DeleteEntryParams = Type.Object(
  {
    entry_id: Type.String({
      description: "The id of the meal, workout or hydration entry to delete.",
    }),
  },
  { additionalProperties: false },
);

function describeEntry(entry: LoggedEntry): string {
  switch (entry.kind) {
    case "meal":
      return `Meal: ${entry.description} (${entry.calories} kcal)`;
    case "workout":
      return `Workout: ${entry.description} (${entry.calories_burned} kcal burned)`;
    case "hydration":
      return `Hydration: ${entry.amount_ml} ml`;
  }
}

export function createDeleteEntryTool(
  deps: { logger?: Logger } = {},
): TrackerTool<
  typeof DeleteEntryParams,
  { deleted: true; entry: LoggedEntry; totals: DailyTotals }
> {
  const logger = deps.logger ?? silentLogger;

  return {
    name: "delete_entry",
    description:
      "Delete a meal, workout or hydration entry from today's log by its id. Use get_daily_summary first to find entry ids.",
    parameters: DeleteEntryParams,

    async execute(session, params) {
      const entryId = params.entry_id.trim();
      if (!entryId) {
        throw new ValidationError("entry_id required", "entry_id");
      }

      const entry = session.log.removeEntry(entryId);
      if (!entry) {
        throw new NotFoundError(`Entry not found: ${entryId}`);
      }
      const totals = session.log.totals();

      logger.info("entry deleted", { session: session.id, entry: entry.id, kind: entry.kind });

      return textResult(`🗑️ Deleted ${describeEntry(entry)}`, {
        deleted: true as const,
        entry,
        totals,
      });
    },
  };
}
