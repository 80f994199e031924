import { Type, type SchemaOptions, type Static, type TSchema } from "@sinclair/typebox";
import type { TrackerSession } from "./session.js";

export type ToolResult<TDetails> = {
  content: Array<{ type: "text"; text: string }>;
  details: TDetails;
};

/** One operation on a session, with the JSON schema its parameters must satisfy. */
export type TrackerTool<TParams extends TSchema, TDetails> = {
  name: string;
  description: string;
  parameters: TParams;
  execute(session: TrackerSession, params: Static<TParams>): Promise<ToolResult<TDetails>>;
};

export function textResult<TDetails>(text: string, details: TDetails): ToolResult<TDetails> {
  return { content: [{ type: "text", text }], details };
}

// A plain `enum` keyword instead of an anyOf of literals.
export function stringEnum<T extends string>(values: readonly T[], options: SchemaOptions = {}) {
  return Type.Unsafe<T>({ type: "string", enum: [...values], ...options });
}
