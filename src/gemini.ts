import { ApiError, GoogleGenAI } from "@google/genai";
import { EstimationError } from "./errors.js";

export type GenerateOptions = {
  /** Ask the model for a JSON response body. */
  json?: boolean;
  signal?: AbortSignal;
};

/** One prompt in, the model's text out. */
export type TextGenerator = (prompt: string, options?: GenerateOptions) => Promise<string>;

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export function createGeminiGenerator(params: { apiKey: string; model?: string }): TextGenerator {
  const client = new GoogleGenAI({ apiKey: params.apiKey });
  const model = params.model ?? DEFAULT_GEMINI_MODEL;

  return async (prompt, options = {}) => {
    try {
      const response = await client.models.generateContent({
        model,
        contents: prompt,
        config: {
          ...(options.json ? { responseMimeType: "application/json" } : {}),
          ...(options.signal ? { abortSignal: options.signal } : {}),
        },
      });
      return response.text ?? "";
    } catch (err) {
      if (err instanceof ApiError && err.status === 429) {
        throw new EstimationError("Estimation service rate limit reached, try again shortly", {
          cause: err,
        });
      }
      throw err;
    }
  };
}
