import { EstimationError, ValidationError, errorMessage } from "./errors.js";
import { buildEstimationPrompt, parseEstimate } from "./extraction.js";
import type { TextGenerator } from "./gemini.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Estimate, EstimationRequest } from "./types.js";

export const DEFAULT_ESTIMATION_TIMEOUT_MS = 30_000;

/**
 * Turns a free-text meal or workout description into numbers. Implementations
 * reject with `EstimationError` for anything that is not a usable estimate.
 */
export interface EstimationGateway {
  estimate(request: EstimationRequest): Promise<Estimate>;
}

/**
 * Runs `task` with an abort signal and rejects with `EstimationError` once
 * `timeoutMs` elapses. The signal is aborted on timeout.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new EstimationError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class LlmEstimationGateway implements EstimationGateway {
  private readonly generate: TextGenerator;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    generate: TextGenerator,
    options: { timeoutMs?: number; logger?: Logger } = {},
  ) {
    this.generate = generate;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ESTIMATION_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async estimate(request: EstimationRequest): Promise<Estimate> {
    const text = request.text.trim();
    if (!text) {
      throw new ValidationError("description required", "description");
    }

    const prompt = buildEstimationPrompt({ ...request, text });
    const startedAt = Date.now();

    let output: string;
    try {
      output = await withTimeout(
        (signal) => this.generate(prompt, { json: true, signal }),
        this.timeoutMs,
        `${request.kind} estimation`,
      );
    } catch (err) {
      this.logger.warn("estimation request failed", { kind: request.kind, error: err });
      if (err instanceof EstimationError) {
        throw err;
      }
      throw new EstimationError(`Estimation request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!output.trim()) {
      throw new EstimationError(`Model returned empty output for ${request.kind} estimation`);
    }

    const estimate = parseEstimate(request.kind, output);
    this.logger.debug("estimation completed", {
      kind: request.kind,
      durationMs: Date.now() - startedAt,
    });
    return estimate;
  }
}
