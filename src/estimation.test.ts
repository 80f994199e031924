import { afterEach, describe, expect, it, vi } from "vitest";
import { EstimationError, ValidationError } from "./errors.js";
import { LlmEstimationGateway, withTimeout } from "./estimation.js";
import type { TextGenerator } from "./gemini.js";

function generator(output: string) {
  return vi.fn<TextGenerator>(async () => output);
}

afterEach(() => {
  vi.useRealTimers();
});

describe("withTimeout", () => {
  it("resolves with the task result", async () => {
    await expect(withTimeout(async () => 42, 1000, "test")).resolves.toBe(42);
  });

  it("rejects and aborts once the deadline passes", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<string>(() => {});
      },
      5000,
      "meal estimation",
    );
    const assertion = expect(pending).rejects.toThrow(
      new EstimationError("meal estimation timed out after 5000ms"),
    );

    await vi.advanceTimersByTimeAsync(5000);

    await assertion;
    expect(seen?.aborted).toBe(true);
  });
});

describe("LlmEstimationGateway", () => {
  it("sends the prompt in JSON mode and parses the reply", async () => {
    const generate = generator('{"calories": 300, "protein_g": 20, "carbs_g": 30, "fat_g": 10}');
    const gateway = new LlmEstimationGateway(generate);

    const estimate = await gateway.estimate({ kind: "meal", text: "  chicken salad  " });

    expect(estimate).toEqual({ kind: "meal", calories: 300, protein_g: 20, carbs_g: 30, fat_g: 10 });
    expect(generate).toHaveBeenCalledTimes(1);
    const [prompt, options] = generate.mock.calls[0] ?? [];
    expect(prompt).toContain("MEAL DESCRIPTION:\nchicken salad\n");
    expect(options).toMatchObject({ json: true });
  });

  it("rejects a blank description without calling the model", async () => {
    const generate = generator("{}");
    const gateway = new LlmEstimationGateway(generate);

    await expect(gateway.estimate({ kind: "workout", text: "   " })).rejects.toThrow(
      ValidationError,
    );
    expect(generate).not.toHaveBeenCalled();
  });

  it("wraps transport failures", async () => {
    const gateway = new LlmEstimationGateway(async () => {
      throw new Error("socket hang up");
    });

    await expect(gateway.estimate({ kind: "meal", text: "toast" })).rejects.toThrow(
      new EstimationError("Estimation request failed: socket hang up"),
    );
  });

  it("passes estimation errors through unchanged", async () => {
    const gateway = new LlmEstimationGateway(async () => {
      throw new EstimationError("Estimation service rate limit reached, try again shortly");
    });

    await expect(gateway.estimate({ kind: "meal", text: "toast" })).rejects.toThrow(
      "Estimation service rate limit reached, try again shortly",
    );
  });

  it("rejects empty output", async () => {
    const gateway = new LlmEstimationGateway(generator("  \n"));

    await expect(gateway.estimate({ kind: "workout", text: "rowing" })).rejects.toThrow(
      "Model returned empty output for workout estimation",
    );
  });

  it("rejects output that fails validation", async () => {
    const gateway = new LlmEstimationGateway(generator('{"calories_burned": -20}'));

    await expect(gateway.estimate({ kind: "workout", text: "rowing" })).rejects.toThrow(
      EstimationError,
    );
  });

  it("times out slow requests", async () => {
    vi.useFakeTimers();
    const gateway = new LlmEstimationGateway(() => new Promise<string>(() => {}), {
      timeoutMs: 250,
    });

    const pending = gateway.estimate({ kind: "meal", text: "pasta" });
    const assertion = expect(pending).rejects.toThrow("meal estimation timed out after 250ms");
    await vi.advanceTimersByTimeAsync(250);
    await assertion;
  });
});
