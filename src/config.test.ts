import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

let tmpDir: string | undefined;

afterEach(() => {
  if (tmpDir) {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  }
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ GEMINI_API_KEY: "test-secret" })).toEqual({
      apiKey: "test-secret",
      model: "gemini-2.5-flash",
      port: 3000,
      estimationTimeoutMs: 30000,
      sessionTtlMs: 1800000,
      logLevel: "info",
    });
  });

  it("reads overrides and coerces numbers", () => {
    const config = loadConfig({
      GOOGLE_API_KEY: "test-secret",
      HEALTH_COACH_MODEL: "gemini-test",
      PORT: "8080",
      HEALTH_COACH_ESTIMATION_TIMEOUT_MS: "5000",
      HEALTH_COACH_SESSION_TTL_MS: "60000",
      HEALTH_COACH_LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      apiKey: "test-secret",
      model: "gemini-test",
      port: 8080,
      estimationTimeoutMs: 5000,
      sessionTtlMs: 60000,
      logLevel: "debug",
    });
  });

  it("prefers HEALTH_COACH_PORT over PORT", () => {
    expect(loadConfig({ GEMINI_API_KEY: "k", HEALTH_COACH_PORT: "4000", PORT: "5000" }).port).toBe(
      4000,
    );
  });

  it("reads the key from a file", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "health-coach-config-"));
    const keyFile = path.join(tmpDir, "key.txt");
    fs.writeFileSync(keyFile, "test-secret\n");

    expect(loadConfig({ GEMINI_API_KEY_FILE: keyFile }).apiKey).toBe("test-secret");
  });

  it("fails without an API key", () => {
    expect(() => loadConfig({ GEMINI_API_KEY: "  " })).toThrow(
      new ConfigError(
        "Missing API key: set GEMINI_API_KEY (or GOOGLE_API_KEY, or GEMINI_API_KEY_FILE)",
      ),
    );
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ GEMINI_API_KEY: "k", HEALTH_COACH_PORT: "not-a-port" })).toThrow(
      ConfigError,
    );
    expect(() => loadConfig({ GEMINI_API_KEY: "k", HEALTH_COACH_LOG_LEVEL: "verbose" })).toThrow(
      /Invalid configuration/,
    );
    expect(() => loadConfig({ GEMINI_API_KEY: "k", PORT: "70000" })).toThrow(
      "Invalid configuration: /port must be <= 65535",
    );
  });
});
