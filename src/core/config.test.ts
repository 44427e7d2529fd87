import path from "node:path";
import { describe, it, expect } from "vitest";
import { DEFAULT_DATABASE_PATH, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      databasePath: path.resolve(DEFAULT_DATABASE_PATH),
      logLevel: "info",
      captureTimeoutMs: 5000,
      captureRetries: 2,
      captureBackoffMs: 250,
      operationTimeoutMs: 30000,
      linkLimit: 5,
      maxResponseChars: 10000,
    });
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({
      DATABASE_PATH: "/tmp/recorder/test.db",
      LOG_LEVEL: "debug",
      CAPTURE_RETRIES: "0",
      LINK_LIMIT: "3",
    });
    expect(config).toMatchObject({
      databasePath: "/tmp/recorder/test.db",
      logLevel: "debug",
      captureRetries: 0,
      linkLimit: 3,
    });
  });

  it("reports every invalid value at once", () => {
    expect(() =>
      loadConfig({ CAPTURE_TIMEOUT_MS: "soon", CAPTURE_RETRIES: "9" }),
    ).toThrow(
      "Invalid configuration:\nCAPTURE_TIMEOUT_MS: CAPTURE_TIMEOUT_MS must be a number\nCAPTURE_RETRIES: CAPTURE_RETRIES cannot exceed 5",
    );
  });
});
