import { describe, it, expect } from "vitest";

import { loadAdvisorConfig, DEFAULT_BASE_URL, DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from "./config";

describe("loadAdvisorConfig", () => {
  it("falls back to defaults", () => {
    expect(loadAdvisorConfig({})).toEqual({
      apiKey: null,
      baseURL: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it("reads and trims the environment", () => {
    expect(loadAdvisorConfig({
      AI_API_KEY: " test-secret ",
      AI_BASE_URL: "http://localhost:8080/v1",
      AI_MODEL: "test-model",
      AI_TIMEOUT_MS: "5000",
    })).toEqual({ apiKey: "test-secret", baseURL: "http://localhost:8080/v1", model: "test-model", timeoutMs: 5000 });
  });

  it("treats a blank key as absent and ignores a bad timeout", () => {
    const config = loadAdvisorConfig({ AI_API_KEY: "   ", AI_TIMEOUT_MS: "soon" });
    expect(config.apiKey).toBeNull();
    expect(config.timeoutMs).toBe(30_000);
    expect(loadAdvisorConfig({ AI_TIMEOUT_MS: "-1" }).timeoutMs).toBe(30_000);
  });
});
