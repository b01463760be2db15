import { describe, it, expect, vi, afterEach } from "vitest";

import { parseAdvisorResult, parseAdvisorStatus, requestAdvice } from "./advisorClient";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseAdvisorResult", () => {
  it("accepts answers and known failures", () => {
    expect(parseAdvisorResult({ status: "ok", answer: "a", model: "m" })).toEqual({ status: "ok", answer: "a", model: "m" });
    expect(parseAdvisorResult({ status: "error", kind: "auth", message: "no" })).toEqual({ status: "error", kind: "auth", message: "no" });
  });

  it("turns anything else into an unknown failure", () => {
    const unreadable = { status: "error", kind: "unknown", message: "The advisor answered with an unreadable response." };
    expect(parseAdvisorResult({ status: "error", kind: "teapot", message: "x" })).toEqual(unreadable);
    expect(parseAdvisorResult("oops")).toEqual(unreadable);
  });
});

describe("parseAdvisorStatus", () => {
  it("reads only a true flag as a server key", () => {
    expect(parseAdvisorStatus({ serverKey: true, model: "m" })).toEqual({ serverKey: true, model: "m" });
    expect(parseAdvisorStatus({ serverKey: "yes" })).toEqual({ serverKey: false, model: "" });
    expect(parseAdvisorStatus(null)).toEqual({ serverKey: false, model: "" });
  });
});

describe("requestAdvice", () => {
  it("posts the request and reads the result", async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ status: "ok", answer: "Yes.", model: "m" })));
    vi.stubGlobal("fetch", fetchMock);
    const result = await requestAdvice({ question: "q", columns: ["a"], summary: "s", apiKey: null });
    expect(result).toEqual({ status: "ok", answer: "Yes.", model: "m" });
    expect(fetchMock).toHaveBeenCalledWith("/api/advisor", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ question: "q", columns: ["a"], summary: "s", apiKey: null }),
    });
  });

  it("reports a failed request as a network failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => { throw new TypeError("fetch failed"); }));
    expect(await requestAdvice({ question: "q", columns: [], summary: "s" })).toEqual({
      status: "error",
      kind: "network",
      message: "Could not reach the advisor: fetch failed",
    });
  });
});
