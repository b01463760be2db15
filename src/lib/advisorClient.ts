// src/lib/advisorClient.ts
// Browser side of the advisor routes; keeps the SDK out of the client bundle.
import type { AdvisorErrorKind, AdvisorFailure, AdvisorRequest, AdvisorResult } from "./advisor";
import { describeError } from "./errors";

export type AdvisorStatus = { serverKey: boolean; model: string };

const ERROR_KINDS: readonly AdvisorErrorKind[] = [
  "invalid-request", "missing-credential", "timeout", "auth", "network", "upstream", "empty", "unknown",
];

function isErrorKind(v: unknown): v is AdvisorErrorKind {
  return ERROR_KINDS.some(k => k === v);
}

function unknownFailure(message: string): AdvisorFailure {
  return { status: "error", kind: "unknown", message };
}

/** Narrows the JSON the advisor route answered with. */
export function parseAdvisorResult(body: unknown): AdvisorResult {
  if (!body || typeof body !== "object") return unknownFailure("The advisor answered with an unreadable response.");
  const b: Record<string, unknown> = { ...body };
  if (b.status === "ok" && typeof b.answer === "string" && typeof b.model === "string") {
    return { status: "ok", answer: b.answer, model: b.model };
  }
  if (b.status === "error" && isErrorKind(b.kind) && typeof b.message === "string") {
    return { status: "error", kind: b.kind, message: b.message };
  }
  return unknownFailure("The advisor answered with an unreadable response.");
}

export function parseAdvisorStatus(body: unknown): AdvisorStatus {
  if (!body || typeof body !== "object") return { serverKey: false, model: "" };
  const b: Record<string, unknown> = { ...body };
  return { serverKey: b.serverKey === true, model: typeof b.model === "string" ? b.model : "" };
}

export async function requestAdvice(request: AdvisorRequest): Promise<AdvisorResult> {
  try {
    const res = await fetch("/api/advisor", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
    });
    const body: unknown = await res.json();
    return parseAdvisorResult(body);
  } catch (e) {
    return { status: "error", kind: "network", message: `Could not reach the advisor: ${describeError(e)}` };
  }
}

export async function fetchAdvisorStatus(): Promise<AdvisorStatus> {
  const res = await fetch("/api/advisor/status", { cache: "no-store" });
  const body: unknown = await res.json();
  return parseAdvisorStatus(body);
}
