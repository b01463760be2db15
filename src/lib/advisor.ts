// src/lib/advisor.ts
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, AuthenticationError, PermissionDeniedError } from "openai";

import type { AdvisorConfig } from "./config";
import { buildAdvisorPrompt } from "./insights";
import { describeError } from "./errors";
import { createLogger } from "./log";

const log = createLogger("advisor");

export type AdvisorRequest = { question: string; columns: string[]; summary: string; apiKey?: string | null };

export type AdvisorErrorKind =
  | "invalid-request" | "missing-credential" | "timeout" | "auth" | "network" | "upstream" | "empty" | "unknown";

export type AdvisorFailure = { status: "error"; kind: AdvisorErrorKind; message: string };

export type AdvisorResult = { status: "ok"; answer: string; model: string } | AdvisorFailure;

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(x => typeof x === "string");
}

/** Narrows an untrusted JSON body to an advisor request, or explains what is wrong. */
export function parseAdvisorRequest(body: unknown): AdvisorRequest | string {
  if (!body || typeof body !== "object") return "Body must be a JSON object.";
  const b: Record<string, unknown> = { ...body };
  if (typeof b.question !== "string") return "Missing 'question' string in body.";
  if (typeof b.summary !== "string") return "Missing 'summary' string in body.";
  if (!isStringArray(b.columns)) return "'columns' must be an array of strings.";
  if (b.apiKey !== undefined && b.apiKey !== null && typeof b.apiKey !== "string") return "'apiKey' must be a string.";
  return {
    question: b.question,
    summary: b.summary,
    columns: b.columns,
    apiKey: typeof b.apiKey === "string" ? b.apiKey : null,
  };
}

export type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export type ChatRequest = { model: string; messages: ChatMessage[]; temperature: number; signal: AbortSignal };

/** The one call the advisor needs from a chat-completion provider. */
export interface ChatClient {
  complete(req: ChatRequest): Promise<string | null>;
}

export type ChatClientFactory = (apiKey: string, config: AdvisorConfig) => ChatClient;

export const openAIChatClient: ChatClientFactory = (apiKey, config) => {
  const client = new OpenAI({ apiKey, baseURL: config.baseURL, timeout: config.timeoutMs, maxRetries: 0 });
  return {
    async complete({ model, messages, temperature, signal }) {
      const resp = await client.chat.completions.create({ model, messages, temperature }, { signal });
      return resp.choices[0]?.message?.content ?? null;
    },
  };
};

export class AdvisorTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`No answer within ${Math.round(timeoutMs / 1000)}s.`);
    this.name = "AdvisorTimeoutError";
  }
}

export async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AdvisorTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function failure(kind: AdvisorErrorKind, message: string): AdvisorFailure {
  return { status: "error", kind, message };
}

export function classifyAdvisorError(e: unknown): AdvisorFailure {
  // the SDK's timeout error is a connection error, so it is checked first
  if (e instanceof AdvisorTimeoutError) return failure("timeout", `The AI service timed out. ${e.message}`);
  if (e instanceof APIConnectionTimeoutError) return failure("timeout", "The AI service timed out.");
  if (e instanceof AuthenticationError || e instanceof PermissionDeniedError) {
    return failure("auth", "The AI service rejected the API key.");
  }
  if (e instanceof APIConnectionError) return failure("network", `Could not reach the AI service: ${describeError(e)}`);
  if (e instanceof APIError) return failure("upstream", `The AI service returned an error (${e.status ?? "no status"}): ${describeError(e)}`);
  return failure("unknown", `Unexpected error: ${describeError(e)}`);
}

/** Asks the chat model about the dataset summary. Never throws. */
export async function askAdvisor(
  request: AdvisorRequest,
  config: AdvisorConfig,
  makeClient: ChatClientFactory = openAIChatClient,
): Promise<AdvisorResult> {
  const question = request.question.trim();
  if (!question) return failure("invalid-request", "Type a question first.");

  const apiKey = request.apiKey?.trim() || config.apiKey;
  if (!apiKey) return failure("missing-credential", "No API key configured. Paste an API key to enable AI answers.");

  const { system, user } = buildAdvisorPrompt({ columns: request.columns, summary: request.summary, question });
  try {
    const client = makeClient(apiKey, config);
    const answer = await withTimeout(
      (signal) => client.complete({
        model: config.model,
        temperature: 0.2,
        messages: [{ role: "system", content: system }, { role: "user", content: user }],
        signal,
      }),
      config.timeoutMs,
    );
    if (!answer || !answer.trim()) return failure("empty", "The AI service returned an empty answer.");
    log.debug(`answered with ${config.model}`);
    return { status: "ok", answer: answer.trim(), model: config.model };
  } catch (e) {
    const result = classifyAdvisorError(e);
    log.error(`request failed (${result.kind})`, describeError(e));
    return result;
  }
}
