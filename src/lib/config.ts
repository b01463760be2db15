// src/lib/config.ts
export const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type AdvisorConfig = {
  /** Server-side key; users may still supply their own per request. */
  apiKey: string | null;
  baseURL: string;
  model: string;
  timeoutMs: number;
};

type Env = Record<string, string | undefined>;

function positiveInt(v: string | undefined, fallback: number) {
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadAdvisorConfig(env: Env = process.env): AdvisorConfig {
  return {
    apiKey: env.AI_API_KEY?.trim() || null,
    baseURL: env.AI_BASE_URL?.trim() || DEFAULT_BASE_URL,
    model: env.AI_MODEL?.trim() || DEFAULT_MODEL,
    timeoutMs: positiveInt(env.AI_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  };
}
