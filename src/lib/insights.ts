// src/lib/insights.ts
import type { Table, ColumnClassification } from "./types";
import { numericValues, summarizeNumbers, columnValues, valueKey, extent } from "./stats";
import { formatValue } from "./filters";

export const MAX_SUMMARY_CHARS = 12_000;

const num = (v: number) => String(+v.toFixed(4));

function describeNumeric(table: Table, c: string) {
  const s = summarizeNumbers(numericValues(table, c));
  if (!s) return `- ${c}: count=0`;
  return `- ${c}: count=${s.n}, mean=${num(s.mean)}, std=${num(s.stdev)}, min=${num(s.min)}, 25%=${num(s.q1)}, 50%=${num(s.median)}, 75%=${num(s.q3)}, max=${num(s.max)}`;
}

function describeCategorical(table: Table, c: string) {
  const counts = new Map<string, { label: string; n: number }>();
  for (const v of columnValues(table, c)) {
    if (v === null) continue;
    const k = valueKey(v);
    const e = counts.get(k) ?? { label: formatValue(v), n: 0 };
    e.n++;
    counts.set(k, e);
  }
  let top: { label: string; n: number } | null = null;
  let count = 0;
  for (const e of counts.values()) {
    count += e.n;
    if (!top || e.n > top.n) top = e;
  }
  if (!top) return `- ${c}: count=0`;
  return `- ${c}: count=${count}, unique=${counts.size}, top=${top.label}, freq=${top.n}`;
}

function describeTemporal(table: Table, c: string) {
  const times = columnValues(table, c).flatMap(v => (v instanceof Date ? [v.getTime()] : []));
  if (!times.length) return `- ${c}: count=0`;
  const day = (t: number) => new Date(t).toISOString().slice(0, 10);
  const { min, max } = extent(times);
  return `- ${c}: count=${times.length}, min=${day(min)}, max=${day(max)}`;
}

/** Describe-style text summary of a table: no raw rows leave the browser. */
export function describeTable(table: Table, classification: ColumnClassification): string {
  const lines = [`Rows: ${table.rows.length} | Columns: ${table.columns.length}`];
  const present = (cols: string[]) => cols.filter(c => table.columns.includes(c));

  const numeric = present(classification.numeric);
  if (numeric.length) lines.push("Numeric columns:", ...numeric.map(c => describeNumeric(table, c)));
  const categorical = present(classification.categorical);
  if (categorical.length) lines.push("Categorical columns:", ...categorical.map(c => describeCategorical(table, c)));
  const temporal = present(classification.temporal);
  if (temporal.length) lines.push("Temporal columns:", ...temporal.map(c => describeTemporal(table, c)));

  const missing = table.columns
    .map(c => ({ c, n: columnValues(table, c).filter(v => v === null).length }))
    .filter(m => m.n > 0);
  if (missing.length) lines.push(`Missing values: ${missing.map(m => `${m.c} (${m.n})`).join(", ")}`);

  return lines.join("\n");
}

export type AdvisorPromptInput = { columns: string[]; summary: string; question: string };

export const ADVISOR_SYSTEM_PROMPT = [
  "You are a senior data analyst.",
  "You will receive the column names of a dataset and a statistical summary of it, followed by a question.",
  "Answer using only that information. Do not invent numbers; if the summary cannot answer the question, say so.",
  "Be concise and business-friendly.",
].join("\n");

export function buildAdvisorPrompt({ columns, summary, question }: AdvisorPromptInput) {
  const clipped = summary.length > MAX_SUMMARY_CHARS ? `${summary.slice(0, MAX_SUMMARY_CHARS)}\n…(truncated)` : summary;
  const user = [
    `Columns: ${columns.join(", ")}`,
    "",
    "Statistical summary:",
    clipped,
    "",
    `Question: ${question.trim()}`,
  ].join("\n");
  return { system: ADVISOR_SYSTEM_PROMPT, user };
}
