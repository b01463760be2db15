// src/lib/stats.ts
import type { Table, Row, Scalar, ColumnKind, ColumnClassification, ColumnProfile, NumericSummary } from "./types";

/** ======================= Type Coercion ======================= */

const NUMERIC_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;
const BOOL_RE = /^(?:true|false)$/i;
const NULL_TOKENS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL", "None", "#N/A"]);

/** Columns named like this are tried as dates even when they arrive as text. */
export const DATE_NAME_RE = /fecha|date/i;

export type RawTable = { columns: string[]; rows: Record<string, unknown>[] };

function normalizeCell(v: unknown): Scalar {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "boolean") return v;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v;
  const s = String(v);
  return NULL_TOKENS.has(s.trim()) ? null : s;
}

function scalarToText(v: Scalar): string | null {
  if (v === null) return null;
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

function typeTag(v: Exclude<Scalar, null>): string {
  return v instanceof Date ? "date" : typeof v;
}

/** Gives every column a single value type: numbers, booleans, dates or text. */
export function coerceColumn(values: unknown[]): Scalar[] {
  const cells = values.map(normalizeCell);
  const present = cells.filter((v): v is Exclude<Scalar, null> => v !== null);
  if (present.length === 0) return cells;

  if (present.every(v => typeof v === "number" || (typeof v === "string" && NUMERIC_RE.test(v.trim())))) {
    return cells.map(v => (v === null ? null : Number(typeof v === "string" ? v.trim() : v)));
  }
  if (present.every(v => typeof v === "boolean" || (typeof v === "string" && BOOL_RE.test(v.trim())))) {
    return cells.map(v => (v === null ? null : typeof v === "boolean" ? v : String(v).trim().toLowerCase() === "true"));
  }
  const tags = new Set(present.map(typeTag));
  if (tags.size <= 1) return cells;
  return cells.map(scalarToText);
}

export function coerceTable(raw: RawTable): Table {
  const byColumn: Record<string, Scalar[]> = {};
  for (const c of raw.columns) byColumn[c] = coerceColumn(raw.rows.map(r => r?.[c]));
  const rows = raw.rows.map((_, i) => {
    const out: Row = {};
    for (const c of raw.columns) out[c] = byColumn[c][i];
    return out;
  });
  return { columns: [...raw.columns], rows };
}

/** ======================= Dates ======================= */

const ISO_DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const YMD_SLASH_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const MDY_SLASH_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function utcDate(y: number, mo: number, d: number, h = 0, mi = 0, s = 0, ms = 0): Date | null {
  if (h > 23 || mi > 59 || s > 59) return null;
  const t = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
  if (t.getUTCFullYear() !== y || t.getUTCMonth() !== mo - 1 || t.getUTCDate() !== d) return null;
  return t;
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/** Parses the date layouts we accept; values without a zone are read as UTC. */
export function parseDateValue(s: string): Date | null {
  const text = s.trim();
  let m = ISO_DATE_RE.exec(text);
  if (m) {
    const ms = m[7] ? Number(m[7].padEnd(3, "0")) : 0;
    const base = utcDate(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0), ms);
    if (!base) return null;
    return new Date(base.getTime() - zoneOffsetMinutes(m[8]) * 60_000);
  }
  m = YMD_SLASH_RE.exec(text);
  if (m) return utcDate(Number(m[1]), Number(m[2]), Number(m[3]));
  m = MDY_SLASH_RE.exec(text);
  if (m) return utcDate(Number(m[3]), Number(m[1]), Number(m[2]));
  return null;
}

function parsesAsDate(v: Scalar): boolean {
  return v instanceof Date || (typeof v === "string" && parseDateValue(v) !== null);
}

/** ======================= Classification ======================= */

export function columnValues(table: Table, column: string): Scalar[] {
  return table.rows.map(r => r[column] ?? null);
}

export function classifyColumn(name: string, values: Scalar[]): ColumnKind {
  const present = values.filter(v => v !== null);
  if (present.length === 0) return "categorical";
  if (present.every(v => v instanceof Date)) return "temporal";
  if (present.every(v => typeof v === "number" && Number.isFinite(v))) return "numeric";
  if (DATE_NAME_RE.test(name) && present.every(parsesAsDate)) return "temporal";
  return "categorical";
}

export function classify(table: Table): ColumnClassification {
  const out: ColumnClassification = { kinds: {}, numeric: [], categorical: [], temporal: [] };
  for (const c of table.columns) {
    const kind = classifyColumn(c, columnValues(table, c));
    out.kinds[c] = kind;
    switch (kind) {
      case "numeric": out.numeric.push(c); break;
      case "categorical": out.categorical.push(c); break;
      case "temporal": out.temporal.push(c); break;
      default: {
        const never: never = kind;
        throw new Error(`Unhandled column kind: ${String(never)}`);
      }
    }
  }
  return out;
}

/** Date-named columns where only some values parsed; they stay categorical. */
export function dateParseFallbacks(table: Table, classification: ColumnClassification): string[] {
  return classification.categorical.filter(c => {
    if (!DATE_NAME_RE.test(c)) return false;
    return columnValues(table, c).some(v => typeof v === "string" && parseDateValue(v) !== null);
  });
}

/** Converts temporal text columns to Date values; returns a new table. */
export function parseDateColumns(table: Table, classification: ColumnClassification): Table {
  const targets = classification.temporal;
  if (targets.length === 0) return table;
  const rows = table.rows.map(r => {
    const out: Row = { ...r };
    for (const c of targets) {
      const v = r[c];
      if (typeof v === "string") out[c] = parseDateValue(v);
    }
    return out;
  });
  return { columns: [...table.columns], rows };
}

/** ======================= Basic Stats ======================= */

export function numericValues(table: Table, column: string): number[] {
  const out: number[] = [];
  for (const r of table.rows) {
    const v = r[column];
    if (typeof v === "number" && Number.isFinite(v)) out.push(v);
  }
  return out;
}

export function quantile(sortedNums: number[], q: number) {
  if (sortedNums.length === 0) return NaN;
  const pos = (sortedNums.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (sortedNums[base + 1] !== undefined) return sortedNums[base] + rest * (sortedNums[base + 1] - sortedNums[base]);
  return sortedNums[base];
}

export function stdev(nums: number[], mean: number) {
  if (nums.length <= 1) return 0;
  const v = nums.reduce((a, x) => a + (x - mean) ** 2, 0) / (nums.length - 1);
  return Math.sqrt(v);
}

export function summarizeNumbers(nums: number[]): NumericSummary | null {
  const n = nums.length;
  if (n === 0) return null;
  const sorted = [...nums].sort((a, b) => a - b);
  const mean = nums.reduce((a, x) => a + x, 0) / n;
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const outliersIqr = nums.filter(x => (x < q1 - 1.5 * iqr) || (x > q3 + 1.5 * iqr)).length;
  return {
    n, mean, median: quantile(sorted, 0.5), min: sorted[0], max: sorted[n - 1],
    stdev: stdev(nums, mean), q1, q3, iqr, outliersIqr,
  };
}

export function valueKey(v: Scalar): string {
  if (v === null) return "null";
  if (v instanceof Date) return `d:${v.getTime()}`;
  return `${typeof v}:${String(v)}`;
}

export function profileTable(table: Table, classification: ColumnClassification): ColumnProfile[] {
  return table.columns.map(c => {
    const colVals = columnValues(table, c);
    const missing = colVals.filter(v => v === null).length;
    const missingPct = Math.round((missing / Math.max(1, table.rows.length)) * 100);
    const distinct = new Set(colVals.filter(v => v !== null).map(valueKey)).size;
    const kind = classification.kinds[c] ?? "categorical";
    const numeric = kind === "numeric" ? summarizeNumbers(numericValues(table, c)) : null;
    return { name: c, kind, missing, missingPct, distinct, numeric };
  });
}

/** ======================= Associations ======================= */

export function pearson(xs: number[], ys: number[]) {
  const n = Math.min(xs.length, ys.length);
  if (n < 3) return NaN;
  const x = xs.slice(0, n), y = ys.slice(0, n);
  const mx = x.reduce((a, v) => a + v, 0) / n;
  const my = y.reduce((a, v) => a + v, 0) / n;
  let num = 0, dx2 = 0, dy2 = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - mx, dy = y[i] - my;
    num += dx * dy; dx2 += dx * dx; dy2 += dy * dy;
  }
  const den = Math.sqrt(dx2 * dy2);
  return den ? num / den : NaN;
}

/** Rows where both columns hold a number. */
export function pairedNumbers(table: Table, a: string, b: string) {
  const xs: number[] = [], ys: number[] = [];
  for (const r of table.rows) {
    const x = r[a], y = r[b];
    if (typeof x === "number" && typeof y === "number" && Number.isFinite(x) && Number.isFinite(y)) {
      xs.push(x); ys.push(y);
    }
  }
  return { xs, ys };
}

export function corrMatrix(table: Table, cols: string[]) {
  const mat: (number | null)[][] = cols.map(() => cols.map(() => null));
  for (let i = 0; i < cols.length; i++) {
    for (let j = i; j < cols.length; j++) {
      const { xs, ys } = pairedNumbers(table, cols[i], cols[j]);
      const r = i === j ? (xs.length ? 1 : NaN) : pearson(xs, ys);
      mat[i][j] = mat[j][i] = Number.isFinite(r) ? r : null;
    }
  }
  return { cols, mat };
}

/** ======================= Histogram ======================= */

/** Smallest and largest of a non-empty list, in one pass. */
export function extent(values: number[]): { min: number; max: number } {
  let min = values[0], max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function histogram(values: number[], bins = 10): { bins: number[]; counts: number[]; edges: number[] } {
  const nums = values.filter(Number.isFinite);
  if (nums.length === 0) return { bins: [], counts: [], edges: [] };
  const { min, max } = extent(nums);
  const width = (max - min) || 1;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins);
  const counts: number[] = Array(bins).fill(0);
  for (const v of nums) {
    const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)));
    counts[idx]++;
  }
  const centers = counts.map((_, i) => (edges[i] + edges[i + 1]) / 2);
  return { bins: centers, counts, edges };
}
