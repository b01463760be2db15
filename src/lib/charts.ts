// src/lib/charts.ts
import type { Table, Scalar, ColumnKind, ColumnClassification, ChartDecision, ChartSpec, BoxOrientation } from "./types";
import { histogram, numericValues, quantile, valueKey, corrMatrix } from "./stats";
import { formatValue } from "./filters";

export const HIST_BINS = 20;

/* ---------------------- decision table ---------------------- */

export type FamilyChoice =
  | { family: "scatter" }
  | { family: "box"; orientation: BoxOrientation }
  | { family: "histogram" }
  | { family: "frequency"; fallback: boolean; byDay: boolean }
  | { family: "line"; flipped: boolean }
  | { family: null };

const SINGLE: Record<ColumnKind, FamilyChoice> = {
  numeric: { family: "histogram" },
  categorical: { family: "frequency", fallback: false, byDay: false },
  temporal: { family: "frequency", fallback: false, byDay: true },
};

// rows: x kind, columns: y kind
const PAIRS: Record<ColumnKind, Record<ColumnKind, FamilyChoice>> = {
  numeric: {
    numeric: { family: "scatter" },
    categorical: { family: "box", orientation: "horizontal" },
    temporal: { family: "line", flipped: true },
  },
  categorical: {
    numeric: { family: "box", orientation: "vertical" },
    categorical: { family: "frequency", fallback: true, byDay: false },
    temporal: { family: null },
  },
  temporal: {
    numeric: { family: "line", flipped: false },
    categorical: { family: null },
    temporal: { family: null },
  },
};

/** Chart family for an x column and an optional y column, by their kinds. */
export function chartFamily(x: ColumnKind, y: ColumnKind | null): FamilyChoice {
  return y === null ? SINGLE[x] : PAIRS[x][y];
}

export type AxisChoice = { x: string; y?: string | null; color?: string | null; size?: string | null };

function missing(column: string): ChartDecision {
  return { status: "unavailable", reason: "missing-columns", message: `Column "${column}" is not in the dataset.` };
}

export function selectChart(axes: AxisChoice, classification: ColumnClassification): ChartDecision {
  const { x } = axes;
  const y = axes.y || null;
  const xKind = classification.kinds[x];
  if (!xKind) return missing(x);
  const yKind = y === null ? null : classification.kinds[y];
  if (y !== null && !yKind) return missing(y);

  const choice = chartFamily(xKind, yKind ?? null);
  switch (choice.family) {
    case "histogram":
      return { status: "chart", spec: { family: "histogram", column: x, bins: HIST_BINS, marginal: "box", title: `Distribution of ${x}` } };
    case "frequency": {
      if (choice.fallback && y) {
        return {
          status: "chart",
          spec: { family: "frequency", column: x, color: y, title: `Count of ${x} by ${y}` },
          notice: `"${x}" and "${y}" are both categorical; showing counts of ${x} split by ${y}.`,
        };
      }
      const title = choice.byDay ? `Count per day of ${x}` : `Count of ${x}`;
      return { status: "chart", spec: { family: "frequency", column: x, byDay: choice.byDay, title } };
    }
    case "scatter": {
      if (!y) break;
      const spec: Extract<ChartSpec, { family: "scatter" }> = { family: "scatter", x, y, title: `${x} vs ${y}` };
      let notice: string | undefined;
      if (axes.color && classification.kinds[axes.color]) spec.color = axes.color;
      if (axes.size && classification.kinds[axes.size] === "numeric") spec.size = axes.size;
      else if (axes.size) notice = `Size needs a numeric column; "${axes.size}" was ignored.`;
      return notice ? { status: "chart", spec, notice } : { status: "chart", spec };
    }
    case "box": {
      if (!y) break;
      const [category, value] = choice.orientation === "vertical" ? [x, y] : [y, x];
      return { status: "chart", spec: { family: "box", category, value, orientation: choice.orientation, title: `${value} by ${category}` } };
    }
    case "line": {
      if (!y) break;
      const [time, value] = choice.flipped ? [y, x] : [x, y];
      return { status: "chart", spec: { family: "line", x: time, y: value, title: `${value} over ${time}` } };
    }
    case null:
      break;
  }
  return {
    status: "unavailable",
    reason: "incompatible-types",
    message: `"${x}" (${xKind}) and "${y}" (${yKind}) cannot be plotted against each other.`,
  };
}

export function correlationChart(classification: ColumnClassification): ChartDecision {
  const n = classification.numeric.length;
  if (n < 2) {
    return {
      status: "unavailable",
      reason: "insufficient-columns",
      message: `Correlation needs at least two numeric columns (found ${n}).`,
    };
  }
  return { status: "chart", spec: { family: "correlation", columns: [...classification.numeric], title: "Correlation matrix" } };
}

/* ---------------------- builders ---------------------- */

function dayKey(v: Scalar): string | null {
  return v instanceof Date ? v.toISOString().slice(0, 10) : null;
}

/** (value, count) pairs in encounter order; nulls are counted apart from the bars. */
export function buildFrequency(table: Table, column: string, byDay = false) {
  const counts = new Map<string, { name: string; count: number }>();
  let nulls = 0;
  for (const r of table.rows) {
    const v = r[column] ?? null;
    if (v === null) { nulls++; continue; }
    const day = byDay ? dayKey(v) : null;
    const key = day ?? valueKey(v);
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { name: day ?? formatValue(v), count: 1 });
  }
  return { bars: [...counts.values()], nulls };
}

/** A bar series: `key` is the field in each data row, `label` the value it stands for. */
export type BarSeries = { key: string; label: string };

/** Adds `amount` to the `label` series of the `group` row. Series fields are `s0`, `s1`, ...; labels never become keys. */
function addToSeries(
  rows: Map<string, Record<string, string | number>>,
  series: BarSeries[],
  group: Scalar,
  label: string,
  amount: number,
) {
  let entry = series.find(s => s.label === label);
  if (!entry) {
    entry = { key: `s${series.length}`, label };
    series.push(entry);
  }
  const key = valueKey(group);
  const row = rows.get(key) ?? { name: formatValue(group) };
  const prev = row[entry.key];
  row[entry.key] = (typeof prev === "number" ? prev : 0) + amount;
  rows.set(key, row);
}

/** Counts of `column` split by `color`, one numeric field per color value. */
export function buildStackedFrequency(table: Table, column: string, color: string) {
  const rows = new Map<string, Record<string, string | number>>();
  const series: BarSeries[] = [];
  for (const r of table.rows) {
    const v = r[column] ?? null;
    if (v === null) continue;
    addToSeries(rows, series, v, formatValue(r[color] ?? null), 1);
  }
  return { data: [...rows.values()], series };
}

export function buildHistData(table: Table, col: string, bins = HIST_BINS) {
  const { bins: centers, counts } = histogram(numericValues(table, col), bins);
  return centers.map((c, i) => ({ bin: c, count: counts[i] }));
}

export type BoxSummary = { n: number; min: number; q1: number; q2: number; q3: number; max: number; whiskerLo: number; whiskerHi: number };

function boxOf(values: number[]): BoxSummary | null {
  const vals = [...values].sort((a, b) => a - b);
  if (!vals.length) return null;
  const q1 = quantile(vals, 0.25);
  const q2 = quantile(vals, 0.5);
  const q3 = quantile(vals, 0.75);
  const iqr = q3 - q1, lo = q1 - 1.5 * iqr, hi = q3 + 1.5 * iqr;
  const min = vals[0], max = vals[vals.length - 1];
  const whiskerLo = vals.find((v) => v >= lo) ?? min;
  const whiskerHi = [...vals].reverse().find((v) => v <= hi) ?? max;
  return { n: vals.length, min, q1, q2, q3, max, whiskerLo, whiskerHi };
}

export function buildBoxSummary(table: Table, col: string) {
  return boxOf(numericValues(table, col));
}

export type BoxRow = BoxSummary & {
  name: string;
  base: number; lowerWhisker: number; lowerBox: number; upperBox: number; upperWhisker: number;
};

/** One box per category, split into stacked segments a bar chart can draw. */
export function buildBoxData(table: Table, category: string, value: string): BoxRow[] {
  const groups = new Map<string, { name: string; values: number[] }>();
  for (const r of table.rows) {
    const c = r[category] ?? null;
    const v = r[value];
    if (c === null || typeof v !== "number" || !Number.isFinite(v)) continue;
    const key = valueKey(c);
    const g = groups.get(key) ?? { name: formatValue(c), values: [] };
    g.values.push(v);
    groups.set(key, g);
  }
  const out: BoxRow[] = [];
  for (const g of groups.values()) {
    const s = boxOf(g.values);
    if (!s) continue;
    out.push({
      ...s,
      name: g.name,
      base: s.whiskerLo,
      lowerWhisker: s.q1 - s.whiskerLo,
      lowerBox: s.q2 - s.q1,
      upperBox: s.q3 - s.q2,
      upperWhisker: s.whiskerHi - s.q3,
    });
  }
  return out;
}

export type ScatterPoint = { x: number; y: number; z: number };

export function buildScatterData(table: Table, x: string, y: string, size?: string, color?: string) {
  const series = new Map<string, { name: string; points: ScatterPoint[] }>();
  for (const r of table.rows) {
    const xv = r[x], yv = r[y];
    if (typeof xv !== "number" || typeof yv !== "number" || !Number.isFinite(xv) || !Number.isFinite(yv)) continue;
    const sv = size ? r[size] : null;
    const z = typeof sv === "number" && Number.isFinite(sv) ? sv : 1;
    const name = color ? formatValue(r[color] ?? null) : y;
    const s = series.get(name) ?? { name, points: [] };
    s.points.push({ x: xv, y: yv, z });
    series.set(name, s);
  }
  return [...series.values()];
}

export function buildLineData(table: Table, x: string, y: string) {
  return table.rows
    .map((r) => ({ t: r[x], y: r[y] }))
    .filter((d): d is { t: Date; y: number } => d.t instanceof Date && typeof d.y === "number" && Number.isFinite(d.y))
    .map((d) => ({ x: d.t.getTime(), y: d.y }))
    .sort((a, b) => a.x - b.x);
}

/** Sum of `y` per `x`, one field per `color` value. */
export function buildGroupedBar(table: Table, x: string, y: string, color: string) {
  const rows = new Map<string, Record<string, string | number>>();
  const series: BarSeries[] = [];
  for (const r of table.rows) {
    const xv = r[x] ?? null;
    const yv = r[y];
    if (xv === null || typeof yv !== "number" || !Number.isFinite(yv)) continue;
    addToSeries(rows, series, xv, formatValue(r[color] ?? null), yv);
  }
  return { data: [...rows.values()], series };
}

export function buildDonut(table: Table, names: string) {
  const { bars } = buildFrequency(table, names);
  return bars.map((b) => ({ name: b.name, value: b.count })).sort((a, b) => b.value - a.value);
}

export function buildCorrelation(table: Table, cols: string[]) {
  const { mat } = corrMatrix(table, cols);
  const data: { x: string; y: string; r: number | null }[] = [];
  for (let i = 0; i < cols.length; i++) {
    for (let j = 0; j < cols.length; j++) data.push({ x: cols[i], y: cols[j], r: mat[i][j] });
  }
  return { cols, data };
}
