// src/lib/metrics.ts
import type { Table, MetricSnapshot, ColumnMetric, KpiDefinition, Kpi, KpiFormat } from "./types";

function isNumberCell(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * Counts and numeric aggregates for the given table, which should always be the
 * currently filtered one. Requested columns that are absent or hold something other
 * than numbers land in `unavailable` instead of failing the snapshot.
 */
export function summarize(table: Table, columns: readonly string[]): MetricSnapshot {
  const nullsByColumn: Record<string, number> = {};
  for (const c of table.columns) nullsByColumn[c] = 0;
  for (const r of table.rows) {
    for (const c of table.columns) if ((r[c] ?? null) === null) nullsByColumn[c]++;
  }
  const totalNulls = Object.values(nullsByColumn).reduce((a, n) => a + n, 0);

  const numeric: Record<string, ColumnMetric> = {};
  const unavailable: string[] = [];
  for (const c of columns) {
    const metric = table.columns.includes(c) ? numericMetric(table, c) : null;
    if (metric) numeric[c] = metric;
    else unavailable.push(c);
  }

  return { rowCount: table.rows.length, columnCount: table.columns.length, nullsByColumn, totalNulls, numeric, unavailable };
}

function numericMetric(table: Table, column: string): ColumnMetric | null {
  let sum = 0, count = 0, nulls = 0;
  for (const r of table.rows) {
    const v = r[column] ?? null;
    if (v === null) { nulls++; continue; }
    if (!isNumberCell(v)) return null;
    sum += v; count++;
  }
  return { column, sum, mean: count ? sum / count : null, count, nulls };
}

/* ---------------------- KPIs ---------------------- */

const twoDecimals = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const oneDecimal = new Intl.NumberFormat("en-US", { minimumFractionDigits: 1, maximumFractionDigits: 1 });
const integer = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatKpi(value: number | null, format: KpiFormat): string {
  if (value === null || !Number.isFinite(value)) return "N/A";
  switch (format) {
    case "number": return twoDecimals.format(value);
    case "percent": return `${oneDecimal.format(value)}%`;
    case "currency": return `$${twoDecimals.format(value)}`;
    case "integer": return integer.format(value);
  }
}

function kpiValue(snapshot: MetricSnapshot, def: KpiDefinition): { value: number | null; available: boolean } {
  if (def.aggregate === "count") return { value: snapshot.rowCount, available: true };
  const metric = def.column ? snapshot.numeric[def.column] : undefined;
  // absent optional columns read as zero
  if (!metric) return { value: 0, available: false };
  return { value: def.aggregate === "sum" ? metric.sum : metric.mean, available: true };
}

export function computeKpis(table: Table, defs: readonly KpiDefinition[]): Kpi[] {
  const columns = defs.flatMap(d => (d.column && d.aggregate !== "count" ? [d.column] : []));
  const snapshot = summarize(table, columns);
  return defs.map(def => {
    const { value, available } = kpiValue(snapshot, def);
    return { key: def.key, label: def.label, value, display: formatKpi(value, def.format), available };
  });
}

/** Row, column and null cards shown for any dataset. */
export function overviewKpis(snapshot: MetricSnapshot): Kpi[] {
  return [
    { key: "rows", label: "Rows", value: snapshot.rowCount, display: formatKpi(snapshot.rowCount, "integer"), available: true },
    { key: "columns", label: "Columns", value: snapshot.columnCount, display: formatKpi(snapshot.columnCount, "integer"), available: true },
    { key: "nulls", label: "Missing values", value: snapshot.totalNulls, display: formatKpi(snapshot.totalNulls, "integer"), available: true },
  ];
}
