// src/lib/types.ts
export type Scalar = number | string | boolean | Date | null;
export type Row = Record<string, Scalar>;
export type Table = { columns: string[]; rows: Row[] };

export type ColumnKind = "numeric" | "categorical" | "temporal";

export type ColumnClassification = {
  kinds: Record<string, ColumnKind>;
  numeric: string[];
  categorical: string[];
  temporal: string[];
};

export type DatasetProfile = "generic" | "energy";

/* ---------------------- Filters ---------------------- */

export type Filter =
  | { kind: "in"; values: Scalar[] }
  | { kind: "range"; min: number | null; max: number | null }
  | { kind: "dateRange"; from: Date | null; to: Date | null };

export type Selection = Readonly<Record<string, Filter>>;

/* ---------------------- Metrics ---------------------- */

export type ColumnMetric = { column: string; sum: number; mean: number | null; count: number; nulls: number };

export type MetricSnapshot = {
  rowCount: number;
  columnCount: number;
  nullsByColumn: Record<string, number>;
  totalNulls: number;
  numeric: Record<string, ColumnMetric>;
  unavailable: string[];
};

export type KpiFormat = "number" | "percent" | "currency" | "integer";

export type KpiDefinition = {
  key: string;
  label: string;
  aggregate: "sum" | "mean" | "count";
  column?: string;
  format: KpiFormat;
};

export type Kpi = { key: string; label: string; value: number | null; display: string; available: boolean };

/* ---------------------- Numeric summary ---------------------- */

export type NumericSummary = {
  n: number; mean: number; median: number; min: number; max: number;
  stdev: number; q1: number; q3: number; iqr: number; outliersIqr: number;
};

export type ColumnProfile = {
  name: string;
  kind: ColumnKind;
  missing: number;
  missingPct: number;
  distinct: number;
  numeric: NumericSummary | null;
};

/* ---------------------- Charts ---------------------- */

export type BoxOrientation = "vertical" | "horizontal";

export type ChartSpec =
  | { family: "scatter"; x: string; y: string; color?: string; size?: string; title: string }
  | { family: "box"; category: string; value: string; orientation: BoxOrientation; title: string }
  | { family: "histogram"; column: string; bins: number; marginal: "box"; title: string }
  | { family: "frequency"; column: string; color?: string; byDay?: boolean; title: string }
  | { family: "line"; x: string; y: string; title: string }
  | { family: "groupedBar"; x: string; y: string; color: string; title: string }
  | { family: "donut"; names: string; title: string }
  | { family: "correlation"; columns: string[]; title: string };

export type ChartFamily = ChartSpec["family"];

export type UnavailableReason = "insufficient-columns" | "incompatible-types" | "missing-columns";

export type ChartDecision =
  | { status: "chart"; spec: ChartSpec; notice?: string }
  | { status: "unavailable"; reason: UnavailableReason; message: string };

/* ---------------------- Loading ---------------------- */

export type LoadErrorKind = "unsupported" | "parse" | "empty" | "missingColumns";

export type LoadError = { kind: LoadErrorKind; message: string; missing?: string[]; rows?: number[] };

export type LoadResult<T> = { ok: true; value: T; notices: string[] } | { ok: false; error: LoadError };
