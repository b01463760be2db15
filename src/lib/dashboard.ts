// src/lib/dashboard.ts
import type {
  Table, Scalar, Selection, Filter, ColumnClassification, DatasetProfile,
  MetricSnapshot, Kpi, KpiDefinition, ChartDecision, LoadResult,
} from "./types";
import { classify, dateParseFallbacks, parseDateColumns } from "./stats";
import { loadFile, checkRequiredColumns } from "./load";
import { applyFilters, distinctValues, emptySelections, sanitizeSelection } from "./filters";
import { summarize, computeKpis, overviewKpis } from "./metrics";
import { correlationChart } from "./charts";
import { ENERGY_REQUIRED, ENERGY_FILTER_COLUMNS, ENERGY_KPIS, energyCharts } from "./energy";

export type LoadedDataset = {
  name: string;
  profile: DatasetProfile;
  table: Table;
  classification: ColumnClassification;
  /** Values observed at load time, per filterable column. */
  options: Record<string, Scalar[]>;
};

export type DashboardView =
  | { status: "ready"; table: Table; snapshot: MetricSnapshot; kpis: Kpi[]; charts: ChartDecision[] }
  | { status: "empty-selection"; columns: string[]; message: string };

const GENERIC_MEAN_CARDS = 3;

export function prepareDataset(name: string, table: Table, profile: DatasetProfile): LoadResult<LoadedDataset> {
  if (profile === "energy") {
    const checked = checkRequiredColumns(table, ENERGY_REQUIRED);
    if (!checked.ok) return checked;
  }

  const classification = classify(table);
  const notices = dateParseFallbacks(table, classification).map(
    c => `Column "${c}" has values that are not dates; it is treated as categorical.`
  );
  const parsed = parseDateColumns(table, classification);

  const filterable = new Set<string>(classification.categorical);
  if (profile === "energy") ENERGY_FILTER_COLUMNS.forEach(c => filterable.add(c));
  const options: Record<string, Scalar[]> = {};
  for (const c of filterable) options[c] = distinctValues(parsed, c);

  return { ok: true, value: { name, profile, table: parsed, classification, options }, notices };
}

/** Parse, validate and classify an upload in one step. */
export function loadDataset(name: string, data: string | ArrayBuffer | Uint8Array, profile: DatasetProfile): LoadResult<LoadedDataset> {
  const loaded = loadFile(name, data);
  if (!loaded.ok) return loaded;
  const prepared = prepareDataset(name, loaded.value, profile);
  if (!prepared.ok) return prepared;
  return { ...prepared, notices: [...loaded.notices, ...prepared.notices] };
}

export type Upload = { name: string; data: string | ArrayBuffer | Uint8Array };

/**
 * Reloads the current upload under another profile. The profile only changes when the
 * upload loads under it (or there is nothing loaded yet); otherwise `current` is kept.
 */
export function switchProfile(
  current: DatasetProfile,
  next: DatasetProfile,
  upload: Upload | null,
): { profile: DatasetProfile; result: LoadResult<LoadedDataset> | null } {
  if (!upload) return { profile: next, result: null };
  const result = loadDataset(upload.name, upload.data, next);
  return { profile: result.ok ? next : current, result };
}

/** Energy datasets start with every technology and status selected. */
export function defaultSelection(dataset: LoadedDataset): Selection {
  if (dataset.profile !== "energy") return {};
  const selection: Record<string, Filter> = {};
  for (const c of ENERGY_FILTER_COLUMNS) selection[c] = { kind: "in", values: [...(dataset.options[c] ?? [])] };
  return selection;
}

function genericKpis(dataset: LoadedDataset, filtered: Table, snapshot: MetricSnapshot): Kpi[] {
  const defs: KpiDefinition[] = dataset.classification.numeric
    .slice(0, GENERIC_MEAN_CARDS)
    .map((c): KpiDefinition => ({ key: `mean:${c}`, label: `Mean ${c}`, aggregate: "mean", column: c, format: "number" }));
  return [...overviewKpis(snapshot), ...computeKpis(filtered, defs)];
}

/** Everything one render needs, recomputed from the loaded table and the current selection. */
export function computeDashboard(dataset: LoadedDataset, selection: Selection): DashboardView {
  const clean = sanitizeSelection(selection, dataset.options);
  const empty = emptySelections(clean).filter(c => dataset.table.columns.includes(c));
  if (empty.length) {
    return { status: "empty-selection", columns: empty, message: `Select at least one value for: ${empty.join(", ")}.` };
  }

  const filtered = applyFilters(dataset.table, clean);
  const snapshot = summarize(filtered, dataset.classification.numeric);

  if (dataset.profile === "energy") {
    return {
      status: "ready",
      table: filtered,
      snapshot,
      kpis: computeKpis(filtered, ENERGY_KPIS),
      charts: energyCharts(dataset.classification),
    };
  }
  return {
    status: "ready",
    table: filtered,
    snapshot,
    kpis: genericKpis(dataset, filtered, snapshot),
    charts: [correlationChart(dataset.classification)],
  };
}
