// src/lib/filters.ts
import type { Table, Row, Scalar, Filter, Selection, ColumnKind } from "./types";
import { valueKey } from "./stats";

/** Distinct values of a column in the order they first appear (null included once). */
export function distinctValues(table: Table, column: string): Scalar[] {
  const seen = new Set<string>();
  const out: Scalar[] = [];
  for (const r of table.rows) {
    const v = r[column] ?? null;
    const k = valueKey(v);
    if (seen.has(k)) continue;
    seen.add(k);
    out.push(v);
  }
  return out;
}

export function filterKindFor(kind: ColumnKind): Filter["kind"] {
  switch (kind) {
    case "categorical": return "in";
    case "numeric": return "range";
    case "temporal": return "dateRange";
    default: {
      const never: never = kind;
      throw new Error(`Unhandled column kind: ${String(never)}`);
    }
  }
}

/** Columns whose admissible set is empty; such a selection excludes every row. */
export function emptySelections(selection: Selection): string[] {
  return Object.entries(selection)
    .filter(([, f]) => f.kind === "in" && f.values.length === 0)
    .map(([c]) => c);
}

type RowTest = (v: Scalar) => boolean;

function predicateFor(filter: Filter): RowTest {
  switch (filter.kind) {
    case "in": {
      const allowed = new Set(filter.values.map(valueKey));
      return v => allowed.has(valueKey(v));
    }
    case "range": {
      const { min, max } = filter;
      return v => typeof v === "number" && (min === null || v >= min) && (max === null || v <= max);
    }
    case "dateRange": {
      const from = filter.from?.getTime() ?? null;
      const to = filter.to?.getTime() ?? null;
      return v => v instanceof Date && (from === null || v.getTime() >= from) && (to === null || v.getTime() <= to);
    }
    default: {
      const never: never = filter;
      throw new Error(`Unhandled filter: ${JSON.stringify(never)}`);
    }
  }
}

/** Rows matching every active filter, as a new table; the source is left untouched. */
export function applyFilters(table: Table, selection: Selection): Table {
  const active = Object.entries(selection).filter(([c]) => table.columns.includes(c));
  if (active.length === 0) return { columns: [...table.columns], rows: [...table.rows] };
  if (emptySelections(Object.fromEntries(active)).length) return { columns: [...table.columns], rows: [] };

  const tests = active.map(([c, f]) => [c, predicateFor(f)] as const);
  const rows = table.rows.filter((r: Row) => tests.every(([c, test]) => test(r[c] ?? null)));
  return { columns: [...table.columns], rows };
}

/** Drops admissible values that were never observed in the column. */
export function sanitizeSelection(selection: Selection, options: Readonly<Record<string, Scalar[]>>): Selection {
  const out: Record<string, Filter> = {};
  for (const [c, f] of Object.entries(selection)) {
    if (f.kind !== "in") { out[c] = f; continue; }
    const observed = options[c];
    if (!observed) { out[c] = f; continue; }
    const known = new Set(observed.map(valueKey));
    out[c] = { kind: "in", values: f.values.filter(v => known.has(valueKey(v))) };
  }
  return out;
}

/** Returns a new selection with one column's filter replaced (or removed with null). */
export function withFilter(selection: Selection, column: string, filter: Filter | null): Selection {
  const next: Record<string, Filter> = { ...selection };
  if (filter === null) delete next[column];
  else next[column] = filter;
  return next;
}

export function formatValue(v: Scalar): string {
  if (v === null) return "(blank)";
  if (v instanceof Date) return v.toISOString().slice(0, 10);
  return String(v);
}
