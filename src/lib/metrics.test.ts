import { describe, it, expect } from "vitest";

import type { Table, KpiDefinition } from "./types";
import { summarize, formatKpi, computeKpis, overviewKpis } from "./metrics";

const table: Table = {
  columns: ["Tecnologia", "Capacidad", "Nota"],
  rows: [
    { Tecnologia: "Solar", Capacidad: 10, Nota: "a" },
    { Tecnologia: "Eolica", Capacidad: 20, Nota: null },
    { Tecnologia: null, Capacidad: 30, Nota: "b" },
    { Tecnologia: "Solar", Capacidad: null, Nota: "c" },
  ],
};

describe("summarize", () => {
  it("counts nulls per column and aggregates numeric columns", () => {
    const s = summarize(table, ["Capacidad"]);
    expect(s).toEqual({
      rowCount: 4,
      columnCount: 3,
      nullsByColumn: { Tecnologia: 1, Capacidad: 1, Nota: 1 },
      totalNulls: 3,
      numeric: { Capacidad: { column: "Capacidad", sum: 60, mean: 20, count: 3, nulls: 1 } },
      unavailable: [],
    });
  });

  it("reports text and absent columns as unavailable", () => {
    expect(summarize(table, ["Tecnologia", "Inversion"]).unavailable).toEqual(["Tecnologia", "Inversion"]);
  });

  it("has no mean when every value is null", () => {
    const s = summarize({ columns: ["x"], rows: [{ x: null }, { x: null }] }, ["x"]);
    expect(s.numeric.x).toEqual({ column: "x", sum: 0, mean: null, count: 0, nulls: 2 });
  });

  it("reflects an empty table", () => {
    const s = summarize({ columns: ["x"], rows: [] }, ["x"]);
    expect(s.rowCount).toBe(0);
    expect(s.numeric.x.mean).toBeNull();
  });
});

describe("formatKpi", () => {
  it("formats each kind", () => {
    expect(formatKpi(1234.5, "number")).toBe("1,234.50");
    expect(formatKpi(12.34, "percent")).toBe("12.3%");
    expect(formatKpi(1500, "currency")).toBe("$1,500.00");
    expect(formatKpi(3, "integer")).toBe("3");
  });

  it("shows N/A for missing or non-finite values", () => {
    expect(formatKpi(null, "number")).toBe("N/A");
    expect(formatKpi(Number.NaN, "percent")).toBe("N/A");
  });
});

describe("computeKpis", () => {
  const defs: KpiDefinition[] = [
    { key: "cap", label: "Capacity", aggregate: "sum", column: "Capacidad", format: "number" },
    { key: "eff", label: "Efficiency", aggregate: "mean", column: "Eficiencia", format: "percent" },
    { key: "n", label: "Plants", aggregate: "count", format: "integer" },
  ];

  it("evaluates definitions over the given rows", () => {
    expect(computeKpis(table, defs)).toEqual([
      { key: "cap", label: "Capacity", value: 60, display: "60.00", available: true },
      { key: "eff", label: "Efficiency", value: 0, display: "0.0%", available: false },
      { key: "n", label: "Plants", value: 4, display: "4", available: true },
    ]);
  });

  it("shows N/A for a mean over no values", () => {
    const [kpi] = computeKpis({ columns: ["x"], rows: [{ x: null }] }, [
      { key: "m", label: "Mean x", aggregate: "mean", column: "x", format: "number" },
    ]);
    expect(kpi).toEqual({ key: "m", label: "Mean x", value: null, display: "N/A", available: true });
  });

  it("builds the overview cards", () => {
    expect(overviewKpis(summarize(table, [])).map(k => [k.label, k.display])).toEqual([
      ["Rows", "4"],
      ["Columns", "3"],
      ["Missing values", "3"],
    ]);
  });
});
