import { describe, it, expect } from "vitest";

import type { Table } from "./types";
import {
  distinctValues, applyFilters, sanitizeSelection, emptySelections, withFilter, formatValue, filterKindFor,
} from "./filters";

const day = (m: number, d: number) => new Date(Date.UTC(2024, m - 1, d));

const plants: Table = {
  columns: ["Tecnologia", "Capacidad", "Fecha"],
  rows: [
    { Tecnologia: "Solar", Capacidad: 10, Fecha: day(1, 1) },
    { Tecnologia: "Eolica", Capacidad: 20, Fecha: day(2, 1) },
    { Tecnologia: null, Capacidad: 30, Fecha: day(3, 1) },
    { Tecnologia: "Solar", Capacidad: null, Fecha: null },
  ],
};

describe("distinctValues", () => {
  it("keeps encounter order and lists null once", () => {
    expect(distinctValues(plants, "Tecnologia")).toEqual(["Solar", "Eolica", null]);
  });
});

describe("applyFilters", () => {
  it("keeps rows whose value is admitted", () => {
    const out = applyFilters(plants, { Tecnologia: { kind: "in", values: ["Solar"] } });
    expect(out.rows).toEqual([plants.rows[0], plants.rows[3]]);
  });

  it("admits null only when asked to", () => {
    const out = applyFilters(plants, { Tecnologia: { kind: "in", values: [null] } });
    expect(out.rows).toEqual([plants.rows[2]]);
  });

  it("returns no rows for an empty admissible set", () => {
    const out = applyFilters(plants, {
      Tecnologia: { kind: "in", values: [] },
      Capacidad: { kind: "range", min: null, max: null },
    });
    expect(out).toEqual({ columns: ["Tecnologia", "Capacidad", "Fecha"], rows: [] });
  });

  it("applies inclusive numeric bounds and drops nulls", () => {
    const out = applyFilters(plants, { Capacidad: { kind: "range", min: 20, max: null } });
    expect(out.rows.map(r => r.Capacidad)).toEqual([20, 30]);
  });

  it("applies inclusive date bounds", () => {
    const out = applyFilters(plants, { Fecha: { kind: "dateRange", from: day(2, 1), to: day(2, 1) } });
    expect(out.rows).toEqual([plants.rows[1]]);
  });

  it("ignores filters on columns the table lacks and never mutates the source", () => {
    const out = applyFilters(plants, { Operador: { kind: "in", values: ["A"] } });
    expect(out.rows).toEqual(plants.rows);
    expect(out.rows).not.toBe(plants.rows);
    expect(plants.rows).toHaveLength(4);
  });
});

describe("selection helpers", () => {
  it("drops values never observed in the column", () => {
    const clean = sanitizeSelection(
      { Tecnologia: { kind: "in", values: ["Solar", "Hidro"] } },
      { Tecnologia: ["Solar", "Eolica", null] },
    );
    expect(clean).toEqual({ Tecnologia: { kind: "in", values: ["Solar"] } });
  });

  it("names the columns with nothing selected", () => {
    expect(emptySelections({
      a: { kind: "in", values: [] },
      b: { kind: "range", min: 1, max: null },
      c: { kind: "in", values: ["x"] },
    })).toEqual(["a"]);
  });

  it("replaces and removes filters without touching the original", () => {
    const base = { a: { kind: "in" as const, values: ["x"] } };
    const added = withFilter(base, "b", { kind: "range", min: 0, max: 1 });
    expect(Object.keys(added)).toEqual(["a", "b"]);
    expect(withFilter(added, "a", null)).toEqual({ b: { kind: "range", min: 0, max: 1 } });
    expect(Object.keys(base)).toEqual(["a"]);
  });

  it("picks a filter kind per column kind", () => {
    expect(filterKindFor("categorical")).toBe("in");
    expect(filterKindFor("numeric")).toBe("range");
    expect(filterKindFor("temporal")).toBe("dateRange");
  });

  it("formats values for display", () => {
    expect(formatValue(null)).toBe("(blank)");
    expect(formatValue(day(1, 5))).toBe("2024-01-05");
    expect(formatValue(true)).toBe("true");
  });
});
