import { describe, it, expect } from "vitest";

import type { ColumnClassification, Table } from "./types";
import {
  chartFamily, selectChart, correlationChart, buildFrequency, buildStackedFrequency, buildHistData,
  buildBoxData, buildLineData, buildGroupedBar, buildDonut, buildScatterData, buildCorrelation,
} from "./charts";

const classification: ColumnClassification = {
  kinds: { price: "numeric", qty: "numeric", region: "categorical", segment: "categorical", day: "temporal" },
  numeric: ["price", "qty"],
  categorical: ["region", "segment"],
  temporal: ["day"],
};

describe("chartFamily", () => {
  it("follows the kind table", () => {
    expect(chartFamily("numeric", null)).toEqual({ family: "histogram" });
    expect(chartFamily("numeric", "numeric")).toEqual({ family: "scatter" });
    expect(chartFamily("categorical", "numeric")).toEqual({ family: "box", orientation: "vertical" });
    expect(chartFamily("numeric", "categorical")).toEqual({ family: "box", orientation: "horizontal" });
    expect(chartFamily("temporal", "temporal")).toEqual({ family: null });
  });
});

describe("selectChart", () => {
  it("draws a histogram with a box marginal for one numeric column", () => {
    expect(selectChart({ x: "price" }, classification)).toEqual({
      status: "chart",
      spec: { family: "histogram", column: "price", bins: 20, marginal: "box", title: "Distribution of price" },
    });
  });

  it("treats an empty y choice as no y", () => {
    expect(selectChart({ x: "price", y: "" }, classification)).toEqual(selectChart({ x: "price" }, classification));
  });

  it("counts categories and days", () => {
    expect(selectChart({ x: "region" }, classification)).toEqual({
      status: "chart",
      spec: { family: "frequency", column: "region", byDay: false, title: "Count of region" },
    });
    expect(selectChart({ x: "day" }, classification)).toEqual({
      status: "chart",
      spec: { family: "frequency", column: "day", byDay: true, title: "Count per day of day" },
    });
  });

  it("scatters two numeric columns and ignores a non-numeric size", () => {
    expect(selectChart({ x: "price", y: "qty" }, classification)).toEqual({
      status: "chart",
      spec: { family: "scatter", x: "price", y: "qty", title: "price vs qty" },
    });
    expect(selectChart({ x: "price", y: "qty", color: "region", size: "segment" }, classification)).toEqual({
      status: "chart",
      spec: { family: "scatter", x: "price", y: "qty", color: "region", title: "price vs qty" },
      notice: 'Size needs a numeric column; "segment" was ignored.',
    });
    expect(selectChart({ x: "price", y: "price", size: "qty" }, classification)).toEqual({
      status: "chart",
      spec: { family: "scatter", x: "price", y: "price", size: "qty", title: "price vs price" },
    });
  });

  it("orients box plots by which axis holds the category", () => {
    expect(selectChart({ x: "region", y: "price" }, classification)).toEqual({
      status: "chart",
      spec: { family: "box", category: "region", value: "price", orientation: "vertical", title: "price by region" },
    });
    expect(selectChart({ x: "price", y: "region" }, classification)).toEqual({
      status: "chart",
      spec: { family: "box", category: "region", value: "price", orientation: "horizontal", title: "price by region" },
    });
  });

  it("puts time on the x axis of a line chart", () => {
    const expected = { status: "chart", spec: { family: "line", x: "day", y: "qty", title: "qty over day" } };
    expect(selectChart({ x: "day", y: "qty" }, classification)).toEqual(expected);
    expect(selectChart({ x: "qty", y: "day" }, classification)).toEqual(expected);
  });

  it("falls back to split counts for two categorical columns", () => {
    expect(selectChart({ x: "region", y: "segment" }, classification)).toEqual({
      status: "chart",
      spec: { family: "frequency", column: "region", color: "segment", title: "Count of region by segment" },
      notice: '"region" and "segment" are both categorical; showing counts of region split by segment.',
    });
  });

  it("explains pairs it cannot plot", () => {
    expect(selectChart({ x: "region", y: "day" }, classification)).toEqual({
      status: "unavailable",
      reason: "incompatible-types",
      message: '"region" (categorical) and "day" (temporal) cannot be plotted against each other.',
    });
    expect(selectChart({ x: "weight" }, classification)).toEqual({
      status: "unavailable",
      reason: "missing-columns",
      message: 'Column "weight" is not in the dataset.',
    });
  });
});

describe("correlationChart", () => {
  it("needs two numeric columns", () => {
    expect(correlationChart({ ...classification, numeric: ["price"] })).toEqual({
      status: "unavailable",
      reason: "insufficient-columns",
      message: "Correlation needs at least two numeric columns (found 1).",
    });
    expect(correlationChart(classification)).toEqual({
      status: "chart",
      spec: { family: "correlation", columns: ["price", "qty"], title: "Correlation matrix" },
    });
  });
});

describe("builders", () => {
  const at = (d: number, h = 0) => new Date(Date.UTC(2024, 0, d, h));
  const sales: Table = {
    columns: ["region", "price", "qty", "day"],
    rows: [
      { region: "north", price: 1, qty: 10, day: at(1, 5) },
      { region: "south", price: 2, qty: 20, day: at(2) },
      { region: "north", price: 3, qty: 30, day: at(1, 20) },
      { region: null, price: 4, qty: 40, day: at(3) },
      { region: "north", price: 5, qty: null, day: null },
    ],
  };

  it("counts values with nulls apart", () => {
    expect(buildFrequency(sales, "region")).toEqual({
      bars: [{ name: "north", count: 3 }, { name: "south", count: 1 }],
      nulls: 1,
    });
  });

  it("counts per calendar day", () => {
    expect(buildFrequency(sales, "day", true)).toEqual({
      bars: [{ name: "2024-01-01", count: 2 }, { name: "2024-01-02", count: 1 }, { name: "2024-01-03", count: 1 }],
      nulls: 1,
    });
  });

  it("splits box plots into stacked segments", () => {
    const table: Table = {
      columns: ["g", "v"],
      rows: [1, 2, 3, 4, 5].map(v => ({ g: "a", v })),
    };
    expect(buildBoxData(table, "g", "v")).toEqual([{
      n: 5, min: 1, q1: 2, q2: 3, q3: 4, max: 5, whiskerLo: 1, whiskerHi: 5,
      name: "a", base: 1, lowerWhisker: 1, lowerBox: 1, upperBox: 1, upperWhisker: 1,
    }]);
  });

  it("orders line points by time", () => {
    expect(buildLineData(sales, "day", "qty")).toEqual([
      { x: at(1, 5).getTime(), y: 10 },
      { x: at(1, 20).getTime(), y: 30 },
      { x: at(2).getTime(), y: 20 },
      { x: at(3).getTime(), y: 40 },
    ]);
  });

  it("groups scatter points by color", () => {
    expect(buildScatterData(sales, "price", "qty", undefined, "region")).toEqual([
      { name: "north", points: [{ x: 1, y: 10, z: 1 }, { x: 3, y: 30, z: 1 }] },
      { name: "south", points: [{ x: 2, y: 20, z: 1 }] },
      { name: "(blank)", points: [{ x: 4, y: 40, z: 1 }] },
    ]);
  });

  it("sums bars per group and series", () => {
    const plants: Table = {
      columns: ["op", "cap", "tec"],
      rows: [
        { op: "A", cap: 10, tec: "S" },
        { op: "A", cap: 5, tec: "S" },
        { op: "A", cap: 7, tec: "W" },
        { op: "B", cap: 3, tec: "W" },
      ],
    };
    expect(buildGroupedBar(plants, "op", "cap", "tec")).toEqual({
      data: [{ name: "A", s0: 15, s1: 7 }, { name: "B", s1: 3 }],
      series: [{ key: "s0", label: "S" }, { key: "s1", label: "W" }],
    });
  });

  it("keeps the bar label when a series value is called name", () => {
    const t: Table = { columns: ["a", "b", "n"], rows: [{ a: "x", b: "name", n: 2 }] };
    expect(buildStackedFrequency(t, "a", "b")).toEqual({
      data: [{ name: "x", s0: 1 }],
      series: [{ key: "s0", label: "name" }],
    });
    expect(buildGroupedBar(t, "a", "n", "b")).toEqual({
      data: [{ name: "x", s0: 2 }],
      series: [{ key: "s0", label: "name" }],
    });
  });

  it("bins a column of 300 000 values", () => {
    const rows = Array.from({ length: 300_000 }, (_, i) => ({ v: i % 997 }));
    const data = buildHistData({ columns: ["v"], rows }, "v", 20);
    expect(data).toHaveLength(20);
    expect(data[0].bin).toBeCloseTo(24.9, 10);
    expect(data.reduce((n, d) => n + d.count, 0)).toBe(300_000);
  });

  it("sorts donut slices by size", () => {
    const t: Table = { columns: ["e"], rows: [{ e: "Plan" }, { e: "Op" }, { e: "Op" }] };
    expect(buildDonut(t, "e")).toEqual([{ name: "Op", value: 2 }, { name: "Plan", value: 1 }]);
  });

  it("flattens the correlation matrix into cells", () => {
    const { data } = buildCorrelation(sales, ["price", "qty"]);
    expect(data.map(d => [d.x, d.y, d.r])).toEqual([
      ["price", "price", 1],
      ["price", "qty", 1],
      ["qty", "price", 1],
      ["qty", "qty", 1],
    ]);
  });
});
