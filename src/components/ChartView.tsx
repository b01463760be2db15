"use client";

import {
  ResponsiveContainer, BarChart, Bar, XAxis, YAxis, ZAxis, Tooltip, CartesianGrid, Legend,
  ScatterChart, Scatter, LineChart, Line, PieChart, Pie, Cell, Brush,
} from "recharts";

import type { Table, ChartDecision, ChartSpec } from "@/lib/types";
import {
  buildFrequency, buildStackedFrequency, buildHistData, buildBoxSummary, buildBoxData,
  buildScatterData, buildLineData, buildGroupedBar, buildDonut, buildCorrelation, type BoxRow,
} from "@/lib/charts";
import { ChartCard } from "./ChartCard";

/* ------------------------- formatting ------------------------- */
export const numFmt = (v: number) => {
  if (v === null || v === undefined || !Number.isFinite(v)) return "";
  const abs = Math.abs(v);
  if (abs >= 1_000_000) return (v / 1_000_000).toFixed(1).replace(/\.0$/, "") + "M";
  if (abs >= 1_000) return (v / 1_000).toFixed(1).replace(/\.0$/, "") + "k";
  return String(Math.round(v * 100) / 100);
};
const dateFmt = (v: number) => {
  const d = new Date(v);
  return Number.isNaN(d.getTime()) ? String(v) : d.toISOString().slice(0, 10);
};

const axisTick = { fill: "#e5e7eb", fontSize: 12 };
const axisStroke = "rgba(255,255,255,0.25)";
const gridStroke = "rgba(255,255,255,0.12)";
const tooltipStyle = { background: "#0f172a", border: "1px solid rgba(255,255,255,0.15)", color: "#fff" };
const axis = { tick: axisTick, axisLine: { stroke: axisStroke }, tickLine: { stroke: axisStroke } };
const margin = { top: 10, right: 20, bottom: 20, left: 10 };

export const palette = ["#60a5fa", "#a78bfa", "#34d399", "#f472b6", "#f59e0b", "#22d3ee", "#f87171", "#93c5fd"];

/* ------------------------- box plot ------------------------- */
function isBoxRow(v: unknown): v is BoxRow {
  return typeof v === "object" && v !== null && "q1" in v && "q3" in v && "name" in v;
}

function BoxTooltip({ active, payload }: { active?: boolean; payload?: { payload?: unknown }[] }) {
  const row: unknown = payload?.[0]?.payload;
  if (!active || !isBoxRow(row)) return null;
  return (
    <div className="rounded-lg p-2 text-xs" style={tooltipStyle}>
      <p className="font-medium">{row.name} (n={row.n})</p>
      <p>Q1 {numFmt(row.q1)} · median {numFmt(row.q2)} · Q3 {numFmt(row.q3)}</p>
      <p>whiskers {numFmt(row.whiskerLo)} – {numFmt(row.whiskerHi)}</p>
    </div>
  );
}

function BoxChart({ table, spec }: { table: Table; spec: Extract<ChartSpec, { family: "box" }> }) {
  const data = buildBoxData(table, spec.category, spec.value);
  const horizontal = spec.orientation === "horizontal";
  const segments: [keyof BoxRow, string][] = [
    ["base", "transparent"],
    ["lowerWhisker", "#94a3b855"],
    ["lowerBox", "#60a5fa"],
    ["upperBox", "#3b82f6"],
    ["upperWhisker", "#94a3b855"],
  ];
  return (
    <ResponsiveContainer>
      <BarChart data={data} layout={horizontal ? "vertical" : "horizontal"} margin={margin}>
        <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
        {horizontal ? (
          <>
            <XAxis type="number" {...axis} tickFormatter={numFmt} domain={["auto", "auto"]} />
            <YAxis type="category" dataKey="name" {...axis} width={100} />
          </>
        ) : (
          <>
            <XAxis type="category" dataKey="name" {...axis} />
            <YAxis type="number" {...axis} tickFormatter={numFmt} domain={["auto", "auto"]} />
          </>
        )}
        <Tooltip content={<BoxTooltip />} />
        {segments.map(([key, fill]) => <Bar key={key} dataKey={key} stackId="box" fill={fill} isAnimationActive={false} />)}
      </BarChart>
    </ResponsiveContainer>
  );
}

/* ------------------------- chart bodies ------------------------- */
function ChartBody({ table, spec }: { table: Table; spec: ChartSpec }) {
  switch (spec.family) {
    case "histogram": {
      const data = buildHistData(table, spec.column, spec.bins);
      const s = buildBoxSummary(table, spec.column);
      return (
        <ChartCard title={spec.title} height={380}>
          <ResponsiveContainer height="85%">
            <BarChart data={data} margin={margin}>
              <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
              <XAxis dataKey="bin" {...axis} tickFormatter={numFmt} />
              <YAxis {...axis} tickFormatter={numFmt} />
              <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(Number(v)), "count"]} labelFormatter={(l) => numFmt(Number(l))} />
              <Bar dataKey="count" fill="#34d399" />
            </BarChart>
          </ResponsiveContainer>
          {s ? (
            <p className="text-xs text-white/80">
              Box: min {numFmt(s.min)} · Q1 {numFmt(s.q1)} · median {numFmt(s.q2)} · Q3 {numFmt(s.q3)} · max {numFmt(s.max)}
              {" "}(whiskers {numFmt(s.whiskerLo)} – {numFmt(s.whiskerHi)})
            </p>
          ) : <p className="text-xs">Not enough data</p>}
        </ChartCard>
      );
    }
    case "frequency": {
      if (spec.color) {
        const { data, series } = buildStackedFrequency(table, spec.column, spec.color);
        return (
          <ChartCard title={spec.title}>
            <ResponsiveContainer>
              <BarChart data={data} margin={margin}>
                <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
                <XAxis dataKey="name" {...axis} />
                <YAxis {...axis} tickFormatter={numFmt} />
                <Tooltip contentStyle={tooltipStyle} />
                <Legend />
                {series.map((s, i) => <Bar key={s.key} dataKey={s.key} name={s.label} stackId="count" fill={palette[i % palette.length]} />)}
              </BarChart>
            </ResponsiveContainer>
          </ChartCard>
        );
      }
      const { bars, nulls } = buildFrequency(table, spec.column, spec.byDay ?? false);
      return (
        <ChartCard title={spec.title}>
          <ResponsiveContainer height={nulls ? "92%" : "100%"}>
            <BarChart data={bars} margin={margin}>
              <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
              <XAxis dataKey="name" {...axis} />
              <YAxis {...axis} tickFormatter={numFmt} allowDecimals={false} />
              <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(Number(v)), "count"]} />
              {bars.length > 20 && <Brush dataKey="name" height={20} stroke="#8884d8" />}
              <Bar dataKey="count" fill="#60a5fa" />
            </BarChart>
          </ResponsiveContainer>
          {nulls > 0 && <p className="text-xs small-muted">{nulls} blank value(s) not shown.</p>}
        </ChartCard>
      );
    }
    case "scatter":
    case "groupedBar":
    case "line":
    case "donut":
    case "box":
    case "correlation":
      return <XYChartBody table={table} spec={spec} />;
  }
}

function XYChartBody({ table, spec }: { table: Table; spec: Exclude<ChartSpec, { family: "histogram" | "frequency" }> }) {
  switch (spec.family) {
    case "scatter": {
      const series = buildScatterData(table, spec.x, spec.y, spec.size, spec.color);
      return (
        <ChartCard title={spec.title}>
          <ResponsiveContainer>
            <ScatterChart margin={margin}>
              <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
              <XAxis type="number" dataKey="x" name={spec.x} {...axis} tickFormatter={numFmt} domain={["auto", "auto"]} />
              <YAxis type="number" dataKey="y" name={spec.y} {...axis} tickFormatter={numFmt} domain={["auto", "auto"]} />
              <ZAxis type="number" dataKey="z" name={spec.size ?? "size"} range={spec.size ? [40, 400] : [60, 60]} />
              <Tooltip contentStyle={tooltipStyle} formatter={(v, name) => [numFmt(Number(v)), String(name)]} />
              {spec.color && <Legend />}
              {series.map((s, i) => <Scatter key={s.name} name={s.name} data={s.points} fill={palette[i % palette.length]} />)}
            </ScatterChart>
          </ResponsiveContainer>
        </ChartCard>
      );
    }
    case "box":
      return <ChartCard title={spec.title}><BoxChart table={table} spec={spec} /></ChartCard>;
    case "line": {
      const data = buildLineData(table, spec.x, spec.y);
      return (
        <ChartCard title={spec.title}>
          <ResponsiveContainer>
            <LineChart data={data} margin={margin}>
              <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
              <XAxis type="number" dataKey="x" {...axis} tickFormatter={dateFmt} domain={["dataMin", "dataMax"]} />
              <YAxis {...axis} tickFormatter={numFmt} domain={["auto", "auto"]} />
              <Tooltip labelFormatter={(l) => dateFmt(Number(l))} contentStyle={tooltipStyle} formatter={(v) => [numFmt(Number(v)), spec.y]} />
              <Brush dataKey="x" height={20} stroke="#8884d8" tickFormatter={dateFmt} />
              <Line type="monotone" dataKey="y" stroke="#93c5fd" dot={false} />
            </LineChart>
          </ResponsiveContainer>
        </ChartCard>
      );
    }
    case "groupedBar": {
      const { data, series } = buildGroupedBar(table, spec.x, spec.y, spec.color);
      return (
        <ChartCard title={spec.title}>
          <ResponsiveContainer>
            <BarChart data={data} margin={margin}>
              <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
              <XAxis dataKey="name" {...axis} />
              <YAxis {...axis} tickFormatter={numFmt} />
              <Tooltip contentStyle={tooltipStyle} formatter={(v, name) => [numFmt(Number(v)), String(name)]} />
              <Legend />
              {series.map((s, i) => <Bar key={s.key} dataKey={s.key} name={s.label} fill={palette[i % palette.length]} />)}
            </BarChart>
          </ResponsiveContainer>
        </ChartCard>
      );
    }
    case "donut": {
      const pieData = buildDonut(table, spec.names);
      return (
        <ChartCard title={spec.title}>
          <ResponsiveContainer>
            <PieChart>
              <Pie data={pieData} dataKey="value" nameKey="name" innerRadius={60} outerRadius={100} stroke="none">
                {pieData.map((_, i) => <Cell key={i} fill={palette[i % palette.length]} />)}
              </Pie>
              <Tooltip contentStyle={tooltipStyle} formatter={(v, n) => [numFmt(Number(v)), String(n)]} />
              <Legend />
            </PieChart>
          </ResponsiveContainer>
        </ChartCard>
      );
    }
    case "correlation": {
      const hm = buildCorrelation(table, spec.columns);
      return (
        <div className="rounded-xl border border-white/15 bg-white/5 p-3 overflow-auto">
          <p className="mb-2 text-sm font-medium text-white/90">{spec.title}</p>
          <table className="text-xs border-collapse">
            <thead>
              <tr>
                <th className="p-1 text-white/90"></th>
                {hm.cols.map(c => <th key={c} className="p-1 text-left text-white/90">{c}</th>)}
              </tr>
            </thead>
            <tbody>
              {hm.cols.map((rowC, i) => (
                <tr key={rowC}>
                  <th className="p-1 text-left text-white/90">{rowC}</th>
                  {hm.cols.map((colC, j) => {
                    const r = hm.data[i * hm.cols.length + j].r;
                    if (r === null) return <td key={colC} className="p-2 border text-white/50" title="not enough paired values">—</td>;
                    const intensity = Math.round(Math.abs(r) * 255);
                    const bg = `rgb(${r >= 0 ? 32 + intensity / 4 : 32}, ${32 + (255 - intensity) / 4}, ${r >= 0 ? 32 : 32 + intensity / 4})`;
                    return (
                      <td key={colC} className="p-2 border text-white/90" title={`r=${r.toFixed(2)}`} style={{ background: bg }}>
                        {r.toFixed(2)}
                      </td>
                    );
                  })}
                </tr>
              ))}
            </tbody>
          </table>
        </div>
      );
    }
  }
}

/** Renders a chart decision: the chart itself, or the reason there is none. */
export function ChartView({ table, decision }: { table: Table; decision: ChartDecision }) {
  if (decision.status === "unavailable") {
    return <div className="notice notice-info">{decision.message}</div>;
  }
  return (
    <div className="space-y-2">
      {decision.notice && <div className="notice notice-info">{decision.notice}</div>}
      <ChartBody table={table} spec={decision.spec} />
    </div>
  );
}
