"use client";

import type { Filter, Scalar, Selection } from "@/lib/types";
import type { LoadedDataset } from "@/lib/dashboard";
import { formatValue, withFilter } from "@/lib/filters";
import { parseDateValue, valueKey } from "@/lib/stats";

const DAY_MS = 86_400_000;

function toNumber(s: string): number | null {
  const n = Number(s);
  return s.trim() === "" || !Number.isFinite(n) ? null : n;
}

function toDay(s: string, endOfDay: boolean): Date | null {
  const d = s ? parseDateValue(s) : null;
  if (!d) return null;
  return endOfDay ? new Date(d.getTime() + DAY_MS - 1) : d;
}

function dayInput(d: Date | null) {
  return d ? d.toISOString().slice(0, 10) : "";
}

function ValueList({ column, options, filter, onChange }: {
  column: string;
  options: Scalar[];
  filter: Filter | undefined;
  onChange: (f: Filter | null) => void;
}) {
  // no filter yet means every value is admitted
  const chosen = filter?.kind === "in" ? new Set(filter.values.map(valueKey)) : new Set(options.map(valueKey));
  function toggle(v: Scalar) {
    const k = valueKey(v);
    const next = options.filter(o => (valueKey(o) === k ? !chosen.has(k) : chosen.has(valueKey(o))));
    onChange({ kind: "in", values: next });
  }
  return (
    <div className="space-y-1">
      <div className="flex items-center justify-between">
        <p className="text-sm font-medium">{column}</p>
        <div className="flex gap-1">
          <button className="btn text-xs" onClick={() => onChange({ kind: "in", values: [...options] })}>All</button>
          <button className="btn text-xs" onClick={() => onChange({ kind: "in", values: [] })}>None</button>
        </div>
      </div>
      <div className="max-h-40 overflow-auto rounded-lg border border-white/10 p-2">
        {options.map((o) => {
          const k = valueKey(o);
          return (
            <label key={k} className="flex items-center gap-2 text-xs">
              <input type="checkbox" checked={chosen.has(k)} onChange={() => toggle(o)} />
              {formatValue(o)}
            </label>
          );
        })}
      </div>
    </div>
  );
}

function RangeInputs({ column, filter, onChange }: { column: string; filter: Filter | undefined; onChange: (f: Filter | null) => void }) {
  const min = filter?.kind === "range" ? filter.min : null;
  const max = filter?.kind === "range" ? filter.max : null;
  function update(nextMin: number | null, nextMax: number | null) {
    onChange(nextMin === null && nextMax === null ? null : { kind: "range", min: nextMin, max: nextMax });
  }
  return (
    <div className="space-y-1">
      <p className="text-sm font-medium">{column}</p>
      <div className="flex gap-2">
        <input className="input w-full text-xs" type="number" placeholder="min" value={min ?? ""} onChange={(e) => update(toNumber(e.target.value), max)} />
        <input className="input w-full text-xs" type="number" placeholder="max" value={max ?? ""} onChange={(e) => update(min, toNumber(e.target.value))} />
      </div>
    </div>
  );
}

function DateInputs({ column, filter, onChange }: { column: string; filter: Filter | undefined; onChange: (f: Filter | null) => void }) {
  const from = filter?.kind === "dateRange" ? filter.from : null;
  const to = filter?.kind === "dateRange" ? filter.to : null;
  function update(nextFrom: Date | null, nextTo: Date | null) {
    onChange(nextFrom === null && nextTo === null ? null : { kind: "dateRange", from: nextFrom, to: nextTo });
  }
  return (
    <div className="space-y-1">
      <p className="text-sm font-medium">{column}</p>
      <div className="flex gap-2">
        <input className="input w-full text-xs" type="date" value={dayInput(from)} onChange={(e) => update(toDay(e.target.value, false), to)} />
        <input className="input w-full text-xs" type="date" value={dayInput(to)} onChange={(e) => update(from, toDay(e.target.value, true))} />
      </div>
    </div>
  );
}

export function FilterPanel({ dataset, selection, onChange }: {
  dataset: LoadedDataset;
  selection: Selection;
  onChange: (next: Selection) => void;
}) {
  const set = (column: string) => (f: Filter | null) => onChange(withFilter(selection, column, f));
  const numeric = dataset.profile === "generic" ? dataset.classification.numeric : [];
  return (
    <div className="space-y-4">
      <div className="flex items-center justify-between">
        <h3 className="section-title">Filters</h3>
        <button className="btn text-xs" onClick={() => onChange({})}>Clear</button>
      </div>
      {Object.entries(dataset.options).map(([c, options]) => (
        <ValueList key={c} column={c} options={options} filter={selection[c]} onChange={set(c)} />
      ))}
      {numeric.map((c) => <RangeInputs key={c} column={c} filter={selection[c]} onChange={set(c)} />)}
      {dataset.classification.temporal.map((c) => <DateInputs key={c} column={c} filter={selection[c]} onChange={set(c)} />)}
    </div>
  );
}
