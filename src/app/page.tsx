// src/app/page.tsx
"use client";

import { useMemo, useState } from "react";

import type { DatasetProfile, LoadError, LoadResult, Selection } from "@/lib/types";
import { ACCEPTED_EXTENSIONS } from "@/lib/load";
import { profileTable } from "@/lib/stats";
import { selectChart } from "@/lib/charts";
import {
  computeDashboard, defaultSelection, loadDataset, switchProfile, type LoadedDataset, type Upload,
} from "@/lib/dashboard";
import { createLogger } from "@/lib/log";
import { describeError } from "@/lib/errors";

import { ChartView, numFmt } from "@/components/ChartView";
import { KpiCards } from "@/components/KpiCards";
import { DataTable, PREVIEW_ROWS } from "@/components/DataTable";
import { FilterPanel } from "@/components/FilterPanel";
import { AdvisorPanel } from "@/components/AdvisorPanel";

const log = createLogger("page");

const GENERIC_TABS = ["Overview", "Distribution", "Relationships", "Correlation", "Ask AI"] as const;
const ENERGY_TABS = ["Overview", "Charts", "Data"] as const;
type TabKey = (typeof GENERIC_TABS)[number] | (typeof ENERGY_TABS)[number];

const SAMPLE_FILE = "/sample-data/energy-plants.csv";

function loadErrorText(error: LoadError) {
  return error.kind === "unsupported" ? error.message : `Could not load the file: ${error.message}`;
}

export default function Page() {
  const [profile, setProfile] = useState<DatasetProfile>("generic");
  const [upload, setUpload] = useState<Upload | null>(null);
  const [dataset, setDataset] = useState<LoadedDataset | null>(null);
  const [selection, setSelection] = useState<Selection>({});
  const [notices, setNotices] = useState<string[]>([]);
  const [loadError, setLoadError] = useState<string>("");
  const [active, setActive] = useState<TabKey>("Overview");
  const [toast, setToast] = useState<string>("");
  const [dzHover, setDzHover] = useState(false);

  // Distribution / Relationships choices
  const [distCol, setDistCol] = useState("");
  const [axes, setAxes] = useState({ x: "", y: "", color: "", size: "" });

  function showToast(msg: string) { setToast(msg); setTimeout(() => setToast(""), 2600); }

  function ingest(next: Upload, result: LoadResult<LoadedDataset>): boolean {
    if (!result.ok) {
      // the previous dataset stays on screen
      log.warn(`load of ${next.name} failed (${result.error.kind})`);
      setLoadError(loadErrorText(result.error));
      showToast("Load failed");
      return false;
    }
    const ds = result.value;
    setUpload(next);
    setDataset(ds);
    setSelection(defaultSelection(ds));
    setNotices(result.notices);
    setLoadError("");
    setActive("Overview");
    setDistCol(ds.table.columns[0] ?? "");
    setAxes({ x: ds.table.columns[0] ?? "", y: "", color: "", size: "" });
    showToast(`Loaded ${ds.table.rows.length} rows × ${ds.table.columns.length} columns`);
    return true;
  }

  function load(next: Upload, nextProfile: DatasetProfile) {
    return ingest(next, loadDataset(next.name, next.data, nextProfile));
  }

  async function loadFileInput(file: File) {
    try {
      const buf = await file.arrayBuffer();
      load({ name: file.name, data: new Uint8Array(buf) }, profile);
    } catch (e) {
      log.error("reading upload failed", describeError(e));
      setLoadError(`Could not read ${file.name}: ${describeError(e)}`);
    }
  }

  async function loadSample() {
    try {
      const res = await fetch(SAMPLE_FILE, { cache: "no-store" });
      const buf = await res.arrayBuffer();
      if (load({ name: "energy-plants.csv", data: new Uint8Array(buf) }, "energy")) setProfile("energy");
    } catch (e) {
      log.error("sample load failed", describeError(e));
      setLoadError(`Could not load the sample dataset: ${describeError(e)}`);
    }
  }

  function changeProfile(next: DatasetProfile) {
    const switched = switchProfile(profile, next, upload);
    if (upload && switched.result) ingest(upload, switched.result);
    setProfile(switched.profile);
  }

  function clearAll() {
    setUpload(null); setDataset(null); setSelection({}); setNotices([]); setLoadError(""); setActive("Overview");
  }

  const view = useMemo(() => (dataset ? computeDashboard(dataset, selection) : null), [dataset, selection]);
  const profileRows = useMemo(
    () => (dataset && view?.status === "ready" ? profileTable(view.table, dataset.classification) : []),
    [dataset, view],
  );

  const tabs: readonly TabKey[] = dataset?.profile === "energy" ? ENERGY_TABS : GENERIC_TABS;

  return (
    <div className="grid gap-6 lg:grid-cols-[300px_1fr]">
      {/* Sidebar */}
      <aside className="card p-5 space-y-5 h-fit">
        <div className="space-y-2">
          <h3 className="section-title">Dataset</h3>
          <div className="tabs">
            {(["generic", "energy"] as const).map((p) => (
              <button key={p} className="tab" data-active={profile === p} onClick={() => changeProfile(p)}>
                {p === "generic" ? "Any table" : "Energy plants"}
              </button>
            ))}
          </div>
          <div
            className="dropzone"
            data-hover={dzHover}
            onDragOver={(e) => { e.preventDefault(); setDzHover(true); }}
            onDragLeave={() => setDzHover(false)}
            onDrop={(e) => {
              e.preventDefault(); setDzHover(false);
              const f = e.dataTransfer.files?.[0];
              if (f) void loadFileInput(f);
            }}
          >
            <div className="space-y-2">
              <p className="text-sm opacity-90">Drag & drop a file here</p>
              <p className="text-xs small-muted">{ACCEPTED_EXTENSIONS}</p>
              <label className="btn cursor-pointer">
                Browse
                <input
                  type="file"
                  accept={ACCEPTED_EXTENSIONS}
                  hidden
                  onChange={(e) => { const f = e.target.files?.[0]; if (f) void loadFileInput(f); }}
                />
              </label>
              {upload && <div className="file-pill" title={upload.name}>{upload.name}</div>}
            </div>
          </div>
          <div className="flex gap-2">
            <button className="btn" onClick={() => void loadSample()}>Sample dataset</button>
            <button className="btn" onClick={clearAll}>Reset</button>
          </div>
        </div>

        {dataset && <FilterPanel dataset={dataset} selection={selection} onChange={setSelection} />}
      </aside>

      <div className="space-y-6">
        {loadError && <div className="notice notice-error">{loadError}</div>}
        {notices.map((n) => <div key={n} className="notice notice-warn">{n}</div>)}

        {!dataset && (
          <section className="card p-8 text-center">
            <h2 className="section-title mb-2">Upload a dataset to begin</h2>
            <p className="small-muted">CSV, TSV, TXT or Excel. Columns are typed automatically and charts follow the column types.</p>
          </section>
        )}

        {dataset && view?.status === "empty-selection" && (
          <div className="notice notice-warn">{view.message}</div>
        )}

        {dataset && view?.status === "ready" && (
          <>
            <nav className="tabs sticky top-4 z-10">
              {tabs.map((t) => (
                <button key={t} className="tab" data-active={active === t} onClick={() => setActive(t)}>{t}</button>
              ))}
              <p className="ml-auto self-center text-xs small-muted">
                {view.table.rows.length} of {dataset.table.rows.length} rows
              </p>
            </nav>

            {active === "Overview" && (
              <section className="card p-5 space-y-4">
                <KpiCards kpis={view.kpis} />
                {dataset.profile === "generic" && (
                  <div className="table-wrap">
                    <table className="min-w-full text-sm">
                      <thead>
                        <tr className="bg-white/5">
                          {["Column", "Type", "Missing", "Distinct", "Mean", "Median", "Min", "Max"].map((h) => (
                            <th key={h} className="border px-3 py-2 text-left font-medium text-white/95">{h}</th>
                          ))}
                        </tr>
                      </thead>
                      <tbody>
                        {profileRows.map((p) => (
                          <tr key={p.name} className="odd:bg-white/0 even:bg-white/5">
                            <td className="border px-3 py-2">{p.name}</td>
                            <td className="border px-3 py-2">{p.kind}</td>
                            <td className="border px-3 py-2">{p.missing} ({p.missingPct}%)</td>
                            <td className="border px-3 py-2">{p.distinct}</td>
                            <td className="border px-3 py-2">{p.numeric ? numFmt(p.numeric.mean) : ""}</td>
                            <td className="border px-3 py-2">{p.numeric ? numFmt(p.numeric.median) : ""}</td>
                            <td className="border px-3 py-2">{p.numeric ? numFmt(p.numeric.min) : ""}</td>
                            <td className="border px-3 py-2">{p.numeric ? numFmt(p.numeric.max) : ""}</td>
                          </tr>
                        ))}
                      </tbody>
                    </table>
                  </div>
                )}
                {dataset.profile === "generic" && (
                  <>
                    <p className="text-sm small-muted">First {PREVIEW_ROWS} filtered rows</p>
                    <DataTable table={view.table} />
                  </>
                )}
              </section>
            )}

            {active === "Distribution" && (
              <section className="card p-5 space-y-4">
                <ColumnSelect label="Column" value={distCol} columns={dataset.table.columns} onChange={setDistCol} />
                {distCol && <ChartView table={view.table} decision={selectChart({ x: distCol }, dataset.classification)} />}
              </section>
            )}

            {active === "Relationships" && (
              <section className="card p-5 space-y-4">
                <div className="grid gap-3 md:grid-cols-4">
                  <ColumnSelect label="X" value={axes.x} columns={dataset.table.columns} onChange={(x) => setAxes({ ...axes, x })} />
                  <ColumnSelect label="Y" value={axes.y} columns={dataset.table.columns} optional onChange={(y) => setAxes({ ...axes, y })} />
                  <ColumnSelect label="Color" value={axes.color} columns={dataset.table.columns} optional onChange={(color) => setAxes({ ...axes, color })} />
                  <ColumnSelect label="Size" value={axes.size} columns={dataset.classification.numeric} optional onChange={(size) => setAxes({ ...axes, size })} />
                </div>
                {axes.x && <ChartView table={view.table} decision={selectChart(axes, dataset.classification)} />}
              </section>
            )}

            {(active === "Correlation" || active === "Charts") && (
              <section className="card p-5 space-y-4">
                {view.charts.map((d, i) => <ChartView key={i} table={view.table} decision={d} />)}
              </section>
            )}

            {active === "Ask AI" && <AdvisorPanel table={view.table} classification={dataset.classification} />}

            {active === "Data" && (
              <section className="card p-5 space-y-2">
                <p className="text-sm small-muted">First {PREVIEW_ROWS} filtered rows</p>
                <DataTable table={view.table} />
              </section>
            )}
          </>
        )}
      </div>

      {toast && <div className="toast">{toast}</div>}
    </div>
  );
}

function ColumnSelect({ label, value, columns, optional = false, onChange }: {
  label: string;
  value: string;
  columns: string[];
  optional?: boolean;
  onChange: (v: string) => void;
}) {
  return (
    <label className="grid gap-1 text-sm">
      <span className="font-medium">{label}</span>
      <select className="input" value={value} onChange={(e) => onChange(e.target.value)}>
        {optional && <option value="">(none)</option>}
        {columns.map((c) => <option key={c} value={c}>{c}</option>)}
      </select>
    </label>
  );
}
