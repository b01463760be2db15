import type { Kpi } from "@/lib/types";

export function KpiCards({ kpis }: { kpis: Kpi[] }) {
  return (
    <div className="grid gap-3 sm:grid-cols-2 lg:grid-cols-4">
      {kpis.map((k) => (
        <div key={k.key} className="rounded-xl border border-white/15 bg-white/5 p-4">
          <p className="text-xs small-muted">{k.label}</p>
          <p className="mt-1 text-2xl font-semibold text-white" title={k.available ? undefined : "column not in the dataset"}>
            {k.display}
          </p>
        </div>
      ))}
    </div>
  );
}
