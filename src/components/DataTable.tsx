import type { Table } from "@/lib/types";
import { formatValue } from "@/lib/filters";

export const PREVIEW_ROWS = 50;

export function DataTable({ table, limit = PREVIEW_ROWS }: { table: Table; limit?: number }) {
  return (
    <div className="table-wrap">
      <table className="min-w-full text-sm">
        <thead className="sticky top-0 z-10">
          <tr className="bg-white/5 backdrop-blur">
            {table.columns.map((c) => (
              <th key={c} className="border px-3 py-2 text-left font-medium text-white/95">{c}</th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.slice(0, limit).map((row, i) => (
            <tr key={i} className="odd:bg-white/0 even:bg-white/5">
              {table.columns.map((c) => {
                const v = row[c] ?? null;
                return <td key={c} className="border px-3 py-2 text-white/90">{v === null ? "" : formatValue(v)}</td>;
              })}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
