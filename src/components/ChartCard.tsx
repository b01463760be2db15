"use client";

import { useRef } from "react";
import html2canvas from "html2canvas";

import { createLogger } from "@/lib/log";
import { describeError } from "@/lib/errors";

const log = createLogger("chart-card");

export function ChartCard({ title, children, height = 340 }: { title: string; children: React.ReactNode; height?: number }) {
  const ref = useRef<HTMLDivElement>(null);
  async function exportPNG() {
    if (!ref.current) return;
    try {
      const canvas = await html2canvas(ref.current);
      const link = document.createElement("a");
      link.download = `${title.replace(/\s+/g, "_")}.png`;
      link.href = canvas.toDataURL();
      link.click();
    } catch (e) {
      log.error("PNG export failed", describeError(e));
    }
  }
  return (
    <div className="rounded-xl border border-white/15 bg-white/5 p-3 space-y-2">
      <div className="flex items-center justify-between">
        <p className="text-sm font-medium text-white/90">{title}</p>
        <button className="btn text-xs" onClick={() => void exportPNG()}>Export PNG</button>
      </div>
      <div ref={ref} style={{ width: "100%", height }}>{children}</div>
    </div>
  );
}
