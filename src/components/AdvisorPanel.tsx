"use client";

import { useEffect, useState } from "react";

import type { Table, ColumnClassification } from "@/lib/types";
import type { AdvisorResult } from "@/lib/advisor";
import { describeTable } from "@/lib/insights";
import { fetchAdvisorStatus, requestAdvice, type AdvisorStatus } from "@/lib/advisorClient";
import { createLogger } from "@/lib/log";
import { describeError } from "@/lib/errors";

const log = createLogger("advisor-panel");

export function AdvisorPanel({ table, classification }: { table: Table; classification: ColumnClassification }) {
  const [status, setStatus] = useState<AdvisorStatus | null>(null);
  const [question, setQuestion] = useState("");
  const [apiKey, setApiKey] = useState("");
  const [loading, setLoading] = useState(false);
  const [result, setResult] = useState<AdvisorResult | null>(null);

  useEffect(() => {
    let live = true;
    void fetchAdvisorStatus()
      .then((s) => { if (live) setStatus(s); })
      .catch((e: unknown) => {
        log.warn("status check failed", describeError(e));
        if (live) setStatus({ serverKey: false, model: "" });
      });
    return () => { live = false; };
  }, []);

  const disabled = status !== null && !status.serverKey && !apiKey.trim();

  async function ask() {
    setLoading(true);
    try {
      const summary = describeTable(table, classification);
      setResult(await requestAdvice({ question, columns: table.columns, summary, apiKey: apiKey.trim() || null }));
    } catch (e) {
      log.error("asking the advisor failed", describeError(e));
      setResult({ status: "error", kind: "unknown", message: `Unexpected error: ${describeError(e)}` });
    } finally {
      setLoading(false);
    }
  }

  return (
    <section className="card p-5 space-y-3">
      <h2 className="section-title">Ask AI about this data</h2>
      <p className="text-xs small-muted">
        Only a statistical summary of the filtered rows is sent{status?.model ? ` to ${status.model}` : ""}; raw rows stay in the browser.
      </p>

      {status && !status.serverKey && (
        <div className="space-y-1">
          <label className="text-sm font-medium" htmlFor="advisor-key">API key</label>
          <input
            id="advisor-key"
            className="input w-full"
            type="password"
            autoComplete="off"
            placeholder="Paste an API key"
            value={apiKey}
            onChange={(e) => setApiKey(e.target.value)}
          />
          {!apiKey.trim() && <div className="notice notice-info">No API key configured on the server. Paste one to enable AI answers.</div>}
        </div>
      )}

      <textarea
        className="input h-24 w-full text-sm"
        placeholder="e.g. Which columns look related, and what should I check next?"
        value={question}
        onChange={(e) => setQuestion(e.target.value)}
      />
      <button className="btn btn-primary" disabled={loading || disabled || !question.trim()} onClick={() => void ask()}>
        {loading ? "Thinking…" : "Ask"}
      </button>

      {result?.status === "ok" && (
        <div className="rounded-xl border border-white/15 bg-white/5 p-4">
          <p className="whitespace-pre-wrap text-sm text-white/90">{result.answer}</p>
          <p className="mt-2 text-xs small-muted">Answered by {result.model}</p>
        </div>
      )}
      {result?.status === "error" && (
        <div className={result.kind === "missing-credential" ? "notice notice-info" : "notice notice-error"}>{result.message}</div>
      )}
    </section>
  );
}
