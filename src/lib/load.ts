// src/lib/load.ts
import Papa from "papaparse";
import * as XLSX from "xlsx";

import type { Table, LoadResult, LoadError } from "./types";
import { coerceTable, type RawTable } from "./stats";

export const DELIMITED_EXTENSIONS = [".csv", ".tsv", ".txt"] as const;
export const SPREADSHEET_EXTENSIONS = [".xlsx", ".xls"] as const;
export const ACCEPTED_EXTENSIONS = [...DELIMITED_EXTENSIONS, ...SPREADSHEET_EXTENSIONS].join(",");

type FileKind = "delimited" | "spreadsheet";
type FileData = string | ArrayBuffer | Uint8Array;

const MAX_REPORTED_ROWS = 5;

function fail(error: LoadError): LoadResult<never> {
  return { ok: false, error };
}

export function extensionOf(name: string) {
  const dot = name.lastIndexOf(".");
  return dot >= 0 ? name.slice(dot).toLowerCase() : "";
}

export function fileKind(name: string): FileKind | null {
  const ext = extensionOf(name);
  if (DELIMITED_EXTENSIONS.some(e => e === ext)) return "delimited";
  if (SPREADSHEET_EXTENSIONS.some(e => e === ext)) return "spreadsheet";
  return null;
}

function asText(data: FileData): string {
  if (typeof data === "string") return data;
  return new TextDecoder("utf-8").decode(data);
}

function isBlank(v: unknown) {
  return v === null || v === undefined || (typeof v === "string" && v.trim() === "");
}

/** Header names the way a dataframe reader would give them: blanks named, duplicates suffixed. */
export function headerNames(cells: unknown[]): string[] {
  const seen = new Map<string, number>();
  return cells.map((cell, i) => {
    const base = isBlank(cell) ? `Unnamed: ${i}` : String(cell).trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

/** First row is the header; short rows are padded, rows with extra values are rejected. */
export function fromMatrix(name: string, matrix: unknown[][]): LoadResult<RawTable> {
  const headerRow = matrix[0] ?? [];
  let width = headerRow.length;
  while (width > 0 && isBlank(headerRow[width - 1])) width--;
  if (width === 0) return fail({ kind: "empty", message: `${name} has no header row.` });

  const columns = headerNames(headerRow.slice(0, width));
  const body = matrix.slice(1).filter(r => !r.every(isBlank));
  if (body.length === 0) return fail({ kind: "empty", message: `No rows found in ${name}.` });

  const tooLong: number[] = [];
  let padded = 0;
  const rows = body.map((cells, i) => {
    if (cells.slice(width).some(v => !isBlank(v))) tooLong.push(i + 1);
    if (cells.length < width) padded++;
    const row: Record<string, unknown> = {};
    columns.forEach((c, j) => { row[c] = j < cells.length ? cells[j] : null; });
    return row;
  });

  if (tooLong.length) {
    const shown = tooLong.slice(0, MAX_REPORTED_ROWS);
    const more = tooLong.length > shown.length ? ` and ${tooLong.length - shown.length} more` : "";
    return fail({
      kind: "parse",
      rows: tooLong,
      message: `Rows with more values than the header (${columns.length} columns): ${shown.join(", ")}${more}.`,
    });
  }

  const notices = padded ? [`${padded} row(s) had fewer values than the header; the missing cells were left empty.`] : [];
  return { ok: true, value: { columns, rows }, notices };
}

export function parseDelimited(name: string, text: string): LoadResult<RawTable> {
  const res = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), { skipEmptyLines: true });
  const quoteErrors = res.errors.filter(e => e.type === "Quotes");
  if (quoteErrors.length) {
    const rows = quoteErrors.map(e => (typeof e.row === "number" ? e.row : 0));
    return fail({ kind: "parse", rows, message: `Could not parse ${name}: ${quoteErrors[0].message}.` });
  }
  return fromMatrix(name, res.data);
}

export function parseSpreadsheet(name: string, data: ArrayBuffer | Uint8Array): LoadResult<RawTable> {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "array", cellDates: true });
  } catch (e) {
    return fail({ kind: "parse", message: `Could not read ${name}: ${e instanceof Error ? e.message : String(e)}` });
  }
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) return fail({ kind: "empty", message: `${name} contains no sheets.` });
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
  return fromMatrix(name, matrix);
}

/** Parses an uploaded file into a typed table. */
export function loadFile(name: string, data: FileData): LoadResult<Table> {
  const kind = fileKind(name);
  if (!kind) {
    const ext = extensionOf(name) || "(none)";
    return fail({ kind: "unsupported", message: `Unsupported file type ${ext}. Upload one of: ${ACCEPTED_EXTENSIONS}.` });
  }

  let parsed: LoadResult<RawTable>;
  if (kind === "delimited") {
    parsed = parseDelimited(name, asText(data));
  } else {
    if (typeof data === "string") return fail({ kind: "parse", message: `${name} must be read as binary data.` });
    parsed = parseSpreadsheet(name, data);
  }
  if (!parsed.ok) return parsed;
  return { ok: true, value: coerceTable(parsed.value), notices: parsed.notices };
}

/** Required columns missing from the table, in the order they are required. */
export function missingColumns(table: Table, required: readonly string[]): string[] {
  return required.filter(c => !table.columns.includes(c));
}

export function checkRequiredColumns(table: Table, required: readonly string[]): LoadResult<Table> {
  const missing = missingColumns(table, required);
  if (missing.length) {
    return fail({
      kind: "missingColumns",
      missing,
      message: `The uploaded file is missing required columns: ${missing.join(", ")}`,
    });
  }
  return { ok: true, value: table, notices: [] };
}
