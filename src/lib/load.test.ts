import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";

import { loadFile, headerNames, fromMatrix, checkRequiredColumns, fileKind } from "./load";

describe("loadFile (delimited)", () => {
  it("parses a CSV and types its columns", () => {
    const res = loadFile("data.csv", "a,b\n1,x\n2,y\n");
    expect(res).toEqual({
      ok: true,
      value: { columns: ["a", "b"], rows: [{ a: 1, b: "x" }, { a: 2, b: "y" }] },
      notices: [],
    });
  });

  it("detects tab separators and strips a byte-order mark", () => {
    const res = loadFile("data.tsv", "\uFEFFid\tv\n1\t2\n");
    expect(res.ok && res.value.columns).toEqual(["id", "v"]);
    expect(res.ok && res.value.rows).toEqual([{ id: 1, v: 2 }]);
  });

  it("decodes bytes as UTF-8", () => {
    const res = loadFile("plants.csv", new TextEncoder().encode("Tecnologia\nEólica\n"));
    expect(res.ok && res.value.rows).toEqual([{ Tecnologia: "Eólica" }]);
  });

  it("pads short rows and says so", () => {
    const res = loadFile("short.csv", "a,b,c\n1,2,3\n4,5\n");
    expect(res).toEqual({
      ok: true,
      value: { columns: ["a", "b", "c"], rows: [{ a: 1, b: 2, c: 3 }, { a: 4, b: 5, c: null }] },
      notices: ["1 row(s) had fewer values than the header; the missing cells were left empty."],
    });
  });

  it("rejects rows with more values than the header", () => {
    const res = loadFile("long.csv", "a,b\n1,2\n3,4,5\n");
    expect(res).toEqual({
      ok: false,
      error: { kind: "parse", rows: [2], message: "Rows with more values than the header (2 columns): 2." },
    });
  });

  it("rejects a header with no rows", () => {
    const res = loadFile("h.csv", "a,b\n");
    expect(res).toEqual({ ok: false, error: { kind: "empty", message: "No rows found in h.csv." } });
  });

  it("rejects unsupported extensions", () => {
    expect(loadFile("notes.pdf", "x")).toEqual({
      ok: false,
      error: { kind: "unsupported", message: "Unsupported file type .pdf. Upload one of: .csv,.tsv,.txt,.xlsx,.xls." },
    });
    const none = loadFile("README", "x");
    expect(!none.ok && none.error.message).toBe("Unsupported file type (none). Upload one of: .csv,.tsv,.txt,.xlsx,.xls.");
  });
});

describe("loadFile (spreadsheet)", () => {
  function workbookBytes(rows: unknown[][]): Uint8Array {
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Sheet1");
    const out: ArrayBuffer = XLSX.write(wb, { type: "array", bookType: "xlsx" });
    return new Uint8Array(out);
  }

  it("reads the first sheet", () => {
    const res = loadFile("book.xlsx", workbookBytes([["Name", "Score"], ["ann", 3], ["bo", 4]]));
    expect(res.ok && res.value).toEqual({ columns: ["Name", "Score"], rows: [{ Name: "ann", Score: 3 }, { Name: "bo", Score: 4 }] });
  });

  it("needs binary data", () => {
    const res = loadFile("book.xlsx", "not binary");
    expect(!res.ok && res.error).toEqual({ kind: "parse", message: "book.xlsx must be read as binary data." });
  });
});

describe("helpers", () => {
  it("names blank and duplicate headers", () => {
    expect(headerNames(["x", "", "x", null])).toEqual(["x", "Unnamed: 1", "x.1", "Unnamed: 3"]);
  });

  it("drops trailing blank header cells", () => {
    const res = fromMatrix("m", [["a", "b", ""], ["1", "2", ""]]);
    expect(res.ok && res.value.columns).toEqual(["a", "b"]);
  });

  it("maps extensions case-insensitively", () => {
    expect(fileKind("DATA.XLSX")).toBe("spreadsheet");
    expect(fileKind("log.txt")).toBe("delimited");
    expect(fileKind("image.png")).toBeNull();
  });

  it("lists missing required columns in order", () => {
    const res = checkRequiredColumns({ columns: ["a"], rows: [] }, ["a", "b", "c"]);
    expect(res).toEqual({
      ok: false,
      error: { kind: "missingColumns", missing: ["b", "c"], message: "The uploaded file is missing required columns: b, c" },
    });
  });
});
