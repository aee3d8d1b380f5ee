/**
 * Spreadsheet Codec Tests
 *
 * Builds small workbooks in memory with exceljs and checks how the codec
 * turns them into row-sets, and how it writes row-sets back.
 */

import { describe, it, expect } from "vitest";
import ExcelJS from "exceljs";
import type { Workbook, Worksheet } from "exceljs";
import { ExcelJsCodec, cellFromExcel, resolveHeaders } from "../impl/ExcelJsCodec.js";
import { DEFAULT_SHEET_NAME } from "../interfaces/ISpreadsheetCodec.js";
import { ErrorCode, SpreadsheetError } from "../../errors.js";
import { EMPTY, rowSetFromRecords, rowSetToRecords } from "../../table/index.js";

async function workbookBytes(build: (sheet: Worksheet) => void): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  build(workbook.addWorksheet("Sheet1"));
  return new Uint8Array(await workbook.xlsx.writeBuffer());
}

async function loadWorkbook(bytes: Uint8Array): Promise<Workbook> {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(copy);
  return workbook;
}

describe("cellFromExcel", () => {
  it("should map primitive values", () => {
    expect(cellFromExcel("Faro")).toEqual({ kind: "string", value: "Faro" });
    expect(cellFromExcel(3.5)).toEqual({ kind: "number", value: 3.5 });
    expect(cellFromExcel(true)).toEqual({ kind: "boolean", value: true });
    expect(cellFromExcel(null)).toBe(EMPTY);
    expect(cellFromExcel("")).toBe(EMPTY);
  });

  it("should use the cached result of formulas", () => {
    expect(cellFromExcel({ formula: "B2*2", result: 10, date1904: false })).toEqual({
      kind: "number",
      value: 10,
    });
    expect(cellFromExcel({ formula: "1/0", result: { error: "#DIV/0!" }, date1904: false })).toEqual({
      kind: "string",
      value: "#DIV/0!",
    });
    expect(cellFromExcel({ formula: "NOW()", date1904: false })).toBe(EMPTY);
  });

  it("should flatten rich text and hyperlinks to their text", () => {
    expect(cellFromExcel({ richText: [{ text: "Lis" }, { text: "bon" }] })).toEqual({
      kind: "string",
      value: "Lisbon",
    });
    expect(cellFromExcel({ text: "Docs", hyperlink: "https://example.com/docs" })).toEqual({
      kind: "string",
      value: "Docs",
    });
  });

  it("should keep error values as their error text", () => {
    expect(cellFromExcel({ error: "#N/A" })).toEqual({ kind: "string", value: "#N/A" });
  });
});

describe("resolveHeaders", () => {
  it("should name blank headers by position and number repeats", () => {
    expect(resolveHeaders(["Name", null, "Name", " ", "Name"])).toEqual([
      "Name",
      "Unnamed: 1",
      "Name.1",
      "Unnamed: 3",
      "Name.2",
    ]);
  });

  it("should skip suffixes already taken by other headers", () => {
    expect(resolveHeaders(["a", "a.1", "a"])).toEqual(["a", "a.1", "a.2"]);
  });
});

describe("ExcelJsCodec", () => {
  const codec = new ExcelJsCodec();

  it("should read the first row as header and the rest as rows", async () => {
    const bytes = await workbookBytes((sheet) => {
      sheet.addRow(["City", "Pop"]);
      sheet.addRow(["Lisbon", 500]);
      sheet.addRow([" porto ", 200]);
    });

    const rowSet = await codec.read(bytes);

    expect(rowSet.columns).toEqual(["City", "Pop"]);
    expect(rowSetToRecords(rowSet)).toEqual([
      { City: "Lisbon", Pop: 500 },
      { City: " porto ", Pop: 200 },
    ]);
  });

  it("should skip wholly empty rows and read missing cells as empty", async () => {
    const bytes = await workbookBytes((sheet) => {
      sheet.addRow(["Code", "Qty"]);
      sheet.addRow(["A1", 3]);
      sheet.addRow([]);
      sheet.addRow(["B2", null]);
    });

    const rowSet = await codec.read(bytes);

    expect(rowSetToRecords(rowSet)).toEqual([
      { Code: "A1", Qty: 3 },
      { Code: "B2", Qty: null },
    ]);
  });

  it("should read formula results from a saved workbook", async () => {
    const bytes = await workbookBytes((sheet) => {
      sheet.addRow(["Base", "Double"]);
      sheet.addRow([4, { formula: "A2*2", result: 8, date1904: false }]);
    });

    expect(rowSetToRecords(await codec.read(bytes))).toEqual([{ Base: 4, Double: 8 }]);
  });

  it("should read styled hyperlinks as their visible text", async () => {
    const bytes = await workbookBytes((sheet) => {
      sheet.addRow(["Key"]);
      sheet.addRow([{ text: { richText: [{ text: "Lisbon" }] }, hyperlink: "http://x/" }]);
      sheet.addRow([{ text: "Porto", hyperlink: "http://y/" }]);
    });

    expect(rowSetToRecords(await codec.read(bytes))).toEqual([{ Key: "Lisbon" }, { Key: "Porto" }]);
  });

  it("should list header names without reading rows", async () => {
    const bytes = await workbookBytes((sheet) => {
      sheet.addRow(["Town", null, "Town"]);
      sheet.addRow(["Faro", 1, 2]);
    });

    expect(await codec.readColumns(bytes)).toEqual(["Town", "Unnamed: 1", "Town.1"]);
  });

  it("should read a blank worksheet as an empty row-set", async () => {
    const bytes = await workbookBytes(() => undefined);

    expect(await codec.read(bytes)).toEqual({ columns: [], rows: [] });
  });

  it("should fail with SpreadsheetError on bytes that are not a workbook", async () => {
    const read = codec.read(new Uint8Array([1, 2, 3, 4]));

    await expect(read).rejects.toBeInstanceOf(SpreadsheetError);
    await expect(read).rejects.toMatchObject({ code: ErrorCode.SPREADSHEET_UNREADABLE });
  });

  it("should write a single named sheet that reads back to the same rows", async () => {
    const rowSet = rowSetFromRecords([
      { comum: "LISBON", Pop: 500, Active: true, Region: "X" },
      { comum: "FARO", Pop: null, Active: false, Region: null },
    ]);

    const output = await codec.write(rowSet, { sheetName: "Result" });

    const workbook = await loadWorkbook(output);
    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(["Result"]);

    const reread = await codec.read(output);
    expect(reread.columns).toEqual(["comum", "Pop", "Active", "Region"]);
    expect(rowSetToRecords(reread)).toEqual(rowSetToRecords(rowSet));
  });

  it("should name the sheet with the default when none is given", async () => {
    const output = await codec.write(rowSetFromRecords([{ a: 1 }]));

    const workbook = await loadWorkbook(output);
    expect(workbook.worksheets[0]?.name).toBe(DEFAULT_SHEET_NAME);
  });
});
