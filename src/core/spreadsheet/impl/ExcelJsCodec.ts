/**
 * ExcelJS Spreadsheet Codec
 *
 * Reads and writes xlsx workbooks with exceljs. Cell values are mapped onto
 * the table module's tagged cells: formulas contribute their cached result,
 * rich text and hyperlinks their text, error values their error string.
 */

import ExcelJS from "exceljs";
import type { CellRichTextValue, CellValue, Worksheet } from "exceljs";
import type { ISpreadsheetCodec, WriteOptions } from "../interfaces/ISpreadsheetCodec.js";
import { DEFAULT_SHEET_NAME } from "../interfaces/ISpreadsheetCodec.js";
import { ErrorCode, SpreadsheetError } from "../../errors.js";
import {
  EMPTY,
  booleanCell,
  cellToString,
  createRow,
  dateCell,
  fromCell,
  getCell,
  numberCell,
  stringCell,
  type Cell,
  type Row,
  type RowSet,
} from "../../table/index.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

type FormulaResult = Exclude<CellValue, null | undefined> | undefined;

// =============================================================================
// Value Conversion
// =============================================================================

/**
 * Map an exceljs cell value onto a tagged cell
 */
export function cellFromExcel(value: CellValue): Cell {
  if (value === null || value === undefined) return EMPTY;
  if (typeof value === "string") return value === "" ? EMPTY : stringCell(value);
  if (typeof value === "number") return numberCell(value);
  if (typeof value === "boolean") return booleanCell(value);
  if (value instanceof Date) return dateCell(value);
  if ("richText" in value) {
    return stringCell(value.richText.map((run) => run.text).join(""));
  }
  if ("hyperlink" in value) {
    // styled link text is loaded as rich text
    const text: unknown = value.text;
    if (typeof text === "string") return stringCell(text);
    if (isRichTextValue(text)) return cellFromExcel(text);
    return stringCell(value.hyperlink);
  }
  if ("formula" in value || "sharedFormula" in value) {
    return formulaResultToCell(value.result);
  }
  if ("error" in value) return stringCell(value.error);
  return EMPTY;
}

function isRichTextValue(value: unknown): value is CellRichTextValue {
  return typeof value === "object" && value !== null && "richText" in value && Array.isArray(value.richText);
}

function formulaResultToCell(result: FormulaResult): Cell {
  if (result === undefined) return EMPTY;
  if (typeof result === "object" && !(result instanceof Date) && "error" in result) {
    return stringCell(result.error);
  }
  return cellFromExcel(result);
}

/**
 * Header names as data-frame readers give them: blank headers become "Unnamed: <index>",
 * repeats get ".1", ".2", ... suffixes.
 */
export function resolveHeaders(raw: ReadonlyArray<string | null>): string[] {
  const used = new Set<string>();
  const counts = new Map<string, number>();

  return raw.map((value, index) => {
    const base = value === null || value.trim() === "" ? `Unnamed: ${index}` : value;
    let name = base;
    let count = counts.get(base) ?? 0;
    while (used.has(name)) {
      count += 1;
      name = `${base}.${count}`;
    }
    counts.set(base, count);
    used.add(name);
    return name;
  });
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

// =============================================================================
// ExcelJsCodec
// =============================================================================

export class ExcelJsCodec implements ISpreadsheetCodec {
  private logger: Logger;

  constructor(logger: Logger = createLogger("spreadsheet")) {
    this.logger = logger;
  }

  async read(bytes: Uint8Array): Promise<RowSet> {
    const sheet = await this.loadFirstSheet(bytes);
    const columns = this.readHeader(sheet);
    const rows: Row[] = [];

    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
      const sheetRow = sheet.getRow(rowNumber);
      const entries = columns.map((column, index): [string, Cell] => [
        column,
        cellFromExcel(sheetRow.getCell(index + 1).value),
      ]);
      if (entries.every(([, cell]) => cell.kind === "empty")) continue;
      rows.push(createRow(entries));
    }

    this.logger.debug({ sheet: sheet.name, columns, rows: rows.length }, "Workbook parsed");
    return { columns, rows };
  }

  async readColumns(bytes: Uint8Array): Promise<string[]> {
    const sheet = await this.loadFirstSheet(bytes);
    return this.readHeader(sheet);
  }

  async write(rowSet: RowSet, options: WriteOptions = {}): Promise<Buffer> {
    const sheetName = options.sheetName ?? DEFAULT_SHEET_NAME;

    try {
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet(sheetName);

      sheet.addRow([...rowSet.columns]);
      for (const row of rowSet.rows) {
        sheet.addRow(rowSet.columns.map((column) => fromCell(getCell(row, column))));
      }

      const output = await workbook.xlsx.writeBuffer();
      this.logger.debug({ sheet: sheetName, rows: rowSet.rows.length }, "Workbook written");
      return Buffer.from(output);
    } catch (error) {
      throw new SpreadsheetError(
        `Unable to write spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.SPREADSHEET_WRITE_FAILED,
        { sheetName }
      );
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async loadFirstSheet(bytes: Uint8Array): Promise<Worksheet> {
    const workbook = new ExcelJS.Workbook();

    try {
      await workbook.xlsx.load(toArrayBuffer(bytes));
    } catch (error) {
      this.logger.warn({ err: error, size: bytes.byteLength }, "Unreadable workbook");
      throw new SpreadsheetError(
        `Unable to read spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.SPREADSHEET_UNREADABLE,
        { size: bytes.byteLength }
      );
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) {
      throw new SpreadsheetError("Workbook has no worksheets", ErrorCode.SPREADSHEET_NO_WORKSHEET);
    }
    return sheet;
  }

  private readHeader(sheet: Worksheet): string[] {
    const header = sheet.getRow(1);
    const raw: Array<string | null> = [];
    for (let col = 1; col <= sheet.columnCount; col++) {
      raw.push(cellToString(cellFromExcel(header.getCell(col).value)));
    }
    return resolveHeaders(raw);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createSpreadsheetCodec(logger?: Logger): ISpreadsheetCodec {
  return new ExcelJsCodec(logger);
}
