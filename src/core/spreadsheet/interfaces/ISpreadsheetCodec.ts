/**
 * Spreadsheet Codec Interface
 *
 * Converts between spreadsheet payloads and row-sets. Only the first
 * worksheet is read, and its first row is the header.
 */

import type { RowSet } from "../../table/index.js";

export interface WriteOptions {
  /** Name of the single worksheet written */
  sheetName?: string;
}

export const DEFAULT_SHEET_NAME = "Dados Completos";

export const XLSX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export interface ISpreadsheetCodec {
  /**
   * Parse the first worksheet of a payload into a row-set.
   *
   * @throws SpreadsheetError if the payload is unreadable or has no worksheet
   */
  read(bytes: Uint8Array): Promise<RowSet>;

  /**
   * Header names of the first worksheet
   */
  readColumns(bytes: Uint8Array): Promise<string[]>;

  /**
   * Encode a row-set as a workbook with a single sheet
   */
  write(rowSet: RowSet, options?: WriteOptions): Promise<Buffer>;
}
