/**
 * Row-set Model
 *
 * An ordered table: a column list shared by all rows, and rows mapping column
 * names to cells. Rows are built with Object.fromEntries so that any header
 * text, "__proto__" included, becomes an own property.
 *
 * @module
 */

import { EMPTY, fromCell, toCell, type Cell, type RawCellValue } from "./cell.js";

export type Row = Readonly<Record<string, Cell>>;

export interface RowSet {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export type RawRecord = Readonly<Record<string, RawCellValue>>;

/**
 * Read a cell from a row; absent columns read as empty
 */
export function getCell(row: Row, column: string): Cell {
  return Object.prototype.hasOwnProperty.call(row, column) ? (row[column] ?? EMPTY) : EMPTY;
}

export function hasColumn(rowSet: RowSet, column: string): boolean {
  return rowSet.columns.includes(column);
}

export function createRow(entries: Iterable<readonly [string, Cell]>): Row {
  return Object.fromEntries(entries);
}

/**
 * Build a row-set from plain records.
 *
 * Columns default to the keys of all records in order of first appearance.
 */
export function rowSetFromRecords(records: readonly RawRecord[], columns?: readonly string[]): RowSet {
  const resolvedColumns = columns ?? collectColumns(records);
  const rows = records.map((record) =>
    createRow(
      resolvedColumns.map((column) => [
        column,
        Object.prototype.hasOwnProperty.call(record, column) ? toCell(record[column]) : EMPTY,
      ])
    )
  );
  return { columns: [...resolvedColumns], rows };
}

/**
 * Convert a row-set back to plain records (empty cells become null)
 */
export function rowSetToRecords(
  rowSet: RowSet
): Array<Record<string, string | number | boolean | Date | null>> {
  return rowSet.rows.map((row) =>
    Object.fromEntries(rowSet.columns.map((column) => [column, fromCell(getCell(row, column))]))
  );
}

function collectColumns(records: readonly RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}
