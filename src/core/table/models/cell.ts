/**
 * Cell Model
 *
 * A spreadsheet cell as a tagged variant. Every raw value a workbook or a
 * caller can produce maps onto exactly one variant, and every variant has
 * exactly one string form.
 *
 * @module
 */

export type StringCell = { readonly kind: "string"; readonly value: string };
export type NumberCell = { readonly kind: "number"; readonly value: number };
export type BooleanCell = { readonly kind: "boolean"; readonly value: boolean };
export type DateCell = { readonly kind: "date"; readonly value: Date };
export type EmptyCell = { readonly kind: "empty" };

export type Cell = StringCell | NumberCell | BooleanCell | DateCell | EmptyCell;

/**
 * Plain values accepted when building cells
 */
export type RawCellValue = string | number | boolean | Date | null | undefined;

export const EMPTY: EmptyCell = Object.freeze({ kind: "empty" });

export function stringCell(value: string): StringCell {
  return { kind: "string", value };
}

export function numberCell(value: number): NumberCell | EmptyCell {
  return Number.isFinite(value) ? { kind: "number", value } : EMPTY;
}

export function booleanCell(value: boolean): BooleanCell {
  return { kind: "boolean", value };
}

export function dateCell(value: Date): DateCell | EmptyCell {
  return Number.isNaN(value.getTime()) ? EMPTY : { kind: "date", value };
}

/**
 * Convert a raw value to a cell. NaN, infinities and invalid dates are empty.
 */
export function toCell(value: RawCellValue): Cell {
  if (value === null || value === undefined) return EMPTY;
  if (typeof value === "string") return stringCell(value);
  if (typeof value === "number") return numberCell(value);
  if (typeof value === "boolean") return booleanCell(value);
  return dateCell(value);
}

/**
 * Convert a cell back to its raw value (empty becomes null)
 */
export function fromCell(cell: Cell): string | number | boolean | Date | null {
  return cell.kind === "empty" ? null : cell.value;
}

export function isEmpty(cell: Cell): cell is EmptyCell {
  return cell.kind === "empty";
}

/**
 * String form of a cell, or null for an empty cell.
 *
 * Numbers use the shortest round-tripping decimal form, dates ISO-8601.
 */
export function cellToString(cell: Cell): string | null {
  switch (cell.kind) {
    case "string":
      return cell.value;
    case "number":
      return String(cell.value);
    case "boolean":
      return cell.value ? "true" : "false";
    case "date":
      return cell.value.toISOString();
    case "empty":
      return null;
  }
}
