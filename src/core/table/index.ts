/**
 * Table Module
 *
 * Typed cells and row-sets shared by the reconciler and the spreadsheet codec.
 *
 * @module
 */

export * from "./models/cell.js";
export * from "./models/row-set.js";
