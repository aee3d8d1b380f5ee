/**
 * Spreadsheet Module
 *
 * Converts xlsx payloads to row-sets and back.
 *
 * @module
 */

// Interfaces
export * from "./interfaces/ISpreadsheetCodec.js";

// Implementation
export { ExcelJsCodec, cellFromExcel, createSpreadsheetCodec, resolveHeaders } from "./impl/ExcelJsCodec.js";
