/**
 * Core module - shared by the CLI and the web server
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./table/index.js";
export * from "./reconciliation/index.js";
export * from "./spreadsheet/index.js";
