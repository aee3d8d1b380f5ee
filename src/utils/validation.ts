/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime, with automatic
 * TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_KEY_COLUMN_NAME } from "../core/reconciliation/index.js";
import { DEFAULT_SHEET_NAME } from "../core/spreadsheet/index.js";

// =============================================================================
// Shared Field Schemas
// =============================================================================

/**
 * Worksheet names: 1-31 characters, none of : \ / ? * [ ]
 */
export const SheetNameSchema = z
  .string()
  .min(1)
  .max(31)
  .regex(/^[^:\\/?*[\]]+$/, "must not contain : \\ / ? * [ ]");

export const FileNameSchema = z
  .string()
  .min(1)
  .regex(/^[^\\/"\r\n]+\.xlsx$/, "must be a plain file name ending in .xlsx");

export const KeyColumnNameSchema = z.string().trim().min(1);

export const DEFAULT_RESULT_FILE_NAME = "dados_completos.xlsx";

// =============================================================================
// Reconcile Options Schema
// =============================================================================

export const ReconcileOptionsSchema = z.object({
  /** Name both join key columns are renamed to */
  keyColumnName: KeyColumnNameSchema.default(DEFAULT_KEY_COLUMN_NAME),

  /** Name of the result worksheet */
  sheetName: SheetNameSchema.default(DEFAULT_SHEET_NAME),
});

export type ReconcileOptions = z.infer<typeof ReconcileOptionsSchema>;

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = ReconcileOptionsSchema.extend({
  /** Port to listen on (0 picks a free port) */
  port: z.coerce.number().int().min(0).max(65535).default(5000),

  /** Host to bind to */
  host: z.string().min(1).default("127.0.0.1"),

  /** File name of the downloaded result */
  fileName: FileNameSchema.default(DEFAULT_RESULT_FILE_NAME),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Environment variables read by loadServerConfig
 */
export const SERVER_ENV_VARS = {
  port: "SHEET_JOIN_PORT",
  host: "SHEET_JOIN_HOST",
  sheetName: "SHEET_JOIN_SHEET_NAME",
  fileName: "SHEET_JOIN_FILE_NAME",
  keyColumnName: "SHEET_JOIN_KEY_COLUMN",
} as const satisfies Record<keyof ServerConfig, string>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate data against a schema, raising a ConfigurationError on failure
 */
export function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Build the server configuration from environment variables and explicit
 * overrides (overrides win; undefined overrides are ignored).
 */
export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Record<keyof ServerConfig, string | number | undefined>> = {}
): ServerConfig {
  const raw: Record<string, string | number> = {};

  for (const [field, variable] of Object.entries(SERVER_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value !== "") raw[field] = value;
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[field] = value;
  }

  return validateConfig(ServerConfigSchema, raw, "server configuration");
}
