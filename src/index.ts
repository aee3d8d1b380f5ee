/**
 * sheet-join
 *
 * Reconcile two tables on a normalized key column: library entry point.
 *
 * @module
 */

export * from "./core/index.js";
export * from "./web/index.js";
export {
  createLogger,
  loadServerConfig,
  ReconcileOptionsSchema,
  ServerConfigSchema,
  type Logger,
  type LogLevel,
  type ReconcileOptions,
  type ServerConfig,
} from "./utils/index.js";
