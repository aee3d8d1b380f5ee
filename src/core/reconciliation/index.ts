/**
 * Reconciliation Module
 *
 * Joins two tables on a normalized key column after restricting both to
 * the keys they share.
 */

// Interfaces
export * from "./interfaces/IReconciler.js";

// Implementation
export { KeyJoinReconciler, createReconciler, normalizeKey } from "./impl/KeyJoinReconciler.js";
