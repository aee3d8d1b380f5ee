/**
 * Reconciler Interface
 *
 * Defines the contract for reconciling two row-sets on a join key:
 * normalize both keys, keep the rows whose key the secondary table knows,
 * and outer-join the survivors.
 */

import type { RowSet } from "../../table/index.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  /** Name both key columns are renamed to before the join */
  keyColumnName: string;
  /** Suffix for a primary column whose name also exists in the secondary */
  primarySuffix: string;
  /** Suffix for a secondary column whose name also exists in the primary */
  secondarySuffix: string;
}

export const DEFAULT_KEY_COLUMN_NAME = "comum";

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  keyColumnName: DEFAULT_KEY_COLUMN_NAME,
  primarySuffix: "_1",
  secondarySuffix: "_2",
};

// =============================================================================
// Request / Result
// =============================================================================

export interface ReconcileRequest {
  primary: RowSet;
  secondary: RowSet;
  /** Key column of the primary row-set */
  primaryKey: string;
  /** Key column of the secondary row-set */
  secondaryKey: string;
}

export interface ReconcileStats {
  primaryRows: number;
  secondaryRows: number;
  /** Distinct keys present in both tables */
  commonKeys: number;
  primaryMatched: number;
  secondaryMatched: number;
  resultRows: number;
}

export interface ReconcileResult {
  rowSet: RowSet;
  stats: ReconcileStats;
}

// =============================================================================
// Reconciler
// =============================================================================

export interface IReconciler {
  readonly config: ReconcilerConfig;

  /**
   * Rename `keyColumn` to the reserved key name and normalize its values
   * to trimmed upper-case strings.
   *
   * @throws MissingColumnError if `keyColumn` is not a column of the row-set
   * @throws KeyColumnConflictError if another column already has the reserved name
   */
  normalize(rowSet: RowSet, keyColumn: string): RowSet;

  /**
   * Keep the primary rows whose normalized key appears in the secondary.
   * Both row-sets must already be normalized.
   *
   * @throws EmptyResultError if no primary row is kept
   */
  restrictToCommonKeys(primary: RowSet, secondary: RowSet): RowSet;

  /**
   * Full outer join on the key column. Never fails on data; a side without
   * the key column is a MissingColumnError.
   */
  outerJoin(left: RowSet, right: RowSet, keyColumn?: string): RowSet;

  /**
   * normalize both sides, filter both to the common keys, then join
   */
  reconcile(request: ReconcileRequest): ReconcileResult;
}
