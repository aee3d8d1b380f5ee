/**
 * Key Join Reconciler Implementation
 *
 * Normalizes the join key of two row-sets, restricts them to the keys both
 * tables share, and outer-joins the result. Pure and synchronous: inputs are
 * never mutated and every stage returns a fresh row-set.
 */

import type {
  IReconciler,
  ReconcilerConfig,
  ReconcileRequest,
  ReconcileResult,
} from "../interfaces/IReconciler.js";
import { DEFAULT_RECONCILER_CONFIG } from "../interfaces/IReconciler.js";
import { EmptyResultError, KeyColumnConflictError, MissingColumnError } from "../../errors.js";
import {
  EMPTY,
  cellToString,
  createRow,
  getCell,
  hasColumn,
  rowSetToRecords,
  stringCell,
  type Cell,
  type Row,
  type RowSet,
} from "../../table/index.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

const PREVIEW_ROWS = 5;

/**
 * Normalize a key cell: string form, trimmed, upper-cased.
 * Empty cells and blank strings have no key.
 */
export function normalizeKey(cell: Cell): Cell {
  const text = cellToString(cell);
  if (text === null) return EMPTY;
  const normalized = text.trim().toUpperCase();
  return normalized === "" ? EMPTY : stringCell(normalized);
}

interface KeyGroup {
  left: Row[];
  right: Row[];
}

type ColumnMapping = Array<[source: string, target: string]>;

// =============================================================================
// KeyJoinReconciler
// =============================================================================

/**
 * @example
 * ```typescript
 * const reconciler = createReconciler();
 * const { rowSet, stats } = reconciler.reconcile({
 *   primary: cities,
 *   secondary: regions,
 *   primaryKey: "City",
 *   secondaryKey: "Town",
 * });
 * ```
 */
export class KeyJoinReconciler implements IReconciler {
  readonly config: ReconcilerConfig;
  private logger: Logger;

  constructor(config: Partial<ReconcilerConfig> = {}, logger: Logger = createLogger("reconciler")) {
    this.config = { ...DEFAULT_RECONCILER_CONFIG, ...config };
    this.logger = logger;
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  normalize(rowSet: RowSet, keyColumn: string): RowSet {
    const keyName = this.config.keyColumnName;

    if (!hasColumn(rowSet, keyColumn)) {
      throw new MissingColumnError(keyColumn, [...rowSet.columns]);
    }
    if (keyColumn !== keyName && hasColumn(rowSet, keyName)) {
      throw new KeyColumnConflictError(keyName, keyColumn);
    }

    const columns = rowSet.columns.map((column) => (column === keyColumn ? keyName : column));
    const rows = rowSet.rows.map((row) =>
      createRow(
        rowSet.columns.map((column): [string, Cell] =>
          column === keyColumn
            ? [keyName, normalizeKey(getCell(row, column))]
            : [column, getCell(row, column)]
        )
      )
    );

    return { columns, rows };
  }

  restrictToCommonKeys(primary: RowSet, secondary: RowSet): RowSet {
    const keyName = this.config.keyColumnName;
    this.requireColumn(primary, keyName);
    this.requireColumn(secondary, keyName);

    const secondaryKeys = this.collectKeys(secondary, keyName);
    const filtered = this.filterByKeys(primary, secondaryKeys, keyName);

    if (filtered.rows.length === 0) {
      throw new EmptyResultError(undefined, {
        primaryRows: primary.rows.length,
        secondaryKeys: secondaryKeys.size,
      });
    }

    return filtered;
  }

  outerJoin(left: RowSet, right: RowSet, keyColumn: string = this.config.keyColumnName): RowSet {
    this.requireColumn(left, keyColumn);
    this.requireColumn(right, keyColumn);

    const { leftMapping, rightMapping, columns } = this.planColumns(left, right, keyColumn);

    const groups = new Map<string, KeyGroup>();
    const unkeyedLeft: Row[] = [];
    const unkeyedRight: Row[] = [];

    const groupFor = (key: string): KeyGroup => {
      let group = groups.get(key);
      if (!group) {
        group = { left: [], right: [] };
        groups.set(key, group);
      }
      return group;
    };

    for (const row of left.rows) {
      const key = cellToString(getCell(row, keyColumn));
      if (key === null) unkeyedLeft.push(row);
      else groupFor(key).left.push(row);
    }
    for (const row of right.rows) {
      const key = cellToString(getCell(row, keyColumn));
      if (key === null) unkeyedRight.push(row);
      else groupFor(key).right.push(row);
    }

    const combine = (l: Row | null, r: Row | null): Row => {
      const entries: Array<[string, Cell]> = [];
      for (const [source, target] of leftMapping) {
        if (source === keyColumn) {
          const keyRow = l ?? r;
          entries.push([target, keyRow ? getCell(keyRow, keyColumn) : EMPTY]);
        } else {
          entries.push([target, l ? getCell(l, source) : EMPTY]);
        }
      }
      for (const [source, target] of rightMapping) {
        entries.push([target, r ? getCell(r, source) : EMPTY]);
      }
      return createRow(entries);
    };

    const rows: Row[] = [];
    for (const group of groups.values()) {
      if (group.right.length === 0) {
        for (const l of group.left) rows.push(combine(l, null));
      } else if (group.left.length === 0) {
        for (const r of group.right) rows.push(combine(null, r));
      } else {
        for (const l of group.left) {
          for (const r of group.right) rows.push(combine(l, r));
        }
      }
    }
    for (const l of unkeyedLeft) rows.push(combine(l, null));
    for (const r of unkeyedRight) rows.push(combine(null, r));

    return { columns, rows };
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  reconcile(request: ReconcileRequest): ReconcileResult {
    const keyName = this.config.keyColumnName;

    const primary = this.normalize(request.primary, request.primaryKey);
    const secondary = this.normalize(request.secondary, request.secondaryKey);
    this.debugTable("Primary table normalized", primary);
    this.debugTable("Secondary table normalized", secondary);

    const filteredPrimary = this.restrictToCommonKeys(primary, secondary);
    const commonKeys = this.collectKeys(filteredPrimary, keyName);
    const filteredSecondary = this.filterByKeys(secondary, commonKeys, keyName);

    if (this.logger.isLevelEnabled("debug")) {
      this.logger.debug({ keys: [...commonKeys] }, "Common keys");
    }
    this.debugTable("Primary table filtered", filteredPrimary);
    this.debugTable("Secondary table filtered", filteredSecondary);

    const rowSet = this.outerJoin(filteredPrimary, filteredSecondary, keyName);

    const stats = {
      primaryRows: request.primary.rows.length,
      secondaryRows: request.secondary.rows.length,
      commonKeys: commonKeys.size,
      primaryMatched: filteredPrimary.rows.length,
      secondaryMatched: filteredSecondary.rows.length,
      resultRows: rowSet.rows.length,
    };
    this.logger.info(stats, "Reconciliation complete");

    return { rowSet, stats };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private requireColumn(rowSet: RowSet, column: string): void {
    if (!hasColumn(rowSet, column)) {
      throw new MissingColumnError(column, [...rowSet.columns]);
    }
  }

  private collectKeys(rowSet: RowSet, keyColumn: string): Set<string> {
    const keys = new Set<string>();
    for (const row of rowSet.rows) {
      const key = cellToString(getCell(row, keyColumn));
      if (key !== null) keys.add(key);
    }
    return keys;
  }

  private filterByKeys(rowSet: RowSet, keys: ReadonlySet<string>, keyColumn: string): RowSet {
    const rows = rowSet.rows.filter((row) => {
      const key = cellToString(getCell(row, keyColumn));
      return key !== null && keys.has(key);
    });
    return { columns: rowSet.columns, rows };
  }

  /**
   * Output columns: left columns in order (key in place), then the right
   * non-key columns. Names on both sides get the side's suffix.
   */
  private planColumns(
    left: RowSet,
    right: RowSet,
    keyColumn: string
  ): { leftMapping: ColumnMapping; rightMapping: ColumnMapping; columns: string[] } {
    const { primarySuffix, secondarySuffix } = this.config;
    const leftNames = new Set(left.columns);
    const rightNames = new Set(right.columns);
    const taken = new Set<string>([...left.columns, ...right.columns]);

    const rename = (column: string, suffix: string): string => {
      let candidate = `${column}${suffix}`;
      while (taken.has(candidate)) candidate = `${candidate}${suffix}`;
      taken.add(candidate);
      return candidate;
    };

    const leftMapping: ColumnMapping = left.columns.map((column): [string, string] => [
      column,
      column !== keyColumn && rightNames.has(column) ? rename(column, primarySuffix) : column,
    ]);
    const rightMapping: ColumnMapping = right.columns
      .filter((column) => column !== keyColumn)
      .map((column): [string, string] => [column, leftNames.has(column) ? rename(column, secondarySuffix) : column]);

    return {
      leftMapping,
      rightMapping,
      columns: [...leftMapping, ...rightMapping].map(([, target]) => target),
    };
  }

  private debugTable(message: string, rowSet: RowSet): void {
    if (!this.logger.isLevelEnabled("debug")) return;
    this.logger.debug(
      {
        columns: rowSet.columns,
        rows: rowSet.rows.length,
        head: rowSetToRecords({ columns: rowSet.columns, rows: rowSet.rows.slice(0, PREVIEW_ROWS) }),
      },
      message
    );
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createReconciler(config: Partial<ReconcilerConfig> = {}, logger?: Logger): IReconciler {
  return new KeyJoinReconciler(config, logger);
}
