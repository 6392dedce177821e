// joins.ts
// Ordered sequence of binary joins over composite keys.
//
// Key ideas:
//
// - The whole plan is checked against the table schemas before any row is
//   touched: a missing key column aborts the transform with JoinKeyNotFound.
// - Each step's left side is the cumulative result of the earlier steps.
// - Right rows are indexed by one composite key string per row, so a lookup
//   is a single Map access.
// - Right-side columns are renamed `<rightPrefix>__<name>`; right key columns
//   are dropped after matching.
// - Quality metrics are measured on the pre-join tables of each step.

import Enumerable from "linq";
import { DatasetResolver } from "./datasets";
import { JoinKeyNotFound, ValidationError } from "./errors";
import { CellValue, Column, Row, Table, cellKey, isBlank, rowsToEnumerable } from "./table";

/* --------------------------------------------------------------------------
 * PLAN TYPES
 * -------------------------------------------------------------------------- */

export type JoinType = "inner" | "left";

export interface JoinKeyPair {
  left: string;
  right: string;
}

export interface JoinStep {
  /** Base dataset, or the `right` of an earlier step. */
  left: string;
  right: string;
  keys: JoinKeyPair[];
  type: JoinType;
  rightPrefix: string;
  /** Fold string key parts to lower case before matching. */
  caseInsensitive: boolean;
}

export interface JoinQualityReport {
  step: number;
  left: string;
  right: string;
  type: JoinType;
  leftRows: number;
  rightRows: number;
  outputRows: number;
  /** Left rows with at least one match / left rows. */
  matchRate: number;
  /** Left rows with a blank value in any key column / left rows. */
  blankKeyRate: number;
  /** Right rows whose key occurs more than once / right rows. */
  duplicateKeyRate: number;
}

export interface JoinResult {
  table: Table;
  reports: JoinQualityReport[];
}

export const PREFIX_SEPARATOR = "__";

export function prefixedColumnName(prefix: string, name: string): string {
  return `${prefix}${PREFIX_SEPARATOR}${name}`;
}

/* --------------------------------------------------------------------------
 * PLANNING (SCHEMA ONLY)
 * -------------------------------------------------------------------------- */

interface RenamedColumn {
  source: string;
  column: Column;
}

export interface PlannedJoinStep {
  index: number;
  step: JoinStep;
  right: Table;
  renamed: RenamedColumn[];
}

export interface JoinPlan {
  base: Table;
  steps: PlannedJoinStep[];
  /** Columns of the final joined table, in order. */
  columns: Column[];
}

/** Checks a step needs no schema for: type, keys, prefix and left reference. */
export function validateJoinStep(
  step: JoinStep,
  index: number,
  knownRefs: Set<string>,
  prefixes: Set<string>
): void {
  const path = `joins[${index}]`;
  if (step.type !== "inner" && step.type !== "left") {
    throw new ValidationError(`${path}.type`, `unsupported join type '${step.type}'`);
  }
  if (step.keys.length === 0) {
    throw new ValidationError(`${path}.keys`, "at least one key pair is required");
  }
  if (!step.rightPrefix) {
    throw new ValidationError(`${path}.rightPrefix`, "prefix must not be empty");
  }
  if (prefixes.has(step.rightPrefix)) {
    throw new ValidationError(`${path}.rightPrefix`, `prefix '${step.rightPrefix}' is already used by an earlier step`);
  }
  if (!knownRefs.has(step.left)) {
    throw new ValidationError(
      `${path}.left`,
      `'${step.left}' is neither the base dataset nor joined by an earlier step`
    );
  }
}

/**
 * Resolve every dataset of the plan and check key columns and output names
 * against the schemas. No rows are read.
 */
export function planJoins(baseRef: string, steps: JoinStep[], resolve: DatasetResolver): JoinPlan {
  const base = resolve(baseRef);
  const knownRefs = new Set<string>([baseRef]);
  const prefixes = new Set<string>();
  let columns: Column[] = base.columns;
  const planned: PlannedJoinStep[] = [];

  steps.forEach((step, index) => {
    validateJoinStep(step, index, knownRefs, prefixes);
    const right = resolve(step.right);

    const leftNames = new Set(columns.map((c) => c.name));
    const rightNames = new Set(right.columns.map((c) => c.name));
    for (const key of step.keys) {
      if (!leftNames.has(key.left)) {
        throw new JoinKeyNotFound(index, "left", key.left, step.left);
      }
      if (!rightNames.has(key.right)) {
        throw new JoinKeyNotFound(index, "right", key.right, step.right);
      }
    }

    const rightKeys = new Set(step.keys.map((k) => k.right));
    const renamed: RenamedColumn[] = right.columns
      .filter((c) => !rightKeys.has(c.name))
      .map((c) => ({
        source: c.name,
        column: { name: prefixedColumnName(step.rightPrefix, c.name), type: c.type },
      }));

    for (const { column } of renamed) {
      if (leftNames.has(column.name)) {
        throw new ValidationError(
          `joins[${index}].rightPrefix`,
          `output column '${column.name}' already exists`
        );
      }
    }

    planned.push({ index, step, right, renamed });
    columns = [...columns, ...renamed.map((r) => r.column)];
    knownRefs.add(step.right);
    prefixes.add(step.rightPrefix);
  });

  return { base, steps: planned, columns };
}

/* --------------------------------------------------------------------------
 * COMPOSITE KEYS
 * -------------------------------------------------------------------------- */

function keyPart(value: CellValue | undefined, caseInsensitive: boolean): string | null {
  if (value === undefined || isBlank(value)) return null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return cellKey(caseInsensitive ? trimmed.toLowerCase() : trimmed);
  }
  return cellKey(value);
}

/** Composite key of a row, or `null` when any key part is blank. */
export function compositeKey(row: Row, columns: string[], caseInsensitive: boolean): string | null {
  const parts: string[] = [];
  for (const column of columns) {
    const part = keyPart(row[column], caseInsensitive);
    if (part === null) return null;
    parts.push(part);
  }
  return JSON.stringify(parts);
}

function buildIndex(rows: Row[], columns: string[], caseInsensitive: boolean): Map<string, Row[]> {
  const index = new Map<string, Row[]>();
  for (const row of rows) {
    const key = compositeKey(row, columns, caseInsensitive);
    if (key === null) continue;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

function rate(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}

/* --------------------------------------------------------------------------
 * EXECUTION
 * -------------------------------------------------------------------------- */

function executeStep(leftRows: Row[], planned: PlannedJoinStep): { rows: Row[]; report: JoinQualityReport } {
  const { step, right, renamed } = planned;
  const leftColumns = step.keys.map((k) => k.left);
  const rightColumns = step.keys.map((k) => k.right);

  const index = buildIndex(right.rows, rightColumns, step.caseInsensitive);
  const leftKeys = leftRows.map((row) => compositeKey(row, leftColumns, step.caseInsensitive));

  const merge = (leftRow: Row, rightRow: Row | null): Row => {
    const out: Row = { ...leftRow };
    for (const { source, column } of renamed) {
      out[column.name] = rightRow ? rightRow[source] ?? null : null;
    }
    return out;
  };

  const rows = rowsToEnumerable(leftRows)
    .selectMany((leftRow, idx) => {
      const key = leftKeys[idx];
      const matches = key === null ? [] : index.get(key) ?? [];
      if (matches.length === 0) {
        return step.type === "left" ? [merge(leftRow, null)] : [];
      }
      return matches.map((match) => merge(leftRow, match));
    })
    .toArray();

  const keyed = Enumerable.from(leftKeys);
  const matched = keyed.count((key) => key !== null && index.has(key));
  const blank = keyed.count((key) => key === null);
  const duplicated = Enumerable.from(Array.from(index.values()))
    .where((bucket) => bucket.length > 1)
    .sum((bucket) => bucket.length);

  return {
    rows,
    report: {
      step: planned.index,
      left: step.left,
      right: step.right,
      type: step.type,
      leftRows: leftRows.length,
      rightRows: right.rows.length,
      outputRows: rows.length,
      matchRate: rate(matched, leftRows.length),
      blankKeyRate: rate(blank, leftRows.length),
      duplicateKeyRate: rate(duplicated, right.rows.length),
    },
  };
}

export function executeJoinPlan(plan: JoinPlan): JoinResult {
  let rows = plan.base.rows;
  const reports: JoinQualityReport[] = [];

  for (const planned of plan.steps) {
    const result = executeStep(rows, planned);
    rows = result.rows;
    reports.push(result.report);
  }

  return { table: { columns: plan.columns, rows }, reports };
}

/** Plan, check and run every join step in declared order. */
export function executeJoins(baseRef: string, steps: JoinStep[], resolve: DatasetResolver): JoinResult {
  return executeJoinPlan(planJoins(baseRef, steps, resolve));
}

/* --------------------------------------------------------------------------
 * KEY SUGGESTION
 * -------------------------------------------------------------------------- */

const PREFERRED_KEYS = ["id", "itemid", "key", "sku", "code"];

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Best-effort key pair for joining two schemas: a preferred key name present
 * on both sides, else the first left column whose normalized name also
 * appears on the right.
 */
export function suggestJoinKeys(leftColumns: string[], rightColumns: string[]): JoinKeyPair | null {
  const leftByName = new Map<string, string>();
  const rightByName = new Map<string, string>();
  for (const c of leftColumns) if (!leftByName.has(normalizeName(c))) leftByName.set(normalizeName(c), c);
  for (const c of rightColumns) if (!rightByName.has(normalizeName(c))) rightByName.set(normalizeName(c), c);

  for (const key of PREFERRED_KEYS) {
    const left = leftByName.get(key);
    const right = rightByName.get(key);
    if (left !== undefined && right !== undefined) return { left, right };
  }

  for (const left of leftColumns) {
    const normalized = normalizeName(left);
    const right = rightByName.get(normalized);
    if (normalized && right !== undefined) return { left, right };
  }

  return null;
}
