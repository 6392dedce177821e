// schemaInspector.ts
// Infers column types and basic quality signals from a table, and checks a
// table against a schema contract (required columns, nullability, types).
//
// Everything here is a pure function of the input table.

import { detectDateFormat } from "./dates";
import {
  CellValue,
  ColumnType,
  Table,
  cellKey,
  isBlank,
  isBooleanValue,
  isIntegerValue,
  rowsToEnumerable,
  toNumber,
} from "./table";

/* --------------------------------------------------------------------------
 * PROFILE TYPES
 * -------------------------------------------------------------------------- */

export const DEFAULT_SAMPLE_SIZE = 1000;

export interface InspectOptions {
  /** Leading rows used for type inference and distinct counts. */
  sampleSize?: number;
}

export interface ColumnStats {
  nullCount: number;
  distinctCountSampled: number;
}

export interface TableProfile {
  types: Record<string, ColumnType>;
  /** Detected date format for every column inferred as `date`. */
  dateFormats: Record<string, string>;
  rowCount: number;
  perColumn: Record<string, ColumnStats>;
}

/* --------------------------------------------------------------------------
 * TYPE INFERENCE
 * -------------------------------------------------------------------------- */

export interface InferredType {
  type: ColumnType;
  dateFormat: string | null;
}

/**
 * Infer a column type from non-blank sample values. Candidates are tried
 * boolean → integer → float → date; a candidate wins only if every value
 * parses as it. Anything else, including an empty sample, is `string`.
 */
export function inferColumnType(values: CellValue[]): InferredType {
  if (values.length === 0) return { type: "string", dateFormat: null };
  if (values.every(isBooleanValue)) return { type: "boolean", dateFormat: null };
  if (values.every(isIntegerValue)) return { type: "integer", dateFormat: null };
  if (values.every((v) => toNumber(v) !== null)) return { type: "float", dateFormat: null };

  const dateFormat = detectDateFormat(values);
  if (dateFormat) return { type: "date", dateFormat };

  return { type: "string", dateFormat: null };
}

export function inspect(table: Table, options: InspectOptions = {}): TableProfile {
  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  if (!Number.isInteger(sampleSize) || sampleSize <= 0) {
    throw new Error("sampleSize must be a positive integer");
  }

  const rows = rowsToEnumerable(table.rows);
  const sample = rows.take(sampleSize).toArray();

  const types: Record<string, ColumnType> = {};
  const dateFormats: Record<string, string> = {};
  const perColumn: Record<string, ColumnStats> = {};

  for (const column of table.columns) {
    const name = column.name;
    const sampled = sample
      .map((row) => row[name] ?? null)
      .filter((value) => !isBlank(value));

    const inferred = inferColumnType(sampled);
    types[name] = inferred.type;
    if (inferred.dateFormat) dateFormats[name] = inferred.dateFormat;

    perColumn[name] = {
      nullCount: rows.count((row) => isBlank(row[name])),
      distinctCountSampled: new Set(sampled.map(cellKey)).size,
    };
  }

  return { types, dateFormats, rowCount: table.rows.length, perColumn };
}

/* --------------------------------------------------------------------------
 * SCHEMA CONTRACT VALIDATION
 * -------------------------------------------------------------------------- */

export type SchemaProblem = "missing" | "all_null" | "type_mismatch";

export interface SchemaIssue {
  column: string;
  problem: SchemaProblem;
}

export interface ColumnExpectation {
  name: string;
  type?: ColumnType;
  /** When true, a column with no values is acceptable. */
  nullable?: boolean;
}

export type RequiredColumn = string | ColumnExpectation;

/** Every row is blank in `column`. An empty table has no all-null columns. */
export function isAllNullColumn(profile: TableProfile, column: string): boolean {
  return profile.rowCount > 0 && profile.perColumn[column]?.nullCount === profile.rowCount;
}

/** `float` accepts integers; `string` accepts anything. */
export function isTypeCompatible(expected: ColumnType, actual: ColumnType): boolean {
  if (expected === actual || expected === "string") return true;
  return expected === "float" && actual === "integer";
}

export function validate(
  table: Table,
  required: RequiredColumn[],
  profile: TableProfile = inspect(table)
): SchemaIssue[] {
  return validateProfile(profile, required);
}

/** Same checks as `validate`, against a profile already taken. */
export function validateProfile(profile: TableProfile, required: RequiredColumn[]): SchemaIssue[] {
  const issues: SchemaIssue[] = [];

  for (const entry of required) {
    const expectation: ColumnExpectation =
      typeof entry === "string" ? { name: entry } : entry;
    const name = expectation.name;

    const actualType = profile.types[name];
    if (actualType === undefined) {
      issues.push({ column: name, problem: "missing" });
      continue;
    }

    if (isAllNullColumn(profile, name)) {
      if (!expectation.nullable) {
        issues.push({ column: name, problem: "all_null" });
      }
      continue;
    }

    if (expectation.type && !isTypeCompatible(expectation.type, actualType)) {
      issues.push({ column: name, problem: "type_mismatch" });
    }
  }

  return issues;
}
