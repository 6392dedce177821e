// table.ts
// In-memory table model shared by every pipeline stage.
//
// Tables are treated as immutable snapshots: stages build new row objects
// and never write into a caller-supplied row.

import Enumerable from "linq";

/* --------------------------------------------------------------------------
 * BASIC TYPES
 * -------------------------------------------------------------------------- */

export type CellValue = string | number | boolean | Date | null;

export type ColumnType = "boolean" | "integer" | "float" | "date" | "string";

export interface Column {
  name: string;
  type: ColumnType;
}

export type Row = Record<string, CellValue>;

export interface Table {
  columns: Column[];
  rows: Row[];
}

export type RowSequence = Enumerable.IEnumerable<Row>;

export function rowsToEnumerable(rows: Row[] = []): RowSequence {
  return Enumerable.from(rows);
}

/**
 * Build a table whose rows carry exactly one value per declared column.
 * Cells absent from a source row become `null`; keys that are not declared
 * columns are dropped.
 */
export function createTable(columns: Column[], rows: Row[]): Table {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new Error(`Duplicate column name: ${column.name}`);
    }
    seen.add(column.name);
  }

  const normalized = rowsToEnumerable(rows)
    .select((row) => {
      const out: Row = {};
      for (const column of columns) {
        out[column.name] = row[column.name] ?? null;
      }
      return out;
    })
    .toArray();

  return { columns: columns.map((c) => ({ ...c })), rows: normalized };
}

export function columnNames(table: Table): string[] {
  return table.columns.map((c) => c.name);
}

export function hasColumn(table: Table, name: string): boolean {
  return table.columns.some((c) => c.name === name);
}

/* --------------------------------------------------------------------------
 * CELL HELPERS
 * -------------------------------------------------------------------------- */

/** Null, or a string that is empty once trimmed. */
export function isBlank(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === "string" && value.trim() === "";
}

/**
 * Text form of a cell used by string operators and concatenation.
 * `null` renders as the empty string; dates render as ISO-8601 so the
 * output does not depend on the host time zone.
 */
export function stringifyCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  }
  return String(value);
}

const NUMERIC_TEXT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const INTEGER_TEXT = /^[-+]?\d+$/;

/** Numeric value of a cell, or `null` when the cell is not a number. */
export function toNumber(value: CellValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!NUMERIC_TEXT.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isIntegerValue(value: CellValue): boolean {
  if (typeof value === "number") return Number.isInteger(value);
  if (typeof value === "string") return INTEGER_TEXT.test(value.trim());
  return false;
}

const BOOLEAN_TEXT = new Set(["true", "false", "yes", "no"]);

export function isBooleanValue(value: CellValue): boolean {
  if (typeof value === "boolean") return true;
  if (typeof value === "string") return BOOLEAN_TEXT.has(value.trim().toLowerCase());
  return false;
}

/**
 * Type-tagged identity of a cell, used wherever values are grouped or
 * hashed (distinct counts, join keys). `"1"` and `1` stay distinct.
 */
export function cellKey(value: CellValue): string {
  if (value === null) return "null";
  if (value instanceof Date) return `d:${value.getTime()}`;
  switch (typeof value) {
    case "number":
      return `n:${value}`;
    case "boolean":
      return `b:${value}`;
    default:
      return `s:${value}`;
  }
}
