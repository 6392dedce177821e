// computedColumns.ts
// Derived columns from a fixed set of functions, applied in declared order.
// A later column may read any column present at its point of application,
// including the outputs of earlier ones.
//
// A bad cell (unparsable date, non-numeric bucket input) degrades to null or
// the unbucketed label; it never aborts the run.

import { formatDate, isValidDatePattern, isValidInputPattern, parseDateValue } from "./dates";
import { ValidationError } from "./errors";
import {
  CellValue,
  Column,
  ColumnType,
  Row,
  Table,
  isBlank,
  rowsToEnumerable,
  stringifyCell,
  toNumber,
} from "./table";

/* --------------------------------------------------------------------------
 * COLUMN SPEC TYPES
 * -------------------------------------------------------------------------- */

export interface ConcatArgs {
  columns: string[];
  separator: string;
}

export interface CoalesceArgs {
  columns: string[];
}

export interface DateFormatArgs {
  column: string;
  /** Pattern used to read the input; the fixed format set when omitted. */
  inputFormat?: string;
  outputFormat: string;
}

export interface BucketArgs {
  column: string;
  /** Strictly ascending; `labels.length === boundaries.length + 1`. */
  boundaries: number[];
  labels: string[];
  unbucketedLabel: string;
}

export type ComputedColumnSpec =
  | { outputName: string; function: "concat"; args: ConcatArgs }
  | { outputName: string; function: "coalesce"; args: CoalesceArgs }
  | { outputName: string; function: "date_format"; args: DateFormatArgs }
  | { outputName: string; function: "bucket"; args: BucketArgs };

export type ComputedFunction = ComputedColumnSpec["function"];

export const cc = {
  concat(outputName: string, columns: string[], separator = ""): ComputedColumnSpec {
    return { outputName, function: "concat", args: { columns, separator } };
  },
  coalesce(outputName: string, columns: string[]): ComputedColumnSpec {
    return { outputName, function: "coalesce", args: { columns } };
  },
  dateFormat(
    outputName: string,
    column: string,
    outputFormat: string,
    inputFormat?: string
  ): ComputedColumnSpec {
    const args: DateFormatArgs = { column, outputFormat };
    if (inputFormat !== undefined) args.inputFormat = inputFormat;
    return { outputName, function: "date_format", args };
  },
  bucket(
    outputName: string,
    column: string,
    boundaries: number[],
    labels: string[],
    unbucketedLabel = "unbucketed"
  ): ComputedColumnSpec {
    return { outputName, function: "bucket", args: { column, boundaries, labels, unbucketedLabel } };
  },
};

/** Input columns a computed column reads, in declared order. */
export function computedInputs(spec: ComputedColumnSpec): string[] {
  switch (spec.function) {
    case "concat":
    case "coalesce":
      return [...spec.args.columns];
    case "date_format":
    case "bucket":
      return [spec.args.column];
  }
}

/* --------------------------------------------------------------------------
 * COMPILATION
 * -------------------------------------------------------------------------- */

type CellComputer = (row: Row) => CellValue;

interface CompiledColumn {
  column: Column;
  compute: CellComputer;
}

function requireColumn(columns: Column[], name: string, field: string): Column {
  const found = columns.find((c) => c.name === name);
  if (!found) {
    throw new ValidationError(field, `unknown column '${name}'`);
  }
  return found;
}

function requireColumnList(columns: Column[], names: string[], field: string): Column[] {
  if (names.length === 0) {
    throw new ValidationError(field, "at least one input column is required");
  }
  return names.map((name, idx) => requireColumn(columns, name, `${field}[${idx}]`));
}

/** Label index = number of boundaries at or below the value. */
function bucketIndex(value: number, boundaries: number[]): number {
  let idx = 0;
  while (idx < boundaries.length && boundaries[idx] <= value) idx++;
  return idx;
}

function validateBucketArgs(args: BucketArgs, field: string): void {
  if (!args.boundaries.every((b) => Number.isFinite(b))) {
    throw new ValidationError(`${field}.boundaries`, "boundaries must be finite numbers");
  }
  for (let i = 1; i < args.boundaries.length; i++) {
    if (args.boundaries[i] <= args.boundaries[i - 1]) {
      throw new ValidationError(`${field}.boundaries`, "boundaries must be strictly ascending");
    }
  }
  if (args.labels.length !== args.boundaries.length + 1) {
    throw new ValidationError(
      `${field}.labels`,
      `expected ${args.boundaries.length + 1} labels for ${args.boundaries.length} boundaries, got ${args.labels.length}`
    );
  }
}

function compileSpec(spec: ComputedColumnSpec, columns: Column[], path: string): CompiledColumn {
  const argsPath = `${path}.args`;

  switch (spec.function) {
    case "concat": {
      const inputs = requireColumnList(columns, spec.args.columns, `${argsPath}.columns`).map((c) => c.name);
      const separator = spec.args.separator;
      return {
        column: { name: spec.outputName, type: "string" },
        compute: (row) => inputs.map((name) => stringifyCell(row[name])).join(separator),
      };
    }

    case "coalesce": {
      const inputs = requireColumnList(columns, spec.args.columns, `${argsPath}.columns`);
      const types = new Set<ColumnType>(inputs.map((c) => c.type));
      const [onlyType] = Array.from(types);
      const names = inputs.map((c) => c.name);
      return {
        column: { name: spec.outputName, type: types.size === 1 ? onlyType : "string" },
        compute: (row) => {
          for (const name of names) {
            const value = row[name] ?? null;
            if (!isBlank(value)) return value;
          }
          return null;
        },
      };
    }

    case "date_format": {
      const input = requireColumn(columns, spec.args.column, `${argsPath}.column`).name;
      const { inputFormat, outputFormat } = spec.args;
      if (!isValidDatePattern(outputFormat)) {
        throw new ValidationError(`${argsPath}.outputFormat`, `invalid date pattern '${outputFormat}'`);
      }
      if (inputFormat !== undefined && !isValidInputPattern(inputFormat)) {
        throw new ValidationError(`${argsPath}.inputFormat`, `invalid date pattern '${inputFormat}'`);
      }
      return {
        column: { name: spec.outputName, type: "string" },
        compute: (row) => {
          const parsed = parseDateValue(row[input], inputFormat);
          return parsed ? formatDate(parsed, outputFormat) : null;
        },
      };
    }

    case "bucket": {
      const input = requireColumn(columns, spec.args.column, `${argsPath}.column`).name;
      validateBucketArgs(spec.args, argsPath);
      const { boundaries, labels, unbucketedLabel } = spec.args;
      return {
        column: { name: spec.outputName, type: "string" },
        compute: (row) => {
          const value = toNumber(row[input]);
          return value === null ? unbucketedLabel : labels[bucketIndex(value, boundaries)];
        },
      };
    }
  }
}

/* --------------------------------------------------------------------------
 * APPLICATION
 * -------------------------------------------------------------------------- */

/**
 * Check one spec against the columns present at its point of application
 * and return the column it adds.
 */
function prepareSpec(spec: ComputedColumnSpec, columns: Column[], specPath: string): CompiledColumn {
  if (!spec.outputName) {
    throw new ValidationError(`${specPath}.outputName`, "missing output column name");
  }
  if (columns.some((c) => c.name === spec.outputName)) {
    throw new ValidationError(
      `${specPath}.outputName`,
      `'${spec.outputName}' collides with an existing column`
    );
  }
  return compileSpec(spec, columns, specPath);
}

/** Schema-only check of one spec; reads no rows. */
export function compileComputedColumn(spec: ComputedColumnSpec, columns: Column[], path: string): Column {
  return prepareSpec(spec, columns, path).column;
}

/**
 * Apply computed-column specs in order and return a new table. `path`
 * prefixes the field named in validation errors.
 */
export function applyComputedColumns(
  specs: ComputedColumnSpec[],
  table: Table,
  path = "computedColumns"
): Table {
  let columns = table.columns;
  let rows = table.rows;

  specs.forEach((spec, idx) => {
    const compiled = prepareSpec(spec, columns, `${path}[${idx}]`);
    const name = compiled.column.name;
    rows = rowsToEnumerable(rows)
      .select((row): Row => ({ ...row, [name]: compiled.compute(row) }))
      .toArray();
    columns = [...columns, compiled.column];
  });

  return { columns, rows };
}
