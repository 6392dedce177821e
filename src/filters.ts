// filters.ts
// Boolean filter trees over table rows.
//
// Key ideas:
//
// - A tree is compiled once into a plain predicate: operator dispatch, regex
//   construction and operand parsing happen at compile time, so evaluating
//   a row only compares cells.
// - Config mistakes (unknown column, missing operand, bad regex) throw a
//   ValidationError at compile time. Cell-level problems (a non-numeric
//   cell under `gt`, an unparsable date) make the condition false.
// - An empty AND group is true; an empty OR group is false.

import { parseDateValue } from "./dates";
import { ValidationError } from "./errors";
import { CellValue, Row, isBlank, stringifyCell, toNumber } from "./table";

/* --------------------------------------------------------------------------
 * FILTER TYPES
 * -------------------------------------------------------------------------- */

export const FILTER_OPERATORS = [
  "equals",
  "not_equals",
  "contains",
  "not_contains",
  "regex",
  "in",
  "not_in",
  "gt",
  "gte",
  "lt",
  "lte",
  "between",
  "is_null",
  "is_not_null",
  "date_before",
  "date_after",
  "date_between",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type FilterScalar = string | number | boolean;
export type FilterValue = FilterScalar | FilterScalar[];

export interface FilterCondition {
  kind: "condition";
  column: string;
  operator: FilterOperator;
  value?: FilterValue;
  caseSensitive: boolean;
}

export interface FilterGroup {
  kind: "group";
  operator: "and" | "or";
  children: FilterNode[];
}

export type FilterNode = FilterGroup | FilterCondition;

export type RowPredicate = (row: Row) => boolean;

export interface FilterCompileContext {
  /** Columns available to the filter; when given, other columns are rejected. */
  columns?: string[];
  /** Inferred date format per column, used by the date operators. */
  dateFormats?: Record<string, string>;
}

/* --------------------------------------------------------------------------
 * BUILDERS
 * -------------------------------------------------------------------------- */

interface TextOptions {
  caseSensitive?: boolean;
}

function condition(
  column: string,
  operator: FilterOperator,
  value?: FilterValue,
  options: TextOptions = {}
): FilterCondition {
  const node: FilterCondition = {
    kind: "condition",
    column,
    operator,
    caseSensitive: options.caseSensitive ?? true,
  };
  if (value !== undefined) node.value = value;
  return node;
}

export const f = {
  equals(column: string, value: FilterScalar, options?: TextOptions): FilterCondition {
    return condition(column, "equals", value, options);
  },
  notEquals(column: string, value: FilterScalar, options?: TextOptions): FilterCondition {
    return condition(column, "not_equals", value, options);
  },
  contains(column: string, value: string, options?: TextOptions): FilterCondition {
    return condition(column, "contains", value, options);
  },
  notContains(column: string, value: string, options?: TextOptions): FilterCondition {
    return condition(column, "not_contains", value, options);
  },
  regex(column: string, pattern: string, options?: TextOptions): FilterCondition {
    return condition(column, "regex", pattern, options);
  },
  in(column: string, values: FilterScalar[], options?: TextOptions): FilterCondition {
    return condition(column, "in", values, options);
  },
  notIn(column: string, values: FilterScalar[], options?: TextOptions): FilterCondition {
    return condition(column, "not_in", values, options);
  },
  gt(column: string, value: number): FilterCondition {
    return condition(column, "gt", value);
  },
  gte(column: string, value: number): FilterCondition {
    return condition(column, "gte", value);
  },
  lt(column: string, value: number): FilterCondition {
    return condition(column, "lt", value);
  },
  lte(column: string, value: number): FilterCondition {
    return condition(column, "lte", value);
  },
  between(column: string, from: number, to: number): FilterCondition {
    return condition(column, "between", [from, to]);
  },
  isNull(column: string): FilterCondition {
    return condition(column, "is_null");
  },
  isNotNull(column: string): FilterCondition {
    return condition(column, "is_not_null");
  },
  dateBefore(column: string, date: string): FilterCondition {
    return condition(column, "date_before", date);
  },
  dateAfter(column: string, date: string): FilterCondition {
    return condition(column, "date_after", date);
  },
  dateBetween(column: string, from: string, to: string): FilterCondition {
    return condition(column, "date_between", [from, to]);
  },
  and(...children: FilterNode[]): FilterGroup {
    return { kind: "group", operator: "and", children };
  },
  or(...children: FilterNode[]): FilterGroup {
    return { kind: "group", operator: "or", children };
  },
};

/* --------------------------------------------------------------------------
 * OPERAND PARSING (COMPILE TIME)
 * -------------------------------------------------------------------------- */

type CellTest = (cell: CellValue) => boolean;

interface ConditionScope {
  node: FilterCondition;
  path: string;
  dateFormat: string | undefined;
}

function isScalar(value: unknown): value is FilterScalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function foldCase(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

function scalarOperand({ node, path }: ConditionScope): FilterScalar {
  if (!isScalar(node.value)) {
    throw new ValidationError(`${path}.value`, `${node.operator} expects a single value`);
  }
  return node.value;
}

function textOperand(scope: ConditionScope): string {
  return foldCase(String(scalarOperand(scope)), scope.node.caseSensitive);
}

/** A value list; a comma-separated string is accepted as a list too. */
function listOperand({ node, path }: ConditionScope): Set<string> {
  const value = node.value;
  let items: FilterScalar[];
  if (Array.isArray(value)) {
    items = value;
  } else if (typeof value === "string") {
    items = value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  } else {
    throw new ValidationError(`${path}.value`, `${node.operator} expects a list of values`);
  }
  return new Set(items.map((item) => foldCase(String(item), node.caseSensitive)));
}

function numberOperand(value: FilterValue | undefined, field: string, operator: string): number {
  const parsed = isScalar(value) && typeof value !== "boolean" ? toNumber(value) : null;
  if (parsed === null) {
    throw new ValidationError(field, `${operator} expects a numeric value`);
  }
  return parsed;
}

function rangeOperand({ node, path }: ConditionScope): [FilterScalar, FilterScalar] {
  const value = node.value;
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ValidationError(`${path}.value`, `${node.operator} expects a [from, to] pair`);
  }
  return [value[0], value[1]];
}

/** Operand dates that fail to parse leave the condition permanently false. */
function dateOperand(value: FilterScalar, dateFormat: string | undefined): number | null {
  if (typeof value !== "string") return null;
  return parseDateValue(value, dateFormat)?.getTime() ?? parseDateValue(value)?.getTime() ?? null;
}

function cellTime(cell: CellValue, dateFormat: string | undefined): number | null {
  return parseDateValue(cell, dateFormat)?.getTime() ?? null;
}

/* --------------------------------------------------------------------------
 * OPERATOR TABLE
 * -------------------------------------------------------------------------- */

function numericTest(compare: (cell: number, operand: number) => boolean) {
  return ({ node, path }: ConditionScope): CellTest => {
    const operand = numberOperand(node.value, `${path}.value`, node.operator);
    return (cell) => {
      const num = toNumber(cell);
      return num !== null && compare(num, operand);
    };
  };
}

function dateTest(compare: (cell: number, operand: number) => boolean) {
  return (scope: ConditionScope): CellTest => {
    const operand = dateOperand(scalarOperand(scope), scope.dateFormat);
    if (operand === null) return () => false;
    return (cell) => {
      const time = cellTime(cell, scope.dateFormat);
      return time !== null && compare(time, operand);
    };
  };
}

const OPERATOR_COMPILERS: Record<FilterOperator, (scope: ConditionScope) => CellTest> = {
  equals: (scope) => {
    const operand = textOperand(scope);
    return (cell) => foldCase(stringifyCell(cell), scope.node.caseSensitive) === operand;
  },
  not_equals: (scope) => {
    const operand = textOperand(scope);
    return (cell) => foldCase(stringifyCell(cell), scope.node.caseSensitive) !== operand;
  },
  contains: (scope) => {
    const operand = textOperand(scope);
    return (cell) => foldCase(stringifyCell(cell), scope.node.caseSensitive).includes(operand);
  },
  not_contains: (scope) => {
    const operand = textOperand(scope);
    return (cell) => !foldCase(stringifyCell(cell), scope.node.caseSensitive).includes(operand);
  },
  regex: (scope) => {
    const source = String(scalarOperand(scope));
    let pattern: RegExp;
    try {
      pattern = new RegExp(source, scope.node.caseSensitive ? "" : "i");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`${scope.path}.value`, `invalid regular expression: ${reason}`);
    }
    return (cell) => pattern.test(stringifyCell(cell));
  },
  in: (scope) => {
    const members = listOperand(scope);
    return (cell) => members.has(foldCase(stringifyCell(cell), scope.node.caseSensitive));
  },
  not_in: (scope) => {
    const members = listOperand(scope);
    return (cell) => !members.has(foldCase(stringifyCell(cell), scope.node.caseSensitive));
  },
  gt: numericTest((cell, operand) => cell > operand),
  gte: numericTest((cell, operand) => cell >= operand),
  lt: numericTest((cell, operand) => cell < operand),
  lte: numericTest((cell, operand) => cell <= operand),
  between: (scope) => {
    const [from, to] = rangeOperand(scope);
    const low = numberOperand(from, `${scope.path}.value[0]`, "between");
    const high = numberOperand(to, `${scope.path}.value[1]`, "between");
    return (cell) => {
      const num = toNumber(cell);
      return num !== null && num >= low && num <= high;
    };
  },
  is_null: () => (cell) => isBlank(cell),
  is_not_null: () => (cell) => !isBlank(cell),
  date_before: dateTest((cell, operand) => cell < operand),
  date_after: dateTest((cell, operand) => cell > operand),
  date_between: (scope) => {
    const [from, to] = rangeOperand(scope);
    const low = dateOperand(from, scope.dateFormat);
    const high = dateOperand(to, scope.dateFormat);
    if (low === null || high === null) return () => false;
    return (cell) => {
      const time = cellTime(cell, scope.dateFormat);
      return time !== null && time >= low && time <= high;
    };
  },
};

/* --------------------------------------------------------------------------
 * COMPILATION + EVALUATION
 * -------------------------------------------------------------------------- */

function compileCondition(
  node: FilterCondition,
  context: FilterCompileContext,
  path: string
): RowPredicate {
  if (!node.column) {
    throw new ValidationError(`${path}.column`, "missing column");
  }
  if (context.columns && !context.columns.includes(node.column)) {
    throw new ValidationError(`${path}.column`, `unknown column '${node.column}'`);
  }
  if (!Object.prototype.hasOwnProperty.call(OPERATOR_COMPILERS, node.operator)) {
    throw new ValidationError(`${path}.operator`, `unsupported operator '${node.operator}'`);
  }

  const test = OPERATOR_COMPILERS[node.operator]({
    node,
    path,
    dateFormat: context.dateFormats?.[node.column],
  });
  const column = node.column;
  return (row) => test(row[column] ?? null);
}

/**
 * Compile a filter tree into a row predicate. `path` prefixes the field
 * named in validation errors.
 */
export function compileFilter(
  node: FilterNode,
  context: FilterCompileContext = {},
  path = "filter"
): RowPredicate {
  if (node.kind === "condition") {
    return compileCondition(node, context, path);
  }

  if (node.operator !== "and" && node.operator !== "or") {
    throw new ValidationError(`${path}.operator`, `unsupported group operator '${node.operator}'`);
  }

  if (node.children.length === 0) {
    return node.operator === "and" ? () => true : () => false;
  }

  const children = node.children.map((child, idx) =>
    compileFilter(child, context, `${path}.children[${idx}]`)
  );

  if (node.operator === "and") {
    return (row) => children.every((child) => child(row));
  }
  return (row) => children.some((child) => child(row));
}

export function evaluateFilter(
  node: FilterNode,
  row: Row,
  context: FilterCompileContext = {}
): boolean {
  return compileFilter(node, context)(row);
}

export function collectFilterColumns(node: FilterNode): Set<string> {
  const columns = new Set<string>();
  const walk = (n: FilterNode) => {
    if (n.kind === "condition") {
      columns.add(n.column);
    } else {
      n.children.forEach(walk);
    }
  };
  walk(node);
  return columns;
}

/**
 * Convert OR-of-AND filter groups (any group may match; every condition in
 * a group must match) into a tree. Empty groups are skipped; with no
 * non-empty group the result is an empty AND, which keeps every row.
 */
export function filterFromGroups(groups: FilterCondition[][]): FilterNode {
  const nonEmpty = groups.filter((group) => group.length > 0);
  if (nonEmpty.length === 0) return f.and();
  return f.or(...nonEmpty.map((group) => f.and(...group)));
}
