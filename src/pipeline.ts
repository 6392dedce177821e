// pipeline.ts
// Runs one TransformConfig against resolved tables:
//
//   resolve → inspect → join → filter → compute → select → sort → paginate
//
// Key ideas:
//
// - Every dataset is resolved and profiled once per run; no state survives
//   the call.
// - Dataset columns take the inspector's inferred types, so sorting and date
//   filters see the same types the profile reports.
// - `executeTransform` throws typed errors; `runTransform` folds any error
//   into `{ status: "error", message }`.

import { TransformConfig, SortSpec, listDatasetRefs } from "./config";
import { DatasetResolver } from "./datasets";
import { parseDateValue } from "./dates";
import { ValidationError } from "./errors";
import { compileFilter } from "./filters";
import { JoinPlan, JoinQualityReport, executeJoinPlan, planJoins } from "./joins";
import { applyComputedColumns } from "./computedColumns";
import {
  SchemaProblem,
  TableProfile,
  InspectOptions,
  inspect,
  isAllNullColumn,
  validateProfile,
} from "./schemaInspector";
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
 * REQUEST / RESPONSE TYPES
 * -------------------------------------------------------------------------- */

export interface PageRequest {
  offset?: number;
  limit?: number;
}

export interface TransformWarning {
  dataset: string;
  column: string;
  problem: SchemaProblem;
}

export interface TransformMeta {
  columns: Column[];
  joins: JoinQualityReport[];
  warnings: TransformWarning[];
}

export interface TransformResult {
  rows: Row[];
  /** Rows after filtering, before pagination. */
  total: number;
  offset: number;
  /** Effective limit after clamping to `maxPageSize`. */
  limit: number;
  meta: TransformMeta;
}

export type TransformResponse =
  | ({ status: "ok" } & TransformResult)
  | { status: "error"; message: string };

/* --------------------------------------------------------------------------
 * DATASET PROFILING
 * -------------------------------------------------------------------------- */

interface ResolvedDataset {
  table: Table;
  profile: TableProfile;
}

/** Where a column of the joined table came from. */
interface ColumnOrigin {
  dataset: string;
  column: string;
}

function resolveDatasets(
  config: TransformConfig,
  resolve: DatasetResolver,
  options: InspectOptions
): Map<string, ResolvedDataset> {
  const resolved = new Map<string, ResolvedDataset>();
  for (const ref of listDatasetRefs(config)) {
    const source = resolve(ref);
    const profile = inspect(source, options);
    const table: Table = {
      columns: source.columns.map((c) => ({ name: c.name, type: profile.types[c.name] ?? c.type })),
      rows: source.rows,
    };
    resolved.set(ref, { table, profile });
  }
  return resolved;
}

function lookup(resolved: Map<string, ResolvedDataset>, ref: string): ResolvedDataset {
  const found = resolved.get(ref);
  if (!found) {
    throw new ValidationError("dataset", `dataset '${ref}' was not resolved`);
  }
  return found;
}

function columnOrigins(config: TransformConfig, plan: JoinPlan): Map<string, ColumnOrigin> {
  const origins = new Map<string, ColumnOrigin>();
  for (const column of plan.base.columns) {
    origins.set(column.name, { dataset: config.dataset, column: column.name });
  }
  for (const planned of plan.steps) {
    for (const { source, column } of planned.renamed) {
      origins.set(column.name, { dataset: planned.step.right, column: source });
    }
  }
  return origins;
}

function collectWarnings(
  config: TransformConfig,
  resolved: Map<string, ResolvedDataset>,
  origins: Map<string, ColumnOrigin>
): TransformWarning[] {
  const warnings: TransformWarning[] = [];
  const seen = new Set<string>();
  const push = (warning: TransformWarning) => {
    const id = JSON.stringify([warning.dataset, warning.column, warning.problem]);
    if (seen.has(id)) return;
    seen.add(id);
    warnings.push(warning);
  };

  const refs = listDatasetRefs(config);
  for (const dataset of Object.keys(config.expectations).sort()) {
    if (!refs.includes(dataset)) {
      throw new ValidationError(`expectations.${dataset}`, "dataset is not read by this transform");
    }
  }

  for (const dataset of refs) {
    const required = config.expectations[dataset];
    if (!required) continue;
    const { profile } = lookup(resolved, dataset);
    for (const issue of validateProfile(profile, required)) {
      push({ dataset, column: issue.column, problem: issue.problem });
    }
  }

  for (const step of config.joins) {
    for (const key of step.keys) {
      const left = origins.get(key.left);
      if (left && isAllNullColumn(lookup(resolved, left.dataset).profile, left.column)) {
        push({ dataset: left.dataset, column: left.column, problem: "all_null" });
      }
      if (isAllNullColumn(lookup(resolved, step.right).profile, key.right)) {
        push({ dataset: step.right, column: key.right, problem: "all_null" });
      }
    }
  }

  return warnings;
}

function dateFormatsByColumn(
  resolved: Map<string, ResolvedDataset>,
  origins: Map<string, ColumnOrigin>
): Record<string, string> {
  const formats: Record<string, string> = {};
  origins.forEach((origin, name) => {
    const format = lookup(resolved, origin.dataset).profile.dateFormats[origin.column];
    if (format !== undefined) formats[name] = format;
  });
  return formats;
}

/* --------------------------------------------------------------------------
 * SELECT / SORT / PAGINATE
 * -------------------------------------------------------------------------- */

function selectColumns(table: Table, selected: string[]): Table {
  if (selected.length === 0) return table;

  const seen = new Set<string>();
  const columns = selected.map((name, idx) => {
    const column = table.columns.find((c) => c.name === name);
    if (!column) {
      throw new ValidationError(`columns[${idx}]`, `unknown column '${name}'`);
    }
    if (seen.has(name)) {
      throw new ValidationError(`columns[${idx}]`, `column '${name}' is selected twice`);
    }
    seen.add(name);
    return column;
  });

  const rows = rowsToEnumerable(table.rows)
    .select((row) => {
      const out: Row = {};
      for (const column of columns) out[column.name] = row[column.name] ?? null;
      return out;
    })
    .toArray();

  return { columns, rows };
}

type SortKey = number | string | null;

function sortKeyFor(type: ColumnType, dateFormat: string | undefined): (cell: CellValue) => SortKey {
  switch (type) {
    case "integer":
    case "float":
      return (cell) => toNumber(cell);
    case "date":
      return (cell) => parseDateValue(cell, dateFormat)?.getTime() ?? parseDateValue(cell)?.getTime() ?? null;
    case "boolean":
      return (cell) => {
        if (typeof cell === "boolean") return cell ? 1 : 0;
        if (typeof cell !== "string") return null;
        const text = cell.trim().toLowerCase();
        if (text === "true" || text === "yes") return 1;
        if (text === "false" || text === "no") return 0;
        return null;
      };
    case "string":
      return (cell) => (isBlank(cell) ? null : stringifyCell(cell));
  }
}

function compareKeys(a: number | string, b: number | string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Stable single-column sort; blank or unparsable keys go last either way. */
export function sortTable(table: Table, sort: SortSpec, dateFormats: Record<string, string> = {}): Table {
  const column = table.columns.find((c) => c.name === sort.column);
  if (!column) {
    throw new ValidationError("sort.column", `unknown column '${sort.column}'`);
  }

  const keyOf = sortKeyFor(column.type, dateFormats[column.name]);
  const direction = sort.direction === "desc" ? -1 : 1;
  const decorated = table.rows.map((row, index) => ({ row, index, key: keyOf(row[column.name] ?? null) }));

  decorated.sort((a, b) => {
    if (a.key === null || b.key === null) {
      if (a.key === b.key) return a.index - b.index;
      return a.key === null ? 1 : -1;
    }
    return compareKeys(a.key, b.key) * direction || a.index - b.index;
  });

  return { columns: table.columns, rows: decorated.map((d) => d.row) };
}

function checkPageValue(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, "must be a non-negative integer");
  }
  return value;
}

export interface PageWindow {
  offset: number;
  limit: number;
}

/** Offset defaults to 0, limit to `pageSize`; limit is clamped to `maxPageSize`. */
export function resolvePage(page: PageRequest, pageSize: number, maxPageSize: number): PageWindow {
  const offset = checkPageValue(page.offset ?? 0, "page.offset");
  const limit = checkPageValue(page.limit ?? pageSize, "page.limit");
  return { offset, limit: Math.min(limit, maxPageSize) };
}

/* --------------------------------------------------------------------------
 * ENTRY POINTS
 * -------------------------------------------------------------------------- */

export interface TransformOptions {
  inspect?: InspectOptions;
}

export function executeTransform(
  config: TransformConfig,
  resolve: DatasetResolver,
  page: PageRequest = {},
  options: TransformOptions = {}
): TransformResult {
  const window = resolvePage(page, config.pageSize, config.maxPageSize);

  const resolved = resolveDatasets(config, resolve, options.inspect ?? {});
  const plan = planJoins(config.dataset, config.joins, (ref) => lookup(resolved, ref).table);
  const origins = columnOrigins(config, plan);
  const warnings = collectWarnings(config, resolved, origins);
  const dateFormats = dateFormatsByColumn(resolved, origins);

  const joined = executeJoinPlan(plan);

  const predicate = compileFilter(config.filter, {
    columns: joined.table.columns.map((c) => c.name),
    dateFormats,
  });
  const filtered: Table = {
    columns: joined.table.columns,
    rows: rowsToEnumerable(joined.table.rows).where(predicate).toArray(),
  };

  const computed = applyComputedColumns(config.computedColumns, filtered);
  const selected = selectColumns(computed, config.columns);
  const sorted = config.sort ? sortTable(selected, config.sort, dateFormats) : selected;

  // Earlier stages may pass source rows through; the page never shares them.
  const rows = rowsToEnumerable(sorted.rows)
    .skip(window.offset)
    .take(window.limit)
    .select((row): Row => ({ ...row }))
    .toArray();

  return {
    rows,
    total: sorted.rows.length,
    offset: window.offset,
    limit: window.limit,
    meta: { columns: sorted.columns, joins: joined.reports, warnings },
  };
}

/** Same as `executeTransform`, but never throws. */
export function runTransform(
  config: TransformConfig,
  resolve: DatasetResolver,
  page: PageRequest = {},
  options: TransformOptions = {}
): TransformResponse {
  try {
    return { status: "ok", ...executeTransform(config, resolve, page, options) };
  } catch (err) {
    return { status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}
