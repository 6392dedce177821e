// config.ts
// TransformConfig: the unit of persistence and reproducibility.
//
// Transform logic never fills in missing settings. Defaults live here, in
// the loader that turns untrusted JSON into a fully specified config.

import { z } from "zod";
import { ComputedColumnSpec } from "./computedColumns";
import { ValidationError } from "./errors";
import { parseFilterExpression } from "./filterDsl";
import { FILTER_OPERATORS, FilterCondition, FilterNode } from "./filters";
import { JoinStep } from "./joins";
import { ColumnExpectation, RequiredColumn } from "./schemaInspector";

/* --------------------------------------------------------------------------
 * CONFIG TYPES
 * -------------------------------------------------------------------------- */

export type SortDirection = "asc" | "desc";

export interface SortSpec {
  column: string;
  direction: SortDirection;
}

export interface TransformConfig {
  /** Base dataset; the left side of the first join. */
  dataset: string;
  joins: JoinStep[];
  filter: FilterNode;
  computedColumns: ComputedColumnSpec[];
  /** Selected output columns in output order; empty keeps every column. */
  columns: string[];
  sort: SortSpec | null;
  pageSize: number;
  /** Upper bound applied to any requested limit. */
  maxPageSize: number;
  /** Schema contract per dataset; violations are reported as warnings. */
  expectations: Record<string, RequiredColumn[]>;
}

/** Every dataset the config reads: the base first, then joined datasets. */
export function listDatasetRefs(config: TransformConfig): string[] {
  const refs = [config.dataset, ...config.joins.map((j) => j.right)];
  return Array.from(new Set(refs));
}

/* --------------------------------------------------------------------------
 * SCHEMAS
 * -------------------------------------------------------------------------- */

type FilterConditionInput = Omit<FilterCondition, "caseSensitive"> & { caseSensitive?: boolean };

type FilterNodeInput =
  | FilterConditionInput
  | { kind: "group"; operator: "and" | "or"; children: FilterNodeInput[] };

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const conditionSchema = z.object({
  kind: z.literal("condition"),
  column: z.string().min(1),
  operator: z.enum(FILTER_OPERATORS),
  value: z.union([scalarSchema, z.array(scalarSchema)]).optional(),
  caseSensitive: z.boolean().default(true),
});

const filterNodeSchema: z.ZodType<FilterNode, z.ZodTypeDef, FilterNodeInput> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    conditionSchema,
    z.object({
      kind: z.literal("group"),
      operator: z.enum(["and", "or"]),
      children: z.array(filterNodeSchema),
    }),
  ])
);

const filterSchema = z.preprocess(
  (value) => (typeof value === "string" ? parseFilterExpression(value) : value),
  filterNodeSchema
);

const columnTypeSchema = z.enum(["boolean", "integer", "float", "date", "string"]);

const joinStepSchema = z.object({
  left: z.string().min(1),
  right: z.string().min(1),
  keys: z.array(z.object({ left: z.string().min(1), right: z.string().min(1) })).min(1),
  type: z.enum(["inner", "left"]),
  rightPrefix: z.string().min(1),
  caseInsensitive: z.boolean().default(false),
});

const computedColumnSchema = z.discriminatedUnion("function", [
  z.object({
    outputName: z.string().min(1),
    function: z.literal("concat"),
    args: z.object({
      columns: z.array(z.string().min(1)).min(1),
      separator: z.string().default(""),
    }),
  }),
  z.object({
    outputName: z.string().min(1),
    function: z.literal("coalesce"),
    args: z.object({ columns: z.array(z.string().min(1)).min(1) }),
  }),
  z.object({
    outputName: z.string().min(1),
    function: z.literal("date_format"),
    args: z.object({
      column: z.string().min(1),
      inputFormat: z.string().min(1).optional(),
      outputFormat: z.string().min(1),
    }),
  }),
  z.object({
    outputName: z.string().min(1),
    function: z.literal("bucket"),
    args: z.object({
      column: z.string().min(1),
      boundaries: z.array(z.number()),
      labels: z.array(z.string()),
      unbucketedLabel: z.string().default("unbucketed"),
    }),
  }),
]);

const columnExpectationSchema: z.ZodType<ColumnExpectation> = z.object({
  name: z.string().min(1),
  type: columnTypeSchema.optional(),
  nullable: z.boolean().optional(),
});

export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_MAX_PAGE_SIZE = 100;

export const transformConfigSchema: z.ZodType<TransformConfig, z.ZodTypeDef, unknown> = z.object({
  dataset: z.string().min(1),
  joins: z.array(joinStepSchema).default([]),
  filter: filterSchema.default({ kind: "group", operator: "and", children: [] }),
  computedColumns: z.array(computedColumnSchema).default([]),
  columns: z.array(z.string().min(1)).default([]),
  sort: z
    .object({
      column: z.string().min(1),
      direction: z.enum(["asc", "desc"]).default("asc"),
    })
    .nullable()
    .default(null),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
  maxPageSize: z.number().int().positive().default(DEFAULT_MAX_PAGE_SIZE),
  expectations: z
    .record(z.array(z.union([z.string().min(1), columnExpectationSchema])))
    .default({}),
});

/* --------------------------------------------------------------------------
 * LOADING + SERIALIZATION
 * -------------------------------------------------------------------------- */

function formatPath(path: (string | number)[]): string {
  if (path.length === 0) return "config";
  return path
    .map((part, idx) => (typeof part === "number" ? `[${part}]` : idx === 0 ? part : `.${part}`))
    .join("");
}

/**
 * The issue to report. A failed union carries one error per member; the
 * member that got furthest into the value names the most useful field.
 */
function deepestIssue(issue: z.ZodIssue): z.ZodIssue {
  if (issue.code !== z.ZodIssueCode.invalid_union) return issue;
  let best: z.ZodIssue = issue;
  for (const member of issue.unionErrors) {
    for (const inner of member.issues) {
      const candidate = deepestIssue(inner);
      if (candidate.path.length > best.path.length) best = candidate;
    }
  }
  return best;
}

/**
 * Validate a config from JSON text or an already-parsed value, filling in
 * loader defaults. A `filter` given as text is parsed as a filter
 * expression.
 */
export function parseTransformConfig(input: unknown): TransformConfig {
  let value = input;
  if (typeof input === "string") {
    try {
      value = JSON.parse(input);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError("config", `invalid JSON: ${reason}`);
    }
  }

  const result = transformConfigSchema.safeParse(value);
  if (!result.success) {
    const issue = deepestIssue(result.error.issues[0]);
    throw new ValidationError(formatPath(issue.path), issue.message);
  }
  return result.data;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, inner]) => [key, sortKeys(inner)]));
  }
  return value;
}

/**
 * Deterministic JSON: keys sorted at every level, two-space indent, trailing
 * newline. Equal configs serialize to identical bytes.
 */
export function serializeTransformConfig(config: TransformConfig): string {
  return `${JSON.stringify(sortKeys(config), null, 2)}\n`;
}
