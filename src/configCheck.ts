// configCheck.ts
// Checks a whole config against dataset profiles without running it.
//
// Key ideas:
// - A run stops at the first problem; a check lists every one it can find.
// - Errors would fail a run. Warnings would not (empty selection, clamped
//   page size, expectation violations, join keys with no values).
// - Fields use the same notation as ValidationError.field.

import { compileComputedColumn } from "./computedColumns";
import { TransformConfig, listDatasetRefs } from "./config";
import { DatasetResolver } from "./datasets";
import { DatasetNotFound, ValidationError } from "./errors";
import { FilterCompileContext, FilterNode, compileFilter } from "./filters";
import { prefixedColumnName, validateJoinStep } from "./joins";
import { InspectOptions, TableProfile, inspect, isAllNullColumn, validateProfile } from "./schemaInspector";
import { Column } from "./table";

export interface ConfigProblem {
  field: string;
  message: string;
}

export interface ConfigCheckResult {
  errors: ConfigProblem[];
  warnings: ConfigProblem[];
}

/* --------------------------------------------------------------------------
 * PROBLEM LOG
 * -------------------------------------------------------------------------- */

class ProblemLog {
  readonly errors: ConfigProblem[] = [];
  readonly warnings: ConfigProblem[] = [];

  error(field: string, message: string): void {
    this.errors.push({ field, message });
  }

  warn(field: string, message: string): void {
    this.warnings.push({ field, message });
  }

  /** Run a throwing check; a ValidationError becomes a logged error. */
  attempt<T>(check: () => T): T | null {
    try {
      return check();
    } catch (err) {
      if (err instanceof ValidationError) {
        this.error(err.field, err.reason);
        return null;
      }
      throw err;
    }
  }
}

/* --------------------------------------------------------------------------
 * JOINED SCHEMA
 * -------------------------------------------------------------------------- */

interface ColumnOrigin {
  dataset: string;
  column: string;
}

interface JoinedSchema {
  columns: Column[];
  origins: Map<string, ColumnOrigin>;
  /** False when a dataset is missing, so later column checks would mislead. */
  complete: boolean;
}

function findProfile(profiles: Record<string, TableProfile>, name: string): TableProfile | undefined {
  return Object.prototype.hasOwnProperty.call(profiles, name) ? profiles[name] : undefined;
}

function profileColumns(profile: TableProfile): Column[] {
  return Object.keys(profile.types).map((name) => ({ name, type: profile.types[name] }));
}

function warnIfEmpty(
  profiles: Record<string, TableProfile>,
  origin: ColumnOrigin,
  field: string,
  log: ProblemLog
): void {
  const profile = findProfile(profiles, origin.dataset);
  if (profile && isAllNullColumn(profile, origin.column)) {
    log.warn(field, `join key '${origin.column}' of '${origin.dataset}' has no values`);
  }
}

function checkJoins(config: TransformConfig, profiles: Record<string, TableProfile>, log: ProblemLog): JoinedSchema {
  const base = findProfile(profiles, config.dataset);
  if (!base) log.error("dataset", `dataset '${config.dataset}' not found`);

  let columns = base ? profileColumns(base) : [];
  const origins = new Map<string, ColumnOrigin>(
    columns.map((c) => [c.name, { dataset: config.dataset, column: c.name }])
  );
  let complete = base !== undefined;
  const knownRefs = new Set<string>([config.dataset]);
  const prefixes = new Set<string>();

  config.joins.forEach((step, index) => {
    const path = `joins[${index}]`;
    log.attempt(() => validateJoinStep(step, index, knownRefs, prefixes));
    knownRefs.add(step.right);
    prefixes.add(step.rightPrefix);

    const right = findProfile(profiles, step.right);
    if (!right) log.error(`${path}.right`, `dataset '${step.right}' not found`);

    step.keys.forEach((key, k) => {
      const keyPath = `${path}.keys[${k}]`;
      const leftOrigin = origins.get(key.left);
      if (leftOrigin) {
        warnIfEmpty(profiles, leftOrigin, `${keyPath}.left`, log);
      } else if (complete) {
        log.error(`${keyPath}.left`, `column '${key.left}' not found in joined table`);
      }
      if (!right) return;
      if (right.types[key.right] === undefined) {
        log.error(`${keyPath}.right`, `column '${key.right}' not found in dataset '${step.right}'`);
      } else {
        warnIfEmpty(profiles, { dataset: step.right, column: key.right }, `${keyPath}.right`, log);
      }
    });

    if (!right) {
      complete = false;
      return;
    }

    const rightKeys = new Set(step.keys.map((k) => k.right));
    const added: Column[] = [];
    for (const column of profileColumns(right)) {
      if (rightKeys.has(column.name)) continue;
      const name = prefixedColumnName(step.rightPrefix, column.name);
      if (origins.has(name)) {
        log.error(`${path}.rightPrefix`, `output column '${name}' already exists`);
        continue;
      }
      origins.set(name, { dataset: step.right, column: column.name });
      added.push({ name, type: column.type });
    }
    columns = [...columns, ...added];
  });

  return { columns, origins, complete };
}

/* --------------------------------------------------------------------------
 * FILTER / COMPUTED / SELECTION
 * -------------------------------------------------------------------------- */

function checkFilter(node: FilterNode, context: FilterCompileContext, path: string, log: ProblemLog): void {
  if (node.kind === "condition") {
    log.attempt(() => compileFilter(node, context, path));
    return;
  }
  log.attempt(() => compileFilter({ ...node, children: [] }, context, path));
  node.children.forEach((child, idx) => checkFilter(child, context, `${path}.children[${idx}]`, log));
}

function checkComputedColumns(config: TransformConfig, columns: Column[], log: ProblemLog): Column[] {
  let current = columns;
  config.computedColumns.forEach((spec, idx) => {
    const available = current;
    const column = log.attempt(() => compileComputedColumn(spec, available, `computedColumns[${idx}]`));
    if (column) {
      current = [...current, column];
    } else if (spec.outputName && !current.some((c) => c.name === spec.outputName)) {
      // Keep later specs that read this output from reporting it as unknown.
      current = [...current, { name: spec.outputName, type: "string" }];
    }
  });
  return current;
}

function checkSelection(selected: string[], columns: Column[], log: ProblemLog): Column[] {
  if (selected.length === 0) return columns;

  const seen = new Set<string>();
  const output: Column[] = [];
  selected.forEach((name, idx) => {
    const column = columns.find((c) => c.name === name);
    if (!column) {
      log.error(`columns[${idx}]`, `unknown column '${name}'`);
    } else if (seen.has(name)) {
      log.error(`columns[${idx}]`, `column '${name}' is selected twice`);
    } else {
      seen.add(name);
      output.push(column);
    }
  });
  return output;
}

function checkExpectations(config: TransformConfig, profiles: Record<string, TableProfile>, log: ProblemLog): void {
  const refs = listDatasetRefs(config);
  for (const dataset of Object.keys(config.expectations).sort()) {
    const field = `expectations.${dataset}`;
    if (!refs.includes(dataset)) {
      log.error(field, "dataset is not read by this transform");
      continue;
    }
    const profile = findProfile(profiles, dataset);
    if (!profile) continue;
    for (const issue of validateProfile(profile, config.expectations[dataset])) {
      log.warn(field, `column '${issue.column}': ${issue.problem}`);
    }
  }
}

/* --------------------------------------------------------------------------
 * ENTRY POINTS
 * -------------------------------------------------------------------------- */

/**
 * List every problem of `config` against the given profiles. Never throws
 * for a config problem; a missing profile is reported as an error.
 */
export function checkTransformConfig(
  config: TransformConfig,
  profiles: Record<string, TableProfile>
): ConfigCheckResult {
  const log = new ProblemLog();
  const joined = checkJoins(config, profiles, log);

  if (joined.complete) {
    const dateFormats: Record<string, string> = {};
    joined.origins.forEach((origin, name) => {
      const format = findProfile(profiles, origin.dataset)?.dateFormats[origin.column];
      if (format !== undefined) dateFormats[name] = format;
    });
    checkFilter(config.filter, { columns: joined.columns.map((c) => c.name), dateFormats }, "filter", log);

    const computed = checkComputedColumns(config, joined.columns, log);
    const output = checkSelection(config.columns, computed, log);
    const sort = config.sort;
    if (sort && !output.some((c) => c.name === sort.column)) {
      log.error("sort.column", `unknown column '${sort.column}'`);
    }
  }

  if (config.columns.length === 0) {
    log.warn("columns", "no columns selected; every column is returned");
  }
  if (config.pageSize > config.maxPageSize) {
    log.warn("pageSize", `larger than maxPageSize ${config.maxPageSize}; pages are clamped`);
  }
  checkExpectations(config, profiles, log);

  return { errors: [...log.errors], warnings: [...log.warnings] };
}

/** Resolve and profile what can be found, then check the config. */
export function checkConfig(
  config: TransformConfig,
  resolve: DatasetResolver,
  options: InspectOptions = {}
): ConfigCheckResult {
  const profiles: Record<string, TableProfile> = {};
  for (const ref of listDatasetRefs(config)) {
    try {
      profiles[ref] = inspect(resolve(ref), options);
    } catch (err) {
      // Reported by the check itself.
      if (!(err instanceof DatasetNotFound)) throw err;
    }
  }
  return checkTransformConfig(config, profiles);
}
