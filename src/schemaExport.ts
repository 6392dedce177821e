// schemaExport.ts
// Schema and quality summary of a transform: which datasets it reads, their
// inferred column types and null counts, and which columns the config
// depends on. Holds no row values and no timestamps, so the same inputs
// always describe the same way.

import { TransformConfig, listDatasetRefs } from "./config";
import { computedInputs } from "./computedColumns";
import { DatasetResolver } from "./datasets";
import { DatasetNotFound } from "./errors";
import { collectFilterColumns } from "./filters";
import { PREFIX_SEPARATOR, prefixedColumnName } from "./joins";
import { InspectOptions, TableProfile, inspect } from "./schemaInspector";
import { ColumnType } from "./table";

export interface ColumnSummary {
  name: string;
  type: ColumnType;
  nullCount: number;
  distinctCountSampled: number;
}

export interface DatasetSummary {
  name: string;
  rowCount: number;
  /** In table order. */
  columns: ColumnSummary[];
}

export interface JoinKeyColumn {
  dataset: string;
  column: string;
}

export interface TransformSchema {
  /** Sorted by name. */
  datasets: DatasetSummary[];
  /** Source columns used as join keys, sorted by dataset then column. */
  joinKeys: JoinKeyColumn[];
  filterColumns: string[];
  computedInputs: string[];
  /** In output order. */
  outputColumns: string[];
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortedUnique(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

function profileOf(profiles: Record<string, TableProfile>, name: string): TableProfile {
  if (!Object.prototype.hasOwnProperty.call(profiles, name)) {
    throw new DatasetNotFound(name);
  }
  return profiles[name];
}

/** Map a cumulative join column (`prefix__name`) back to its dataset. */
function keyOrigin(config: TransformConfig, column: string, beforeStep: number): JoinKeyColumn {
  for (const step of config.joins.slice(0, beforeStep)) {
    const marker = `${step.rightPrefix}${PREFIX_SEPARATOR}`;
    if (column.startsWith(marker)) {
      return { dataset: step.right, column: column.slice(marker.length) };
    }
  }
  return { dataset: config.dataset, column };
}

function outputColumns(config: TransformConfig, profiles: Record<string, TableProfile>): string[] {
  if (config.columns.length > 0) return [...config.columns];

  const names = Object.keys(profileOf(profiles, config.dataset).types);
  for (const step of config.joins) {
    const rightKeys = new Set(step.keys.map((k) => k.right));
    for (const column of Object.keys(profileOf(profiles, step.right).types)) {
      if (!rightKeys.has(column)) names.push(prefixedColumnName(step.rightPrefix, column));
    }
  }
  for (const spec of config.computedColumns) names.push(spec.outputName);
  return names;
}

export function describeTransform(
  config: TransformConfig,
  profiles: Record<string, TableProfile>
): TransformSchema {
  const datasets = listDatasetRefs(config)
    .sort()
    .map((name): DatasetSummary => {
      const profile = profileOf(profiles, name);
      return {
        name,
        rowCount: profile.rowCount,
        columns: Object.keys(profile.types).map((column) => ({
          name: column,
          type: profile.types[column],
          nullCount: profile.perColumn[column]?.nullCount ?? 0,
          distinctCountSampled: profile.perColumn[column]?.distinctCountSampled ?? 0,
        })),
      };
    });

  const keyColumns = new Map<string, JoinKeyColumn>();
  config.joins.forEach((step, index) => {
    for (const key of step.keys) {
      const left = keyOrigin(config, key.left, index);
      keyColumns.set(JSON.stringify([left.dataset, left.column]), left);
      keyColumns.set(JSON.stringify([step.right, key.right]), { dataset: step.right, column: key.right });
    }
  });
  const joinKeys = Array.from(keyColumns.values()).sort(
    (a, b) => compareText(a.dataset, b.dataset) || compareText(a.column, b.column)
  );

  return {
    datasets,
    joinKeys,
    filterColumns: sortedUnique(collectFilterColumns(config.filter)),
    computedInputs: sortedUnique(config.computedColumns.flatMap(computedInputs)),
    outputColumns: outputColumns(config, profiles),
  };
}

/** Resolve and profile every dataset of the config, then describe it. */
export function exportSchema(
  config: TransformConfig,
  resolve: DatasetResolver,
  options: InspectOptions = {}
): TransformSchema {
  const profiles: Record<string, TableProfile> = {};
  for (const ref of listDatasetRefs(config)) {
    profiles[ref] = inspect(resolve(ref), options);
  }
  return describeTransform(config, profiles);
}
