// datasets.ts
// Dataset access. How a dataset name becomes a table is the caller's
// concern; the engine only sees a resolver function.

import { DatasetNotFound } from "./errors";
import { inferColumnType } from "./schemaInspector";
import { CellValue, Column, Row, Table, createTable, isBlank } from "./table";

export type DatasetResolver = (name: string) => Table;

export interface InMemoryDb {
  tables: Record<string, Table>;
}

export function inMemoryResolver(db: InMemoryDb): DatasetResolver {
  return (name) => {
    if (!Object.prototype.hasOwnProperty.call(db.tables, name)) {
      throw new DatasetNotFound(name);
    }
    return db.tables[name];
  };
}

/**
 * Build a table from plain records. Columns appear in first-seen key order
 * and are typed from their values.
 */
export function tableFromRecords(records: Record<string, CellValue | undefined>[]): Table {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        names.push(key);
      }
    }
  }

  const columns: Column[] = names.map((name) => {
    const values = records
      .map((record) => record[name] ?? null)
      .filter((value) => !isBlank(value));
    return { name, type: inferColumnType(values).type };
  });

  const rows: Row[] = records.map((record) => {
    const row: Row = {};
    for (const name of names) row[name] = record[name] ?? null;
    return row;
  });

  return createTable(columns, rows);
}
