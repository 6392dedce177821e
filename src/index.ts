export * from "./table";
export * from "./errors";
export * from "./dates";
export * from "./schemaInspector";
export * from "./datasets";
export * from "./filters";
export * from "./filterDsl";
export * from "./computedColumns";
export * from "./joins";
export * from "./config";
export * from "./configCheck";
export * from "./pipeline";
export * from "./schemaExport";
export * from "./transformEngine";
