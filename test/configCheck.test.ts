import { expect } from "chai";
import { cc } from "../src/computedColumns";
import { TransformConfig, parseTransformConfig } from "../src/config";
import { checkConfig, checkTransformConfig } from "../src/configCheck";
import { inMemoryResolver, tableFromRecords } from "../src/datasets";
import { runTransform } from "../src/pipeline";
import { inspect } from "../src/schemaInspector";
import { TransformEngine } from "../src/transformEngine";
import { errorMessage } from "./helpers";

const orders = tableFromRecords([
  { id: 1, customerId: "c1", amount: 12, placed: "2024-01-05" },
  { id: 2, customerId: "c2", amount: 8, placed: "2024-02-10" },
]);
const customers = tableFromRecords([
  { customerId: "c1", name: "Alma", promo: null },
  { customerId: "c2", name: "Bo", promo: null },
]);
const resolve = inMemoryResolver({ tables: { orders, customers } });

const customerJoin = {
  left: "orders",
  right: "customers",
  keys: [{ left: "customerId", right: "customerId" }],
  type: "left",
  rightPrefix: "cust",
};

function config(input: Record<string, unknown>): TransformConfig {
  return parseTransformConfig({ dataset: "orders", ...input });
}

describe("config check", () => {
  it("finds nothing wrong with a runnable config", () => {
    const clean = config({
      joins: [customerJoin],
      filter: 'amount > 10 and placed before "2024-02-01"',
      computedColumns: [cc.concat("label", ["id", "cust__name"], "-")],
      columns: ["id", "label"],
      sort: { column: "label" },
    });
    expect(checkConfig(clean, resolve)).to.deep.equal({ errors: [], warnings: [] });
  });

  it("lists every problem instead of stopping at the first", () => {
    const broken = config({
      joins: [customerJoin],
      filter: {
        kind: "group",
        operator: "and",
        children: [
          { kind: "condition", column: "region", operator: "equals", value: "north" },
          { kind: "condition", column: "amount", operator: "gt", value: "lots" },
        ],
      },
      computedColumns: [
        cc.concat("amount", ["id"]),
        cc.coalesce("pick", ["nick", "id"]),
        cc.concat("tag", ["pick", "id"]),
      ],
      columns: ["id", "tag", "ghost"],
      sort: { column: "amount" },
    });

    expect(checkConfig(broken, resolve)).to.deep.equal({
      errors: [
        { field: "filter.children[0].column", message: "unknown column 'region'" },
        { field: "filter.children[1].value", message: "gt expects a numeric value" },
        { field: "computedColumns[0].outputName", message: "'amount' collides with an existing column" },
        { field: "computedColumns[1].args.columns[0]", message: "unknown column 'nick'" },
        { field: "columns[2]", message: "unknown column 'ghost'" },
        { field: "sort.column", message: "unknown column 'amount'" },
      ],
      warnings: [],
    });
  });

  it("reports the same first error a run fails with", () => {
    const bad = config({ columns: ["id", "nope"] });
    const [first] = checkConfig(bad, resolve).errors;
    expect(`${first.field}: ${first.message}`).to.equal(errorMessage(runTransform(bad, resolve)));
  });

  it("warns about problems a run tolerates", () => {
    const loose = config({
      joins: [{ ...customerJoin, keys: [{ left: "customerId", right: "promo" }] }],
      pageSize: 200,
      expectations: { orders: ["id", "missing"], customers: [{ name: "name", type: "integer" }] },
    });

    expect(checkConfig(loose, resolve)).to.deep.equal({
      errors: [],
      warnings: [
        { field: "joins[0].keys[0].right", message: "join key 'promo' of 'customers' has no values" },
        { field: "columns", message: "no columns selected; every column is returned" },
        { field: "pageSize", message: "larger than maxPageSize 100; pages are clamped" },
        { field: "expectations.customers", message: "column 'name': type_mismatch" },
        { field: "expectations.orders", message: "column 'missing': missing" },
      ],
    });
  });

  it("reports missing datasets and bad join steps without throwing", () => {
    const unresolved = config({
      joins: [
        { left: "orders", right: "returns", keys: [{ left: "id", right: "orderId" }], type: "inner", rightPrefix: "ret" },
        { left: "orders", right: "customers", keys: [{ left: "customerId", right: "id" }], type: "left", rightPrefix: "ret" },
      ],
      expectations: { ghost: ["x"] },
    });

    expect(checkConfig(unresolved, resolve)).to.deep.equal({
      errors: [
        { field: "joins[0].right", message: "dataset 'returns' not found" },
        { field: "joins[1].rightPrefix", message: "prefix 'ret' is already used by an earlier step" },
        { field: "joins[1].keys[0].right", message: "column 'id' not found in dataset 'customers'" },
        { field: "expectations.ghost", message: "dataset is not read by this transform" },
      ],
      warnings: [{ field: "columns", message: "no columns selected; every column is returned" }],
    });
  });

  it("checks against profiles directly", () => {
    const result = checkTransformConfig(config({ columns: ["amount"] }), {});
    expect(result.errors).to.deep.equal([{ field: "dataset", message: "dataset 'orders' not found" }]);

    const profiled = checkTransformConfig(config({ columns: ["amount"] }), { orders: inspect(orders) });
    expect(profiled).to.deep.equal({ errors: [], warnings: [] });
  });

  it("is available from the engine by config name", () => {
    const engine = TransformEngine.fromResolver(resolve).registerConfig("all", config({}));
    expect(engine.check("all")).to.deep.equal({
      errors: [],
      warnings: [{ field: "columns", message: "no columns selected; every column is returned" }],
    });
  });
});
