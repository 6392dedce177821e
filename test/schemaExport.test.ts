import { expect } from "chai";
import { cc } from "../src/computedColumns";
import { parseTransformConfig } from "../src/config";
import { inMemoryResolver, tableFromRecords } from "../src/datasets";
import { DatasetNotFound } from "../src/errors";
import { describeTransform, exportSchema } from "../src/schemaExport";
import { inspect } from "../src/schemaInspector";

const orders = tableFromRecords([
  { id: 1, customerId: "c1", sku: "A", amount: 12 },
  { id: 2, customerId: null, sku: "B", amount: 8 },
]);
const customers = tableFromRecords([{ customerId: "c1", name: "Alma", regionId: "r1" }]);
const regions = tableFromRecords([{ id: "r1", label: "North" }]);
const resolve = inMemoryResolver({ tables: { orders, customers, regions } });

const config = parseTransformConfig({
  dataset: "orders",
  joins: [
    { left: "orders", right: "customers", keys: [{ left: "customerId", right: "customerId" }], type: "left", rightPrefix: "cust" },
    { left: "customers", right: "regions", keys: [{ left: "cust__regionId", right: "id" }], type: "left", rightPrefix: "reg" },
  ],
  filter: 'amount > 10 and cust__name contains "a"',
  computedColumns: [cc.concat("label", ["sku", "cust__name"], " ")],
});

describe("schema export", () => {
  it("summarizes datasets in name order with per-column quality", () => {
    const schema = exportSchema(config, resolve);

    expect(schema.datasets.map((d) => d.name)).to.deep.equal(["customers", "orders", "regions"]);
    expect(schema.datasets[1]).to.deep.equal({
      name: "orders",
      rowCount: 2,
      columns: [
        { name: "id", type: "integer", nullCount: 0, distinctCountSampled: 2 },
        { name: "customerId", type: "string", nullCount: 1, distinctCountSampled: 1 },
        { name: "sku", type: "string", nullCount: 0, distinctCountSampled: 2 },
        { name: "amount", type: "integer", nullCount: 0, distinctCountSampled: 2 },
      ],
    });
  });

  it("lists the columns the config depends on", () => {
    const schema = exportSchema(config, resolve);

    expect(schema.joinKeys).to.deep.equal([
      { dataset: "customers", column: "customerId" },
      { dataset: "customers", column: "regionId" },
      { dataset: "orders", column: "customerId" },
      { dataset: "regions", column: "id" },
    ]);
    expect(schema.filterColumns).to.deep.equal(["amount", "cust__name"]);
    expect(schema.computedInputs).to.deep.equal(["cust__name", "sku"]);
    expect(schema.outputColumns).to.deep.equal([
      "id",
      "customerId",
      "sku",
      "amount",
      "cust__name",
      "cust__regionId",
      "reg__label",
      "label",
    ]);
  });

  it("uses the selected columns as the output when given", () => {
    const selected = { ...config, columns: ["label", "id"] };
    expect(exportSchema(selected, resolve).outputColumns).to.deep.equal(["label", "id"]);
  });

  it("describes the same inputs identically", () => {
    expect(JSON.stringify(exportSchema(config, resolve))).to.equal(JSON.stringify(exportSchema(config, resolve)));
  });

  it("requires a profile for every dataset", () => {
    const profiles = { orders: inspect(orders), customers: inspect(customers) };
    expect(() => describeTransform(config, profiles)).to.throw(DatasetNotFound, "Dataset not found: regions");
  });
});
