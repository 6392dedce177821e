import { pathToFileURL } from "node:url";
import { cc } from "./computedColumns";
import { inMemoryResolver, tableFromRecords, InMemoryDb } from "./datasets";
import { f } from "./filters";
import { TransformEngine } from "./transformEngine";
import { parseTransformConfig, serializeTransformConfig } from "./config";

function runTransformEngineDemo() {
  const db: InMemoryDb = {
    tables: {
      orders: tableFromRecords([
        { orderId: 1, customerId: "c1", sku: "A-1", amount: 120, orderedAt: "2024-01-04", status: "open" },
        { orderId: 2, customerId: "c2", sku: "B-7", amount: 80, orderedAt: "2024-01-09", status: "shipped" },
        { orderId: 3, customerId: "C1", sku: "A-1", amount: 15, orderedAt: "2024-02-11", status: "open" },
        { orderId: 4, customerId: null, sku: "C-3", amount: 240, orderedAt: "2024-02-20", status: "open" },
        { orderId: 5, customerId: "c3", sku: "B-7", amount: 55, orderedAt: "not recorded", status: "cancelled" },
      ]),
      customers: tableFromRecords([
        { customerId: "c1", name: "Downtown Bikes", region: "North" },
        { customerId: "c2", name: "Harbor Supply", region: "South" },
        { customerId: "c3", name: "Ridge Outfitters", region: null },
      ]),
      products: tableFromRecords([
        { sku: "A-1", title: "Chain lube", category: "care" },
        { sku: "B-7", title: "Brake pads", category: "parts" },
      ]),
    },
  };

  const configFile = JSON.stringify({
    open_orders: {
      dataset: "orders",
      joins: [
        {
          left: "orders",
          right: "customers",
          keys: [{ left: "customerId", right: "customerId" }],
          type: "left",
          rightPrefix: "cust",
          caseInsensitive: true,
        },
      ],
      filter: 'status == "open" and amount >= 20',
      columns: ["orderId", "cust__name", "amount", "orderedAt"],
      sort: { column: "amount", direction: "desc" },
      pageSize: 10,
    },
  });

  const engine = TransformEngine.fromResolver(inMemoryResolver(db)).useConfigFile(configFile);

  const enriched = parseTransformConfig({
    dataset: "orders",
    joins: [
      {
        left: "orders",
        right: "products",
        keys: [{ left: "sku", right: "sku" }],
        type: "inner",
        rightPrefix: "prod",
      },
    ],
    filter: f.or(f.equals("prod__category", "care"), f.gt("amount", 50)),
    computedColumns: [
      cc.bucket("size", "amount", [50, 100], ["small", "medium", "large"]),
      cc.dateFormat("month", "orderedAt", "yyyy-MM"),
      cc.concat("label", ["sku", "prod__title"], " / "),
    ],
    columns: ["orderId", "label", "size", "month"],
    sort: { column: "orderId", direction: "asc" },
  });
  engine.registerConfig("orders_by_product", enriched);

  console.log("Open orders config:", serializeTransformConfig(engine.getConfig("open_orders")));
  console.log("Open orders output:", JSON.stringify(engine.run("open_orders"), null, 2));
  console.log("\nOrders by product output:", JSON.stringify(engine.run("orders_by_product"), null, 2));
  console.log("\nSchema export:", JSON.stringify(engine.describe("orders_by_product"), null, 2));
  console.log("\nPaged request:", engine.run("orders_by_product", { offset: 1, limit: 2 }));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runTransformEngineDemo();
}

export { runTransformEngineDemo };
