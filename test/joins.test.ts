import { expect } from "chai";
import { inMemoryResolver, tableFromRecords } from "../src/datasets";
import { DatasetNotFound, JoinKeyNotFound } from "../src/errors";
import { JoinStep, executeJoins, planJoins, suggestJoinKeys } from "../src/joins";
import { validationField } from "./helpers";

function step(overrides: Partial<JoinStep> = {}): JoinStep {
  return {
    left: "visits",
    right: "accounts",
    keys: [{ left: "account", right: "key" }],
    type: "inner",
    rightPrefix: "acct",
    caseInsensitive: false,
    ...overrides,
  };
}

// Three visits without an account; accounts k3 appears twice.
const visits = tableFromRecords(
  Array.from({ length: 10 }, (_, i) => ({ visitId: i + 1, account: i < 3 ? null : `k${i}` }))
);
const accounts = tableFromRecords(
  ["k3", "k3", "k4", "k5", "k6", "k7", "k8", "k10", "k11", "k12"].map((key, i) => ({
    key,
    name: `account ${i}`,
  }))
);
const resolve = inMemoryResolver({ tables: { visits, accounts } });

describe("join execution", () => {
  it("reports match, blank-key and duplicate-key rates", () => {
    const { reports } = executeJoins("visits", [step()], resolve);

    expect(reports).to.deep.equal([
      {
        step: 0,
        left: "visits",
        right: "accounts",
        type: "inner",
        leftRows: 10,
        rightRows: 10,
        outputRows: 7,
        matchRate: 0.6,
        blankKeyRate: 0.3,
        duplicateKeyRate: 0.2,
      },
    ]);
  });

  it("multiplies left rows on duplicate keys in right-table order", () => {
    const { table } = executeJoins("visits", [step()], resolve);

    expect(table.columns.map((c) => c.name)).to.deep.equal(["visitId", "account", "acct__name"]);
    expect(table.rows.slice(0, 3)).to.deep.equal([
      { visitId: 4, account: "k3", acct__name: "account 0" },
      { visitId: 4, account: "k3", acct__name: "account 1" },
      { visitId: 5, account: "k4", acct__name: "account 2" },
    ]);
  });

  it("keeps unmatched rows with null right columns on a left join", () => {
    const { table, reports } = executeJoins("visits", [step({ type: "left" })], resolve);

    expect(table.rows).to.have.length(11);
    expect(table.rows[0]).to.deep.equal({ visitId: 1, account: null, acct__name: null });
    expect(table.rows[10]).to.deep.equal({ visitId: 10, account: "k9", acct__name: null });
    expect(reports[0].outputRows).to.equal(11);
    expect(reports[0].outputRows).to.be.at.least(reports[0].leftRows);
  });

  it("matches case-insensitively only when asked", () => {
    const left = tableFromRecords([{ code: "ABC " }, { code: "1" }]);
    const right = tableFromRecords([{ code: "abc", label: "letters" }, { code: 1, label: "number" }]);
    const db = inMemoryResolver({ tables: { left, right } });
    const base = { left: "left", right: "right", keys: [{ left: "code", right: "code" }], rightPrefix: "r" };

    const exact = executeJoins("left", [step({ ...base })], db);
    const folded = executeJoins("left", [step({ ...base, caseInsensitive: true })], db);

    expect(exact.table.rows).to.deep.equal([]);
    expect(folded.table.rows).to.deep.equal([{ code: "ABC ", r__label: "letters" }]);
  });

  it("chains steps against earlier right datasets", () => {
    const orders = tableFromRecords([
      { orderId: 1, customerId: "c1" },
      { orderId: 2, customerId: "c2" },
    ]);
    const customers = tableFromRecords([
      { customerId: "c1", name: "North Co", regionId: "r1" },
      { customerId: "c2", name: "South Co", regionId: "r2" },
    ]);
    const regions = tableFromRecords([
      { id: "r1", label: "North" },
      { id: "r2", label: "South" },
    ]);
    const db = inMemoryResolver({ tables: { orders, customers, regions } });

    const { table } = executeJoins(
      "orders",
      [
        step({ left: "orders", right: "customers", keys: [{ left: "customerId", right: "customerId" }], rightPrefix: "cust" }),
        step({ left: "customers", right: "regions", keys: [{ left: "cust__regionId", right: "id" }], rightPrefix: "reg" }),
      ],
      db
    );

    expect(table.rows).to.deep.equal([
      { orderId: 1, customerId: "c1", cust__name: "North Co", cust__regionId: "r1", reg__label: "North" },
      { orderId: 2, customerId: "c2", cust__name: "South Co", cust__regionId: "r2", reg__label: "South" },
    ]);
  });

  it("reports zero rates for empty inputs", () => {
    const empty = { columns: visits.columns, rows: [] };
    const db = inMemoryResolver({ tables: { visits: empty, accounts: { columns: accounts.columns, rows: [] } } });
    const { reports } = executeJoins("visits", [step()], db);

    expect(reports[0]).to.include({ matchRate: 0, blankKeyRate: 0, duplicateKeyRate: 0, outputRows: 0 });
  });
});

describe("join planning", () => {
  it("raises JoinKeyNotFound for a missing left key", () => {
    expect(() => planJoins("visits", [step({ keys: [{ left: "nope", right: "key" }] })], resolve)).to.throw(
      JoinKeyNotFound,
      "Join step 1: left key column 'nope' not found in joined table 'visits'"
    );
  });

  it("raises JoinKeyNotFound for a missing right key", () => {
    try {
      planJoins("visits", [step({ keys: [{ left: "account", right: "accountKey" }] })], resolve);
      expect.fail("expected JoinKeyNotFound");
    } catch (err) {
      if (!(err instanceof JoinKeyNotFound)) throw err;
      expect(err.step).to.equal(0);
      expect(err.side).to.equal("right");
      expect(err.column).to.equal("accountKey");
      expect(err.dataset).to.equal("accounts");
    }
  });

  it("checks every step's schema before reading rows", () => {
    const steps = [step(), step({ left: "accounts", right: "missing", rightPrefix: "m" })];
    expect(() => executeJoins("visits", steps, resolve)).to.throw(DatasetNotFound, "Dataset not found: missing");
  });

  it("validates step shape", () => {
    expect(validationField(() => planJoins("visits", [step({ left: "elsewhere" })], resolve))).to.equal(
      "joins[0].left"
    );
    expect(validationField(() => planJoins("visits", [step({ keys: [] })], resolve))).to.equal("joins[0].keys");
    expect(validationField(() => planJoins("visits", [step({ rightPrefix: "" })], resolve))).to.equal(
      "joins[0].rightPrefix"
    );
    expect(
      validationField(() => planJoins("visits", [step(), step({ left: "accounts", right: "visits" })], resolve))
    ).to.equal("joins[1].rightPrefix");
  });

  it("computes the joined columns without touching rows", () => {
    const plan = planJoins("visits", [step({ type: "left" })], resolve);
    expect(plan.columns).to.deep.equal([
      { name: "visitId", type: "integer" },
      { name: "account", type: "string" },
      { name: "acct__name", type: "string" },
    ]);
  });
});

describe("join key suggestion", () => {
  it("prefers common key names", () => {
    expect(suggestJoinKeys(["Order ID", "item_id", "name"], ["ItemID", "title"])).to.deep.equal({
      left: "item_id",
      right: "ItemID",
    });
  });

  it("falls back to the first shared normalized name", () => {
    expect(suggestJoinKeys(["region", "name"], ["Name", "zone"])).to.deep.equal({ left: "name", right: "Name" });
    expect(suggestJoinKeys(["a"], ["b"])).to.equal(null);
  });
});
