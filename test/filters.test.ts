import { expect } from "chai";
import {
  FilterCompileContext,
  FilterNode,
  collectFilterColumns,
  compileFilter,
  evaluateFilter,
  f,
  filterFromGroups,
} from "../src/filters";
import { Row } from "../src/table";
import { validationField } from "./helpers";

const rows: Row[] = [
  { id: 1, name: "Alpha", amount: 10, region: "North", shipped: "2024-01-10", note: null },
  { id: 2, name: "beta", amount: "25", region: "south", shipped: "2024-02-01", note: "" },
  { id: 3, name: "Gamma", amount: "n/a", region: "North", shipped: "bad", note: "rush" },
];

function matching(node: FilterNode, context: FilterCompileContext = {}): unknown[] {
  const predicate = compileFilter(node, context);
  return rows.filter(predicate).map((row) => row.id);
}

describe("filter evaluation", () => {
  it("treats an empty AND as true and an empty OR as false", () => {
    expect(matching(f.and())).to.deep.equal([1, 2, 3]);
    expect(matching(f.or())).to.deep.equal([]);
  });

  it("compares text with optional case folding", () => {
    expect(matching(f.equals("name", "beta"))).to.deep.equal([2]);
    expect(matching(f.equals("name", "BETA"))).to.deep.equal([]);
    expect(matching(f.equals("name", "BETA", { caseSensitive: false }))).to.deep.equal([2]);
    expect(matching(f.notEquals("region", "North"))).to.deep.equal([2]);
    expect(matching(f.equals("id", 1))).to.deep.equal([1]);
  });

  it("supports contains, regex and list membership", () => {
    expect(matching(f.contains("name", "mm"))).to.deep.equal([3]);
    expect(matching(f.notContains("name", "mm"))).to.deep.equal([1, 2]);
    expect(matching(f.regex("name", "^[A-Z]"))).to.deep.equal([1, 3]);
    expect(matching(f.regex("name", "^b", { caseSensitive: false }))).to.deep.equal([2]);
    expect(matching(f.in("region", ["North"]))).to.deep.equal([1, 3]);
    expect(matching(f.notIn("region", ["North"]))).to.deep.equal([2]);
  });

  it("accepts a comma-separated string as a value list", () => {
    const node: FilterNode = {
      kind: "condition",
      column: "region",
      operator: "in",
      value: "north, south",
      caseSensitive: false,
    };
    expect(matching(node)).to.deep.equal([1, 2, 3]);
  });

  it("fails numeric comparisons closed on non-numeric cells", () => {
    expect(matching(f.gt("amount", 15))).to.deep.equal([2]);
    expect(matching(f.gte("amount", 10))).to.deep.equal([1, 2]);
    expect(matching(f.lt("amount", 25))).to.deep.equal([1]);
    expect(matching(f.lte("amount", 25))).to.deep.equal([1, 2]);
    expect(matching(f.between("amount", 10, 25))).to.deep.equal([1, 2]);
  });

  it("treats null and blank strings as null", () => {
    expect(matching(f.isNull("note"))).to.deep.equal([1, 2]);
    expect(matching(f.isNotNull("note"))).to.deep.equal([3]);
  });

  it("compares dates with the column's format", () => {
    const context = { dateFormats: { shipped: "yyyy-MM-dd" } };

    expect(matching(f.dateBefore("shipped", "2024-01-15"), context)).to.deep.equal([1]);
    expect(matching(f.dateAfter("shipped", "2024-01-15"), context)).to.deep.equal([2]);
    expect(matching(f.dateBetween("shipped", "2024-01-01", "2024-02-01"), context)).to.deep.equal([1, 2]);
    expect(matching(f.dateBefore("shipped", "someday"), context)).to.deep.equal([]);
  });

  it("combines nested groups", () => {
    const node = f.or(f.and(f.equals("region", "North"), f.gt("amount", 5)), f.equals("name", "beta"));
    expect(matching(node)).to.deep.equal([1, 2]);
    expect(evaluateFilter(f.equals("name", "Alpha"), rows[0])).to.equal(true);
  });
});

describe("filter validation", () => {
  it("names the node path of an unknown column", () => {
    const node = f.and(f.equals("name", "x"), f.equals("missing", "y"));
    const field = validationField(() => compileFilter(node, { columns: ["id", "name"] }));
    expect(field).to.equal("filter.children[1].column");
  });

  it("rejects a missing column name", () => {
    expect(validationField(() => compileFilter(f.equals("", "x")))).to.equal("filter.column");
  });

  it("rejects an invalid regular expression at compile time", () => {
    expect(validationField(() => compileFilter(f.regex("name", "(")))).to.equal("filter.value");
  });

  it("rejects a non-numeric operand for numeric operators", () => {
    const node: FilterNode = {
      kind: "condition",
      column: "amount",
      operator: "gt",
      value: "many",
      caseSensitive: true,
    };
    expect(() => compileFilter(node)).to.throw("filter.value: gt expects a numeric value");
  });

  it("rejects a range that is not a pair", () => {
    const node: FilterNode = {
      kind: "condition",
      column: "amount",
      operator: "between",
      value: [1],
      caseSensitive: true,
    };
    expect(validationField(() => compileFilter(f.or(f.isNull("note"), node)))).to.equal(
      "filter.children[1].value"
    );
  });
});

describe("filter helpers", () => {
  it("collects referenced columns", () => {
    const node = f.or(f.equals("b", 1), f.and(f.isNull("a"), f.equals("b", 2)));
    expect(Array.from(collectFilterColumns(node)).sort()).to.deep.equal(["a", "b"]);
  });

  it("converts OR-of-AND groups into a tree", () => {
    const a = f.equals("a", "1");
    const b = f.equals("b", "2");
    const c = f.equals("c", "3");

    expect(filterFromGroups([[], [a], [b, c]])).to.deep.equal(f.or(f.and(a), f.and(b, c)));
    expect(filterFromGroups([[]])).to.deep.equal({ kind: "group", operator: "and", children: [] });
  });
});
