import { expect } from "chai";
import { ValidationError } from "../src/errors";
import { parseFilterExpression } from "../src/filterDsl";
import { f } from "../src/filters";

describe("filter expression parser", () => {
  it("parses a single comparison without wrapping it in a group", () => {
    expect(parseFilterExpression('status == "open"')).to.deep.equal({
      kind: "condition",
      column: "status",
      operator: "equals",
      value: "open",
      caseSensitive: true,
    });
  });

  it("binds and tighter than or", () => {
    expect(parseFilterExpression("a == 1 and b == 2 or c == 3")).to.deep.equal(
      f.or(f.and(f.equals("a", 1), f.equals("b", 2)), f.equals("c", 3))
    );
  });

  it("groups with parentheses", () => {
    expect(parseFilterExpression("a == 1 AND (b == 2 or c == 3)")).to.deep.equal(
      f.and(f.equals("a", 1), f.or(f.equals("b", 2), f.equals("c", 3)))
    );
  });

  it("parses comparison operators and literals", () => {
    expect(parseFilterExpression("amount >= 100")).to.deep.equal(f.gte("amount", 100));
    expect(parseFilterExpression("amount > -5")).to.deep.equal(f.gt("amount", -5));
    expect(parseFilterExpression("amount <= 2.5")).to.deep.equal(f.lte("amount", 2.5));
    expect(parseFilterExpression("`order id` != 7")).to.deep.equal(f.notEquals("order id", 7));
    expect(parseFilterExpression("active == true")).to.deep.equal(f.equals("active", true));
    expect(parseFilterExpression("code == 'A-1'")).to.deep.equal(f.equals("code", "A-1"));
  });

  it("parses list and range operands", () => {
    expect(parseFilterExpression('region in ("north", "south")')).to.deep.equal(
      f.in("region", ["north", "south"])
    );
    expect(parseFilterExpression('region not in ("x")')).to.deep.equal(f.notIn("region", ["x"]));
    expect(parseFilterExpression("amount between 10 and 20")).to.deep.equal(f.between("amount", 10, 20));
    expect(parseFilterExpression('shipped between dates "2024-01-01" and "2024-03-31"')).to.deep.equal(
      f.dateBetween("shipped", "2024-01-01", "2024-03-31")
    );
  });

  it("parses text and date operators", () => {
    expect(parseFilterExpression('name contains "acme" ignorecase')).to.deep.equal(
      f.contains("name", "acme", { caseSensitive: false })
    );
    expect(parseFilterExpression('name not contains "test"')).to.deep.equal(f.notContains("name", "test"));
    expect(parseFilterExpression('code matches "^A\\d+"')).to.deep.equal(f.regex("code", "^A\\d+"));
    expect(parseFilterExpression('shipped before "2024-02-01"')).to.deep.equal(
      f.dateBefore("shipped", "2024-02-01")
    );
    expect(parseFilterExpression('shipped after "2024-02-01"')).to.deep.equal(
      f.dateAfter("shipped", "2024-02-01")
    );
  });

  it("parses null checks", () => {
    expect(parseFilterExpression("notes is null")).to.deep.equal(f.isNull("notes"));
    expect(parseFilterExpression("notes is not null")).to.deep.equal(f.isNotNull("notes"));
  });

  it("unescapes quotes inside strings", () => {
    expect(parseFilterExpression('name == "say \\"hi\\""')).to.deep.equal(f.equals("name", 'say "hi"'));
  });

  it("returns an empty AND for blank input", () => {
    expect(parseFilterExpression("   ")).to.deep.equal(f.and());
  });

  it("reports where parsing stopped", () => {
    expect(() => parseFilterExpression("status ==")).to.throw(
      ValidationError,
      "filter: cannot parse filter expression at position 0 near 'status =='"
    );
    expect(() => parseFilterExpression("a == 1 b == 2")).to.throw(
      ValidationError,
      "filter: unexpected input at position 7 near 'b == 2'"
    );
    expect(() => parseFilterExpression("(a == 1")).to.throw(ValidationError, /position 0/);
  });
});
