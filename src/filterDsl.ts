// filterDsl.ts
// Text syntax for filter trees, built from small parser combinators.
//
//   status == "open" and (amount >= 100 or region in ("north", "south"))
//   name contains "acme" ignorecase
//   shipped_at between dates "2024-01-01" and "2024-03-31"
//   notes is not null
//
// `and` binds tighter than `or`; parentheses group.

import { ValidationError } from "./errors";
import {
  FilterCondition,
  FilterNode,
  FilterOperator,
  FilterScalar,
  FilterValue,
  f,
} from "./filters";

export type ParseResult<T> = { value: T; nextPos: number };
export type Parser<T> = (input: string, pos: number) => ParseResult<T> | null;

/* --------------------------------------------------------------------------
 * COMBINATORS
 * -------------------------------------------------------------------------- */

function skipWs(input: string, pos: number): number {
  const match = /^\s*/.exec(input.slice(pos));
  return pos + (match ? match[0].length : 0);
}

function map<A, B>(parser: Parser<A>, fn: (value: A) => B): Parser<B> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    return { value: fn(result.value), nextPos: result.nextPos };
  };
}

function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input, pos) => {
    for (const p of parsers) {
      const result = p(input, pos);
      if (result) return result;
    }
    return null;
  };
}

function opt<T>(parser: Parser<T>): Parser<T | null> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return { value: null, nextPos: pos };
    return result;
  };
}

function regex(re: RegExp): Parser<string> {
  const anchored = new RegExp("^(?:" + re.source + ")", re.flags);
  return (input, pos) => {
    const start = skipWs(input, pos);
    const match = anchored.exec(input.slice(start));
    if (!match) return null;
    const nextPos = skipWs(input, start + match[0].length);
    return { value: match[0], nextPos };
  };
}

function symbol(text: string): Parser<string> {
  return (input, pos) => {
    const start = skipWs(input, pos);
    if (input.slice(start).startsWith(text)) {
      const nextPos = skipWs(input, start + text.length);
      return { value: text, nextPos };
    }
    return null;
  };
}

function keyword(word: string): Parser<string> {
  return regex(new RegExp(word + "(?![A-Za-z0-9_])", "i"));
}

/** Run `prefix` parsers in order, discarding their values, then `parser`. */
function after<T>(prefix: Parser<unknown>[], parser: Parser<T>): Parser<T> {
  return (input, pos) => {
    let nextPos = pos;
    for (const p of prefix) {
      const result = p(input, nextPos);
      if (!result) return null;
      nextPos = result.nextPos;
    }
    return parser(input, nextPos);
  };
}

function sepBy1<T>(parser: Parser<T>, separator: Parser<unknown>): Parser<T[]> {
  return (input, pos) => {
    const first = parser(input, pos);
    if (!first) return null;
    const values: T[] = [first.value];
    let nextPos = first.nextPos;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const sep = separator(input, nextPos);
      if (!sep) break;
      const next = parser(input, sep.nextPos);
      if (!next) break;
      values.push(next.value);
      nextPos = next.nextPos;
    }
    return { value: values, nextPos };
  };
}

function lazy<T>(fn: () => Parser<T>): Parser<T> {
  return (input, pos) => fn()(input, pos);
}

function parens<T>(parser: Parser<T>): Parser<T> {
  return after([symbol("(")], (input, pos) => {
    const inner = parser(input, pos);
    if (!inner) return null;
    const close = symbol(")")(input, inner.nextPos);
    if (!close) return null;
    return { value: inner.value, nextPos: close.nextPos };
  });
}

/* --------------------------------------------------------------------------
 * LEXER HELPERS
 * -------------------------------------------------------------------------- */

const identifier: Parser<string> = regex(/[A-Za-z_][A-Za-z0-9_]*/);
const quotedIdentifier: Parser<string> = map(regex(/`[^`]+`/), (v) => v.slice(1, -1));
const columnName: Parser<string> = choice(quotedIdentifier, identifier);

// Only \" (or \') and \\ are escapes; other backslashes stay, so regex
// patterns such as "\d+" survive.
const doubleQuoted: Parser<string> = map(regex(/"(?:[^"\\]|\\.)*"/), (v) =>
  v.slice(1, -1).replace(/\\(["\\])/g, "$1")
);
const singleQuoted: Parser<string> = map(regex(/'(?:[^'\\]|\\.)*'/), (v) =>
  v.slice(1, -1).replace(/\\(['\\])/g, "$1")
);
const numberLiteral: Parser<number> = map(regex(/-?\d+(?:\.\d+)?(?![A-Za-z0-9_])/), Number);
const booleanLiteral: Parser<boolean> = map(
  choice(keyword("true"), keyword("false")),
  (v) => v.toLowerCase() === "true"
);

const literal: Parser<FilterScalar> = choice<FilterScalar>(
  doubleQuoted,
  singleQuoted,
  numberLiteral,
  booleanLiteral
);

const literalList: Parser<FilterScalar[]> = parens(sepBy1(literal, symbol(",")));

const literalRange: Parser<FilterScalar[]> = (input, pos) => {
  const from = literal(input, pos);
  if (!from) return null;
  const to = after([keyword("and")], literal)(input, from.nextPos);
  if (!to) return null;
  return { value: [from.value, to.value], nextPos: to.nextPos };
};

/* --------------------------------------------------------------------------
 * CONDITION PARSER
 * -------------------------------------------------------------------------- */

interface ConditionTail {
  operator: FilterOperator;
  value?: FilterValue;
}

function operation(
  prefix: Parser<unknown>[],
  operator: FilterOperator,
  operand?: Parser<FilterValue>
): Parser<ConditionTail> {
  if (!operand) {
    return after(prefix, (_input, pos) => ({ value: { operator }, nextPos: pos }));
  }
  return after(
    prefix,
    map(operand, (value) => ({ operator, value }))
  );
}

// Longer spellings first: ">=" before ">", "is not null" before "is null".
const conditionTail: Parser<ConditionTail> = choice(
  operation([keyword("is"), keyword("not"), keyword("null")], "is_not_null"),
  operation([keyword("is"), keyword("null")], "is_null"),
  operation([symbol(">=")], "gte", literal),
  operation([symbol("<=")], "lte", literal),
  operation([symbol("==")], "equals", literal),
  operation([symbol("!=")], "not_equals", literal),
  operation([symbol(">")], "gt", literal),
  operation([symbol("<")], "lt", literal),
  operation([keyword("not"), keyword("contains")], "not_contains", literal),
  operation([keyword("not"), keyword("in")], "not_in", literalList),
  operation([keyword("contains")], "contains", literal),
  operation([keyword("matches")], "regex", literal),
  operation([keyword("in")], "in", literalList),
  operation([keyword("between"), keyword("dates")], "date_between", literalRange),
  operation([keyword("between")], "between", literalRange),
  operation([keyword("before")], "date_before", literal),
  operation([keyword("after")], "date_after", literal)
);

const condition: Parser<FilterNode> = (input, pos) => {
  const column = columnName(input, pos);
  if (!column) return null;
  const tail = conditionTail(input, column.nextPos);
  if (!tail) return null;
  const ignoreCase = opt(keyword("ignorecase"))(input, tail.nextPos);
  if (!ignoreCase) return null;

  const node: FilterCondition = {
    kind: "condition",
    column: column.value,
    operator: tail.value.operator,
    caseSensitive: ignoreCase.value === null,
  };
  if (tail.value.value !== undefined) node.value = tail.value.value;
  return { value: node, nextPos: ignoreCase.nextPos };
};

/* --------------------------------------------------------------------------
 * BOOLEAN STRUCTURE
 * -------------------------------------------------------------------------- */

const filterExpr: Parser<FilterNode> = lazy(() => orExpr);

const term: Parser<FilterNode> = choice(parens(filterExpr), condition);

const andExpr: Parser<FilterNode> = map(sepBy1(term, keyword("and")), (items) =>
  items.length === 1 ? items[0] : f.and(...items)
);

const orExpr: Parser<FilterNode> = map(sepBy1(andExpr, keyword("or")), (items) =>
  items.length === 1 ? items[0] : f.or(...items)
);

/* --------------------------------------------------------------------------
 * ENTRY POINT
 * -------------------------------------------------------------------------- */

function describePosition(text: string, pos: number): string {
  const snippet = text.slice(pos, pos + 20);
  return snippet ? `at position ${pos} near '${snippet}'` : `at position ${pos} (end of input)`;
}

/**
 * Parse a filter expression. Blank text is an empty AND group, which keeps
 * every row.
 */
export function parseFilterExpression(text: string): FilterNode {
  if (text.trim() === "") return f.and();

  const result = filterExpr(text, 0);
  if (!result) {
    throw new ValidationError("filter", `cannot parse filter expression ${describePosition(text, skipWs(text, 0))}`);
  }
  const end = skipWs(text, result.nextPos);
  if (end !== text.length) {
    throw new ValidationError("filter", `unexpected input ${describePosition(text, end)}`);
  }
  return result.value;
}
