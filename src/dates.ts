// dates.ts
// Date parsing and formatting over a fixed set of formats.
//
// Formats use date-fns (Unicode) tokens. Parsed dates are local wall-clock
// values, so parse + format round-trips regardless of the host time zone.

import { format as formatWithPattern, isValid, parse, parseISO } from "date-fns";
import type { CellValue } from "./table";

/** Tried in order; the first one that parses the whole string wins. */
export const DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd HH:mm:ss",
  // "yy" before "yyyy": the four-digit token also accepts two digits.
  "MM/dd/yy",
  "MM/dd/yyyy",
] as const;

/** Pseudo-formats: cells already holding `Date`s, or ISO-8601 text. */
export const NATIVE_DATE = "native";
export const ISO_DATE = "iso";

// Fills fields the pattern does not mention (e.g. time for "yyyy-MM-dd").
// The year also pivots two-digit years: 00-68 read as 20xx, 69-99 as 19xx.
const REFERENCE_DATE = new Date(2019, 0, 1, 0, 0, 0, 0);

function parseWith(text: string, pattern: string): Date | null {
  if (pattern === ISO_DATE) {
    const parsed = parseISO(text);
    return isValid(parsed) ? parsed : null;
  }
  let parsed: Date;
  try {
    parsed = parse(text, pattern, REFERENCE_DATE);
  } catch (err) {
    // Pattern-level RangeError (e.g. "yyyy" with "ww"): the cell is unreadable.
    if (err instanceof RangeError) return null;
    throw err;
  }
  return isValid(parsed) ? parsed : null;
}

/**
 * Parse a cell as a date. With `pattern` only that pattern is tried
 * (`NATIVE_DATE` accepts only `Date` cells); without it, the fixed format
 * set and then ISO-8601. Returns `null` instead of throwing.
 */
export function parseDateValue(value: CellValue | undefined, pattern?: string): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text) return null;

  if (pattern !== undefined) {
    if (pattern === NATIVE_DATE) return null;
    return parseWith(text, pattern);
  }

  for (const candidate of DATE_FORMATS) {
    const parsed = parseWith(text, candidate);
    if (parsed) return parsed;
  }
  return parseWith(text, ISO_DATE);
}

/**
 * First format that parses every value, or `null`. Values must be
 * non-blank.
 */
export function detectDateFormat(values: CellValue[]): string | null {
  if (values.length === 0) return null;
  if (values.every((v) => v instanceof Date && isValid(v))) return NATIVE_DATE;
  if (!values.every((v) => typeof v === "string")) return null;

  for (const candidate of [...DATE_FORMATS, ISO_DATE]) {
    if (values.every((v) => parseDateValue(v, candidate) !== null)) {
      return candidate;
    }
  }
  return null;
}

export function formatDate(date: Date, pattern: string): string {
  return formatWithPattern(date, pattern);
}

/** Whether date-fns can format with every token of `pattern`. */
export function isValidDatePattern(pattern: string): boolean {
  try {
    formatWithPattern(REFERENCE_DATE, pattern);
    return pattern.length > 0;
  } catch {
    return false;
  }
}

/**
 * Whether `pattern` can also be used for reading. Some token pairs format
 * fine but make `parse` throw, such as "yyyy" with "ww".
 */
export function isValidInputPattern(pattern: string): boolean {
  if (!isValidDatePattern(pattern)) return false;
  try {
    parse(formatWithPattern(REFERENCE_DATE, pattern), pattern, REFERENCE_DATE);
    return true;
  } catch {
    return false;
  }
}
