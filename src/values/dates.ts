/**
 * Date pattern conversion and free-text date parsing
 *
 * ARFF declares date attributes with Weka (Java SimpleDateFormat) patterns.
 * Writing goes through a strftime-style pattern obtained by substituting
 * the six supported Weka tokens, then rendered in local time.
 *
 * @module values/dates
 */

import { ValueTypeError } from "../errors";

/**
 * Weka tokens and their strftime equivalents, in substitution order.
 * `MM` must be replaced before `mm`.
 */
const WEKA_TOKENS: ReadonlyArray<readonly [string, string]> = [
  ["yyyy", "%Y"],
  ["MM", "%m"],
  ["dd", "%d"],
  ["HH", "%H"],
  ["mm", "%M"],
  ["ss", "%S"],
];

const ISO_LIKE =
  /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T /](\d{1,2})[:/](\d{1,2})(?:[:/](\d{1,2})(?:\.(\d+))?)?)?$/;

/**
 * Convert a Weka date pattern to a strftime pattern
 *
 * @example
 * ```typescript
 * toStrftimePattern("yyyy-MM-dd HH:mm:ss"); // "%Y-%m-%d %H:%M:%S"
 * ```
 */
export function toStrftimePattern(wekaPattern: string): string {
  let pattern = wekaPattern;
  for (const [weka, strftime] of WEKA_TOKENS) {
    pattern = pattern.replaceAll(weka, strftime);
  }
  return pattern;
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

/**
 * Render a date with a strftime pattern. Only the directives produced by
 * `toStrftimePattern` (and `%%`) are interpreted; anything else is literal.
 */
export function strftime(date: Date, pattern: string): string {
  return pattern.replace(/%([YmdHMS%])/g, (_match, directive: string) => {
    switch (directive) {
      case "Y":
        return pad(date.getFullYear(), 4);
      case "m":
        return pad(date.getMonth() + 1, 2);
      case "d":
        return pad(date.getDate(), 2);
      case "H":
        return pad(date.getHours(), 2);
      case "M":
        return pad(date.getMinutes(), 2);
      case "S":
        return pad(date.getSeconds(), 2);
      default:
        return "%";
    }
  });
}

/**
 * Format a calendar value with a Weka date pattern
 */
export function formatDate(date: Date, wekaPattern: string): string {
  return strftime(date, toStrftimePattern(wekaPattern));
}

/**
 * Parse free-text dates into calendar values
 *
 * Numeric year-first forms (`2020-01-02`, `2020/01/02/03/04/05`,
 * `2020-01-02T03:04:05`) are read as local wall-clock time; anything else
 * is handed to `Date.parse`.
 *
 * @throws {ValueTypeError} When the text is not a recognizable date
 */
export function parseDateText(text: string): Date {
  const trimmed = text.trim();
  const match = ISO_LIKE.exec(trimmed);

  if (match) {
    const [, year, month, day, hour, minute, second, fraction] = match;
    const date = new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      fraction !== undefined ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0
    );
    if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
      throw ValueTypeError.incompatible("date", text, "day is out of range for month");
    }
    return date;
  }

  const timestamp = Date.parse(trimmed);
  if (Number.isNaN(timestamp)) {
    throw ValueTypeError.incompatible("date", text, "unrecognized date format");
  }
  return new Date(timestamp);
}

/**
 * Normalize a date payload to a calendar value. Text goes through
 * `parseDateText`; numbers are read as epoch milliseconds.
 *
 * @throws {ValueTypeError} When the payload is not a date
 */
export function toCalendarDate(payload: unknown): Date {
  if (payload instanceof Date) {
    if (Number.isNaN(payload.getTime())) {
      throw ValueTypeError.incompatible("date", payload, "invalid calendar value");
    }
    return payload;
  }
  if (typeof payload === "string") {
    return parseDateText(payload);
  }
  if (typeof payload === "number" && Number.isFinite(payload)) {
    return new Date(payload);
  }
  throw ValueTypeError.incompatible("date", payload);
}
