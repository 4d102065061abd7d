/**
 * Typed value construction
 *
 * One constructor per attribute kind, each validating its raw input, plus
 * `valueOfKind` for schema-directed construction and `wrapValue` for the
 * fallback case where no schema kind is known.
 *
 * @module values/constructors
 */

import { Decimal } from "decimal.js";
import { MISSING } from "../constants";
import { ValueTypeError } from "../errors";
import type {
  ArffValue,
  AttributeKind,
  DateValue,
  IntegerValue,
  NominalValue,
  NumericValue,
  RawScalar,
  StringValue,
} from "./types";
import { isArffValue } from "./types";

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL: Readonly<Record<string, number>> = {
  nan: Number.NaN,
  inf: Number.POSITIVE_INFINITY,
  "+inf": Number.POSITIVE_INFINITY,
  "-inf": Number.NEGATIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  "+infinity": Number.POSITIVE_INFINITY,
  "-infinity": Number.NEGATIVE_INFINITY,
};

/**
 * Build an integer value. Payloads are JavaScript numbers, so magnitudes
 * beyond `Number.MAX_SAFE_INTEGER` (2^53 - 1) are rejected rather than
 * rounded.
 *
 * @throws {ValueTypeError} When the input is not exactly an integer
 */
export function integerValue(raw: RawScalar, isClass = false): IntegerValue {
  if (raw === MISSING) {
    return { kind: "integer", value: MISSING, isClass };
  }

  let parsed: number;
  if (typeof raw === "number") {
    parsed = raw;
  } else if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (!INTEGER_TEXT.test(trimmed)) {
      throw ValueTypeError.incompatible("integer", raw, "not an integer literal");
    }
    parsed = Number(trimmed);
  } else if (Decimal.isDecimal(raw)) {
    if (!raw.isInteger()) {
      throw ValueTypeError.incompatible("integer", raw, "has a fractional part");
    }
    parsed = raw.toNumber();
  } else {
    throw ValueTypeError.incompatible("integer", raw);
  }

  if (!Number.isSafeInteger(parsed)) {
    throw ValueTypeError.incompatible("integer", raw, "not exactly representable as an integer");
  }
  return { kind: "integer", value: parsed, isClass };
}

/**
 * Build a numeric (floating) value
 *
 * @throws {ValueTypeError} When the input does not parse as a number
 */
export function numericValue(raw: RawScalar, isClass = false): NumericValue {
  if (raw === MISSING) {
    return { kind: "numeric", value: MISSING, isClass };
  }
  if (typeof raw === "number") {
    return { kind: "numeric", value: raw, isClass };
  }
  if (typeof raw === "string") {
    const trimmed = raw.trim();
    const special = FLOAT_SPECIAL[trimmed.toLowerCase()];
    if (special !== undefined) {
      return { kind: "numeric", value: special, isClass };
    }
    if (!FLOAT_TEXT.test(trimmed)) {
      throw ValueTypeError.incompatible("numeric", raw, "not a number");
    }
    return { kind: "numeric", value: Number(trimmed), isClass };
  }
  if (Decimal.isDecimal(raw)) {
    return { kind: "numeric", value: raw.toNumber(), isClass };
  }
  throw ValueTypeError.incompatible("numeric", raw);
}

/**
 * Parse plain decimal text exactly: an optional sign, digits with an
 * optional fraction, and an optional exponent
 *
 * @returns undefined when the text is not a decimal literal
 */
export function decimalFromText(text: string): Decimal | undefined {
  const trimmed = text.trim();
  return FLOAT_TEXT.test(trimmed) ? new Decimal(trimmed) : undefined;
}

/**
 * Build a string value. Any scalar is coerced to text.
 */
export function stringValue(raw: RawScalar, isClass = false): StringValue {
  const text = raw instanceof Date ? raw.toISOString() : String(raw);
  return { kind: "string", value: text, isClass };
}

/**
 * Build a nominal value. Membership in the attribute's value set is checked
 * by whoever consumes the value, not here.
 */
export function nominalValue(raw: RawScalar, isClass = false): NominalValue {
  if (raw instanceof Date) {
    throw ValueTypeError.incompatible("nominal", raw, "calendar values are not nominal labels");
  }
  return { kind: "nominal", value: String(raw), isClass };
}

/**
 * Build a date value from a calendar value or from free text, which the
 * writer normalizes later
 */
export function dateValue(raw: RawScalar, isClass = false): DateValue {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) {
      throw ValueTypeError.incompatible("date", raw, "invalid calendar value");
    }
    return { kind: "date", value: raw, isClass };
  }
  if (typeof raw === "string") {
    return { kind: "date", value: raw, isClass };
  }
  throw ValueTypeError.incompatible("date", raw, "expected a calendar value or date text");
}

/**
 * Build a value for a known attribute kind. The missing marker always
 * becomes a missing value of that kind.
 */
export function valueOfKind(kind: AttributeKind, raw: RawScalar, isClass = false): ArffValue {
  switch (kind) {
    case "integer":
      return integerValue(raw, isClass);
    case "numeric":
      return numericValue(raw, isClass);
    case "string":
      return stringValue(raw, isClass);
    case "nominal":
      return nominalValue(raw, isClass);
    case "date":
      return dateValue(raw, isClass);
  }
}

/**
 * Options for kind inference
 */
export interface WrapOptions {
  /** Try the numeric kind before integer (default: true) */
  numeric?: boolean;
  /** Class flag given to the inferred value (default: false) */
  isClass?: boolean;
}

/**
 * Infer a value for a scalar whose attribute kind is unknown.
 *
 * Order: existing values pass through, the missing marker and any text
 * become strings, then numeric, integer and date are tried in turn. A plain
 * number therefore becomes numeric, never integer, unless `numeric: false`
 * is passed. Prefer `valueOfKind` whenever the schema knows the kind.
 *
 * @throws {ValueTypeError} When no kind accepts the input
 */
export function wrapValue(raw: RawScalar | ArffValue, options: WrapOptions = {}): ArffValue {
  if (isArffValue(raw)) {
    return raw;
  }

  const isClass = options.isClass ?? false;
  if (raw === MISSING || typeof raw === "string") {
    return stringValue(raw, isClass);
  }

  const candidates =
    options.numeric === false
      ? [integerValue, dateValue]
      : [numericValue, integerValue, dateValue];

  for (const build of candidates) {
    try {
      return build(raw, isClass);
    } catch (error) {
      if (!(error instanceof ValueTypeError)) throw error;
    }
  }

  throw ValueTypeError.incompatible("any attribute kind", raw);
}
