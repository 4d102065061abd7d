/**
 * Typed value definitions
 *
 * A value is an immutable scalar tagged with the attribute kind it was
 * built for and whether it marks the class attribute. The kinds form a
 * closed union; every dispatch on `kind` is an exhaustive switch.
 *
 * @module values/types
 */

import { Decimal } from "decimal.js";
import type { MISSING } from "../constants";

/**
 * The missing marker as a type
 */
export type Missing = typeof MISSING;

/**
 * Attribute kinds supported by the value model and the schema
 */
export type AttributeKind = "integer" | "numeric" | "string" | "nominal" | "date";

/**
 * Every attribute kind, in declaration order
 */
export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  "integer",
  "numeric",
  "string",
  "nominal",
  "date",
];

/**
 * Untyped scalar accepted wherever a value can be built
 */
export type RawScalar = string | number | Decimal | Date;

interface TaggedValue<K extends AttributeKind, P> {
  readonly kind: K;
  /** Payload, or the missing marker */
  readonly value: P | Missing;
  /** Whether this value designates its attribute as the class attribute */
  readonly isClass: boolean;
}

export type IntegerValue = TaggedValue<"integer", number>;
export type NumericValue = TaggedValue<"numeric", number>;
export type StringValue = TaggedValue<"string", string>;
export type NominalValue = TaggedValue<"nominal", string>;
/** Date payloads are calendar values or free text normalized on write */
export type DateValue = TaggedValue<"date", Date | string>;

export type ArffValue = IntegerValue | NumericValue | StringValue | NominalValue | DateValue;

/**
 * Values that support arithmetic
 */
export type ArithmeticValue = IntegerValue | NumericValue;

/**
 * Check whether an unknown cell is a typed value rather than a raw scalar
 */
export function isArffValue(cell: unknown): cell is ArffValue {
  if (typeof cell !== "object" || cell === null) return false;
  if (cell instanceof Date || Decimal.isDecimal(cell)) return false;
  if (!("kind" in cell) || !("value" in cell) || !("isClass" in cell)) return false;
  return typeof cell.kind === "string" && ATTRIBUTE_KINDS.some((kind) => kind === cell.kind);
}
