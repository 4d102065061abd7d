/**
 * Typed value model
 *
 * @example Schema-directed construction
 * ```typescript
 * import { valueOfKind } from "./values";
 *
 * const label = valueOfKind("nominal", "yes", true);
 * ```
 *
 * @module values
 */

export { accumulate, add, compareValues, divide, valuesEqual } from "./arithmetic";
export {
  dateValue,
  decimalFromText,
  integerValue,
  nominalValue,
  numericValue,
  stringValue,
  valueOfKind,
  wrapValue,
  type WrapOptions,
} from "./constructors";
export { formatDate, parseDateText, strftime, toCalendarDate, toStrftimePattern } from "./dates";
export { ATTRIBUTE_KINDS, isArffValue } from "./types";
export type {
  ArffValue,
  ArithmeticValue,
  AttributeKind,
  DateValue,
  IntegerValue,
  Missing,
  NominalValue,
  NumericValue,
  RawScalar,
  StringValue,
} from "./types";
