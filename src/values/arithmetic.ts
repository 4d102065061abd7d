/**
 * Arithmetic and comparison on typed values
 *
 * Values are immutable: `add` and `divide` return new values carrying the
 * left operand's class flag, and accumulation is a fold over `add`.
 * Arithmetic is only defined between values of the same kind (or a value
 * and a plain number) and never over missing payloads.
 *
 * @module values/arithmetic
 */

import { MISSING } from "../constants";
import { ValueTypeError } from "../errors";
import { integerValue, numericValue } from "./constructors";
import type { ArffValue, ArithmeticValue, IntegerValue, NumericValue } from "./types";

function operandOf(
  left: ArithmeticValue,
  right: ArithmeticValue | number,
  operation: string
): number {
  if (left.value === MISSING) {
    throw new ValueTypeError(`Cannot ${operation} a missing ${left.kind} value`, left.kind);
  }
  if (typeof right === "number") {
    return right;
  }
  if (right.kind !== left.kind) {
    throw new ValueTypeError(
      `Cannot ${operation} ${right.kind} and ${left.kind} values`,
      left.kind,
      right
    );
  }
  if (right.value === MISSING) {
    throw new ValueTypeError(`Cannot ${operation} a missing ${right.kind} value`, right.kind);
  }
  return right.value;
}

function payloadOf(value: ArithmeticValue): number {
  if (value.value === MISSING) {
    throw new ValueTypeError(`Cannot use a missing ${value.kind} value`, value.kind);
  }
  return value.value;
}

/**
 * Add a value of the same kind, or a plain number
 *
 * @throws {ValueTypeError} On missing payloads, mixed kinds, or an integer
 * sum that is not integral
 */
export function add(left: IntegerValue, right: IntegerValue | number): IntegerValue;
export function add(left: NumericValue, right: NumericValue | number): NumericValue;
export function add(left: ArithmeticValue, right: ArithmeticValue | number): ArithmeticValue;
export function add(left: ArithmeticValue, right: ArithmeticValue | number): ArithmeticValue {
  const operand = operandOf(left, right, "add");
  const sum = payloadOf(left) + operand;
  return left.kind === "integer" ? integerValue(sum, left.isClass) : numericValue(sum, left.isClass);
}

/**
 * Divide a numeric value by another numeric value or a plain number
 *
 * @throws {ValueTypeError} On missing payloads or a zero divisor
 */
export function divide(left: NumericValue, right: NumericValue | number): NumericValue {
  const operand = operandOf(left, right, "divide");
  if (operand === 0) {
    throw new ValueTypeError("Cannot divide a numeric value by zero", "numeric", right);
  }
  return numericValue(payloadOf(left) / operand, left.isClass);
}

/**
 * Fold `add` over a sequence of operands, starting from `initial`
 *
 * @example
 * ```typescript
 * const total = accumulate(integerValue(0), [integerValue(2), 3]);
 * total.value; // 5
 * ```
 */
export function accumulate(
  initial: IntegerValue,
  operands: Iterable<IntegerValue | number>
): IntegerValue;
export function accumulate(
  initial: NumericValue,
  operands: Iterable<NumericValue | number>
): NumericValue;
export function accumulate(
  initial: ArithmeticValue,
  operands: Iterable<ArithmeticValue | number>
): ArithmeticValue {
  let total = initial;
  for (const operand of operands) {
    total = add(total, operand);
  }
  return total;
}

function comparablePayload(value: ArffValue): string | number {
  const payload = value.value;
  return payload instanceof Date ? payload.getTime() : payload;
}

/**
 * Payload equality; the kind and class flag are not compared
 */
export function valuesEqual(left: ArffValue, right: ArffValue): boolean {
  return comparablePayload(left) === comparablePayload(right);
}

/**
 * Order two values by payload: numbers numerically, everything else as text
 */
export function compareValues(left: ArffValue, right: ArffValue): number {
  const a = comparablePayload(left);
  const b = comparablePayload(right);
  if (typeof a === "number" && typeof b === "number") {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const textA = String(a);
  const textB = String(b);
  return textA === textB ? 0 : textA < textB ? -1 : 1;
}
