/**
 * Schema evolution for name-keyed rows
 *
 * In memory, a row may declare new attributes and widen nominal sets. Once
 * the schema is frozen by an open stream, fields that would change the
 * header are trimmed from the row instead.
 *
 * @module dataset/append
 */

import { MISSING } from "../constants";
import { SchemaError } from "../errors";
import type { ArffSchema } from "../schema";
import type { NamedRow, RowCell } from "../types";
import { stringValue, valueOfKind, wrapValue } from "../values/constructors";
import { type ArffValue, isArffValue } from "../values/types";

/**
 * Build the typed value for one appended cell: typed values pass through,
 * the missing marker becomes a string value, declared attributes use their
 * kind and unknown attributes fall back to inference.
 */
export function appendValue(schema: ArffSchema, name: string, cell: RowCell): ArffValue {
  if (isArffValue(cell)) return cell;
  if (cell === MISSING) return stringValue(cell);

  const declared = schema.kindOf(name);
  return declared === undefined ? wrapValue(cell) : valueOfKind(declared, cell);
}

/**
 * Apply a row to the schema and return the fields to keep
 *
 * @throws {SchemaError} When a value conflicts with its declared kind or
 * designates a second class attribute
 */
export function resolveNamedRow(
  schema: ArffSchema,
  row: NamedRow,
  updateSchema: boolean
): Record<string, ArffValue> {
  const resolved: Record<string, ArffValue> = {};

  for (const [name, cell] of Object.entries(row)) {
    const value = appendValue(schema, name, cell);
    if (!updateSchema) {
      resolved[name] = value;
      continue;
    }

    const declared = schema.kindOf(name);
    if (value.value !== MISSING && declared !== undefined && declared !== value.kind) {
      throw new SchemaError(
        `Attempting to set attribute ${name} to type ${value.kind} but it is already defined as type ${declared}.`,
        name
      );
    }

    if (declared === undefined) {
      if (schema.isFrozen) continue;
      schema.defineAttribute(name, value.kind);
    }

    if (value.kind === "nominal" && value.value !== MISSING) {
      if (schema.isFrozen) {
        if (!schema.nominalValues(name).has(value.value)) continue;
      } else {
        schema.addNominalValue(name, value.value);
      }
    }

    if (value.isClass) {
      schema.designateClass(name);
    }
    schema.normalizeClassPosition();

    resolved[name] = value;
  }

  return resolved;
}
