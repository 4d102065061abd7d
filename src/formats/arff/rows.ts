/**
 * Dense and sparse row decoding
 *
 * Dense rows are decoded positionally against the schema into exact
 * integers, decimals, text and undecoded date text. Sparse rows become
 * name-keyed typed values. Date fields therefore stay raw text in dense
 * rows but become date values in sparse rows.
 *
 * @module formats/arff/rows
 */

import { Decimal } from "decimal.js";
import { FORMAT_NAME, MISSING } from "../../constants";
import { ParseError, ValidationError, ValueTypeError } from "../../errors";
import type { ArffSchema } from "../../schema";
import type { ArffRow, AttributeSpec, DenseRow, RowCell } from "../../types";
import { decimalFromText, integerValue, stringValue, valueOfKind } from "../../values/constructors";
import { type ArffValue, isArffValue, type RawScalar } from "../../values/types";
import type { ParsedDenseRow, ParsedSparseRow, WarningHandler } from "./types";

const SPARSE_ENTRY = /^([0-9]+)\s+(.*)$/;
const UNESCAPED_COMMA = /(?<!\\),/;

/**
 * Distinguish positional rows from name-keyed rows
 */
export function isDenseRow(row: ArffRow): row is DenseRow {
  return Array.isArray(row);
}

/**
 * Unwrap typed values to their payload
 */
export function cellPayload(cell: RowCell): RawScalar {
  return isArffValue(cell) ? cell.value : cell;
}

function cellText(cell: RawScalar): string {
  return cell instanceof Date ? cell.toISOString() : String(cell);
}

function toDecimal(cell: RawScalar, spec: AttributeSpec, lineNumber?: number): Decimal {
  if (Decimal.isDecimal(cell)) return cell;
  const decimal =
    typeof cell === "string"
      ? decimalFromText(cell)
      : typeof cell === "number" && !Number.isNaN(cell)
        ? new Decimal(cell)
        : undefined;
  if (decimal !== undefined) return decimal;
  throw new ValidationError(
    `Invalid numeric value "${cellText(cell)}" for attribute ${spec.name}`,
    lineNumber
  );
}

function toInteger(cell: RawScalar, spec: AttributeSpec, lineNumber?: number): number {
  try {
    const value = integerValue(cell).value;
    if (value !== MISSING) return value;
  } catch (error) {
    if (!(error instanceof ValueTypeError)) throw error;
  }
  throw new ValidationError(
    `Invalid integer value "${cellText(cell)}" for attribute ${spec.name}`,
    lineNumber
  );
}

/**
 * Decode one dense cell against its attribute declaration
 *
 * @throws {ValidationError} For non-numeric text in a numeric column or a
 * nominal value outside the declared set
 */
export function decodeDenseCell(
  spec: AttributeSpec,
  cell: RowCell,
  lineNumber?: number
): RawScalar {
  const payload = cellPayload(cell);
  if (payload === MISSING) {
    return MISSING;
  }

  switch (spec.kind) {
    case "integer":
      return toInteger(payload, spec, lineNumber);
    case "numeric":
      return toDecimal(payload, spec, lineNumber);
    case "string":
      return cellText(payload);
    case "nominal": {
      const text = cellText(payload);
      if (!spec.values.has(text)) {
        throw new ValidationError(
          `Incorrect value ${text} for nominal attribute ${spec.name}; allowed values: ${[...spec.values].join(", ")}`,
          lineNumber
        );
      }
      return text;
    }
    case "date":
      return payload;
  }
}

/**
 * Decode a positional row of the same length as the schema
 */
export function decodeDenseCells(
  schema: ArffSchema,
  cells: DenseRow,
  lineNumber?: number
): ParsedDenseRow {
  return schema.attributes.map((spec, index) => {
    const cell = cells[index];
    if (cell === undefined) {
      throw new ValidationError(`Missing cell for attribute ${spec.name}`, lineNumber);
    }
    return decodeDenseCell(spec, cell, lineNumber);
  });
}

/**
 * Parse a dense data line. A field count that differs from the attribute
 * count is reported through `onWarning` and the row is dropped.
 *
 * @returns The decoded row, or undefined when the row was dropped
 */
export function parseDenseRow(
  schema: ArffSchema,
  line: string,
  lineNumber: number,
  onWarning: WarningHandler
): ParsedDenseRow | undefined {
  const fields = line
    .trim()
    .split(",")
    .map((field) => field.trim());

  if (fields.length !== schema.size) {
    onWarning(
      `line ${lineNumber} contains ${fields.length} values but it should contain ${schema.size} values`,
      lineNumber
    );
    return undefined;
  }

  return decodeDenseCells(schema, fields, lineNumber);
}

function unquote(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === '"' || first === "'") && value[value.length - 1] === first) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse a sparse `{<index> <value>, ...}` data line into typed values keyed
 * by attribute name. The missing marker is always a string-kind value.
 *
 * @throws {ParseError} When the braces are unbalanced or an entry is malformed
 * @throws {ValidationError} When a value does not fit its attribute kind
 */
export function parseSparseRow(
  schema: ArffSchema,
  line: string,
  lineNumber?: number
): ParsedSparseRow {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) {
    throw new ParseError(`Malformed sparse data line: ${trimmed}`, FORMAT_NAME, lineNumber, line);
  }

  const interior = trimmed.slice(1, -1);
  const row: Record<string, ArffValue> = {};
  if (interior.trim() === "") {
    return row;
  }

  for (const part of interior.split(UNESCAPED_COMMA)) {
    const match = SPARSE_ENTRY.exec(part.trim());
    const index = match?.[1];
    const rawValue = match?.[2];
    if (index === undefined || rawValue === undefined) {
      throw new ParseError(`Malformed sparse entry "${part.trim()}"`, FORMAT_NAME, lineNumber, line);
    }

    const spec = schema.at(Number(index));
    if (spec === undefined) {
      throw new ParseError(
        `Sparse index ${index} is out of range for ${schema.size} attributes`,
        FORMAT_NAME,
        lineNumber,
        line
      );
    }

    const value = unquote(rawValue);
    if (value === MISSING) {
      row[spec.name] = stringValue(value);
      continue;
    }

    try {
      row[spec.name] = valueOfKind(spec.kind, value);
    } catch (error) {
      if (error instanceof ValueTypeError) {
        throw new ValidationError(`${error.message} for attribute ${spec.name}`, lineNumber);
      }
      throw error;
    }
  }

  return row;
}
