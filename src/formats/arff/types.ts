/**
 * ARFF format type definitions
 *
 * @module formats/arff/types
 */

import type { RowFormat } from "../../types";
import type { ArffValue, AttributeKind, RawScalar } from "../../values/types";

/**
 * Dense row as produced by the parser: missing markers, exact integers,
 * decimals, text, and date text left undecoded
 */
export type ParsedDenseRow = readonly RawScalar[];

/**
 * Sparse row as produced by the parser: typed values keyed by attribute name
 */
export type ParsedSparseRow = Readonly<Record<string, ArffValue>>;

/**
 * Row shape held in memory by a dataset
 */
export type ParsedRow = ParsedDenseRow | ParsedSparseRow;

/**
 * One data line decoded by the parser
 */
export interface ArffRecord {
  readonly format: RowFormat;
  readonly row: ParsedRow;
  /** Source line number, when line tracking is on */
  readonly lineNumber?: number;
}

/**
 * Parsed `@attribute` declaration
 */
export interface AttributeDeclaration {
  readonly name: string;
  readonly kind: AttributeKind;
  /** Nominal value list or date pattern */
  readonly data?: readonly string[] | string;
}

/**
 * States of the line-oriented parser. DATA is terminal.
 */
export enum ArffParseState {
  COMMENT,
  HEADER,
  DATA,
}

/**
 * Warning sink used by the row parsers
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;
