/**
 * Core type definitions for ARFF datasets
 *
 * Attribute declarations, row shapes and the option objects accepted by the
 * parser, the writer and the dataset, together with the ArkType schemas
 * that validate those options at construction time.
 */

import { type } from "arktype";
import type { ArffSink } from "./io/sink";
import type { ArffValue, AttributeKind, RawScalar } from "./values/types";

// =============================================================================
// SCHEMA TYPES
// =============================================================================

/**
 * Kind keyword accepted when declaring an attribute; `real` is an alias of
 * `numeric`
 */
export type DeclaredKind = AttributeKind | "real";

/**
 * Attribute declaration. Position in the schema fixes the dense column
 * order and the sparse column index.
 */
export type AttributeSpec =
  | { readonly name: string; readonly kind: "integer" | "numeric" | "string" }
  | { readonly name: string; readonly kind: "nominal"; readonly values: ReadonlySet<string> }
  | { readonly name: string; readonly kind: "date"; readonly pattern?: string };

/**
 * Extra declaration data: the allowed values of a nominal attribute, or the
 * Weka pattern of a date attribute
 */
export type AttributeData = Iterable<string> | string;

// =============================================================================
// ROW TYPES
// =============================================================================

/**
 * A single cell: a raw scalar (including the missing marker) or a typed value
 */
export type RowCell = RawScalar | ArffValue;

/**
 * Positional row aligned with schema order
 */
export type DenseRow = readonly RowCell[];

/**
 * Name-keyed row; attributes without an entry are absent
 */
export type NamedRow = Readonly<Record<string, RowCell>>;

/**
 * Either row shape
 */
export type ArffRow = DenseRow | NamedRow;

/**
 * Row encodings of the data section
 */
export type RowFormat = "dense" | "sparse";

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Base parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before the line is rejected */
  maxLineLength?: number;
  /** Attach source line numbers to parsed records */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler; the default throws a ParseError */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler; the default logs through console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * ARFF parser options
 */
export interface ArffParserOptions extends ParserOptions {
  /** Stop at `@data` without reading any rows */
  schemaOnly?: boolean;
}

/**
 * ARFF writer options
 */
export interface ArffWriterOptions {
  /** Row encoding (default: "sparse") */
  format?: RowFormat;
  /** Line terminator (default: "\n") */
  lineEnding?: "\n" | "\r\n";
}

/**
 * Options for appending a row to a dataset
 */
export interface AppendOptions {
  /** Grow and check the schema from the row (default: true) */
  updateSchema?: boolean;
  /** Apply schema effects without storing or writing the row (default: false) */
  schemaOnly?: boolean;
}

/**
 * Options for opening a streaming sink on a dataset
 */
export interface StreamOptions {
  /** Output file; a temporary file is created when omitted */
  path?: string;
  /** Attribute to designate as class before the header is flushed */
  classAttribute?: string;
  /** Sink to stream into instead of a file */
  sink?: ArffSink;
}

/**
 * Options for reading files
 */
export interface ReadOptions {
  /** Maximum accepted file size in bytes (default: 100MB) */
  maxFileSize?: number;
}

/**
 * Options shared by every dataset
 */
export interface DatasetOptions {
  /** Warning handler for dropped rows; the default logs through console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

/**
 * Options for building a dataset from ARFF text
 */
export interface ParseOptions extends DatasetOptions {
  /** Read the header only (default: false) */
  schemaOnly?: boolean;
}

/**
 * Options for loading a dataset from a file
 */
export interface LoadOptions extends ParseOptions, ReadOptions {}

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * ArkType validation schema for parser options
 */
export const ArffParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "signal?": "unknown", // AbortSignal
  "onError?": "unknown",
  "onWarning?": "unknown",
  "schemaOnly?": "boolean",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && options.maxLineLength > 100_000_000) {
    return ctx.reject({
      path: ["maxLineLength"],
      expected: "at most 100MB per line",
      actual: `${options.maxLineLength}`,
    });
  }
  return true;
});

/**
 * ArkType validation schema for writer options
 */
export const ArffWriterOptionsSchema = type({
  "format?": '"dense"|"sparse"',
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

/**
 * ArkType validation schema for append options
 */
export const AppendOptionsSchema = type({
  "updateSchema?": "boolean",
  "schemaOnly?": "boolean",
});

/**
 * ArkType validation schema for stream options
 */
export const StreamOptionsSchema = type({
  "path?": "string>0",
  "classAttribute?": "string>0",
  "sink?": "object",
});

/**
 * ArkType validation schema for dataset parse and load options
 */
export const LoadOptionsSchema = type({
  "onWarning?": "unknown",
  "schemaOnly?": "boolean",
  "maxFileSize?": "number>=0",
});

/**
 * ArkType validation schema for read options
 */
export const ReadOptionsSchema = type({
  "maxFileSize?": "number>=0",
});

/**
 * ArkType validation schema for file paths
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without null characters", actual: "null character" });
  }
  return true;
});
