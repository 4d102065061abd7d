/**
 * ARFF format constants
 *
 * Markers, directive keywords and defaults shared by the value model,
 * the parser and the writer.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Token denoting "no value", valid for any attribute kind
 */
export const MISSING = "?";

/**
 * Prefix of comment lines
 */
export const COMMENT_MARKER = "%";

/**
 * Header directives, matched case-insensitively at the start of a line
 */
export const DIRECTIVES = {
  relation: "@relation ",
  attribute: "@attribute ",
  data: "@data",
} as const;

/**
 * Date pattern written for date attributes declared without one.
 * Weka documents "yyyy-MM-dd'T'HH:mm:ss" as its default but fails to read
 * the quoted T back, so the space-separated form is used instead.
 */
export const DEFAULT_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss";

/**
 * Format name used in warnings and parse errors
 */
export const FORMAT_NAME = "ARFF";

/**
 * Attribute type keywords accepted in `@attribute` declarations
 */
export const TYPE_KEYWORDS = {
  integer: "integer",
  numeric: "numeric",
  real: "real",
  string: "string",
  date: "date",
} as const;
