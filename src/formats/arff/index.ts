/**
 * @module formats/arff
 * @description ARFF (Attribute-Relation File Format) support
 *
 * Line-oriented parsing of the header and of dense and sparse data rows,
 * and the matching writer.
 *
 * @example Parsing
 * ```typescript
 * import { ArffParser } from './formats/arff';
 *
 * const parser = new ArffParser();
 * for await (const record of parser.parseFile('weather.arff')) {
 *   console.log(record.row);
 * }
 * ```
 *
 * @example Writing
 * ```typescript
 * import { ArffWriter } from './formats/arff';
 *
 * const writer = new ArffWriter(parser.schema);
 * writer.formatRow({ temperature: 21.5, play: "yes" }); // "{0 21.5, 1 yes}"
 * ```
 */

// =============================================================================
// RE-EXPORTS - TYPES
// =============================================================================

export type {
  ArffRecord,
  AttributeDeclaration,
  ParsedDenseRow,
  ParsedRow,
  ParsedSparseRow,
  WarningHandler,
} from "./types";

export { ArffParseState } from "./types";

// =============================================================================
// RE-EXPORTS - MAIN CLASSES
// =============================================================================

export { ArffParser } from "./parser";
export { ArffStateMachine, stripCommentMarker } from "./state-machine";
export { ArffWriter, quoteName, quoteToken } from "./writer";

// =============================================================================
// RE-EXPORTS - UTILITIES
// =============================================================================

export { parseAttributeDeclaration, parseRelation, tokenizeDeclaration } from "./declarations";
export {
  cellPayload,
  decodeDenseCell,
  decodeDenseCells,
  isDenseRow,
  parseDenseRow,
  parseSparseRow,
} from "./rows";
