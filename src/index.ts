/**
 * arff-kit - reading and writing ARFF datasets
 *
 * Typed values, an attribute schema, a line-oriented parser, a dense and
 * sparse writer, and a dataset that can stream rows straight to disk.
 */

// Constants
export { DEFAULT_DATE_FORMAT, MISSING } from "./constants";
// Datasets
export { ArffDataset, type AttributeValue, type DatasetMode } from "./dataset";
// Error types
export {
  ArffError,
  FileError,
  ParseError,
  SchemaError,
  ValidationError,
  ValueTypeError,
} from "./errors";
// ARFF format
export {
  type ArffRecord,
  ArffParser,
  ArffParseState,
  ArffWriter,
  type ParsedDenseRow,
  type ParsedRow,
  type ParsedSparseRow,
} from "./formats/arff";
// File I/O infrastructure
export { exists, readToString } from "./io/file-reader";
export { deleteFile, makeTempFile, writeString } from "./io/file-writer";
export { type ArffSink, FileSink, MemorySink } from "./io/sink";
// Schema
export { ArffSchema, type SchemaDeclaration, type SchemaView } from "./schema";
// Core types
export type {
  AppendOptions,
  ArffParserOptions,
  ArffRow,
  ArffWriterOptions,
  AttributeData,
  AttributeSpec,
  DatasetOptions,
  DeclaredKind,
  DenseRow,
  LoadOptions,
  NamedRow,
  ParseOptions,
  ParserOptions,
  ReadOptions,
  RowCell,
  RowFormat,
  StreamOptions,
} from "./types";
// Typed values
export {
  accumulate,
  add,
  compareValues,
  dateValue,
  decimalFromText,
  divide,
  integerValue,
  isArffValue,
  nominalValue,
  numericValue,
  stringValue,
  valueOfKind,
  valuesEqual,
  wrapValue,
} from "./values";
export type {
  ArffValue,
  ArithmeticValue,
  AttributeKind,
  DateValue,
  IntegerValue,
  NominalValue,
  NumericValue,
  RawScalar,
  StringValue,
  WrapOptions,
} from "./values";
