/**
 * ARFF dataset
 *
 * Owns a schema together with either an in-memory row sequence or a live
 * stream sink, never both. Rows enter by parsing text or by `append`;
 * leaving streaming mode is final.
 *
 * @module dataset
 */

import { type } from "arktype";
import type { Decimal } from "decimal.js";
import { DIRECTIVES, MISSING } from "../constants";
import { SchemaError, ValidationError } from "../errors";
import { ArffParser } from "../formats/arff/parser";
import { decodeDenseCells, isDenseRow } from "../formats/arff/rows";
import { ArffParseState, type ParsedRow } from "../formats/arff/types";
import { ArffWriter } from "../formats/arff/writer";
import { readToString } from "../io/file-reader";
import { makeTempFile, writeString } from "../io/file-writer";
import { type ArffSink, FileSink } from "../io/sink";
import { ArffSchema, type SchemaView } from "../schema";
import type {
  AppendOptions,
  ArffRow,
  ArffWriterOptions,
  AttributeData,
  DatasetOptions,
  DeclaredKind,
  LoadOptions,
  NamedRow,
  ParseOptions,
  RowCell,
  StreamOptions,
} from "../types";
import { AppendOptionsSchema, LoadOptionsSchema, StreamOptionsSchema } from "../types";
import { dateValue, decimalFromText, integerValue } from "../values/constructors";
import { type ArffValue, isArffValue } from "../values/types";
import { resolveNamedRow } from "./append";

/**
 * Storage regime of a dataset
 */
export type DatasetMode = "memory" | "streaming" | "closed";

/**
 * Decoded prediction token
 */
export type AttributeValue = number | Decimal | string;

function validated<T extends object>(
  schema: (input: unknown) => unknown,
  options: T,
  what: string
): T {
  const result = schema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid ${what}: ${result.summary}`);
  }
  return options;
}

function cloneRow(row: ParsedRow): ParsedRow {
  if (isDenseRow(row)) {
    return row.map((cell) => (cell instanceof Date ? new Date(cell.getTime()) : cell));
  }
  const copy: Record<string, ArffValue> = {};
  for (const [name, value] of Object.entries(row)) {
    copy[name] =
      value.kind === "date" && value.value instanceof Date
        ? dateValue(new Date(value.value.getTime()), value.isClass)
        : value;
  }
  return copy;
}

function displayCell(cell: RowCell): string {
  if (isArffValue(cell)) {
    return `${cell.kind}(${displayCell(cell.value)})`;
  }
  return cell instanceof Date ? cell.toISOString() : String(cell);
}

/**
 * Schema plus rows, or schema plus an open stream
 *
 * @example In memory
 * ```typescript
 * const dataset = ArffDataset.parse(text);
 * await dataset.append({ temperature: 18.5, play: nominalValue("no", true) });
 * await dataset.save("weather.arff");
 * ```
 *
 * @example Streaming
 * ```typescript
 * const dataset = new ArffDataset(new ArffSchema("weather", [["a", "numeric"]]));
 * await dataset.openStream({ path: "out.arff" });
 * await dataset.append({ a: 1.5 });
 * const path = await dataset.closeStream();
 * ```
 */
export class ArffDataset implements Iterable<NamedRow> {
  /** Leading comment block, without comment markers */
  comment = "";
  private readonly data: ParsedRow[] = [];
  private readonly owned: ArffSchema;
  private readonly parser: ArffParser;
  private sink: ArffSink | undefined;
  private streamWriter: ArffWriter | undefined;
  private sourcePath: string | undefined;
  private closed = false;

  /**
   * @param schema Initial declarations; the dataset keeps its own copy
   */
  constructor(
    schema: ArffSchema = new ArffSchema(),
    private readonly options: DatasetOptions = {}
  ) {
    this.owned = schema.copy();
    this.parser = new ArffParser({ onWarning: options.onWarning }, this.owned);
  }

  /**
   * Build a dataset from ARFF text
   *
   * @throws {ParseError} On structural errors
   * @throws {ValidationError} On values that do not fit their attribute
   */
  static parse(text: string, options: ParseOptions = {}): ArffDataset {
    validated(LoadOptionsSchema, options, "parse options");
    const dataset = new ArffDataset(new ArffSchema(), { onWarning: options.onWarning });
    dataset.feed(text, options.schemaOnly ?? false);
    return dataset;
  }

  /**
   * Read and parse an ARFF file. Unless only the schema was read, `save()`
   * without a path writes back to the same file.
   *
   * @throws {FileError} When the file cannot be read
   */
  static async load(path: string, options: LoadOptions = {}): Promise<ArffDataset> {
    validated(LoadOptionsSchema, options, "load options");
    const text = await readToString(path, options);
    const dataset = ArffDataset.parse(text, options);
    if (options.schemaOnly !== true) {
      dataset.sourcePath = path;
    }
    return dataset;
  }

  /**
   * Current declarations. Change them through the dataset so that rows
   * held in memory follow the attribute order.
   */
  get schema(): SchemaView {
    return this.owned;
  }

  get relation(): string {
    return this.owned.relation;
  }

  set relation(name: string) {
    this.owned.relation = name;
  }

  get mode(): DatasetMode {
    if (this.closed) return "closed";
    return this.sink === undefined ? "memory" : "streaming";
  }

  /** Number of rows held in memory */
  get length(): number {
    return this.data.length;
  }

  /**
   * Parse additional ARFF text into this dataset, continuing from wherever
   * earlier text left the parser
   *
   * @throws {SchemaError} While streaming or after the stream was closed
   */
  feed(text: string, schemaOnly = false): void {
    this.assertInMemory("parse text into");
    const inComment = this.parser.state === ArffParseState.COMMENT;
    const records = this.parser.parseText(text, schemaOnly);
    for (;;) {
      // Declarations in the text may reorder attributes under buffered rows
      const step = this.reshape(() => records.next());
      if (step.done === true) break;
      this.data.push(step.value.row);
    }
    if (inComment) {
      this.comment = this.parser.comment;
    }
  }

  /**
   * Deep copy. A full copy continues the document where this dataset's
   * parser stopped, so `feed` behaves the same on both. A schema-only copy
   * carries neither rows nor comment, and `feed` on it starts a new
   * document.
   */
  copy(options: { schemaOnly?: boolean } = {}): ArffDataset {
    const copy = new ArffDataset(this.owned, this.options);
    if (options.schemaOnly !== true) {
      copy.parser.resumeFrom(this.parser);
      copy.comment = this.comment;
      for (const row of this.data) {
        copy.data.push(cloneRow(row));
      }
    }
    return copy;
  }

  // ===========================================================================
  // SCHEMA
  // ===========================================================================

  /**
   * Declare an attribute. Pass the allowed values for nominal attributes
   * and the Weka pattern for dates.
   */
  defineAttribute(name: string, kind: DeclaredKind, data?: AttributeData): void {
    this.reshape(() => this.owned.defineAttribute(name, kind, data));
  }

  /**
   * Designate the class attribute and move it last
   */
  setClass(name: string): void {
    this.reshape(() => this.owned.setClass(name));
  }

  setNominalValues(name: string, values: Iterable<string>): void {
    this.owned.setNominalValues(name, values);
  }

  /**
   * Sort attributes by name, keeping the class attribute last
   */
  alphabetizeAttributes(): void {
    this.reshape(() => this.owned.alphabetize());
  }

  /**
   * Decode a prediction token for an attribute: integers to numbers,
   * numerics to decimals and nominal `index:value` pairs to their value
   *
   * @returns undefined for the missing marker
   * @throws {ValidationError} For an unknown label or a kind without tokens
   */
  getAttributeValue(name: string, token: string): AttributeValue | undefined {
    if (token === MISSING) return undefined;

    const kind = this.owned.kindOf(name);
    switch (kind) {
      case "integer": {
        const value = integerValue(token).value;
        return value === MISSING ? undefined : value;
      }
      case "numeric": {
        const value = decimalFromText(token);
        if (value === undefined) {
          throw new ValidationError(`Invalid numeric prediction "${token}" for attribute ${name}`);
        }
        return value;
      }
      case "nominal": {
        const parts = token.split(":");
        const label = parts[1];
        if (parts.length !== 2 || label === undefined) {
          throw new ValidationError(`Malformed prediction "${token}" for attribute ${name}`);
        }
        const allowed = this.owned.nominalValues(name);
        if (label !== MISSING && !allowed.has(label)) {
          throw new ValidationError(
            `Predicted value "${label}" but only values ${[...allowed].join(", ")} are allowed.`
          );
        }
        return label;
      }
      case undefined:
        throw new SchemaError(`Unknown attribute "${name}"`, name);
      default:
        throw new ValidationError(`Attribute ${name} of type ${kind} has no prediction tokens`);
    }
  }

  // ===========================================================================
  // ROWS
  // ===========================================================================

  /**
   * Add a row. Name-keyed rows may grow the schema in memory; positional
   * rows must match the schema exactly. While streaming, the row is written
   * and flushed at once.
   *
   * @throws {SchemaError} On kind or class conflicts, or after the stream closed
   * @throws {ValidationError} On positional rows that do not fit the schema
   */
  async append(row: ArffRow, options: AppendOptions = {}): Promise<void> {
    validated(AppendOptionsSchema, options, "append options");
    if (this.closed) {
      throw new SchemaError("Cannot append: the stream has already been closed");
    }

    const stored = isDenseRow(row) ? this.decodePositional(row) : this.resolve(row, options);

    if (options.schemaOnly === true) return;

    if (this.sink === undefined || this.streamWriter === undefined) {
      this.data.push(stored);
      return;
    }

    const line = this.streamWriter.formatRow(stored);
    if (line !== undefined) {
      await this.sink.write(this.streamWriter.terminate(line));
    }
    await this.sink.flush();
  }

  /**
   * Rows as name-keyed records in schema order
   */
  *rows(): Generator<NamedRow> {
    const names = this.owned.names;
    for (const row of this.data) {
      if (!isDenseRow(row)) {
        yield { ...row };
        continue;
      }
      const named: Record<string, RowCell> = {};
      names.forEach((name, index) => {
        const cell = row[index];
        if (cell !== undefined) named[name] = cell;
      });
      yield named;
    }
  }

  [Symbol.iterator](): Iterator<NamedRow> {
    return this.rows();
  }

  // ===========================================================================
  // OUTPUT
  // ===========================================================================

  /**
   * Serialize the header and the in-memory rows
   */
  write(options: ArffWriterOptions = {}): string {
    return new ArffWriter(this.owned, options).formatDocument(this.comment, this.data);
  }

  /**
   * Write to a file; without a path, to the file the dataset was loaded from
   *
   * @throws {ValidationError} When no path is known
   */
  async save(path?: string, options: ArffWriterOptions = {}): Promise<void> {
    const target = path ?? this.sourcePath;
    if (target === undefined) {
      throw new ValidationError("No file name given and the dataset was not loaded from a file");
    }
    await writeString(target, this.write(options));
  }

  /**
   * Relation, attributes and rows as readable text
   */
  describe(): string {
    const lines = [`Relation ${this.owned.relation}`, "  With attributes"];
    for (const spec of this.owned.attributes) {
      lines.push(
        spec.kind === "nominal"
          ? `    ${spec.name} of type nominal with values ${[...spec.values].join(", ")}`
          : `    ${spec.name} of type ${spec.kind}`
      );
    }
    for (const row of this.data) {
      lines.push(
        isDenseRow(row)
          ? `[${row.map(displayCell).join(", ")}]`
          : `{${Object.entries(row)
              .map(([name, value]) => `${name}: ${displayCell(value)}`)
              .join(", ")}}`
      );
    }
    return lines.join("\n");
  }

  // ===========================================================================
  // STREAMING
  // ===========================================================================

  /**
   * Write the header and any buffered rows to a sink and keep it open.
   * From here on rows are written instead of kept, and the schema is frozen.
   *
   * @throws {SchemaError} When a stream is already open or was closed
   */
  async openStream(options: StreamOptions = {}): Promise<void> {
    validated(StreamOptionsSchema, options, "stream options");
    this.assertInMemory("open a stream on");

    if (options.classAttribute !== undefined) {
      this.setClass(options.classAttribute);
    }

    const writer = new ArffWriter(this.owned, { format: "sparse" });
    const lines = [...writer.headerLines(this.comment), DIRECTIVES.data];
    for (const row of this.data) {
      const line = writer.formatRow(row);
      if (line !== undefined) lines.push(line);
    }

    const sink = options.sink ?? (await FileSink.open(options.path ?? (await makeTempFile())));
    try {
      await sink.write(lines.map((line) => writer.terminate(line)).join(""));
      await sink.flush();
    } catch (error) {
      if (options.sink === undefined) {
        await sink.close();
      }
      throw error;
    }

    this.data.length = 0;
    this.owned.freeze();
    this.sink = sink;
    this.streamWriter = writer;
  }

  /**
   * Flush the open stream, if any
   */
  async flush(): Promise<void> {
    await this.sink?.flush();
  }

  /**
   * Close the stream and return its location. The dataset accepts no more
   * rows afterwards.
   *
   * @throws {SchemaError} When no stream is open
   */
  async closeStream(): Promise<string> {
    const sink = this.sink;
    if (sink === undefined) {
      throw new SchemaError("No stream is open");
    }
    this.sink = undefined;
    this.streamWriter = undefined;
    this.closed = true;
    return sink.close();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private resolve(row: NamedRow, options: AppendOptions): ParsedRow {
    return this.reshape(() => resolveNamedRow(this.owned, row, options.updateSchema ?? true));
  }

  private decodePositional(row: readonly RowCell[]): ParsedRow {
    if (row.length !== this.owned.size) {
      throw new ValidationError(
        `Row contains ${row.length} values but the schema has ${this.owned.size} attributes`
      );
    }
    return decodeDenseCells(this.owned, row);
  }

  /**
   * Run a schema change and realign in-memory positional rows with the
   * resulting attribute order. New attributes read as missing.
   */
  private reshape<T>(change: () => T): T {
    const before = this.owned.names;
    const result = change();
    const after = this.owned.names;

    if (before.length === after.length && before.every((name, index) => name === after[index])) {
      return result;
    }

    this.data.forEach((row, rowIndex) => {
      if (!isDenseRow(row)) return;
      this.data[rowIndex] = after.map((name) => {
        const index = before.indexOf(name);
        return index === -1 ? MISSING : (row[index] ?? MISSING);
      });
    });
    return result;
  }

  private assertInMemory(action: string): void {
    if (this.closed) {
      throw new SchemaError(`Cannot ${action} a dataset whose stream has been closed`);
    }
    if (this.sink !== undefined) {
      throw new SchemaError(`Cannot ${action} a dataset with an open stream`);
    }
  }
}
