/**
 * ARFF parser
 *
 * Feeds lines through the state machine and yields one record per data
 * row. Declarations are written into the schema the parser was given, so a
 * dataset can hand over its own schema and keep parsing into it.
 *
 * @module formats/arff/parser
 */

import { type } from "arktype";
import { FORMAT_NAME } from "../../constants";
import { ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { ArffSchema } from "../../schema";
import type { ArffParserOptions, ReadOptions } from "../../types";
import { ArffParserOptionsSchema } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { ArffStateMachine } from "./state-machine";
import { type ArffRecord, ArffParseState } from "./types";

const LINE_BREAK = /\r?\n/;

/**
 * Streaming ARFF parser
 *
 * One parser reads one document. Line numbers and the parse state carry
 * over between calls, so text may be supplied in several pieces.
 *
 * @example
 * ```typescript
 * const parser = new ArffParser();
 * for await (const record of parser.parseString(text)) {
 *   console.log(record.format, record.row);
 * }
 * console.log(parser.schema.names);
 * ```
 *
 * @example Header only
 * ```typescript
 * const parser = new ArffParser({ schemaOnly: true });
 * for await (const _ of parser.parseFile("weather.arff")) {
 *   // never reached
 * }
 * ```
 */
export class ArffParser extends AbstractParser<ArffRecord, ArffParserOptions> {
  private readonly target: ArffSchema;
  private readonly machine: ArffStateMachine;
  private lineNumber = 0;

  /**
   * @param schema Schema receiving the declarations; a new one by default
   */
  constructor(options: ArffParserOptions = {}, schema: ArffSchema = new ArffSchema()) {
    const validationResult = ArffParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid ARFF parser options: ${validationResult.summary}`,
        undefined,
        "ARFF parser configuration"
      );
    }

    super(options);
    this.target = schema;
    this.machine = new ArffStateMachine(schema, this.onWarning);
  }

  protected getDefaultOptions(): Partial<ArffParserOptions> {
    return {
      maxLineLength: 10_000_000,
      trackLineNumbers: true,
      schemaOnly: false,
    };
  }

  protected getFormatName(): string {
    return FORMAT_NAME;
  }

  /** Schema populated by the header */
  get schema(): ArffSchema {
    return this.target;
  }

  /** Leading comment block */
  get comment(): string {
    return this.machine.comment;
  }

  get state(): ArffParseState {
    return this.machine.state;
  }

  /**
   * Pick up the document where another parser stopped
   */
  resumeFrom(other: ArffParser): void {
    this.machine.resumeFrom(other.machine);
    this.lineNumber = other.lineNumber;
  }

  async *parseString(data: string): AsyncIterable<ArffRecord> {
    yield* this.parseText(data);
  }

  async *parseFile(filePath: string, options?: ReadOptions): AsyncIterable<ArffRecord> {
    const text = await readToString(filePath, options);
    yield* this.parseText(text);
  }

  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<ArffRecord> {
    const reader = stream.getReader();
    const decoder = new TextDecoder();
    let buffer = "";

    try {
      while (true) {
        const { done, value } = await reader.read();

        if (done) {
          buffer += decoder.decode();
          if (buffer !== "") {
            yield* this.parseLines([buffer]);
          }
          break;
        }

        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split(LINE_BREAK);
        buffer = lines.pop() ?? "";

        if (lines.length > 0) {
          yield* this.parseLines(lines);
        }
        if (this.stopped()) {
          break;
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  /**
   * Synchronously parse a piece of text
   */
  *parseText(text: string, schemaOnly?: boolean): Generator<ArffRecord> {
    yield* this.parseLines(text.split(LINE_BREAK), schemaOnly);
  }

  /**
   * Synchronously parse lines. With `schemaOnly`, parsing stops as soon as
   * the data section begins.
   */
  *parseLines(lines: Iterable<string>, schemaOnly = this.options.schemaOnly): Generator<ArffRecord> {
    for (const line of lines) {
      if (this.stopped(schemaOnly)) return;
      this.checkAborted();

      this.lineNumber += 1;
      if (!this.checkLineLength(line, this.lineNumber)) continue;

      const record = this.machine.consume(line, this.lineNumber);
      if (record === undefined) continue;

      yield this.options.trackLineNumbers === false
        ? { format: record.format, row: record.row }
        : record;
    }
  }

  private stopped(schemaOnly = this.options.schemaOnly): boolean {
    return schemaOnly === true && this.machine.state === ArffParseState.DATA;
  }
}
