/**
 * ARFF writer
 *
 * Header text plus two row encodings. Dense rows are positional and only
 * support numeric, string and nominal attributes. Sparse rows (the
 * default) list `<index> <value>` pairs for the columns that carry
 * information; out-of-set nominal columns are dropped without error and a
 * row with nothing left to say produces no line at all.
 *
 * @module formats/arff/writer
 */

import { type } from "arktype";
import { Decimal } from "decimal.js";
import { COMMENT_MARKER, DEFAULT_DATE_FORMAT, DIRECTIVES, MISSING } from "../../constants";
import { ValidationError } from "../../errors";
import type { ArffSchema } from "../../schema";
import type { ArffRow, ArffWriterOptions, AttributeSpec, NamedRow, RowCell, RowFormat } from "../../types";
import { ArffWriterOptionsSchema } from "../../types";
import { integerValue, numericValue } from "../../values/constructors";
import { formatDate, toCalendarDate } from "../../values/dates";
import type { RawScalar } from "../../values/types";
import { cellPayload, isDenseRow } from "./rows";

const WHITESPACE = /\s/;

/**
 * Quote an attribute name for a header directive
 */
export function quoteName(name: string): string {
  return `'${name}'`.replaceAll("''", "'");
}

/**
 * Wrap a sparse token in double quotes when it contains whitespace and is
 * not quoted already
 */
export function quoteToken(token: string): string {
  return WHITESPACE.test(token) && !token.startsWith('"') ? `"${token}"` : token;
}

function scalarText(payload: RawScalar): string {
  return payload instanceof Date ? payload.toISOString() : String(payload);
}

/**
 * Serializer bound to one schema
 *
 * @example
 * ```typescript
 * const writer = new ArffWriter(schema, { format: "dense" });
 * const text = writer.formatDocument("generated", rows);
 * ```
 */
export class ArffWriter {
  private readonly format: RowFormat;
  private readonly lineEnding: "\n" | "\r\n";

  constructor(
    private readonly schema: ArffSchema,
    options: ArffWriterOptions = {}
  ) {
    const validationResult = ArffWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid ARFF writer options: ${validationResult.summary}`);
    }
    this.format = options.format ?? "sparse";
    this.lineEnding = options.lineEnding ?? "\n";
  }

  /**
   * Header lines: comment block, relation and attribute directives. The
   * `@data` marker is not included.
   */
  headerLines(comment: string): string[] {
    const lines: string[] = [];
    if (comment !== "") {
      for (const line of comment.split("\n")) {
        lines.push(`${COMMENT_MARKER} ${line}`);
      }
    }
    lines.push(`${DIRECTIVES.relation}${this.schema.relation}`);
    for (const spec of this.schema.attributes) {
      lines.push(this.formatAttribute(spec));
    }
    return lines;
  }

  formatAttribute(spec: AttributeSpec): string {
    const head = `${DIRECTIVES.attribute}${quoteName(spec.name)}`;
    switch (spec.kind) {
      case "integer":
      case "numeric":
      case "string":
        return `${head} ${spec.kind}`;
      case "nominal":
        return `${head} {${this.schema.sortedNominalValues(spec.name).join(",")}}`;
      case "date":
        return `${head} date "${spec.pattern ?? DEFAULT_DATE_FORMAT}"`;
    }
  }

  /**
   * Encode one row with the configured format
   *
   * @returns The row text, or undefined when a sparse row has nothing to write
   */
  formatRow(row: ArffRow): string | undefined {
    return this.format === "dense" ? this.formatDenseRow(row) : this.formatSparseRow(row);
  }

  /**
   * Positional comma-separated encoding
   *
   * @throws {ValidationError} For name-keyed rows and for date attributes
   */
  formatDenseRow(row: ArffRow): string {
    if (!isDenseRow(row)) {
      throw new ValidationError("Dense writing requires positional rows");
    }
    if (row.length !== this.schema.size) {
      throw new ValidationError(
        `Row contains ${row.length} values but the schema has ${this.schema.size} attributes`
      );
    }

    return this.schema.attributes
      .map((spec, index) => {
        const payload = cellPayload(row[index] ?? MISSING);
        if (payload === MISSING) return MISSING;

        switch (spec.kind) {
          case "integer":
          case "numeric":
          case "nominal":
            return scalarText(payload);
          case "string":
            return quoteName(scalarText(payload));
          case "date":
            throw new ValidationError(
              `Type date of attribute ${spec.name} not supported for dense writing`
            );
        }
      })
      .join(",");
  }

  /**
   * Brace-delimited `<index> <value>` encoding
   *
   * @returns The row text, or undefined when no informative column remains
   */
  formatSparseRow(row: ArffRow): string | undefined {
    const named = isDenseRow(row) ? this.nameCells(row) : row;
    const tokens: string[] = [];
    let informative = 0;

    this.schema.attributes.forEach((spec, index) => {
      const cell = named[spec.name];
      if (cell === undefined) return;

      const token = this.sparseToken(spec, cell);
      if (token === undefined) return;

      if (token !== MISSING) informative += 1;
      tokens.push(`${index} ${quoteToken(token)}`);
    });

    // A lone missing column says nothing either
    if (informative === 0 && tokens.length <= 1) {
      return undefined;
    }
    return `{${tokens.join(", ")}}`;
  }

  /**
   * Full document: header, `@data` and every row that encodes to a line
   */
  formatDocument(comment: string, rows: Iterable<ArffRow>): string {
    const lines = this.headerLines(comment);
    lines.push(DIRECTIVES.data);
    for (const row of rows) {
      const line = this.formatRow(row);
      if (line !== undefined) lines.push(line);
    }
    return lines.map((line) => line + this.lineEnding).join("");
  }

  /**
   * Terminate a single line with the configured line ending
   */
  terminate(line: string): string {
    return line + this.lineEnding;
  }

  private nameCells(row: readonly RowCell[]): NamedRow {
    const named: Record<string, RowCell> = {};
    this.schema.names.forEach((name, index) => {
      const cell = row[index];
      if (cell !== undefined) named[name] = cell;
    });
    return named;
  }

  /**
   * Token for one sparse column, or undefined to drop the column
   */
  private sparseToken(spec: AttributeSpec, cell: RowCell): string | undefined {
    const payload = cellPayload(cell);
    if (payload === MISSING) {
      return MISSING;
    }

    switch (spec.kind) {
      case "integer":
        return scalarText(integerValue(payload).value);
      case "numeric":
        return Decimal.isDecimal(payload)
          ? payload.toString()
          : scalarText(numericValue(payload).value);
      case "string":
        return `"${scalarText(payload)}"`;
      case "nominal": {
        const text = scalarText(payload);
        return spec.values.has(text) ? text : undefined;
      }
      case "date":
        return formatDate(toCalendarDate(payload), spec.pattern ?? DEFAULT_DATE_FORMAT);
    }
  }
}
