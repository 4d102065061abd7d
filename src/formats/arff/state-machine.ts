/**
 * ARFF line state machine
 *
 * Lines move the machine through COMMENT → HEADER → DATA. The comment
 * state collects the leading `%` block; the first other line closes it and
 * is re-dispatched to the header state. Header lines declare the relation
 * and attributes; `@data` enters the terminal data state, where every
 * non-comment line is a dense or sparse row.
 *
 * @module formats/arff/state-machine
 */

import { COMMENT_MARKER, DIRECTIVES } from "../../constants";
import type { ArffSchema } from "../../schema";
import { parseAttributeDeclaration, parseRelation } from "./declarations";
import { parseDenseRow, parseSparseRow } from "./rows";
import { type ArffRecord, ArffParseState, type WarningHandler } from "./types";

/**
 * Strip the comment marker and at most one following space
 */
export function stripCommentMarker(line: string): string {
  const body = line.slice(COMMENT_MARKER.length);
  return body.startsWith(" ") ? body.slice(1) : body;
}

/**
 * Line-at-a-time ARFF decoder writing declarations into a schema
 *
 * @example
 * ```typescript
 * const machine = new ArffStateMachine(new ArffSchema(), console.warn);
 * lines.forEach((line, i) => {
 *   const record = machine.consume(line, i + 1);
 *   if (record) rows.push(record.row);
 * });
 * ```
 */
export class ArffStateMachine {
  private current = ArffParseState.COMMENT;
  private readonly commentLines: string[] = [];
  private commentText = "";

  constructor(
    private readonly schema: ArffSchema,
    private readonly onWarning: WarningHandler
  ) {}

  get state(): ArffParseState {
    return this.current;
  }

  /** Leading comment block, joined with newlines once the block has ended */
  get comment(): string {
    return this.current === ArffParseState.COMMENT ? this.commentLines.join("\n") : this.commentText;
  }

  /**
   * Continue where another machine stopped, taking over its state and
   * comment block
   */
  resumeFrom(other: ArffStateMachine): void {
    this.current = other.current;
    this.commentLines.splice(0, this.commentLines.length, ...other.commentLines);
    this.commentText = other.commentText;
  }

  /**
   * Feed one line
   *
   * @returns The decoded row when the line was a data row
   */
  consume(line: string, lineNumber: number): ArffRecord | undefined {
    switch (this.current) {
      case ArffParseState.COMMENT:
        return this.consumeComment(line, lineNumber);
      case ArffParseState.HEADER:
        this.consumeHeader(line, lineNumber);
        return undefined;
      case ArffParseState.DATA:
        return this.consumeData(line, lineNumber);
    }
  }

  private consumeComment(line: string, lineNumber: number): ArffRecord | undefined {
    if (line.startsWith(COMMENT_MARKER)) {
      this.commentLines.push(stripCommentMarker(line));
      return undefined;
    }
    this.commentText = this.commentLines.join("\n");
    this.current = ArffParseState.HEADER;
    return this.consume(line, lineNumber);
  }

  private consumeHeader(line: string, lineNumber: number): void {
    const lowered = line.toLowerCase();
    if (lowered.startsWith(DIRECTIVES.relation)) {
      this.schema.relation = parseRelation(line, lineNumber);
    } else if (lowered.startsWith(DIRECTIVES.attribute)) {
      const declaration = parseAttributeDeclaration(line, lineNumber);
      this.schema.defineAttribute(declaration.name, declaration.kind, declaration.data);
    } else if (lowered.startsWith(DIRECTIVES.data)) {
      this.current = ArffParseState.DATA;
    }
    // Unknown directives and blank lines are ignored
  }

  private consumeData(line: string, lineNumber: number): ArffRecord | undefined {
    if (line === "" || line.startsWith(COMMENT_MARKER) || line.trim() === "") {
      return undefined;
    }
    if (line.trim().startsWith("{")) {
      return { format: "sparse", row: parseSparseRow(this.schema, line, lineNumber), lineNumber };
    }
    const row = parseDenseRow(this.schema, line, lineNumber, this.onWarning);
    return row === undefined ? undefined : { format: "dense", row, lineNumber };
  }
}
