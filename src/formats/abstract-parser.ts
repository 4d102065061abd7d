/**
 * Abstract base parser with shared interrupt and reporting handling
 *
 * Provides AbortSignal support and the default error and warning handlers
 * without imposing parsing implementation details on the format parser.
 *
 * @since v0.1.0
 */

import { ParseError } from "../errors";
import type { ParserOptions, ReadOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;
  protected readonly onError: (error: string, lineNumber?: number) => void;
  protected readonly onWarning: (warning: string, lineNumber?: number) => void;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    // Merge in order: format-specific defaults -> user options
    this.options = { ...this.getDefaultOptions(), ...options };

    this.onError =
      this.options.onError ??
      ((error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      });
    this.onWarning =
      this.options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      });
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED HANDLING (Concrete Implementation)
  // ============================================================================

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Report lines longer than `maxLineLength` through the error handler
   *
   * @returns Whether the line is within bounds
   */
  protected checkLineLength(line: string, lineNumber: number): boolean {
    const limit = this.options.maxLineLength;
    if (limit !== undefined && line.length > limit) {
      this.onError(`Line length ${line.length} exceeds maximum ${limit}`, lineNumber);
      return false;
    }
    return true;
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: ReadOptions): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration for format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
