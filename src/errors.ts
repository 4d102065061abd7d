/**
 * Error handling for ARFF reading and writing
 *
 * Every fatal condition raised by the library is one of the classes below.
 * Recoverable conditions (short dense rows, out-of-set nominal columns on
 * write) never throw; they are reported through parser warnings or dropped.
 */

/**
 * Base error class for all ARFF-related errors
 */
export class ArffError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "ArffError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for values that do not fit their declared attribute
 */
export class ValidationError extends ArffError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Structural errors in ARFF text
 */
export class ParseError extends ArffError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Typed value construction or arithmetic failed
 */
export class ValueTypeError extends ArffError {
  constructor(
    message: string,
    public readonly kind: string,
    public readonly input?: unknown
  ) {
    super(message, "VALUE_TYPE_ERROR");
    this.name = "ValueTypeError";
  }

  /**
   * Build the standard "cannot convert" error for a typed constructor
   */
  static incompatible(kind: string, input: unknown, reason?: string): ValueTypeError {
    const shown =
      input instanceof Date && !Number.isNaN(input.getTime()) ? input.toISOString() : String(input);
    const suffix = reason !== undefined ? `: ${reason}` : "";
    return new ValueTypeError(`Cannot convert "${shown}" to ${kind}${suffix}`, kind, input);
  }
}

/**
 * Schema consistency errors: class attribute conflicts, kind conflicts and
 * attempts to change a schema that has already been flushed to a stream
 */
export class SchemaError extends ArffError {
  constructor(
    message: string,
    public readonly attribute?: string,
    context?: string
  ) {
    super(message, "SCHEMA_ERROR", undefined, context);
    this.name = "SchemaError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends ArffError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close" | "flush" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}
