/**
 * Append-only text sinks for streaming ARFF output
 *
 * A sink is exclusively owned by one dataset. Every write is followed by a
 * flush from the dataset; for a file sink a write has reached the file
 * once its promise resolves, and `close` releases the handle.
 *
 * @module sink
 */

import { FileSystem } from "@effect/platform";
import { Effect, Exit, Scope } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Character sink with explicit flush and close
 */
export interface ArffSink {
  /** Identifying location, returned again by `close` */
  readonly location: string;
  write(text: string): Promise<void>;
  flush(): Promise<void>;
  /** Release the sink and return its location */
  close(): Promise<string>;
}

/**
 * Sink writing to a file opened for the lifetime of the stream. The file
 * handle lives in an Effect scope that `close` releases.
 *
 * @example
 * ```typescript
 * const sink = await FileSink.open("out.arff");
 * await sink.write("@relation weather\n");
 * await sink.flush();
 * const path = await sink.close();
 * ```
 */
export class FileSink implements ArffSink {
  private closed = false;
  private readonly encoder = new TextEncoder();

  private constructor(
    readonly location: string,
    private readonly file: FileSystem.File,
    private readonly scope: Scope.CloseableScope
  ) {}

  /**
   * Open (create or truncate) a file for writing
   *
   * @throws {FileError} When the file cannot be opened
   */
  static async open(path: string): Promise<FileSink> {
    const validatedPath = validatePath(path);
    const scope = Effect.runSync(Scope.make());

    const program = Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return yield* fs.open(validatedPath, { flag: "w", mode: 0o644 });
    });

    try {
      const file = await Effect.runPromise(
        program.pipe(Scope.extend(scope), Effect.provide(getPlatform()))
      );
      return new FileSink(validatedPath, file, scope);
    } catch (error) {
      await Effect.runPromise(Scope.close(scope, Exit.void));
      throw FileError.fromSystemError("open", validatedPath, error);
    }
  }

  async write(text: string): Promise<void> {
    this.assertOpen("write");
    try {
      await Effect.runPromise(this.file.writeAll(this.encoder.encode(text)));
    } catch (error) {
      throw FileError.fromSystemError("write", this.location, error);
    }
  }

  /**
   * `writeAll` completes before `write` resolves, so there is nothing left
   * to hand to the file
   */
  async flush(): Promise<void> {
    this.assertOpen("flush");
  }

  async close(): Promise<string> {
    if (this.closed) {
      return this.location;
    }
    this.closed = true;
    await Effect.runPromise(Scope.close(this.scope, Exit.void));
    return this.location;
  }

  private assertOpen(operation: "write" | "flush"): void {
    if (this.closed) {
      throw new FileError(`Cannot ${operation}: sink is closed`, this.location, operation);
    }
  }
}

/**
 * Sink collecting output in memory, for streaming into a string buffer
 */
export class MemorySink implements ArffSink {
  private readonly chunks: string[] = [];
  private closed = false;

  constructor(readonly location = "memory") {}

  /** Everything written so far */
  get contents(): string {
    return this.chunks.join("");
  }

  async write(text: string): Promise<void> {
    if (this.closed) {
      throw new FileError("Cannot write: sink is closed", this.location, "write");
    }
    this.chunks.push(text);
  }

  async flush(): Promise<void> {
    if (this.closed) {
      throw new FileError("Cannot flush: sink is closed", this.location, "flush");
    }
  }

  async close(): Promise<string> {
    this.closed = true;
    return this.location;
  }
}
