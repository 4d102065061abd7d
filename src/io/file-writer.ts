/**
 * File writing operations backed by the Effect platform
 *
 * Provides whole-file writes, temporary file allocation and removal. All
 * Effect complexity is hidden behind Promise-based APIs.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("weather.arff", writer.formatDocument(comment, rows));
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(validatedPath, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Create an empty temporary file and return its path. The caller owns the
 * file and removes it when done.
 *
 * @throws {FileError} When the file cannot be created
 */
export async function makeTempFile(prefix = "arff-"): Promise<string> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.makeTempFile({ prefix });
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("open", prefix, error);
  }
}

/**
 * Delete file from filesystem
 *
 * @throws {FileError} When deletion fails
 *
 * @example
 * ```typescript
 * const path = await dataset.closeStream();
 * await deleteFile(path);
 * ```
 */
export async function deleteFile(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.remove(validatedPath);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("remove", validatedPath, error);
  }
}
