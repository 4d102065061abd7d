/**
 * File reading utilities backed by the Effect platform
 *
 * All Effect plumbing stays behind Promise-based functions.
 *
 * @module file-reader
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { ReadOptions } from "../types";
import { FilePathSchema, ReadOptionsSchema } from "../types";
import { getPlatform } from "./runtime";

const DEFAULT_MAX_FILE_SIZE = 104_857_600; // 100MB

/**
 * Check whether a path names an existing regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read entire file to string (with size limits for safety)
 *
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: ReadOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);

  const validation = ReadOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new FileError(`Invalid read options: ${validation.summary}`, validatedPath, "read");
  }

  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  const fileSize = await getSize(validatedPath);
  if (fileSize > maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Validate file path using ArkType
 *
 * @throws {FileError} For empty paths or paths with null characters
 */
export function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
