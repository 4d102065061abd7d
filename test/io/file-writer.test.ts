/**
 * Tests for file writing and stream sinks
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { FileError } from "../../src/errors";
import { readToString } from "../../src/io/file-reader";
import { deleteFile, makeTempFile, writeString } from "../../src/io/file-writer";
import { FileSink, MemorySink } from "../../src/io/sink";

let fixturesDir = "";

beforeEach(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "arff-writer-"));
});

afterEach(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

describe("writeString", () => {
  test("roundtrip: write then read", async () => {
    const path = join(fixturesDir, "out.arff");
    const content = "@relation r\n@data\n".repeat(100);

    await writeString(path, content);

    expect(await readToString(path)).toBe(content);
  });

  test("overwrites existing files", async () => {
    const path = join(fixturesDir, "out.arff");
    await writeString(path, "first");
    await writeString(path, "second");

    expect(readFileSync(path, "utf8")).toBe("second");
  });

  test("fails for a missing directory", async () => {
    await expect(writeString(join(fixturesDir, "missing", "out.arff"), "x")).rejects.toThrow(FileError);
  });
});

describe("makeTempFile and deleteFile", () => {
  test("creates and removes a file", async () => {
    const path = await makeTempFile();
    expect(existsSync(path)).toBe(true);

    await deleteFile(path);
    expect(existsSync(path)).toBe(false);
  });

  test("fails to delete a missing file", async () => {
    await expect(deleteFile(join(fixturesDir, "gone.arff"))).rejects.toThrow(FileError);
  });
});

describe("FileSink", () => {
  test("appends text and returns its path on close", async () => {
    const path = join(fixturesDir, "stream.arff");
    const sink = await FileSink.open(path);

    await sink.write("@relation r\n");
    await sink.flush();
    expect(readFileSync(path, "utf8")).toBe("@relation r\n");

    await sink.write("@data\n");
    expect(await sink.close()).toBe(path);
    expect(readFileSync(path, "utf8")).toBe("@relation r\n@data\n");
  });

  test("rejects writes after close", async () => {
    const sink = await FileSink.open(join(fixturesDir, "closed.arff"));
    await sink.close();

    await expect(sink.write("late")).rejects.toThrow("Cannot write: sink is closed");
  });

  test("writes reach the file before any flush", async () => {
    const path = join(fixturesDir, "eager.arff");
    const sink = await FileSink.open(path);

    await sink.write("% header\n");
    expect(readFileSync(path, "utf8")).toBe("% header\n");

    await sink.close();
    await expect(sink.flush()).rejects.toThrow("Cannot flush: sink is closed");
  });

  test("fails to open inside a missing directory", async () => {
    await expect(FileSink.open(join(fixturesDir, "missing", "x.arff"))).rejects.toThrow(FileError);
  });
});

describe("MemorySink", () => {
  test("collects writes", async () => {
    const sink = new MemorySink("buffer");
    await sink.write("a");
    await sink.write("b");
    await sink.flush();

    expect(sink.contents).toBe("ab");
    expect(await sink.close()).toBe("buffer");
    await expect(sink.flush()).rejects.toThrow(FileError);
  });
});
