/**
 * Tests for scoped file writing
 */

import { readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, ParseError } from "../../src/errors";
import { openForWriting } from "../../src/io/file-writer";
import { ScratchDir } from "../utils/fixtures";

describe("openForWriting", () => {
  let scratch: ScratchDir;

  beforeEach(() => {
    scratch = new ScratchDir();
  });

  afterEach(() => {
    scratch.cleanup();
  });

  test("should write strings and bytes in order and return the callback result", async () => {
    const path = scratch.file("merged.fasta");

    const result = await openForWriting(path, async (handle) => {
      await handle.writeString(">k__Bacteria;\n");
      await handle.writeBytes(new TextEncoder().encode("ACGT\n"));
      return 1;
    });

    expect(result).toBe(1);
    expect(readFileSync(path, "utf8")).toBe(">k__Bacteria;\nACGT\n");
  });

  test("should truncate existing files", async () => {
    const path = scratch.write("merged.fasta", "old content\n");

    await openForWriting(path, (handle) => handle.writeString("new\n"));

    expect(readFileSync(path, "utf8")).toBe("new\n");
  });

  test("should rethrow callback errors unchanged", async () => {
    const path = scratch.file("merged.fasta");
    const failure = new ParseError("bad record", "FASTA", 3);

    await expect(
      openForWriting(path, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });

  test("should fail with FileError when the directory is missing", async () => {
    const path = scratch.file("missing-dir/merged.fasta");
    const promise = openForWriting(path, (handle) => handle.writeString(""));

    await expect(promise).rejects.toBeInstanceOf(FileError);
    await expect(promise).rejects.toMatchObject({ operation: "open" });
  });
});
