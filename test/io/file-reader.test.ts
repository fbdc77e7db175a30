/**
 * Tests for file checks and streaming reads
 */

import { mkdirSync } from "node:fs";
import { gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, exists, getMetadata } from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";
import { collect, readBytes, ScratchDir } from "../utils/fixtures";

describe("file-reader", () => {
  let scratch: ScratchDir;

  beforeEach(() => {
    scratch = new ScratchDir();
  });

  afterEach(() => {
    scratch.cleanup();
  });

  describe("exists", () => {
    test("should distinguish files, directories and missing paths", async () => {
      const file = scratch.write("taxonomy.tsv", "id\ttaxonomy\n");
      const dir = scratch.file("subdir");
      mkdirSync(dir);

      expect(await exists(file)).toBe(true);
      expect(await exists(dir)).toBe(false);
      expect(await exists(scratch.file("missing.tsv"))).toBe(false);
    });

    test("should reject paths with null bytes", async () => {
      await expect(exists("bad\0path")).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("getMetadata", () => {
    test("should report size and extension", async () => {
      const file = scratch.write("db.fasta", ">seq1\nACGT\n");
      const metadata = await getMetadata(file);

      expect(metadata.size).toBe(11);
      expect(metadata.extension).toBe(".fasta");
      expect(metadata.lastModified).toBeInstanceOf(Date);
    });

    test("should fail for missing files with the path in the message", async () => {
      const missing = scratch.file("missing.fasta");
      const promise = getMetadata(missing);

      await expect(promise).rejects.toBeInstanceOf(FileError);
      await expect(promise).rejects.toMatchObject({ filePath: missing, operation: "open" });
    });

    test("should refuse directories", async () => {
      const dir = scratch.file("subdir");
      mkdirSync(dir);

      await expect(getMetadata(dir)).rejects.toThrow("not a regular file");
    });
  });

  describe("createStream", () => {
    test("should stream plain files", async () => {
      const file = scratch.write("db.fasta", ">seq1\nACGT\n");
      const lines = await collect(readLines(await createStream(file)));
      expect(lines).toEqual([">seq1", "ACGT"]);
    });

    test("should decompress gzip files", async () => {
      const file = scratch.write("db.fasta.gz", gzipSync(">seq1\nACGT\n"));
      const lines = await collect(readLines(await createStream(file)));
      expect(lines).toEqual([">seq1", "ACGT"]);
    });

    test("should leave gzip files compressed when asked", async () => {
      const file = scratch.write("db.fasta.gz", gzipSync(">seq1\n"));
      const bytes = await readBytes(await createStream(file, { autoDecompress: false }));
      expect(bytes.slice(0, 2)).toEqual([0x1f, 0x8b]);
    });

    test("should handle empty files", async () => {
      const file = scratch.write("empty.fasta", "");
      expect(await collect(readLines(await createStream(file)))).toEqual([]);
    });

    test("should reject a buffer size below the minimum", async () => {
      const file = scratch.write("db.fasta", ">seq1\n");
      await expect(createStream(file, { bufferSize: 16 })).rejects.toBeInstanceOf(FileError);
    });
  });
});
