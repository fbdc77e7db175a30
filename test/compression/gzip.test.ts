import { gzipSync } from "node:zlib";
import { describe, expect, test } from "vitest";
import { wrapStream } from "../../src/compression/gzip";
import { readLines } from "../../src/io/stream-utils";
import { collect, streamOf } from "../utils/fixtures";

describe("gzip wrapStream", () => {
  test("should decompress a stream split across chunks", async () => {
    const compressed = gzipSync(">seq1\nACGT\n>seq2\nGGCC\n");
    const stream = streamOf(compressed.subarray(0, 7), compressed.subarray(7));

    const lines = await collect(readLines(wrapStream(stream)));

    expect(lines).toEqual([">seq1", "ACGT", ">seq2", "GGCC"]);
  });

  test("should fail on corrupt input", async () => {
    const stream = streamOf(new Uint8Array([0x1f, 0x8b, 0x00, 0x01, 0x02]));
    await expect(collect(readLines(wrapStream(stream)))).rejects.toThrow();
  });
});
