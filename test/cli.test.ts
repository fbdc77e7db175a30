import { existsSync, readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type CliIO, EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, runCli, USAGE } from "../src/cli";
import { ScratchDir } from "./utils/fixtures";

interface CapturedIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

describe("runCli", () => {
  let scratch: ScratchDir;
  let taxonomy: string;
  let database: string;

  beforeEach(() => {
    scratch = new ScratchDir();
    taxonomy = scratch.write("taxonomy.tsv", "id\ttaxonomy\nID1\tk__Bacteria;p__\nID2\n");
    database = scratch.write("db.fasta", ">ID1\nACGT\n>ID3\nGG\n");
  });

  afterEach(() => {
    scratch.cleanup();
  });

  test("should print usage and exit 2 without arguments", async () => {
    const io = captureIO();

    expect(await runCli([], io)).toBe(EXIT_USAGE);
    expect(io.out).toEqual([USAGE]);
    expect(io.err).toEqual([]);
  });

  test("should print usage and exit 0 for --help", async () => {
    const io = captureIO();

    expect(await runCli(["--help"], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toEqual([USAGE]);
  });

  test("should report a missing --out without touching any file", async () => {
    const io = captureIO();
    const out = scratch.file("merged.fasta");

    const code = await runCli(["-g", database, "-t", taxonomy], io);

    expect(code).toBe(EXIT_USAGE);
    expect(io.err).toEqual(["**ERROR: taxmerge : Please supply a file to write to"]);
    expect(io.out).toEqual([USAGE]);
    expect(existsSync(out)).toBe(false);
  });

  test("should check required flags in order", async () => {
    const io = captureIO();

    await runCli(["-o", scratch.file("merged.fasta")], io);
    await runCli(["--greengenes", database], io);

    expect(io.err).toEqual([
      "**ERROR: taxmerge : Please supply a GG database in fasta format",
      "**ERROR: taxmerge : Please supply a taxonomy file",
    ]);
  });

  test("should reject unknown flags and flags without a value", async () => {
    const unknown = captureIO();
    expect(await runCli(["--colour", "-g", database], unknown)).toBe(EXIT_USAGE);
    expect(unknown.err[0]?.startsWith("**ERROR: taxmerge : ")).toBe(true);

    const missingValue = captureIO();
    expect(await runCli(["-g"], missingValue)).toBe(EXIT_USAGE);
    expect(missingValue.err).toHaveLength(1);
  });

  test("should exit 1 and report the reason when the merge fails", async () => {
    const io = captureIO();
    const out = scratch.file("merged.fasta");

    const code = await runCli(["-g", database, "-t", taxonomy, "-o", out], io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([
      "**ERROR: taxmerge : Taxonomy row has 1 field(s); expected an id and a taxonomy string (line 3)",
    ]);
    expect(existsSync(out)).toBe(false);
  });

  test("should merge with --skip-short-rows", async () => {
    const io = captureIO();
    const out = scratch.file("merged.fasta");

    const code = await runCli(
      ["-g", database, "-t", taxonomy, "-o", out, "--skip-short-rows"],
      io
    );

    expect(code).toBe(EXIT_SUCCESS);
    expect(io.err).toEqual([]);
    expect(readFileSync(out, "utf8")).toBe(">k__Bacteria;\nACGT\n>ID3\nGG\n");
  });

  test("should report unreadable inputs with the path and reason", async () => {
    const io = captureIO();
    const missing = scratch.file("missing.fasta");

    const out = scratch.file("out.fasta");

    const code = await runCli(["-g", missing, "-t", taxonomy, "-o", out, "--skip-short-rows"], io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err[0]?.startsWith(`**ERROR: taxmerge : could not open file: ${missing}`)).toBe(true);
    expect(io.err[0]).toContain("Check that the file path is correct and the file exists");
    expect(io.err[0]).not.toContain("[object Object]");
  });
});
