/**
 * Command-line front end for `mergeTaxonomy`
 *
 * Usage:
 *   taxmerge -g GG_FILE -t TAX_FILE -o FILE [options]
 *
 * Exit codes:
 *   0 - Merge finished (or help was requested)
 *   1 - The merge failed (unreadable file, malformed input)
 *   2 - Missing or malformed parameters
 */

import { parseArgs } from "node:util";
import { describeError, ParameterError, toTaxmergeError } from "./errors";
import { type MergeOptions, mergeTaxonomy } from "./operations/merge";

// ============================================================
// Types
// ============================================================

/**
 * Where the CLI writes its usage text and error messages
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const PROGRAM = "taxmerge";

export const USAGE = `
Usage: ${PROGRAM} -g GG_FILE -t TAX_FILE -o FILE [options]

Combine a taxonomy table with a FASTA reference database.

Options:
  -g, --greengenes <path>  Reference database in FASTA format (may be gzipped)
  -t, --taxonomy <path>    Tab-separated id/taxonomy table to apply
  -o, --out <path>         File to write to
  --skip-short-rows        Skip taxonomy rows without a taxonomy column
  --allow-empty            Keep records that have no sequence lines
  --validate               Check sequence characters against IUPAC codes
  -v, --verbose            Log debug details
  -h, --help               Show this help message
`;

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(argv: readonly string[]) {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      greengenes: { type: "string", short: "g" },
      taxonomy: { type: "string", short: "t" },
      out: { type: "string", short: "o" },
      "skip-short-rows": { type: "boolean", default: false },
      "allow-empty": { type: "boolean", default: false },
      validate: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });
  return values;
}

type CliRequest =
  | { kind: "help" }
  | { kind: "merge"; options: MergeOptions }
  | { kind: "invalid"; message: string };

function requireParameter(value: string | undefined, name: string, message: string): string {
  if (value === undefined || value === "") {
    throw new ParameterError(message, name);
  }
  return value;
}

/**
 * Turn arguments into a merge request; required flags are checked in the
 * order greengenes, taxonomy, out
 */
function readRequest(argv: readonly string[]): CliRequest {
  try {
    const values = parseCliArgs(argv);
    if (values.help) {
      return { kind: "help" };
    }

    return {
      kind: "merge",
      options: {
        greengenes: requireParameter(
          values.greengenes,
          "greengenes",
          "Please supply a GG database in fasta format"
        ),
        taxonomy: requireParameter(values.taxonomy, "taxonomy", "Please supply a taxonomy file"),
        out: requireParameter(values.out, "out", "Please supply a file to write to"),
        shortRows: values["skip-short-rows"] ? "skip" : "error",
        allowEmptySequences: values["allow-empty"],
        validateSequences: values.validate,
        logLevel: values.verbose ? "debug" : "info",
      },
    };
  } catch (error) {
    return { kind: "invalid", message: describeError(error) };
  }
}

function reportError(io: CliIO, message: string): void {
  io.stderr(`**ERROR: ${PROGRAM} : ${message}`);
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and resolve to its exit code
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2));
 * ```
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  if (argv.length === 0) {
    io.stdout(USAGE);
    return EXIT_USAGE;
  }

  const request = readRequest(argv);
  switch (request.kind) {
    case "help":
      io.stdout(USAGE);
      return EXIT_SUCCESS;
    case "invalid":
      reportError(io, request.message);
      io.stdout(USAGE);
      return EXIT_USAGE;
  }

  try {
    await mergeTaxonomy(request.options);
    return EXIT_SUCCESS;
  } catch (error) {
    reportError(io, toTaxmergeError(error).message);
    return EXIT_FAILURE;
  }
}
