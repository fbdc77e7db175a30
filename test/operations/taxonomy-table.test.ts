import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, TaxonomyRowError } from "../../src/errors";
import { buildTaxonomyTable, loadTaxonomy } from "../../src/operations/taxonomy-table";
import type { TaxonomyRow } from "../../src/types";
import { ScratchDir } from "../utils/fixtures";

describe("buildTaxonomyTable", () => {
  test("should clean lineages and label repeats in row order", async () => {
    const rows: TaxonomyRow[] = [
      { id: "ID1", taxonomy: '"k__Bacteria;p__Proteo"' },
      { id: "ID2", taxonomy: "k__Bacteria;p__Proteo;c__" },
      { id: "ID3", taxonomy: "k__Archaea" },
    ];

    const table = await buildTaxonomyTable(rows);

    expect([...table.entries]).toEqual([
      ["ID1", "k__Bacteria;p__Proteo"],
      ["ID2", "k__Bacteria;p__Proteo;"],
      ["ID3", "k__Archaea"],
    ]);
    expect(table.stats).toEqual({
      rows: 3,
      entries: 3,
      repeats: 0,
      overwrittenIds: 0,
      skippedRows: 0,
    });
  });

  test("should give the second id with the same clean lineage a repeat suffix", async () => {
    const table = await buildTaxonomyTable([
      { id: "ID1", taxonomy: "k__Bacteria;p__Proteo" },
      { id: "ID2", taxonomy: '"k__Bacteria;p__Proteo"' },
    ]);

    expect(table.entries.get("ID1")).toBe("k__Bacteria;p__Proteo");
    expect(table.entries.get("ID2")).toBe("k__Bacteria;p__Proteo_REPEAT_2;");
    expect(table.stats.repeats).toBe(1);
  });

  test("should let a duplicate id overwrite the earlier entry", async () => {
    const table = await buildTaxonomyTable([
      { id: "ID1", taxonomy: "k__Bacteria" },
      { id: "ID1", taxonomy: "k__Archaea" },
      { id: "ID2", taxonomy: "k__Bacteria" },
    ]);

    expect(table.entries.get("ID1")).toBe("k__Archaea");
    expect(table.entries.get("ID2")).toBe("k__Bacteria_REPEAT_2;");
    expect(table.stats).toMatchObject({ rows: 3, entries: 2, overwrittenIds: 1 });
  });

  test("should accept async row sources", async () => {
    async function* rows(): AsyncIterable<TaxonomyRow> {
      yield { id: "ID1", taxonomy: "k__Bacteria" };
    }

    const table = await buildTaxonomyTable(rows());
    expect(table.entries.get("ID1")).toBe("k__Bacteria");
  });
});

describe("loadTaxonomy", () => {
  let scratch: ScratchDir;

  beforeEach(() => {
    scratch = new ScratchDir();
  });

  afterEach(() => {
    scratch.cleanup();
  });

  test("should load and clean a table from disk", async () => {
    const path = scratch.write(
      "taxonomy.tsv",
      '#OTU ID\ttaxonomy\nID1\t"k__Bacteria;p__Proteo"\nID2\tk__Bacteria;p__Proteo\nID4\tk__Bacteria;p__\n'
    );

    const table = await loadTaxonomy(path);

    expect(table.entries.get("ID1")).toBe("k__Bacteria;p__Proteo");
    expect(table.entries.get("ID2")).toBe("k__Bacteria;p__Proteo_REPEAT_2;");
    expect(table.entries.get("ID4")).toBe("k__Bacteria;");
    expect(table.stats).toEqual({
      rows: 3,
      entries: 3,
      repeats: 1,
      overwrittenIds: 0,
      skippedRows: 0,
    });
  });

  test("should read a file whose name contains a backslash", async () => {
    const path = scratch.write("tax\\onomy.tsv", "h\nID1\tk__Bacteria\n");

    const table = await loadTaxonomy(path);

    expect(path.endsWith("tax\\onomy.tsv")).toBe(true);
    expect(table.entries.get("ID1")).toBe("k__Bacteria");
  });

  test("should count a line of tabs as a skipped short row", async () => {
    const path = scratch.write("taxonomy.tsv", "h\nID1\tk__Bacteria\n\t\n");

    const table = await loadTaxonomy(path, { shortRows: "skip" });

    expect(table.stats.skippedRows).toBe(1);
    expect(table.stats.rows).toBe(1);
  });

  test("should fail on short rows by default", async () => {
    const path = scratch.write("taxonomy.tsv", "h\nID1\tk__Bacteria\nID2\n");
    await expect(loadTaxonomy(path)).rejects.toBeInstanceOf(TaxonomyRowError);
  });

  test("should count short rows skipped under the skip policy", async () => {
    const path = scratch.write("taxonomy.tsv", "h\nID1\tk__Bacteria\nID2\n");
    const warnings: string[] = [];

    const table = await loadTaxonomy(path, {
      shortRows: "skip",
      onWarning: (warning) => {
        warnings.push(warning);
      },
    });

    expect([...table.entries.keys()]).toEqual(["ID1"]);
    expect(table.stats.skippedRows).toBe(1);
    expect(warnings).toHaveLength(1);
  });

  test("should fail with FileError naming the path and reason when the table is missing", async () => {
    const path = scratch.file("missing.tsv");
    const promise = loadTaxonomy(path);

    await expect(promise).rejects.toBeInstanceOf(FileError);
    await expect(promise).rejects.toThrow(`could not open file: ${path}: `);
    await expect(promise).rejects.toThrow("Check that the file path is correct and the file exists");
    await expect(promise).rejects.not.toThrow("[object Object]");
  });
});
