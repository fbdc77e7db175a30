#!/usr/bin/env tsx
/**
 * Using the taxmerge building blocks from code
 *
 * Run with: npx tsx examples/basic-usage.ts
 */

import { buildTaxonomyTable, FastaParser, FastaWriter, relabel, TaxonomyParser } from "../src";

// ============================================================================
// Example 1: Cleaning and de-duplicating a taxonomy table
// ============================================================================

async function example1_taxonomyTable() {
  console.log("\n=== Example 1: Taxonomy table ===\n");

  const tsv = [
    "#OTU ID\ttaxonomy",
    'seqA\t"k__Bacteria; p__Proteobacteria; c__"',
    "seqB\tk__Bacteria; p__Proteobacteria; c__",
    "seqC\tk__Archaea;p__;c__Thermoprotei",
  ].join("\n");

  const table = await buildTaxonomyTable(new TaxonomyParser().parseString(tsv));

  for (const [id, lineage] of table.entries) {
    console.log(`  ${id} -> ${lineage}`);
  }
  console.log(`  ${table.stats.entries} entries, ${table.stats.repeats} repeat(s)`);
}

// ============================================================================
// Example 2: Relabeling FASTA records
// ============================================================================

async function example2_relabel() {
  console.log("\n=== Example 2: Relabeled FASTA ===\n");

  const table = await buildTaxonomyTable([
    { id: "seqA", taxonomy: "k__Bacteria;p__Firmicutes" },
    { id: "seqB", taxonomy: "k__Bacteria;p__Firmicutes" },
  ]);

  const fasta = ">seqA primer-trimmed\nACGTACGT\nACGT\n>seqB\nGGCC\n>seqZ\nTTAA\n";
  const records = relabel(new FastaParser().parseString(fasta), table.entries);

  const writer = new FastaWriter({ lineWidth: 0, includeDescription: false });
  for await (const record of records) {
    console.log(writer.formatSequence(record));
  }
}

await example1_taxonomyTable();
await example2_relabel();
