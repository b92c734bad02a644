/**
 * Shared builders for aligner rows and hit table lines
 */

import { BLAST_FIELDS, type BlastField, parseAlignmentRow } from "../../src/formats/blast-tabular";
import { HIT_TABLE_COLUMNS, type HitTableColumn } from "../../src/formats/hit-table";
import type { AlignmentRecord } from "../../src/types";

const DEFAULT_ROW: Record<BlastField, string | number> = {
  qseqid: "contig1",
  qstart: 1,
  qend: 861,
  qlen: 5000,
  sseqid: "ncbi~~~blaTEM-1~~~AY458016~~~BETA-LACTAM",
  sstart: 1,
  send: 861,
  slen: 861,
  sstrand: "plus",
  evalue: "0.0",
  length: 861,
  pident: 100,
  gaps: 0,
  gapopen: 0,
  stitle: "ncbi~~~blaTEM-1~~~AY458016~~~BETA-LACTAM class A beta-lactamase TEM-1",
};

/**
 * Tab-separated aligner row with the given fields replaced
 */
export function alignmentRow(overrides: Partial<Record<BlastField, string | number>> = {}): string {
  return BLAST_FIELDS.map((field) => String(overrides[field] ?? DEFAULT_ROW[field])).join("\t");
}

export function alignmentRecord(
  overrides: Partial<Record<BlastField, string | number>> = {}
): AlignmentRecord {
  return parseAlignmentRow(alignmentRow(overrides), "test.fa");
}

export function reportHeader(delimiter = "\t"): string {
  return `#${HIT_TABLE_COLUMNS.join(delimiter)}`;
}

/**
 * Hit table row; columns not given are filled with placeholders
 */
export function reportRow(values: Partial<Record<HitTableColumn, string>>, delimiter = "\t"): string {
  return HIT_TABLE_COLUMNS.map((column) => values[column] ?? "x").join(delimiter);
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
