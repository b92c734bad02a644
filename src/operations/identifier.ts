/**
 * Reference identifier decomposition
 *
 * Curated databases name their sequences database~~~gene~~~accession~~~resistance.
 * Custom databases often do not, and their identifiers are used as the gene
 * name as they are.
 */

import type { Delimiter, ReferenceIdentifier } from "../types";

export const IDENTIFIER_SEPARATOR = "~~~";

export interface ResolvedIdentifier {
  database: string;
  gene: string;
  accession: string;
  resistance: string;
}

/**
 * Split a reference identifier on the separator token.
 *
 * An identifier without the separator is "plain" and keeps the whole
 * identifier as its gene name. Any separated identifier is annotated, even
 * when some of its fields are empty.
 *
 * @example
 * ```typescript
 * decomposeIdentifier("ncbi~~~blaTEM-1~~~AY458016~~~BETA-LACTAM");
 * // { kind: "annotated", database: "ncbi", gene: "blaTEM-1", ... }
 * decomposeIdentifier("myGene");
 * // { kind: "plain", gene: "myGene" }
 * ```
 */
export function decomposeIdentifier(identifier: string): ReferenceIdentifier {
  const parts = identifier.split(IDENTIFIER_SEPARATOR);
  if (parts.length === 1) {
    return { kind: "plain", gene: identifier };
  }

  const [database = "", gene = "", accession = "", resistance = ""] = parts;
  return { kind: "annotated", database, gene, accession, resistance };
}

/**
 * Turn a decomposed identifier into report columns, using the selected
 * database name for plain identifiers
 */
export function resolveIdentifier(
  identifier: ReferenceIdentifier,
  fallbackDatabase: string
): ResolvedIdentifier {
  switch (identifier.kind) {
    case "annotated":
      return {
        database: identifier.database,
        gene: identifier.gene,
        accession: identifier.accession,
        resistance: identifier.resistance,
      };
    case "plain":
      return { database: fallbackDatabase, gene: identifier.gene, accession: "", resistance: "" };
  }
}

/**
 * Clean a reference title for use as the PRODUCT column.
 *
 * Delimiter characters are removed so the row keeps its column count. Titles
 * that still contain the separator token start with an echo of the
 * identifier, which is dropped when other words follow it.
 */
export function cleanProduct(title: string, delimiter: Delimiter): string {
  const product = title.split(delimiter).join("");
  if (product.includes(IDENTIFIER_SEPARATOR)) {
    return product.replace(/^\S+\s+/, "");
  }
  return product;
}
