/**
 * Reference identifier decomposition and product cleanup
 */

import { describe, expect, test } from "vitest";
import { cleanProduct, decomposeIdentifier, resolveIdentifier } from "../../src/operations/identifier";

describe("decomposeIdentifier", () => {
  test("splits the four annotated fields", () => {
    expect(decomposeIdentifier("card~~~tet(M)~~~X92947~~~TETRACYCLINE")).toEqual({
      kind: "annotated",
      database: "card",
      gene: "tet(M)",
      accession: "X92947",
      resistance: "TETRACYCLINE",
    });
  });

  test("keeps an empty resistance field", () => {
    expect(decomposeIdentifier("ncbi~~~blaTEM~~~ACC123~~~")).toEqual({
      kind: "annotated",
      database: "ncbi",
      gene: "blaTEM",
      accession: "ACC123",
      resistance: "",
    });
  });

  test("a gene without an accession is still annotated", () => {
    expect(decomposeIdentifier("plasmidfinder~~~IncFII")).toEqual({
      kind: "annotated",
      database: "plasmidfinder",
      gene: "IncFII",
      accession: "",
      resistance: "",
    });
  });

  test("an identifier without separators is plain", () => {
    expect(decomposeIdentifier("myCustomGene_1")).toEqual({ kind: "plain", gene: "myCustomGene_1" });
  });

  test("empty gene and accession fields stay in their columns", () => {
    expect(decomposeIdentifier("vfdb~~~~~~~~~X")).toEqual({
      kind: "annotated",
      database: "vfdb",
      gene: "",
      accession: "",
      resistance: "X",
    });
  });

  test("four-field identifiers come back field for field", () => {
    const identifiers = [
      "ncbi~~~blaTEM-1~~~AY458016~~~BETA-LACTAM",
      "vfdb~~~~~~~~~X",
      "~~~~~~~~~",
      "card~~~aac(6')-Ib~~~~~~AMINOGLYCOSIDE",
    ];

    for (const identifier of identifiers) {
      const { database, gene, accession, resistance } = resolveIdentifier(
        decomposeIdentifier(identifier),
        "other"
      );
      expect([database, gene, accession, resistance].join("~~~")).toBe(identifier);
    }
  });
});

describe("resolveIdentifier", () => {
  test("plain identifiers take the selected database name", () => {
    expect(resolveIdentifier(decomposeIdentifier("myCustomGene_1"), "mydb")).toEqual({
      database: "mydb",
      gene: "myCustomGene_1",
      accession: "",
      resistance: "",
    });
  });

  test("annotated identifiers ignore the selected database name", () => {
    expect(resolveIdentifier(decomposeIdentifier("ncbi~~~blaTEM~~~ACC123~~~"), "mydb").database).toBe(
      "ncbi"
    );
  });
});

describe("cleanProduct", () => {
  test("removes commas from CSV output", () => {
    expect(cleanProduct("beta-lactamase, class A", ",")).toBe("beta-lactamase class A");
  });

  test("keeps commas in tab-separated output", () => {
    expect(cleanProduct("beta-lactamase, class A", "\t")).toBe("beta-lactamase, class A");
  });

  test("removes tabs from tab-separated output", () => {
    expect(cleanProduct("efflux\tpump", "\t")).toBe("effluxpump");
  });

  test("drops an identifier echoed at the start of the title", () => {
    expect(cleanProduct("ncbi~~~blaTEM~~~ACC123~~~ TEM beta-lactamase", "\t")).toBe(
      "TEM beta-lactamase"
    );
  });

  test("keeps a title that is only the echoed identifier", () => {
    expect(cleanProduct("ncbi~~~blaTEM~~~ACC123~~~", "\t")).toBe("ncbi~~~blaTEM~~~ACC123~~~");
  });

  test("leaves titles without the separator alone", () => {
    expect(cleanProduct("WP_000027057.1 TEM-1", "\t")).toBe("WP_000027057.1 TEM-1");
  });
});
