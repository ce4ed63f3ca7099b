import { describe, it, expect } from "vitest";
import type { Draft } from "../src/contracts/research";
import { CitationConsistencyGate, crossCheckCitations } from "../src/gates/citation_consistency_gate";
import { authorsLookAlike, normalizeAuthor, parseReferenceEntry, scanCitations } from "../src/gates/citation_parsing";
import { silentLogger } from "../src/logging/logger";

function draft(parts: Partial<Draft>): Draft {
  return { introduction: "", body: "", conclusion: "", citationsList: [], wordCount: 0, ...parts };
}

const context = (d: Draft) => ({ draft: d, cited: [], log: silentLogger() });

describe("citation parsing", () => {
  it("reads single, et al. and grouped citations", () => {
    const scan = scanCitations("One (Smith, 2021). Two (Chen et al., 2020a; Park, n.d.).");

    expect(scan.citations.map((c) => c.key)).toEqual(["smith|2021", "chen|2020a", "park|n.d."]);
    expect(scan.malformed).toEqual([]);
  });

  it("flags citation-like parentheticals that do not parse", () => {
    const scan = scanCitations("A (Smith 2021) and (see Table 2) and (smith, 2021).");

    expect(scan.citations).toEqual([]);
    expect(scan.malformed).toEqual(["(Smith 2021)", "(smith, 2021)"]);
  });

  it("normalizes authors and parses reference entries", () => {
    expect(normalizeAuthor("Smith and Jones")).toBe("smith");
    expect(normalizeAuthor("O. Brien et al.")).toBe("o brien");
    expect(parseReferenceEntry("Chen (2020a). Screens and sleep. Pediatrics.")).toMatchObject({
      author: "Chen",
      year: "2020a",
      key: "chen|2020a",
    });
    expect(parseReferenceEntry("Screens and sleep, 2020")).toBeNull();
  });

  it("treats near-identical but distinct surnames as lookalikes", () => {
    expect(authorsLookAlike("Smyth", "Smith")).toBe(true);
    expect(authorsLookAlike("Smith", "Smith")).toBe(false);
    expect(authorsLookAlike("Chen", "Okafor")).toBe(false);
  });
});

describe("CitationConsistencyGate", () => {
  it("passes when every citation has a reference and every reference is cited", async () => {
    const verdict = await new CitationConsistencyGate().evaluate(
      context(
        draft({
          introduction: "Sleep matters (Smith et al., 2021; Chen, 2020a).",
          citationsList: ["Smith (2021). Sleep and memory. Sleep.", "Chen (2020a). Screens and sleep. Pediatrics."],
        })
      )
    );

    expect(verdict).toMatchObject({ gateName: "citation_consistency", passed: true, score: 1, issues: [] });
  });

  it("reports orphan citations and unused references", async () => {
    const verdict = await new CitationConsistencyGate().evaluate(
      context(
        draft({
          introduction: "Sleep matters for memory (Smith, 2021).",
          body: "Screens delay sleep onset (Chen, 2020).",
          citationsList: ["Smith (2021). Sleep and memory. Sleep.", "Jones (2019). Unused work. Journal."],
        })
      )
    );

    expect(verdict.passed).toBe(false);
    expect(verdict.score).toBe(0);
    expect(verdict.issues).toEqual([
      "citation (Chen, 2020) has no matching reference",
      'reference "Jones (2019). Unused work. Journal." is never cited',
    ]);
  });

  it("reports a misspelled author as a mismatch instead of an orphan", () => {
    const check = crossCheckCitations(
      draft({
        body: "Memory suffers (Smyth, 2021).",
        citationsList: ["Smith (2021). Sleep and memory. Sleep."],
      })
    );

    expect(check.orphanCitations).toEqual([]);
    expect(check.unusedReferences).toEqual([]);
    expect(check.mismatches).toEqual([
      { citation: "(Smyth, 2021)", reference: "Smith (2021). Sleep and memory. Sleep." },
    ]);
  });

  it("fails a draft without citations and flags malformed ones", async () => {
    const verdict = await new CitationConsistencyGate().evaluate(
      context(
        draft({
          body: "Memory suffers (Smith 2021).",
          citationsList: ["Smith (2021). Sleep and memory. Sleep."],
        })
      )
    );

    expect(verdict.passed).toBe(false);
    expect(verdict.issues).toEqual([
      "draft contains no in-text citations",
      'reference "Smith (2021). Sleep and memory. Sleep." is never cited',
      "malformed citation (Smith 2021); use (Author, Year)",
    ]);
  });
});
