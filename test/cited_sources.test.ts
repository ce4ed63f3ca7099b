import { describe, it, expect } from "vitest";
import type { AnalysisResult, SourceRecord } from "../src/contracts/research";
import { scanCitations } from "../src/gates/citation_parsing";
import { buildCitedSources, collisionSuffix, leadNameOf } from "../src/synthesis/cited_sources";

function source(id: string, overrides: Partial<SourceRecord>): SourceRecord {
  return {
    id,
    title: "A sufficiently long title",
    snippet: "snippet",
    publishedYear: 2022,
    venue: "Journal of Sleep Research",
    provenance: "primary",
    citationProxy: 0,
    url: null,
    authors: [],
    validationLevel: "full",
    ...overrides,
  };
}

function analysis(sourceRef: string): AnalysisResult {
  return {
    sourceRef,
    summary: "summary",
    keyPoints: [],
    relevanceScore: 5,
    methodology: "",
    limitations: [],
    reasoningTrace: "",
  };
}

describe("leadNameOf", () => {
  it("uses the first author's surname, else the first significant title word", () => {
    expect(leadNameOf(source("a", { authors: ["L Moreno", "K Patel"] }))).toBe("Moreno");
    expect(leadNameOf(source("b", { title: "The effects of caffeine" }))).toBe("Effects");
  });
});

describe("buildCitedSources", () => {
  it("disambiguates colliding labels with year suffixes", () => {
    const cited = buildCitedSources(
      [
        source("s-1", { authors: ["L Moreno"], title: "First study." }),
        source("s-2", { authors: ["P Moreno"], title: "Second study" }),
        source("s-3", { authors: ["A Chen"], publishedYear: 2021 }),
      ],
      [analysis("s-1"), analysis("s-2"), analysis("s-3")]
    );

    expect(cited.map((c) => c.label)).toEqual(["Moreno, 2022a", "Moreno, 2022b", "Chen, 2021"]);
    expect(cited.map((c) => c.key)).toEqual(["moreno|2022a", "moreno|2022b", "chen|2021"]);
    expect(cited[0]?.reference).toBe("Moreno (2022a). First study. Journal of Sleep Research.");
  });

  it("moves to two-letter suffixes after z", () => {
    expect([0, 25, 26, 27, 701].map(collisionSuffix)).toEqual(["a", "z", "aa", "ab", "zz"]);

    const ids = Array.from({ length: 28 }, (_, i) => `w-${i + 1}`);
    const cited = buildCitedSources(
      ids.map((id) =>
        source(id, {
          title: `University guidance ${id}`,
          publishedYear: null,
          venue: "web:health.uni.edu",
          provenance: "secondary",
          validationLevel: "domain",
        })
      ),
      ids.map(analysis)
    );

    expect(cited.slice(25).map((c) => c.label)).toEqual([
      "University, n.d.-z",
      "University, n.d.-aa",
      "University, n.d.-ab",
    ]);
    expect(scanCitations(`Findings vary (${cited[27]?.label}).`).citations.map((c) => c.key)).toEqual([
      "university|n.d.-ab",
    ]);
  });

  it("uses n.d. for undated secondary sources and drops the web prefix", () => {
    const [entry] = buildCitedSources(
      [
        source("w-1", {
          title: "The effects of caffeine",
          publishedYear: null,
          venue: "web:health.uni.edu",
          provenance: "secondary",
          validationLevel: "domain",
        }),
      ],
      [analysis("w-1")]
    );

    expect(entry?.label).toBe("Effects, n.d.");
    expect(entry?.reference).toBe("Effects (n.d.). The effects of caffeine. health.uni.edu.");
  });

  it("follows analysis order and skips analyses without a source", () => {
    const cited = buildCitedSources(
      [source("s-1", { authors: ["A Chen"] }), source("s-2", { authors: ["B Park"] })],
      [analysis("s-2"), analysis("missing"), analysis("s-1")]
    );

    expect(cited.map((c) => c.label)).toEqual(["Park, 2022", "Chen, 2022"]);
  });
});
