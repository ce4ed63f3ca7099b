import { describe, it, expect } from "vitest";
import type { SourceRecord } from "../src/contracts/research";
import { assessSufficiency, citationBoost, effectiveCount } from "../src/sources/source_sufficiency";

const config = { minSources: 5, minVenues: 3, minRecentSources: 2, minEffectiveCount: 4.0 };

function record(overrides: Partial<SourceRecord>): SourceRecord {
  return {
    id: "s-1",
    title: "A sufficiently long title",
    snippet: "snippet",
    publishedYear: 2022,
    venue: "Venue A",
    provenance: "primary",
    citationProxy: 0,
    url: null,
    authors: [],
    validationLevel: "full",
    ...overrides,
  };
}

describe("effectiveCount", () => {
  it("weights validation level and boosts heavily cited sources", () => {
    expect(citationBoost(501)).toBe(1.5);
    expect(citationBoost(51)).toBe(1.2);
    expect(citationBoost(50)).toBe(1.0);
    expect(
      effectiveCount([
        record({ validationLevel: "full", citationProxy: 600 }),
        record({ validationLevel: "partial" }),
        record({ validationLevel: "domain" }),
      ])
    ).toBe(3.05);
  });
});

describe("assessSufficiency", () => {
  it("accepts ten sources across four venues", () => {
    const venues = ["A", "B", "C", "D"];
    const records = Array.from({ length: 10 }, (_, i) =>
      record({ id: `s-${i}`, venue: venues[i % 4], publishedYear: 2020 + (i % 5) })
    );

    const report = assessSufficiency(records, config, { provenance: "primary", currentYear: 2026 });

    expect(report.sufficient).toBe(true);
    expect(report.validCount).toBe(10);
    expect(report.uniqueVenues).toBe(4);
    expect(report.venueDistribution).toEqual({ A: 3, B: 3, C: 2, D: 2 });
    expect(report.issues).toEqual([]);
  });

  it("reports every shortfall for two sources", () => {
    const report = assessSufficiency(
      [record({ publishedYear: 2010 }), record({ id: "s-2", venue: "Venue B", publishedYear: 2012 })],
      config,
      { provenance: "primary", currentYear: 2026 }
    );

    expect(report.sufficient).toBe(false);
    expect(report.issues).toEqual([
      "only 2 valid sources (minimum 5)",
      "only 2 distinct venues (minimum 3)",
      "effective count 2.00 below 4.00",
      "only 0 sources from the last 5 years (minimum 2)",
    ]);
    expect(report.recommendations).toHaveLength(4);
  });

  it("skips the recency rule for secondary provenance", () => {
    const records = Array.from({ length: 6 }, (_, i) =>
      record({
        id: `w-${i}`,
        venue: `web:site${i}.edu`,
        publishedYear: null,
        provenance: "secondary",
        validationLevel: "domain",
      })
    );

    const report = assessSufficiency(records, config, { provenance: "secondary", currentYear: 2026 });

    expect(report.effectiveCount).toBe(4.2);
    expect(report.recentCount).toBe(0);
    expect(report.sufficient).toBe(true);
  });
});
