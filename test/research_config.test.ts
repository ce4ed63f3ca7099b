import { describe, it, expect } from "vitest";
import { loadResearchConfig } from "../src/config/research_config";

describe("loadResearchConfig", () => {
  it("applies defaults", () => {
    const config = loadResearchConfig({});

    expect(config.mode).toBe("live");
    expect(config.port).toBe(3333);
    expect(config.budget).toEqual({
      totalBudgetMs: 600_000,
      safetyMarginMs: 10_000,
      degradationThresholdMs: 90_000,
      stageFloorMs: 5_000,
      stageTimeoutsMs: { fetch: 60_000, analysis: 240_000, synthesis: 240_000 },
    });
    expect(config.sufficiency).toEqual({ minSources: 5, minVenues: 3, minRecentSources: 2, minEffectiveCount: 4 });
    expect(config.analyzer).toEqual({
      batchSize: 10,
      maxWorkers: 5,
      maxAttempts: 3,
      baseDelayMs: 1_000,
      callTimeoutMs: 60_000,
    });
    expect(config.synthesis.maxRegenerations).toBe(2);
    expect(config.providers.scholarApiKey).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const config = loadResearchConfig({
      RESEARCH_PIPELINE_MODE: "fake",
      RESEARCH_MAX_WORKERS: "8",
      RESEARCH_MIN_QUALITY_SCORE: "6.5",
      SCHOLAR_API_KEY: "  test-secret  ",
      OPENAI_API_KEY: "   ",
    });

    expect(config.mode).toBe("fake");
    expect(config.analyzer.maxWorkers).toBe(8);
    expect(config.synthesis.minQualityScore).toBe(6.5);
    expect(config.providers.scholarApiKey).toBe("test-secret");
    expect(config.providers.openaiApiKey).toBeUndefined();
  });

  it("rejects a degradation threshold at or above the total budget", () => {
    expect(() =>
      loadResearchConfig({ RESEARCH_TOTAL_BUDGET_MS: "60000", RESEARCH_DEGRADATION_THRESHOLD_MS: "60000" })
    ).toThrow("RESEARCH_DEGRADATION_THRESHOLD_MS must be below RESEARCH_TOTAL_BUDGET_MS");
  });

  it("rejects an unknown pipeline mode", () => {
    expect(() => loadResearchConfig({ RESEARCH_PIPELINE_MODE: "replay" })).toThrow();
  });
});
