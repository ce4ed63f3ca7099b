import { describe, it, expect } from "vitest";
import type { AnalysisResult, Draft, SourceRecord } from "../src/contracts/research";
import { ClaimVerificationGate, extractClaims } from "../src/gates/claim_verification_gate";
import { silentLogger } from "../src/logging/logger";
import type { ReasoningClient, ReasoningRequest } from "../src/providers/reasoning_client";
import { buildCitedSources } from "../src/synthesis/cited_sources";

const source: SourceRecord = {
  id: "scholar-1",
  title: "Sleep deprivation and working memory in adolescents",
  snippet: "Restricted sleep reduced working memory accuracy across three nights.",
  publishedYear: 2022,
  venue: "Journal of Sleep Research",
  provenance: "primary",
  citationProxy: 64,
  url: null,
  authors: ["L Moreno"],
  validationLevel: "full",
};

const analysis: AnalysisResult = {
  sourceRef: "scholar-1",
  summary: "Restricted sleep hurts working memory.",
  keyPoints: ["accuracy fell"],
  relevanceScore: 8,
  methodology: "crossover trial",
  limitations: [],
  reasoningTrace: "",
};

const cited = buildCitedSources([source], [analysis]);

const supportedClaim =
  "Restricted sleep reduced working memory accuracy across three consecutive nights in adolescents (Moreno, 2022).";
const unknownClaim =
  "Another long sentence claims something entirely unrelated to any analyzed source here (Nobody, 2001).";

function draft(body: string): Draft {
  return { introduction: "", body, conclusion: "", citationsList: [], wordCount: 0 };
}

class VerdictClient implements ReasoningClient {
  readonly prompts: string[] = [];

  constructor(private readonly respond: () => Promise<string>) {}

  async complete(request: ReasoningRequest): Promise<string> {
    this.prompts.push(request.prompt);
    return this.respond();
  }
}

const supported = async () =>
  JSON.stringify({ verdict: "SUPPORTED", confidence: 0.9, evidence: "accuracy fell", reasoning: "matches" });

function gate(client: ReasoningClient) {
  return new ClaimVerificationGate({
    client,
    minSupportedFraction: 0.75,
    claimsToVerify: 5,
    policy: { timeoutMs: 1_000, maxAttempts: 1, baseDelayMs: 0 },
  });
}

describe("extractClaims", () => {
  it("takes substantive cited sentences in order up to the limit", () => {
    const claims = extractClaims(draft(`${supportedClaim} Short (Moreno, 2022). ${unknownClaim}`), 5);

    expect(claims.map((c) => c.citationKeys)).toEqual([["moreno|2022"], ["nobody|2001"]]);
    expect(extractClaims(draft(`${supportedClaim} ${unknownClaim}`), 1)).toHaveLength(1);
  });
});

describe("ClaimVerificationGate", () => {
  it("passes when there are no cited claims", async () => {
    const verdict = await gate(new VerdictClient(supported)).evaluate({
      draft: draft("Nothing cited here."),
      cited,
      log: silentLogger(),
    });

    expect(verdict).toMatchObject({ gateName: "claim_verification", passed: true, score: 1, issues: [] });
  });

  it("marks claims citing unanalyzed sources unsupported without calling the model", async () => {
    const client = new VerdictClient(supported);
    const verdict = await gate(client).evaluate({
      draft: draft(`${supportedClaim} ${unknownClaim}`),
      cited,
      log: silentLogger(),
    });

    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]).toContain("Source (Moreno, 2022): Sleep deprivation and working memory in adolescents");
    expect(verdict.passed).toBe(false);
    expect(verdict.score).toBe(0.5);
    expect(verdict.issues).toEqual([
      "only 1 of 2 verified claims are supported (minimum 75%)",
      `unsupported claim: ${unknownClaim}`,
    ]);
  });

  it("passes when every verified claim is supported", async () => {
    const verdict = await gate(new VerdictClient(supported)).evaluate({
      draft: draft(supportedClaim),
      cited,
      log: silentLogger(),
    });

    expect(verdict.passed).toBe(true);
    expect(verdict.score).toBe(1);
  });

  it("excludes claims whose verification call fails", async () => {
    const client = new VerdictClient(async () => {
      throw new Error("HTTP 400: bad request");
    });
    const verdict = await gate(client).evaluate({ draft: draft(supportedClaim), cited, log: silentLogger() });

    expect(verdict.passed).toBe(false);
    expect(verdict.score).toBe(0);
    expect(verdict.issues).toEqual(["none of 1 claims could be verified"]);
    expect(verdict.metadata?.unverifiable).toBe(1);
  });
});
