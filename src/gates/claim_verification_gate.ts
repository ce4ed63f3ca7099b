import { z } from "zod";

import type { Draft, GateVerdict } from "../contracts/research";
import type { JsonSchema } from "../providers/openai_model";
import {
  callReasoning,
  parseJsonPayload,
  type CallPolicy,
  type ReasoningClient,
} from "../providers/reasoning_client";
import type { CitedSource } from "../synthesis/cited_sources";
import { scanCitations } from "./citation_parsing";
import { GATE_CLAIM_VERIFICATION, type DraftGate, type GateContext } from "./gate_interfaces";
import { countWords, round, splitSentences } from "./text_metrics";

export const ClaimVerdictValue = z.enum(["SUPPORTED", "PARTIALLY_SUPPORTED", "NOT_SUPPORTED"]);
export type ClaimVerdictValue = z.infer<typeof ClaimVerdictValue>;

export const ClaimVerdictPayload = z.object({
  verdict: ClaimVerdictValue,
  confidence: z.number().min(0).max(1),
  evidence: z.string(),
  reasoning: z.string(),
});
export type ClaimVerdictPayload = z.infer<typeof ClaimVerdictPayload>;

export const CLAIM_VERDICT_JSON_SCHEMA: JsonSchema = {
  type: "object",
  required: ["verdict", "confidence", "evidence", "reasoning"],
  properties: {
    verdict: { type: "string", enum: ["SUPPORTED", "PARTIALLY_SUPPORTED", "NOT_SUPPORTED"] },
    confidence: { type: "number", minimum: 0, maximum: 1 },
    evidence: { type: "string" },
    reasoning: { type: "string" },
  },
};

export const CLAIM_MIN_WORDS = 10;

export type ExtractedClaim = {
  text: string;
  citationKeys: string[];
};

export type ClaimCheck = {
  claim: string;
  verdict: ClaimVerdictValue;
  confidence: number;
  source: string | null;
  reasoning: string;
};

/**
 * Substantive cited sentences in document order, capped at `limit`.
 */
export function extractClaims(draft: Draft, limit: number): ExtractedClaim[] {
  const claims: ExtractedClaim[] = [];
  for (const section of [draft.introduction, draft.body, draft.conclusion]) {
    for (const sentence of splitSentences(section)) {
      if (countWords(sentence) < CLAIM_MIN_WORDS) continue;
      const { citations } = scanCitations(sentence);
      if (citations.length === 0) continue;
      claims.push({ text: sentence, citationKeys: [...new Set(citations.map((c) => c.key))] });
      if (claims.length >= limit) return claims;
    }
  }
  return claims;
}

export function buildVerificationPrompt(claim: string, cited: CitedSource): string {
  const { analysis, source } = cited;
  return [
    "Decide whether the cited source supports the claim.",
    `Claim: ${claim}`,
    "",
    `Source (${cited.label}): ${source.title}`,
    `Excerpt: ${source.snippet}`,
    `Analysis summary: ${analysis.summary}`,
    `Key points: ${analysis.keyPoints.join("; ") || "none"}`,
    `Methodology: ${analysis.methodology || "not stated"}`,
    "",
    "Answer SUPPORTED, PARTIALLY_SUPPORTED or NOT_SUPPORTED with a confidence between 0 and 1,",
    "the evidence you relied on, and brief reasoning. Respond with JSON only.",
  ].join("\n");
}

export class ClaimVerificationGate implements DraftGate {
  readonly name = GATE_CLAIM_VERIFICATION;

  constructor(
    private readonly options: {
      client: ReasoningClient;
      minSupportedFraction: number;
      claimsToVerify: number;
      policy: CallPolicy;
    }
  ) {}

  async evaluate(context: GateContext): Promise<GateVerdict> {
    const claims = extractClaims(context.draft, this.options.claimsToVerify);
    if (claims.length === 0) {
      return {
        gateName: this.name,
        passed: true,
        score: 1,
        issues: [],
        metadata: { claimCount: 0, verified: 0, supported: 0, checks: [] },
      };
    }

    const byKey = new Map(context.cited.map((cited) => [cited.key, cited]));
    const checks: ClaimCheck[] = [];
    let unverifiable = 0;

    for (const claim of claims) {
      const cited = claim.citationKeys.map((key) => byKey.get(key)).find((c) => c !== undefined);
      if (!cited) {
        checks.push({
          claim: claim.text,
          verdict: "NOT_SUPPORTED",
          confidence: 1,
          source: null,
          reasoning: "cited source was not among the analyzed sources",
        });
        continue;
      }

      try {
        const payload = await callReasoning({
          client: this.options.client,
          request: {
            task: "claim_verification",
            prompt: buildVerificationPrompt(claim.text, cited),
            structured: { name: "claim_verdict", schema: CLAIM_VERDICT_JSON_SCHEMA },
          },
          parse: (raw) => parseJsonPayload("claim_verification", raw, ClaimVerdictPayload),
          policy: this.options.policy,
          label: `claim verification ${cited.label}`,
          signal: context.signal,
          log: context.log,
        });
        checks.push({
          claim: claim.text,
          verdict: payload.verdict,
          confidence: payload.confidence,
          source: cited.label,
          reasoning: payload.reasoning,
        });
      } catch (error) {
        if (context.signal?.aborted) throw error;
        unverifiable += 1;
        context.log.warn(
          { source: cited.label, error: error instanceof Error ? error.message : String(error) },
          "gates.claim_unverifiable"
        );
      }
    }

    const supported = checks.filter((check) => check.verdict !== "NOT_SUPPORTED").length;
    const fraction = checks.length ? supported / checks.length : 0;
    const passed = checks.length > 0 && fraction >= this.options.minSupportedFraction;

    const issues: string[] = [];
    if (checks.length === 0) {
      issues.push(`none of ${claims.length} claims could be verified`);
    } else if (!passed) {
      issues.push(
        `only ${supported} of ${checks.length} verified claims are supported (minimum ${Math.round(
          this.options.minSupportedFraction * 100
        )}%)`
      );
    }
    for (const check of checks) {
      if (check.verdict === "NOT_SUPPORTED") {
        issues.push(`unsupported claim${check.source ? ` (${check.source})` : ""}: ${check.claim}`);
      }
    }

    return {
      gateName: this.name,
      passed,
      score: round(fraction),
      issues,
      metadata: { claimCount: claims.length, verified: checks.length, supported, unverifiable, checks },
    };
  }
}
