import { z } from "zod";

import type { AnalysisResult, SourceRecord } from "../contracts/research";
import type { Logger } from "../logging/logger";
import type { JsonSchema } from "../providers/openai_model";
import {
  callReasoning,
  parseJsonPayload,
  type CallPolicy,
  type ReasoningClient,
} from "../providers/reasoning_client";

export const AnalysisPayload = z.object({
  summary: z.string().min(1),
  key_points: z.array(z.string()),
  methodology: z.string(),
  limitations: z.array(z.string()),
  relevance_score: z.number().min(0).max(10),
  reasoning: z.string(),
});
export type AnalysisPayload = z.infer<typeof AnalysisPayload>;

export const ANALYSIS_JSON_SCHEMA: JsonSchema = {
  type: "object",
  required: ["summary", "key_points", "methodology", "limitations", "relevance_score", "reasoning"],
  properties: {
    summary: { type: "string" },
    key_points: { type: "array", items: { type: "string" } },
    methodology: { type: "string" },
    limitations: { type: "array", items: { type: "string" } },
    relevance_score: { type: "number", minimum: 0, maximum: 10 },
    reasoning: { type: "string" },
  },
};

export function buildAnalysisPrompt(query: string, source: SourceRecord): string {
  const lines = [
    "You are a research analyst reviewing one source for an essay.",
    `Research question: ${query}`,
    "",
    `Title: ${source.title}`,
    `Venue: ${source.venue}`,
    `Year: ${source.publishedYear ?? "unknown"}`,
    source.authors.length ? `Authors: ${source.authors.join(", ")}` : "Authors: unknown",
    `Excerpt: ${source.snippet}`,
    "",
    "Summarize what the source contributes to the question, list its key points,",
    "describe its methodology as far as the excerpt reveals it, list its limitations,",
    "and rate its relevance to the question from 0 to 10.",
    "Respond with JSON only.",
  ];
  return lines.join("\n");
}

export function toAnalysisResult(sourceRef: string, payload: AnalysisPayload): AnalysisResult {
  return {
    sourceRef,
    summary: payload.summary.trim(),
    keyPoints: payload.key_points.map((point) => point.trim()).filter(Boolean),
    relevanceScore: payload.relevance_score,
    methodology: payload.methodology.trim(),
    limitations: payload.limitations.map((item) => item.trim()).filter(Boolean),
    reasoningTrace: payload.reasoning.trim(),
  };
}

export async function analyzeSource(args: {
  client: ReasoningClient;
  query: string;
  source: SourceRecord;
  policy: CallPolicy;
  signal?: AbortSignal;
  log?: Logger;
}): Promise<AnalysisResult> {
  const payload = await callReasoning({
    client: args.client,
    request: {
      task: "source_analysis",
      prompt: buildAnalysisPrompt(args.query, args.source),
      structured: { name: "source_analysis", schema: ANALYSIS_JSON_SCHEMA },
    },
    parse: (raw) => parseJsonPayload("source_analysis", raw, AnalysisPayload),
    policy: args.policy,
    label: `analysis ${args.source.id}`,
    signal: args.signal,
    log: args.log,
  });
  return toAnalysisResult(args.source.id, payload);
}
