import { z } from "zod";

export const Provenance = z.enum(["primary", "secondary"]);
export type Provenance = z.infer<typeof Provenance>;

export const ValidationLevel = z.enum(["full", "partial", "domain"]);
export type ValidationLevel = z.infer<typeof ValidationLevel>;

export const SourceRecord = z.object({
  id: z.string().min(1),
  title: z.string(),
  snippet: z.string(),
  publishedYear: z.number().int().nullable(),
  venue: z.string().min(1),
  provenance: Provenance,
  citationProxy: z.number().int().min(0),
  url: z.string().nullable(),
  authors: z.array(z.string()),
  validationLevel: ValidationLevel,
});
export type SourceRecord = z.infer<typeof SourceRecord>;

export const AnalysisResult = z.object({
  sourceRef: z.string().min(1),
  summary: z.string(),
  keyPoints: z.array(z.string()),
  relevanceScore: z.number().min(0).max(10),
  methodology: z.string(),
  limitations: z.array(z.string()),
  reasoningTrace: z.string(),
});
export type AnalysisResult = z.infer<typeof AnalysisResult>;

export const Draft = z.object({
  introduction: z.string(),
  body: z.string(),
  conclusion: z.string(),
  citationsList: z.array(z.string()),
  wordCount: z.number().int().min(0),
});
export type Draft = z.infer<typeof Draft>;

export const GateName = z.enum(["quality_score", "citation_consistency", "claim_verification"]);
export type GateName = z.infer<typeof GateName>;

export const GateVerdict = z.object({
  gateName: GateName,
  passed: z.boolean(),
  score: z.number(),
  issues: z.array(z.string()),
  metadata: z.record(z.unknown()).optional(),
});
export type GateVerdict = z.infer<typeof GateVerdict>;

export const SynthesisState = z.enum([
  "DRAFTING",
  "GATE_CHECKING",
  "REGENERATING",
  "DEGRADED_ACCEPT",
  "ACCEPTED",
]);
export type SynthesisState = z.infer<typeof SynthesisState>;

export const SufficiencyReport = z.object({
  sufficient: z.boolean(),
  validCount: z.number().int(),
  uniqueVenues: z.number().int(),
  recentCount: z.number().int(),
  effectiveCount: z.number(),
  venueDistribution: z.record(z.number().int()),
  issues: z.array(z.string()),
  recommendations: z.array(z.string()),
});
export type SufficiencyReport = z.infer<typeof SufficiencyReport>;

export const ResearchResult = z.object({
  query: z.string(),
  provenance: Provenance,
  draft: Draft,
  essayMarkdown: z.string(),
  degraded: z.boolean(),
  finalState: z.enum(["ACCEPTED", "DEGRADED_ACCEPT"]),
  attempts: z.number().int().min(1),
  verdicts: z.array(GateVerdict),
  warnings: z.array(z.string()),
  sourceCount: z.number().int(),
  analysisCount: z.number().int(),
  sufficiency: SufficiencyReport,
});
export type ResearchResult = z.infer<typeof ResearchResult>;

export const SessionStatus = z.enum([
  "queued",
  "fetching",
  "analyzing",
  "synthesizing",
  "completed",
  "failed",
]);
export type SessionStatus = z.infer<typeof SessionStatus>;

export const TERMINAL_STATUSES: readonly SessionStatus[] = ["completed", "failed"];

export function isTerminalStatus(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const SessionProgress = z.object({
  sourcesFetched: z.number().int().min(0),
  sourcesValidated: z.number().int().min(0),
  sourcesAnalyzed: z.number().int().min(0),
  analysisFailures: z.number().int().min(0),
  draftAttempts: z.number().int().min(0),
  wordCount: z.number().int().min(0),
});
export type SessionProgress = z.infer<typeof SessionProgress>;

export const EMPTY_PROGRESS: SessionProgress = {
  sourcesFetched: 0,
  sourcesValidated: 0,
  sourcesAnalyzed: 0,
  analysisFailures: 0,
  draftAttempts: 0,
  wordCount: 0,
};

export const SessionError = z.object({
  code: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});
export type SessionError = z.infer<typeof SessionError>;

export const ResearchSession = z.object({
  id: z.string(),
  query: z.string(),
  status: SessionStatus,
  stage: z.string(),
  deadline: z.string().nullable(),
  progress: SessionProgress,
  provenance: Provenance.nullable(),
  result: ResearchResult.nullable(),
  error: SessionError.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type ResearchSession = z.infer<typeof ResearchSession>;

export const ResearchRequest = z
  .object({
    query: z.string().trim().min(3).max(500),
  })
  .strict();
export type ResearchRequest = z.infer<typeof ResearchRequest>;
