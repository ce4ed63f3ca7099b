import type { Draft, GateVerdict } from "../contracts/research";
import { scanCitations } from "./citation_parsing";
import { draftText, GATE_QUALITY_SCORE, type DraftGate, type GateContext } from "./gate_interfaces";
import { clamp, containsPhrase, countWords, round, splitParagraphs, splitSentences } from "./text_metrics";

export const QUALITY_WEIGHTS = {
  citation_density: 0.2,
  source_diversity: 0.15,
  academic_language: 0.15,
  structural_coherence: 0.15,
  evidence_based_claims: 0.2,
  citation_format: 0.15,
} as const;

export type QualityDimension = keyof typeof QUALITY_WEIGHTS;
export type DimensionScores = Record<QualityDimension, number>;

const DIMENSIONS: readonly QualityDimension[] = [
  "citation_density",
  "source_diversity",
  "academic_language",
  "structural_coherence",
  "evidence_based_claims",
  "citation_format",
];

export const TARGET_CITATIONS_PER_WORD = 1 / 175;
export const DENSITY_TOLERANCE_RATIO = 0.25;
export const DIMENSION_ISSUE_THRESHOLD = 5;
export const MIN_SECTION_WORDS = 30;
export const CLAIM_MIN_WORDS = 10;

const HEDGES = [
  "suggest",
  "suggests",
  "indicate",
  "indicates",
  "may",
  "might",
  "appears",
  "likely",
  "evidence",
  "findings",
  "associated",
  "consistent with",
  "according to",
  "reported",
];

const ABSOLUTES = ["always", "never", "proves", "proven", "undeniably", "obviously", "everyone", "certainly", "definitely"];

const TRANSITIONS = [
  "however",
  "moreover",
  "furthermore",
  "in contrast",
  "consequently",
  "therefore",
  "additionally",
  "similarly",
  "nevertheless",
  "overall",
  "in summary",
  "taken together",
];

const CONTRACTION = /\b\w+'(?:t|re|ve|ll|d)\b/gi;

const HINTS: Record<QualityDimension, string> = {
  citation_density: "aim for roughly one citation per 175 words",
  source_diversity: "cite more of the analyzed sources and spread citations across them",
  academic_language: "use hedged, evidence-oriented phrasing and avoid absolutes and contractions",
  structural_coherence: "give each section substance and connect paragraphs with transitions",
  evidence_based_claims: "follow substantive statements with a supporting citation",
  citation_format: "write citations as (Author, Year)",
};

const hasCitation = (sentence: string) => scanCitations(sentence).citations.length > 0;

export function scoreCitationDensity(wordCount: number, citationCount: number): number {
  if (wordCount === 0 || citationCount === 0) return 0;
  const density = citationCount / wordCount;
  const deviation = Math.abs(density - TARGET_CITATIONS_PER_WORD) / TARGET_CITATIONS_PER_WORD;
  return clamp(10 - Math.max(0, deviation - DENSITY_TOLERANCE_RATIO) * 10, 0, 10);
}

export function scoreSourceDiversity(citationKeys: string[], sourceCount: number): number {
  if (citationKeys.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const key of citationKeys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const coverage = Math.min(1, counts.size / Math.max(1, sourceCount));
  const maxShare = Math.max(...counts.values()) / citationKeys.length;
  return 10 * (0.6 * coverage + 0.4 * (1 - maxShare));
}

export function scoreAcademicLanguage(text: string): number {
  const sentences = splitSentences(text);
  if (sentences.length === 0) return 0;
  const hedged = sentences.filter((sentence) => HEDGES.some((hedge) => containsPhrase(sentence, hedge))).length;
  const absolutes = sentences.reduce(
    (sum, sentence) => sum + ABSOLUTES.filter((word) => containsPhrase(sentence, word)).length,
    0
  );
  const contractions = (text.match(CONTRACTION) ?? []).length;
  const hedgeRatio = hedged / sentences.length;
  return clamp(4 + 6 * Math.min(1, hedgeRatio * 2) - 1.5 * absolutes - contractions, 0, 10);
}

export function scoreStructuralCoherence(draft: Draft): number {
  const sections = [draft.introduction, draft.body, draft.conclusion];
  const substantial = sections.filter((section) => countWords(section) >= MIN_SECTION_WORDS).length;
  const bodyParagraphs = splitParagraphs(draft.body).length;
  const transitions = splitSentences(draftText(draft)).filter((sentence) =>
    TRANSITIONS.some((phrase) => containsPhrase(sentence, phrase))
  ).length;
  return Math.min(10, substantial * 2 + (bodyParagraphs >= 2 ? 1 : 0) + Math.min(3, transitions * 0.5));
}

/**
 * Share of substantive sentences that carry a citation themselves or within
 * the next two sentences.
 */
export function scoreEvidenceBasedClaims(text: string): number {
  const sentences = splitSentences(text);
  const cited = sentences.map(hasCitation);
  let significant = 0;
  let supported = 0;
  sentences.forEach((sentence, index) => {
    if (countWords(sentence) < CLAIM_MIN_WORDS) return;
    significant += 1;
    if (cited.slice(index, index + 3).some(Boolean)) supported += 1;
  });
  if (significant === 0) return 5;
  return (10 * supported) / significant;
}

export function scoreCitationFormat(wellFormed: number, malformed: number): number {
  const total = wellFormed + malformed;
  if (total === 0) return 0;
  return (10 * wellFormed) / total;
}

export function assessmentLevel(score: number, floor: number): string {
  if (score >= 8) return "excellent";
  if (score >= 6) return "good";
  if (score >= floor) return "acceptable_with_review";
  return "rejected";
}

export function scoreDraft(draft: Draft, sourceCount: number): { overall: number; dimensions: DimensionScores } {
  const text = draftText(draft);
  const { citations, malformed } = scanCitations(text);
  const dimensions: DimensionScores = {
    citation_density: round(scoreCitationDensity(countWords(text), citations.length)),
    source_diversity: round(scoreSourceDiversity(citations.map((c) => c.key), sourceCount)),
    academic_language: round(scoreAcademicLanguage(text)),
    structural_coherence: round(scoreStructuralCoherence(draft)),
    evidence_based_claims: round(scoreEvidenceBasedClaims(text)),
    citation_format: round(scoreCitationFormat(citations.length, malformed.length)),
  };

  let overall = 0;
  for (const dimension of DIMENSIONS) {
    overall += QUALITY_WEIGHTS[dimension] * dimensions[dimension];
  }
  return { overall: round(overall), dimensions };
}

export class QualityScoreGate implements DraftGate {
  readonly name = GATE_QUALITY_SCORE;

  constructor(private readonly options: { minScore: number }) {}

  async evaluate(context: GateContext): Promise<GateVerdict> {
    const { overall, dimensions } = scoreDraft(context.draft, context.cited.length);
    const passed = overall >= this.options.minScore;

    const issues: string[] = [];
    if (!passed) {
      issues.push(`overall score ${overall.toFixed(2)} below floor ${this.options.minScore.toFixed(2)}`);
    }
    for (const dimension of DIMENSIONS) {
      const score = dimensions[dimension];
      if (score < DIMENSION_ISSUE_THRESHOLD) {
        issues.push(`${dimension} scored ${score.toFixed(1)}/10: ${HINTS[dimension]}`);
      }
    }

    return {
      gateName: this.name,
      passed,
      score: overall,
      issues,
      metadata: {
        dimensions,
        assessment: assessmentLevel(overall, this.options.minScore),
        wordCount: context.draft.wordCount,
      },
    };
  }
}
