import type { Draft, GateVerdict } from "../contracts/research";
import {
  authorsLookAlike,
  parseReferenceEntry,
  scanCitations,
  type InTextCitation,
  type ParsedReference,
} from "./citation_parsing";
import { draftText, GATE_CITATION_CONSISTENCY, type DraftGate, type GateContext } from "./gate_interfaces";
import { round } from "./text_metrics";

export type CitationMismatch = {
  citation: string;
  reference: string;
};

export type CitationCrossCheck = {
  citationCount: number;
  referenceCount: number;
  orphanCitations: string[];
  unusedReferences: string[];
  mismatches: CitationMismatch[];
  malformedCitations: string[];
  unparseableReferences: string[];
};

const unique = (values: string[]) => [...new Set(values)];

/**
 * Cross-checks in-text citations against the reference list in both
 * directions. An orphan whose year matches a reference with a near-identical
 * author is reported as a mismatch rather than an orphan.
 */
export function crossCheckCitations(draft: Draft): CitationCrossCheck {
  const { citations, malformed } = scanCitations(draftText(draft));

  const references: ParsedReference[] = [];
  const unparseableReferences: string[] = [];
  for (const entry of draft.citationsList) {
    const parsed = parseReferenceEntry(entry);
    if (parsed) references.push(parsed);
    else unparseableReferences.push(entry);
  }

  const referenceKeys = new Set(references.map((reference) => reference.key));
  const citedKeys = new Set(citations.map((citation) => citation.key));

  const orphans: InTextCitation[] = citations.filter((citation) => !referenceKeys.has(citation.key));
  const mismatches: CitationMismatch[] = [];
  const orphanCitations: string[] = [];
  for (const orphan of orphans) {
    const lookalike = references.find(
      (reference) => reference.year === orphan.year && authorsLookAlike(reference.author, orphan.author)
    );
    if (lookalike) mismatches.push({ citation: orphan.raw, reference: lookalike.entry });
    else orphanCitations.push(orphan.raw);
  }

  const mismatchedReferences = new Set(mismatches.map((mismatch) => mismatch.reference));
  const unusedReferences = references
    .filter((reference) => !citedKeys.has(reference.key) && !mismatchedReferences.has(reference.entry))
    .map((reference) => reference.entry);

  return {
    citationCount: citations.length,
    referenceCount: draft.citationsList.length,
    orphanCitations: unique(orphanCitations),
    unusedReferences,
    mismatches,
    malformedCitations: unique(malformed),
    unparseableReferences,
  };
}

export function consistencyIssueCount(check: CitationCrossCheck): number {
  return (
    check.orphanCitations.length +
    check.unusedReferences.length +
    check.mismatches.length +
    check.malformedCitations.length +
    check.unparseableReferences.length
  );
}

export class CitationConsistencyGate implements DraftGate {
  readonly name = GATE_CITATION_CONSISTENCY;

  async evaluate(context: GateContext): Promise<GateVerdict> {
    const check = crossCheckCitations(context.draft);
    const issueCount = consistencyIssueCount(check);

    const issues: string[] = [
      ...check.orphanCitations.map((c) => `citation ${c} has no matching reference`),
      ...check.mismatches.map((m) => `citation ${m.citation} does not match reference "${m.reference}"`),
      ...check.unusedReferences.map((r) => `reference "${r}" is never cited`),
      ...check.malformedCitations.map((c) => `malformed citation ${c}; use (Author, Year)`),
      ...check.unparseableReferences.map((r) => `reference "${r}" is not in "Author (Year). Title." form`),
    ];
    if (check.citationCount === 0) {
      issues.unshift("draft contains no in-text citations");
    }

    return {
      gateName: this.name,
      passed: issues.length === 0,
      score: round(Math.max(0, 1 - issueCount / Math.max(1, check.citationCount))),
      issues,
      metadata: { ...check },
    };
  }
}
