import type { AnalysisResult, SourceRecord } from "../contracts/research";
import { citationKey } from "../gates/citation_parsing";

export type CitedSource = {
  label: string;
  lead: string;
  yearToken: string;
  key: string;
  reference: string;
  source: SourceRecord;
  analysis: AnalysisResult;
};

const TITLE_STOP_WORDS = new Set([
  "a", "an", "and", "the", "of", "on", "in", "for", "to", "with", "from", "by", "at", "as", "is", "are", "how", "why", "what",
]);

const capitalize = (word: string) => (word ? word[0].toUpperCase() + word.slice(1) : word);

export function leadNameOf(source: SourceRecord): string {
  const firstAuthor = source.authors[0];
  if (firstAuthor) {
    const surname = firstAuthor.trim().split(/\s+/).at(-1)?.replace(/[^\p{L}'-]/gu, "");
    if (surname) return capitalize(surname);
  }
  const words = source.title
    .split(/\s+/)
    .map((word) => word.replace(/[^\p{L}'-]/gu, ""))
    .filter((word) => word.length > 1 && !TITLE_STOP_WORDS.has(word.toLowerCase()));
  return capitalize(words[0] ?? "Anonymous");
}

/** a..z, then aa, ab, ... */
export function collisionSuffix(ordinal: number): string {
  let suffix = "";
  for (let n = ordinal + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    suffix = String.fromCharCode(97 + ((n - 1) % 26)) + suffix;
  }
  return suffix;
}

function venueDisplay(venue: string): string {
  return venue.startsWith("web:") ? venue.slice("web:".length) : venue;
}

/**
 * Pairs each analysis with its source and assigns a citation label
 * "Lead, Year". Labels that would collide get a, b, c suffixes on the year.
 * One reference entry per analyzed source, in analysis order.
 */
export function buildCitedSources(sources: SourceRecord[], analyses: AnalysisResult[]): CitedSource[] {
  const byId = new Map(sources.map((source) => [source.id, source]));
  const paired = analyses.flatMap((analysis) => {
    const source = byId.get(analysis.sourceRef);
    return source ? [{ source, analysis }] : [];
  });

  const bases = paired.map(({ source }) => {
    const lead = leadNameOf(source);
    const year = source.publishedYear === null ? "n.d." : String(source.publishedYear);
    return { lead, year };
  });
  const totals = new Map<string, number>();
  for (const base of bases) {
    const key = citationKey(base.lead, base.year);
    totals.set(key, (totals.get(key) ?? 0) + 1);
  }

  const seen = new Map<string, number>();
  return paired.map(({ source, analysis }, index) => {
    const { lead, year } = bases[index];
    const baseKey = citationKey(lead, year);
    let yearToken = year;
    if ((totals.get(baseKey) ?? 0) > 1) {
      const ordinal = seen.get(baseKey) ?? 0;
      seen.set(baseKey, ordinal + 1);
      const suffix = collisionSuffix(ordinal);
      yearToken = year === "n.d." ? `n.d.-${suffix}` : `${year}${suffix}`;
    }
    const title = source.title.replace(/[.?!]+$/, "");
    return {
      label: `${lead}, ${yearToken}`,
      lead,
      yearToken,
      key: citationKey(lead, yearToken),
      reference: `${lead} (${yearToken}). ${title}. ${venueDisplay(source.venue)}.`,
      source,
      analysis,
    };
  });
}
