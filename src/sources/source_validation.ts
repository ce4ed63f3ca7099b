import type { SourceRecord, ValidationLevel } from "../contracts/research";
import type { RawSourceHit, SourceProvider } from "./source_provider";

export const TITLE_MIN_LENGTH = 10;
export const TITLE_MAX_LENGTH = 500;
export const PRIMARY_SNIPPET_MIN_LENGTH = 50;
export const SECONDARY_SNIPPET_MIN_LENGTH = 20;
export const EARLIEST_PLAUSIBLE_YEAR = 1950;

// Suffix matches against the result host.
export const DEFAULT_CONTENT_DOMAINS: readonly string[] = [
  "edu",
  "gov",
  "ac.uk",
  "edu.au",
  "arxiv.org",
  "nih.gov",
  "nature.com",
  "science.org",
  "sciencedirect.com",
  "springer.com",
  "wiley.com",
  "tandfonline.com",
  "sagepub.com",
  "plos.org",
  "frontiersin.org",
  "mdpi.com",
  "bmj.com",
  "thelancet.com",
  "ieee.org",
  "acm.org",
  "jstor.org",
  "ssrn.com",
  "who.int",
  "oecd.org",
];

export type ValidationOptions = {
  currentYear: number;
  contentDomains?: readonly string[];
};

export type RejectedHit = {
  index: number;
  title: string;
  reason: string;
};

export type ValidationOutcome = {
  records: SourceRecord[];
  rejected: RejectedHit[];
};

export type PublicationInfo = {
  authors: string[];
  venue: string | null;
  year: number | null;
};

export function hostOf(url: string | undefined): string | null {
  if (!url) return null;
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return null;
  }
}

export function normalizeVenue(venue: string): string {
  const cleaned = venue.replace(/[…\s]+$/u, "").replace(/\s+/g, " ").trim();
  if (/arxiv/i.test(cleaned)) return "arXiv";
  return cleaned;
}

const looksLikeHost = (value: string) => /^[\w-]+(\.[\w-]+)+$/.test(value);

export function parsePublicationInfo(info: string | undefined): PublicationInfo {
  if (!info) return { authors: [], venue: null, year: null };

  const parts = info.split(" - ").map((part) => part.trim());
  if (parts.length < 2) return { authors: [], venue: null, year: null };

  const authors = parts[0]
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0 && !name.includes("…"));

  let venueSegment = parts[1];
  let year: number | null = null;
  const yearMatch = /,?\s*((?:19|20)\d{2})\s*$/.exec(venueSegment);
  if (yearMatch) {
    year = Number(yearMatch[1]);
    venueSegment = venueSegment.slice(0, yearMatch.index);
  } else if (/^(?:19|20)\d{2}$/.test(venueSegment)) {
    year = Number(venueSegment);
    venueSegment = "";
  }

  const venue = venueSegment && !looksLikeHost(venueSegment) ? normalizeVenue(venueSegment) : null;
  return { authors, venue: venue || null, year };
}

export function isAllowedContentDomain(host: string, domains: readonly string[]): boolean {
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

const normalizeTitle = (title: string) => title.toLowerCase().replace(/\s+/g, " ").trim();

function checkTitle(title: string): string | null {
  if (title.length < TITLE_MIN_LENGTH) return `title shorter than ${TITLE_MIN_LENGTH} characters`;
  if (title.length > TITLE_MAX_LENGTH) return `title longer than ${TITLE_MAX_LENGTH} characters`;
  return null;
}

function validatePrimary(
  hit: RawSourceHit,
  id: string,
  options: ValidationOptions
): SourceRecord | string {
  const snippet = hit.snippet.trim();
  if (snippet.length < PRIMARY_SNIPPET_MIN_LENGTH) {
    return `snippet shorter than ${PRIMARY_SNIPPET_MIN_LENGTH} characters`;
  }

  const info = parsePublicationInfo(hit.publicationInfo);
  const year = hit.year ?? info.year;
  if (year !== null && (year < EARLIEST_PLAUSIBLE_YEAR || year > options.currentYear + 1)) {
    return `implausible publication year ${year}`;
  }

  const host = hostOf(hit.url);
  const venue = info.venue ?? (host ? normalizeVenue(host) : null);
  if (!venue) {
    return "no venue or link to attribute";
  }

  const validationLevel: ValidationLevel = info.venue && year !== null ? "full" : "partial";
  return {
    id,
    title: hit.title.trim(),
    snippet,
    publishedYear: year,
    venue,
    provenance: "primary",
    citationProxy: hit.citedBy ?? 0,
    url: hit.url ?? null,
    authors: info.authors,
    validationLevel,
  };
}

function validateSecondary(
  hit: RawSourceHit,
  id: string,
  options: ValidationOptions
): SourceRecord | string {
  const snippet = hit.snippet.trim();
  if (snippet.length < SECONDARY_SNIPPET_MIN_LENGTH) {
    return `content shorter than ${SECONDARY_SNIPPET_MIN_LENGTH} characters`;
  }

  const host = hostOf(hit.url);
  if (!host) {
    return "missing or invalid url";
  }
  if (!isAllowedContentDomain(host, options.contentDomains ?? DEFAULT_CONTENT_DOMAINS)) {
    return `domain ${host} is not an allowed content domain`;
  }

  return {
    id,
    title: hit.title.trim(),
    snippet,
    publishedYear: null,
    venue: `web:${host}`,
    provenance: "secondary",
    citationProxy: 0,
    url: hit.url ?? null,
    authors: [],
    validationLevel: "domain",
  };
}

/**
 * Normalizes raw hits into SourceRecords. Primary hits are checked
 * bibliographically, secondary hits by content domain. Duplicate titles are
 * dropped.
 */
export function validateHits(
  hits: RawSourceHit[],
  provider: Pick<SourceProvider, "name" | "provenance">,
  options: ValidationOptions
): ValidationOutcome {
  const records: SourceRecord[] = [];
  const rejected: RejectedHit[] = [];
  const seenTitles = new Set<string>();

  hits.forEach((hit, index) => {
    const title = hit.title.trim();
    const titleIssue = checkTitle(title);
    if (titleIssue) {
      rejected.push({ index, title, reason: titleIssue });
      return;
    }
    const key = normalizeTitle(title);
    if (seenTitles.has(key)) {
      rejected.push({ index, title, reason: "duplicate title" });
      return;
    }

    const id = `${provider.name}-${index + 1}`;
    const outcome = provider.provenance === "primary"
      ? validatePrimary(hit, id, options)
      : validateSecondary(hit, id, options);

    if (typeof outcome === "string") {
      rejected.push({ index, title, reason: outcome });
      return;
    }
    seenTitles.add(key);
    records.push(outcome);
  });

  return { records, rejected };
}
