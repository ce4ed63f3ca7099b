export type InTextCitation = {
  raw: string;
  author: string;
  year: string;
  key: string;
};

export type ParsedReference = {
  entry: string;
  author: string;
  year: string;
  key: string;
};

export type CitationScan = {
  citations: InTextCitation[];
  malformed: string[];
};

const YEAR_TOKEN = String.raw`(?:\d{4}[a-z]{0,2}|n\.d\.(?:-[a-z]{1,2})?)`;
const PARENTHETICAL = /\(([^()]*)\)/g;
const CITATION_PART = new RegExp(String.raw`^(\p{Lu}[^,\d]*?),\s*(${YEAR_TOKEN})$`, "u");
const REFERENCE_ENTRY = new RegExp(String.raw`^\s*(.+?)\s+\((${YEAR_TOKEN})\)`);

// Parentheticals that look like they meant to be a citation.
const CITATION_LIKE = /(?:[A-Za-z]{2,}[^()]*\b(?:19|20)\d{2}\b)|\bet al\b|\bn\.d\./;

export function normalizeAuthor(author: string): string {
  const first = author
    .replace(/\bet al\.?/gi, "")
    .split(/\s+(?:and|&)\s+/)[0] ?? "";
  return first.replace(/\./g, "").replace(/\s+/g, " ").trim().toLowerCase();
}

export function citationKey(author: string, year: string): string {
  return `${normalizeAuthor(author)}|${year.toLowerCase()}`;
}

/**
 * Finds "(Author, Year)" citations, including "et al." and several citations
 * separated by semicolons in one parenthetical. Parentheticals that mention a
 * year next to words but do not parse are reported as malformed.
 */
export function scanCitations(text: string): CitationScan {
  const citations: InTextCitation[] = [];
  const malformed: string[] = [];

  for (const match of text.matchAll(PARENTHETICAL)) {
    const inner = match[1] ?? "";
    const parts = inner.split(";").map((part) => part.trim()).filter(Boolean);
    for (const part of parts) {
      const parsed = CITATION_PART.exec(part);
      if (parsed) {
        const author = (parsed[1] ?? "").trim();
        const year = parsed[2] ?? "";
        citations.push({ raw: `(${part})`, author, year, key: citationKey(author, year) });
      } else if (CITATION_LIKE.test(part)) {
        malformed.push(`(${part})`);
      }
    }
  }

  return { citations, malformed };
}

export function parseReferenceEntry(entry: string): ParsedReference | null {
  const match = REFERENCE_ENTRY.exec(entry);
  if (!match) return null;
  const author = (match[1] ?? "").trim();
  const year = match[2] ?? "";
  return { entry, author, year, key: citationKey(author, year) };
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

export function authorsLookAlike(a: string, b: string): boolean {
  const left = normalizeAuthor(a);
  const right = normalizeAuthor(b);
  if (!left || !right || left === right) return false;
  return levenshtein(left, right) <= 2 || left.startsWith(right) || right.startsWith(left);
}
