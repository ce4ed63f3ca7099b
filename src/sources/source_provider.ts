import { z } from "zod";

import type { Provenance } from "../contracts/research";

export type RawSourceHit = {
  title: string;
  snippet: string;
  url?: string;
  // "A Author, B Author - Venue, 2021 - host"
  publicationInfo?: string;
  year?: number;
  citedBy?: number;
  relevance?: number;
};

export type SearchOptions = {
  maxResults: number;
  signal?: AbortSignal;
};

export interface SourceProvider {
  readonly name: string;
  readonly provenance: Provenance;
  search(query: string, options: SearchOptions): Promise<RawSourceHit[]>;
}

export class SourceProviderError extends Error {
  readonly provider: string;
  readonly statusCode?: number;

  constructor(provider: string, message: string, statusCode?: number) {
    super(message);
    this.name = "SourceProviderError";
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

export async function postProviderJson(args: {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
  signal?: AbortSignal;
}): Promise<unknown> {
  const res = await fetch(args.url, {
    method: "POST",
    headers: { "content-type": "application/json", ...args.headers },
    body: JSON.stringify(args.body),
    signal: args.signal,
  });

  if (!res.ok) {
    const text = await res.text();
    throw new SourceProviderError(
      args.provider,
      `HTTP ${res.status}: ${text.slice(0, 300) || res.statusText}`,
      res.status
    );
  }

  try {
    return await res.json();
  } catch {
    throw new SourceProviderError(args.provider, "response body is not JSON", res.status);
  }
}

// Search APIs send null for absent fields; a bad value drops the field, not the record.
export const OptionalText = z
  .string()
  .nullish()
  .catch(undefined)
  .transform((value) => value ?? undefined);

export const OptionalCount = z
  .preprocess((value) => (value === null || value === "" ? undefined : value), z.coerce.number().optional())
  .catch(undefined)
  .transform((value) => (value !== undefined && Number.isFinite(value) ? value : undefined));

/**
 * Items are parsed one by one so a single malformed entry is skipped rather
 * than failing the whole response.
 */
export function parseItems<T extends z.ZodTypeAny>(schema: T, items: unknown[]): z.output<T>[] {
  const parsed: z.output<T>[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
}

const STUB_HITS: RawSourceHit[] = [
  {
    title: "Sleep deprivation and working memory in adolescents",
    snippet:
      "A randomized crossover study of 120 adolescents found that restricted sleep reduced working memory accuracy and slowed response times across three consecutive nights.",
    url: "https://example.org/sleep-memory",
    publicationInfo: "L Moreno, K Patel - Journal of Sleep Research, 2022 - example.org",
    year: 2022,
    citedBy: 64,
  },
  {
    title: "Screen time before bed and sleep onset latency",
    snippet:
      "Survey data from 3,400 secondary school students associate evening screen exposure with delayed sleep onset and shorter total sleep duration on school nights.",
    url: "https://example.org/screen-time",
    publicationInfo: "A Chen, R Olsen - Pediatrics, 2021 - example.org",
    year: 2021,
    citedBy: 212,
  },
  {
    title: "School start times and academic performance: a district panel",
    snippet:
      "Districts that delayed start times by 45 minutes saw modest gains in attendance and grades, with larger effects among students from lower income households.",
    url: "https://example.org/start-times",
    publicationInfo: "J Whitfield - Education Policy Analysis, 2020 - example.org",
    year: 2020,
    citedBy: 530,
  },
  {
    title: "Circadian phase shifts during puberty",
    snippet:
      "Longitudinal melatonin sampling shows a pubertal delay in circadian phase of roughly two hours, which conflicts with early institutional schedules.",
    url: "https://example.org/circadian",
    publicationInfo: "S Nakamura, P Dubois - Chronobiology International, 2019 - example.org",
    year: 2019,
    citedBy: 95,
  },
  {
    title: "Napping interventions and afternoon attention",
    snippet:
      "A controlled trial of short afternoon naps reported improved sustained attention scores, though benefits faded for participants who napped longer than thirty minutes.",
    url: "https://example.org/napping",
    publicationInfo: "M Okafor - Journal of Sleep Research, 2023 - example.org",
    year: 2023,
    citedBy: 12,
  },
  {
    title: "Caffeine consumption patterns among teenagers",
    snippet:
      "Cross-sectional evidence links high caffeine intake to later bedtimes and daytime sleepiness, suggesting a reinforcing cycle between stimulant use and sleep debt.",
    url: "https://example.org/caffeine",
    publicationInfo: "H Lindqvist, T Amari - Nutrients, 2022 - example.org",
    year: 2022,
    citedBy: 41,
  },
];

export class StubSourceProvider implements SourceProvider {
  readonly name: string;
  readonly provenance: Provenance;

  constructor(name = "stub", provenance: Provenance = "primary") {
    this.name = name;
    this.provenance = provenance;
  }

  async search(_query: string, options: SearchOptions): Promise<RawSourceHit[]> {
    return STUB_HITS.slice(0, options.maxResults).map((hit) => ({ ...hit }));
  }
}
