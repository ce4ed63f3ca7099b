import { z } from "zod";

import {
  OptionalCount,
  OptionalText,
  parseItems,
  postProviderJson,
  SourceProviderError,
  type RawSourceHit,
  type SearchOptions,
  type SourceProvider,
} from "./source_provider";

const ScholarResponse = z.object({
  organic: z.array(z.unknown()).nullish(),
});

const ScholarItem = z.object({
  title: OptionalText,
  link: OptionalText,
  snippet: OptionalText,
  publicationInfo: OptionalText,
  year: OptionalCount,
  citedBy: OptionalCount,
});

/**
 * Scholarly search (Serper's Google Scholar endpoint). Records carry
 * publication metadata, so they are validated bibliographically.
 */
export class ScholarSourceProvider implements SourceProvider {
  readonly name = "scholar";
  readonly provenance = "primary" as const;

  constructor(
    private readonly options: {
      apiKey?: string;
      baseUrl: string;
    }
  ) {}

  async search(query: string, options: SearchOptions): Promise<RawSourceHit[]> {
    if (!this.options.apiKey) {
      throw new SourceProviderError(this.name, "SCHOLAR_API_KEY missing", 401);
    }

    const payload = await postProviderJson({
      provider: this.name,
      url: `${this.options.baseUrl}/scholar`,
      headers: { "X-API-KEY": this.options.apiKey },
      body: { q: query, num: options.maxResults },
      signal: options.signal,
    });

    const parsed = ScholarResponse.safeParse(payload);
    if (!parsed.success) {
      throw new SourceProviderError(this.name, "unexpected response shape");
    }

    return parseItems(ScholarItem, parsed.data.organic ?? []).map((item) => ({
      title: item.title ?? "",
      snippet: item.snippet ?? "",
      url: item.link,
      publicationInfo: item.publicationInfo,
      year: item.year === undefined ? undefined : Math.trunc(item.year),
      citedBy: item.citedBy === undefined ? undefined : Math.max(0, Math.trunc(item.citedBy)),
    }));
  }
}
