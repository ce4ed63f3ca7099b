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

const WebSearchResponse = z.object({
  results: z.array(z.unknown()).nullish(),
});

const WebSearchItem = z.object({
  title: OptionalText,
  url: OptionalText,
  content: OptionalText,
  score: OptionalCount,
});

/**
 * General web search (Tavily). No bibliographic fields: results are validated
 * by content domain instead.
 */
export class WebSearchSourceProvider implements SourceProvider {
  readonly name = "web_search";
  readonly provenance = "secondary" as const;

  constructor(
    private readonly options: {
      apiKey?: string;
      baseUrl: string;
    }
  ) {}

  async search(query: string, options: SearchOptions): Promise<RawSourceHit[]> {
    if (!this.options.apiKey) {
      throw new SourceProviderError(this.name, "WEB_SEARCH_API_KEY missing", 401);
    }

    const payload = await postProviderJson({
      provider: this.name,
      url: `${this.options.baseUrl}/search`,
      headers: { authorization: `Bearer ${this.options.apiKey}` },
      body: {
        query: `${query} research study`,
        max_results: options.maxResults,
        search_depth: "advanced",
      },
      signal: options.signal,
    });

    const parsed = WebSearchResponse.safeParse(payload);
    if (!parsed.success) {
      throw new SourceProviderError(this.name, "unexpected response shape");
    }

    return parseItems(WebSearchItem, parsed.data.results ?? []).map((item) => ({
      title: item.title ?? "",
      snippet: item.content ?? "",
      url: item.url,
      relevance: item.score,
    }));
  }
}
