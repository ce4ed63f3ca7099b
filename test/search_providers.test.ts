import { afterEach, describe, it, expect, vi } from "vitest";
import { ScholarSourceProvider } from "../src/sources/scholar_provider";
import { SourceProviderError } from "../src/sources/source_provider";
import { validateHits } from "../src/sources/source_validation";
import { WebSearchSourceProvider } from "../src/sources/web_search_provider";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ScholarSourceProvider", () => {
  it("fails fast without an API key", async () => {
    const provider = new ScholarSourceProvider({ baseUrl: "https://scholar.test" });
    await expect(provider.search("q", { maxResults: 5 })).rejects.toThrow("SCHOLAR_API_KEY missing");
  });

  it("posts the query and maps organic results", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        organic: [
          {
            title: "Sleep and memory consolidation",
            link: "https://example.org/a",
            snippet: "Findings on consolidation.",
            publicationInfo: "A Smith - Sleep, 2021 - example.org",
            year: 2021,
            citedBy: 33,
          },
        ],
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new ScholarSourceProvider({ apiKey: "test-secret", baseUrl: "https://scholar.test" });
    const hits = await provider.search("sleep memory", { maxResults: 7 });

    expect(hits).toEqual([
      {
        title: "Sleep and memory consolidation",
        snippet: "Findings on consolidation.",
        url: "https://example.org/a",
        publicationInfo: "A Smith - Sleep, 2021 - example.org",
        year: 2021,
        citedBy: 33,
      },
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://scholar.test/scholar");
    expect(init?.body).toBe(JSON.stringify({ q: "sleep memory", num: 7 }));
  });

  it("treats null fields as absent and skips entries that are not objects", async () => {
    const snippet = "Later school start times were associated with longer weeknight sleep in teenagers.";
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          organic: [
            {
              title: "School start times and weeknight sleep",
              link: "https://a.org/p",
              snippet,
              publicationInfo: "A Smith - Sleep, 2021 - a.org",
              year: null,
              citedBy: "12",
            },
            "not an entry",
          ],
        })
      )
    );

    const provider = new ScholarSourceProvider({ apiKey: "test-secret", baseUrl: "https://scholar.test" });
    const hits = await provider.search("school start", { maxResults: 5 });

    expect(hits).toEqual([
      {
        title: "School start times and weeknight sleep",
        snippet,
        url: "https://a.org/p",
        publicationInfo: "A Smith - Sleep, 2021 - a.org",
        year: undefined,
        citedBy: 12,
      },
    ]);
    const { records } = validateHits(hits, provider, { currentYear: 2026 });
    expect(records[0]?.publishedYear).toBe(2021);
    expect(records[0]?.validationLevel).toBe("full");
  });

  it("surfaces HTTP errors with status and body", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("quota exceeded", { status: 429 })));

    const provider = new ScholarSourceProvider({ apiKey: "test-secret", baseUrl: "https://scholar.test" });
    const error = await provider.search("q", { maxResults: 5 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceProviderError);
    if (!(error instanceof SourceProviderError)) return;
    expect(error.message).toBe("HTTP 429: quota exceeded");
    expect(error.statusCode).toBe(429);
  });
});

describe("WebSearchSourceProvider", () => {
  it("fails fast without an API key", async () => {
    const provider = new WebSearchSourceProvider({ baseUrl: "https://web.test" });
    await expect(provider.search("q", { maxResults: 5 })).rejects.toThrow("WEB_SEARCH_API_KEY missing");
  });

  it("maps results and sends a bearer token", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({
        results: [{ title: "Campus sleep guide", url: "https://health.uni.edu/s", content: "Guide text", score: 0.9 }],
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const provider = new WebSearchSourceProvider({ apiKey: "test-secret", baseUrl: "https://web.test" });
    const hits = await provider.search("sleep", { maxResults: 3 });

    expect(hits).toEqual([
      { title: "Campus sleep guide", snippet: "Guide text", url: "https://health.uni.edu/s", relevance: 0.9 },
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://web.test/search");
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-secret" });
  });

  it("keeps good results when one entry has null fields", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          results: [
            { title: "Campus sleep guide", url: "https://health.uni.edu/s", content: "Guide text", score: 0.9 },
            { title: "Clinic sleep advice", url: "https://clinic.uni.edu/a", content: "Advice text", score: null },
            { title: null, url: "https://other.uni.edu/x", content: "Untitled text" },
          ],
        })
      )
    );

    const provider = new WebSearchSourceProvider({ apiKey: "test-secret", baseUrl: "https://web.test" });
    const hits = await provider.search("sleep", { maxResults: 3 });

    expect(hits).toEqual([
      { title: "Campus sleep guide", snippet: "Guide text", url: "https://health.uni.edu/s", relevance: 0.9 },
      { title: "Clinic sleep advice", snippet: "Advice text", url: "https://clinic.uni.edu/a", relevance: undefined },
      { title: "", snippet: "Untitled text", url: "https://other.uni.edu/x", relevance: undefined },
    ]);
  });
});
