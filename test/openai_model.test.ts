import { afterEach, describe, it, expect, vi } from "vitest";
import { openAIResponse, parseRetryAfter, ReasoningProviderError, sanitizeJsonSchema } from "../src/providers/openai_model";
import { callReasoning, OpenAIReasoningClient } from "../src/providers/reasoning_client";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseRetryAfter", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfter("2")).toBe(2000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:10 GMT", Date.parse("2026-01-01T00:00:00Z"))).toBe(10_000);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("sanitizeJsonSchema", () => {
  it("closes nested objects", () => {
    expect(
      sanitizeJsonSchema({
        type: "object",
        properties: { inner: { type: "object", properties: {} } },
      })
    ).toEqual({
      type: "object",
      additionalProperties: false,
      properties: { inner: { type: "object", properties: {}, additionalProperties: false } },
    });
  });
});

describe("openAIResponse", () => {
  it("refuses to call without an API key", async () => {
    const error = await openAIResponse({ baseUrl: "https://llm.test", model: "m", promptText: "hi" }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ReasoningProviderError);
    if (!(error instanceof ReasoningProviderError)) return;
    expect(error.retryable).toBe(false);
  });

  it("returns the first text part of the response", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      new Response(JSON.stringify({ output: [{ content: [{ type: "output_text", text: "hello" }] }] }), {
        status: 200,
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OpenAIReasoningClient({ apiKey: "test-secret", baseUrl: "https://llm.test", model: "gpt-test" });
    const text = await client.complete({
      task: "source_analysis",
      prompt: "analyze",
      structured: { name: "source_analysis", schema: { type: "object", properties: {} } },
    });

    expect(text).toBe("hello");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://llm.test/responses");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "gpt-test",
      input: "analyze",
      text: { format: { type: "json_schema", name: "source_analysis", strict: true } },
    });
  });

  it("marks rate limits retryable and carries the retry-after hint", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(JSON.stringify({ error: { type: "rate_limit", message: "slow down" } }), {
            status: 429,
            headers: { "retry-after": "3" },
          })
      )
    );

    const error = await openAIResponse({
      apiKey: "test-secret",
      baseUrl: "https://llm.test",
      model: "m",
      promptText: "hi",
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReasoningProviderError);
    if (!(error instanceof ReasoningProviderError)) return;
    expect(error.message).toBe("OpenAI error 429: slow down");
    expect(error.retryable).toBe(true);
    expect(error.retryAfterMs).toBe(3000);
  });

  it("treats a response without text as a retryable failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(JSON.stringify({ output: [] }), { status: 200 })));

    await expect(
      openAIResponse({ apiKey: "test-secret", baseUrl: "https://llm.test", model: "m", promptText: "hi" })
    ).rejects.toThrow("OpenAI response missing content");
  });

  it("retries a response body that is not JSON", async () => {
    const fetchMock = vi.fn(async () => new Response("<html>gateway</html>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const client = new OpenAIReasoningClient({ apiKey: "test-secret", baseUrl: "https://llm.test", model: "m" });
    const error = await callReasoning({
      client,
      request: { task: "draft_body", prompt: "write" },
      parse: (raw) => raw,
      policy: { timeoutMs: 1000, maxAttempts: 3, baseDelayMs: 0 },
      label: "draft_body",
    }).catch((e: unknown) => e);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ReasoningProviderError);
    if (!(error instanceof ReasoningProviderError)) return;
    expect(error.message).toBe("OpenAI response is not JSON");
    expect(error.retryable).toBe(true);
  });
});
