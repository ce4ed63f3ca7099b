import { z } from "zod";

import type { Logger } from "../logging/logger";

export class ReasoningProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "ReasoningProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

export type JsonSchema = { [key: string]: unknown };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// Strict structured output rejects objects that allow extra keys.
export function sanitizeJsonSchema(schema: unknown): unknown {
  if (Array.isArray(schema)) return schema.map(sanitizeJsonSchema);
  if (!isRecord(schema)) return schema;

  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(schema)) {
    copy[key] = typeof value === "object" && value !== null ? sanitizeJsonSchema(value) : value;
  }
  if (copy.type === "object" && copy.additionalProperties === undefined) {
    copy.additionalProperties = false;
  }
  return copy;
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
}

const ErrorBody = z.object({
  error: z
    .object({
      type: z.string().nullish(),
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
});

const ResponsesBody = z.object({
  output: z
    .array(
      z.object({
        content: z.array(z.object({ text: z.string().optional() }).passthrough()).nullish(),
      }).passthrough()
    )
    .nullish(),
  output_text: z.string().nullish(),
});

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export type OpenAIResponseInput = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  promptText: string;
  structured?: { name: string; schema: JsonSchema };
  maxOutputTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  logger?: Pick<Logger, "error" | "debug">;
};

/**
 * One call to the Responses API. Structured calls ask for strict json_schema
 * output; drafting calls take plain text.
 */
export async function openAIResponse(input: OpenAIResponseInput): Promise<{ rawText: string }> {
  if (!input.apiKey) {
    throw new ReasoningProviderError("OPENAI_API_KEY missing", {
      statusCode: 500,
      retryable: false,
    });
  }

  const body: Record<string, unknown> = {
    model: input.model,
    store: false,
    stream: false,
    input: input.promptText,
  };
  if (input.structured) {
    body.text = {
      format: {
        type: "json_schema",
        name: input.structured.name,
        strict: true,
        schema: sanitizeJsonSchema(input.structured.schema),
      },
    };
  }
  if (typeof input.maxOutputTokens === "number") {
    body.max_output_tokens = input.maxOutputTokens;
  }
  if (typeof input.temperature === "number") {
    body.temperature = input.temperature;
  }

  const res = await fetch(`${input.baseUrl}/responses`, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${input.apiKey}`,
    },
    body: JSON.stringify(body),
    signal: input.signal,
  });

  if (!res.ok) {
    const text = await res.text();
    const parsed = ErrorBody.safeParse(safeJson(text));
    const apiError = parsed.success ? parsed.data.error : undefined;
    const errorType = apiError?.type ?? undefined;
    const errorCode = apiError?.code ?? undefined;
    const requestId = res.headers.get("x-request-id") ?? undefined;
    const bodySnippet = (apiError?.message ?? text).slice(0, 500);
    const statusCode = res.status;
    const isInvalidSchema = errorType === "invalid_request_error"
      && errorCode === "invalid_json_schema";
    const retryable = statusCode === 429 || statusCode >= 500;
    input.logger?.error(
      { statusCode, requestId, bodySnippet, errorType, errorCode },
      "openai.request_failed"
    );
    throw new ReasoningProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
      statusCode,
      retryable,
      errorType,
      errorCode,
      retryAfterMs: isInvalidSchema ? undefined : parseRetryAfter(res.headers.get("retry-after")),
    });
  }

  const responseBody = safeJson(await res.text());
  if (responseBody === null) {
    throw new ReasoningProviderError("OpenAI response is not JSON", {
      statusCode: 502,
      retryable: true,
    });
  }

  const data = ResponsesBody.safeParse(responseBody);
  let content: string | undefined;

  if (data.success) {
    for (const item of data.data.output ?? []) {
      for (const part of item.content ?? []) {
        if (typeof part.text === "string") {
          content = part.text;
          break;
        }
      }
      if (content) break;
    }
    if (!content && typeof data.data.output_text === "string") {
      content = data.data.output_text;
    }
  }

  if (!content) {
    throw new ReasoningProviderError("OpenAI response missing content", {
      statusCode: 502,
      retryable: true,
    });
  }

  return { rawText: content };
}
