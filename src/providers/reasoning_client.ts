import type { z } from "zod";

import { withCallTimeout } from "../budget/call_timeout";
import { withRetry } from "../budget/retry";
import type { Logger } from "../logging/logger";
import { openAIResponse, type JsonSchema } from "./openai_model";

export type ReasoningTask =
  | "source_analysis"
  | "draft_introduction"
  | "draft_body"
  | "draft_conclusion"
  | "claim_verification";

export type ReasoningRequest = {
  task: ReasoningTask;
  prompt: string;
  structured?: { name: string; schema: JsonSchema };
  signal?: AbortSignal;
};

export interface ReasoningClient {
  complete(request: ReasoningRequest): Promise<string>;
}

/**
 * The model answered, but not in the shape we asked for. Retryable: the next
 * sample usually conforms.
 */
export class MalformedResponseError extends Error {
  readonly retryable = true;

  constructor(
    readonly task: ReasoningTask,
    readonly reason: string
  ) {
    super(`Malformed ${task} response: ${reason}`);
    this.name = "MalformedResponseError";
  }
}

export class OpenAIReasoningClient implements ReasoningClient {
  constructor(
    private readonly options: {
      apiKey?: string;
      baseUrl: string;
      model: string;
      log?: Logger;
    }
  ) {}

  async complete(request: ReasoningRequest): Promise<string> {
    const { rawText } = await openAIResponse({
      apiKey: this.options.apiKey,
      baseUrl: this.options.baseUrl,
      model: this.options.model,
      promptText: request.prompt,
      structured: request.structured,
      signal: request.signal,
      logger: this.options.log,
    });
    return rawText;
  }
}

export type CallPolicy = {
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
};

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

export function parseJsonPayload<T>(
  task: ReasoningTask,
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const trimmed = raw.trim();
  const unfenced = FENCE.exec(trimmed)?.[1] ?? trimmed;
  let json: unknown;
  try {
    json = JSON.parse(unfenced);
  } catch (error) {
    throw new MalformedResponseError(task, error instanceof Error ? error.message : "invalid JSON");
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new MalformedResponseError(
      task,
      first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "schema mismatch"
    );
  }
  return parsed.data;
}

/**
 * One logical reasoning call: bounded per attempt, retried with backoff on
 * timeouts, rate limits and malformed output. `parse` runs inside the retried
 * attempt so a non-conforming answer costs one attempt, not the pipeline.
 */
export async function callReasoning<T>(args: {
  client: ReasoningClient;
  request: Omit<ReasoningRequest, "signal">;
  parse: (raw: string) => T;
  policy: CallPolicy;
  label: string;
  signal?: AbortSignal;
  log?: Logger;
}): Promise<T> {
  return withRetry(
    async () => {
      const raw = await withCallTimeout(
        args.label,
        args.policy.timeoutMs,
        (signal) => args.client.complete({ ...args.request, signal }),
        args.signal
      );
      return args.parse(raw);
    },
    {
      maxAttempts: args.policy.maxAttempts,
      baseDelayMs: args.policy.baseDelayMs,
      signal: args.signal,
      onRetry: ({ attempt, delayMs, error }) => {
        args.log?.warn(
          {
            label: args.label,
            task: args.request.task,
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          },
          "reasoning.retry"
        );
      },
    }
  );
}

export function requireText(task: ReasoningTask, raw: string): string {
  const text = raw.trim();
  if (!text) {
    throw new MalformedResponseError(task, "empty text");
  }
  return text;
}
