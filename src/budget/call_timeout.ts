import type { StageName } from "../config/research_config";
import { StageTimeoutError } from "../errors/pipeline_errors";
import type { DeadlineContext } from "./deadline_context";

export class CallTimeoutError extends Error {
  readonly retryable = true;

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

/**
 * The enclosing stage ran out of time while this call was in flight.
 */
export class CallAbortedError extends Error {
  readonly retryable = false;

  constructor(readonly label: string) {
    super(`${label} abandoned: stage deadline reached`);
    this.name = "CallAbortedError";
  }
}

/**
 * Runs one external call with its own timeout, linked to the stage signal.
 * Rejects as soon as either fires, even if `run` ignores its signal.
 */
export async function withCallTimeout<T>(
  label: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new CallAbortedError(label);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new CallTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    timer.unref();

    if (parent) {
      onParentAbort = () => {
        const error = new CallAbortedError(label);
        controller.abort(error);
        reject(error);
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([run(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener("abort", onParentAbort);
    }
  }
}

/**
 * Gives a stage its allowance from the deadline context and a signal that
 * aborts when the allowance elapses. The stage decides what a timeout means
 * for it (fall back, keep partial results, degrade).
 */
export async function runStage<T>(
  stage: StageName,
  deadline: DeadlineContext,
  run: (signal: AbortSignal, allowanceMs: number) => Promise<T>
): Promise<T> {
  const allowanceMs = deadline.stageAllowance(stage);
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new StageTimeoutError(stage, allowanceMs));
  }, allowanceMs);
  timer.unref();

  try {
    return await run(controller.signal, allowanceMs);
  } finally {
    clearTimeout(timer);
  }
}
