import pLimit from "p-limit";

import type { AnalyzerConfig } from "../config/research_config";
import type { AnalysisResult, SourceRecord } from "../contracts/research";
import type { Logger } from "../logging/logger";
import type { ReasoningClient } from "../providers/reasoning_client";
import { analyzeSource } from "./source_analyst";

export type AnalysisFailure = {
  sourceRef: string;
  title: string;
  error: string;
};

export type AnalysisReport = {
  results: AnalysisResult[];
  failures: AnalysisFailure[];
  abandoned: string[];
  batchCount: number;
  timedOut: boolean;
};

export type AnalysisProgress = {
  analyzed: number;
  failed: number;
  total: number;
};

export function partitionIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  const size = Math.max(1, Math.floor(batchSize));
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function settledOrAborted(work: Promise<unknown>, signal?: AbortSignal): Promise<boolean> {
  if (!signal) return work.then(() => false);
  if (signal.aborted) return Promise.resolve(true);

  return new Promise<boolean>((resolve, reject) => {
    const onAbort = () => resolve(true);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve(false);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Fans source analysis out over fixed-size batches, one worker per batch,
 * with at most `maxWorkers` batches in flight. A source that exhausts its
 * retries is recorded as a failure; its batch carries on.
 */
export class ParallelAnalyzer {
  constructor(
    private readonly options: {
      client: ReasoningClient;
      config: AnalyzerConfig;
      log: Logger;
    }
  ) {}

  async analyzeAll(
    query: string,
    sources: SourceRecord[],
    opts: { signal?: AbortSignal; onProgress?: (progress: AnalysisProgress) => void } = {}
  ): Promise<AnalysisReport> {
    const { config, log } = this.options;
    const { signal, onProgress } = opts;
    const batches = partitionIntoBatches(sources, config.batchSize);
    const limit = pLimit(config.maxWorkers);
    const completed = new Map<string, AnalysisResult>();
    const failures: AnalysisFailure[] = [];

    const report = () =>
      onProgress?.({ analyzed: completed.size, failed: failures.length, total: sources.length });

    const runBatch = async (batch: SourceRecord[], batchIndex: number) => {
      log.debug({ batchIndex, size: batch.length }, "analysis.batch_started");
      for (const source of batch) {
        if (signal?.aborted) return;
        try {
          const result = await analyzeSource({
            client: this.options.client,
            query,
            source,
            policy: {
              timeoutMs: config.callTimeoutMs,
              maxAttempts: config.maxAttempts,
              baseDelayMs: config.baseDelayMs,
            },
            signal,
            log,
          });
          if (signal?.aborted) return;
          completed.set(source.id, result);
        } catch (error) {
          if (signal?.aborted) return;
          const message = error instanceof Error ? error.message : String(error);
          failures.push({ sourceRef: source.id, title: source.title, error: message });
          log.warn({ sourceRef: source.id, batchIndex, error: message }, "analysis.source_failed");
        }
        report();
      }
    };

    const work = Promise.all(batches.map((batch, index) => limit(() => runBatch(batch, index))));
    const timedOut = await settledOrAborted(work, signal);
    if (timedOut) {
      limit.clearQueue();
    }

    const failedRefs = new Set(failures.map((failure) => failure.sourceRef));
    const results = sources.flatMap((source) => {
      const result = completed.get(source.id);
      return result ? [result] : [];
    });
    const abandoned = sources
      .filter((source) => !completed.has(source.id) && !failedRefs.has(source.id))
      .map((source) => source.id);

    log.info(
      {
        total: sources.length,
        analyzed: results.length,
        failed: failures.length,
        abandoned: abandoned.length,
        batches: batches.length,
        timedOut,
      },
      "analysis.completed"
    );

    return {
      results,
      failures: [...failures],
      abandoned,
      batchCount: batches.length,
      timedOut,
    };
  }
}
