import type { ParallelAnalyzer } from "../analysis/parallel_analyzer";
import { runStage } from "../budget/call_timeout";
import { DeadlineContext, type Clock } from "../budget/deadline_context";
import type { BudgetConfig } from "../config/research_config";
import type { ResearchResult, SessionError } from "../contracts/research";
import { AnalysisExhaustedError, ResearchPipelineError } from "../errors/pipeline_errors";
import type { Logger } from "../logging/logger";
import type { SourceFetcher } from "../sources/source_fetcher";
import type { SessionPatch, SessionStore } from "../store/session_store";
import { buildCitedSources } from "../synthesis/cited_sources";
import { renderEssayMarkdown } from "../synthesis/draft_writer";
import type { Synthesizer } from "../synthesis/synthesizer";

export type ResearchPipelineDeps = {
  fetcher: SourceFetcher;
  analyzer: ParallelAnalyzer;
  synthesizer: Synthesizer;
  store: SessionStore;
  budget: BudgetConfig;
  log: Logger;
  now?: Clock;
};

export function toSessionError(error: unknown): SessionError {
  if (error instanceof ResearchPipelineError) {
    return { code: error.code, message: error.message, details: error.details };
  }
  return {
    code: "internal_error",
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Runs one session through fetch, analysis and synthesis under a single
 * deadline context. The pipeline is the session's only writer; progress is
 * written to the store as it happens so pollers can follow along.
 */
export class ResearchPipeline {
  constructor(private readonly deps: ResearchPipelineDeps) {}

  async run(session: { id: string; query: string }): Promise<ResearchResult> {
    const { fetcher, analyzer, synthesizer, store } = this.deps;
    const log = this.deps.log.child({ sessionId: session.id });
    const deadline = new DeadlineContext(this.deps.budget, this.deps.now);
    const query = session.query;

    let pendingWrites: Promise<unknown> = Promise.resolve();
    const enqueue = (patch: SessionPatch) => {
      pendingWrites = pendingWrites
        .then(() => store.updateSession(session.id, patch))
        .catch((error: unknown) => {
          log.warn({ error: error instanceof Error ? error.message : String(error) }, "pipeline.progress_write_failed");
        });
    };
    const write = async (patch: SessionPatch) => {
      enqueue(patch);
      await pendingWrites;
    };

    try {
      await write({
        status: "fetching",
        stage: "fetch",
        deadline: new Date(deadline.deadlineMs).toISOString(),
      });
      const fetched = await runStage("fetch", deadline, (signal) => fetcher.fetch(query, signal));

      await write({
        status: "analyzing",
        stage: "analysis",
        provenance: fetched.provenance,
        progress: { sourcesFetched: fetched.fetchedCount, sourcesValidated: fetched.sources.length },
      });
      const analysis = await runStage("analysis", deadline, (signal) =>
        analyzer.analyzeAll(query, fetched.sources, {
          signal,
          onProgress: ({ analyzed, failed }) =>
            enqueue({ progress: { sourcesAnalyzed: analyzed, analysisFailures: failed } }),
        })
      );
      await pendingWrites;

      if (analysis.results.length === 0) {
        throw new AnalysisExhaustedError({
          attempted: fetched.sources.length,
          failures: analysis.failures.length,
          timedOut: analysis.timedOut,
        });
      }

      await write({
        status: "synthesizing",
        stage: "synthesis",
        progress: { sourcesAnalyzed: analysis.results.length, analysisFailures: analysis.failures.length },
      });
      const cited = buildCitedSources(fetched.sources, analysis.results);
      const outcome = await runStage("synthesis", deadline, (signal, allowanceMs) =>
        synthesizer.synthesize({
          query,
          cited,
          deadline,
          signal,
          allowanceMs,
          onStateChange: (state, attempt, draft) =>
            enqueue({
              stage: `synthesis:${state.toLowerCase()}`,
              progress: { draftAttempts: attempt, wordCount: draft?.wordCount ?? 0 },
            }),
        })
      );
      await pendingWrites;

      const warnings = [
        ...fetched.failures.map((failure) => `source provider ${failure.provider} failed: ${failure.message}`),
        ...(analysis.failures.length
          ? [`${analysis.failures.length} of ${fetched.sources.length} sources failed analysis`]
          : []),
        ...(analysis.timedOut
          ? [`analysis stage timed out; ${analysis.abandoned.length} sources were not analyzed`]
          : []),
        ...outcome.warnings,
      ];

      const result: ResearchResult = {
        query,
        provenance: fetched.provenance,
        draft: outcome.draft,
        essayMarkdown: renderEssayMarkdown(query, outcome.draft),
        degraded: outcome.degraded,
        finalState: outcome.finalState,
        attempts: outcome.attempts,
        verdicts: outcome.verdicts,
        warnings,
        sourceCount: fetched.sources.length,
        analysisCount: analysis.results.length,
        sufficiency: fetched.sufficiency,
      };

      await write({
        status: "completed",
        stage: "completed",
        result,
        progress: { draftAttempts: outcome.attempts, wordCount: outcome.draft.wordCount },
      });
      log.info(
        {
          provenance: result.provenance,
          degraded: result.degraded,
          attempts: result.attempts,
          remainingMs: deadline.remaining(),
        },
        "pipeline.completed"
      );
      return result;
    } catch (error) {
      const sessionError = toSessionError(error);
      log.error({ code: sessionError.code, error: sessionError.message }, "pipeline.failed");
      await write({ status: "failed", stage: "failed", error: sessionError });
      throw error;
    }
  }
}
