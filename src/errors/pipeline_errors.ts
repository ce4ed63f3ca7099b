import type { StageName } from "../config/research_config";
import type { SufficiencyReport } from "../contracts/research";

export type PipelineErrorCode =
  | "provider_unavailable"
  | "insufficient_sources"
  | "analysis_exhausted"
  | "drafting_exhausted"
  | "stage_timeout";

export abstract class ResearchPipelineError extends Error {
  public abstract readonly code: PipelineErrorCode;
  public readonly details: Record<string, unknown>;

  protected constructor(message: string, details: Record<string, unknown>) {
    super(message);
    this.details = details;
  }

  toJSON() {
    return {
      error: "research_failed",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type ProviderFailure = {
  provider: string;
  message: string;
};

/**
 * Every provider strategy failed. Carries each provider's message verbatim so
 * the caller can tell an auth problem from a quota problem.
 */
export class ProviderUnavailableError extends ResearchPipelineError {
  public readonly code = "provider_unavailable";
  public readonly failures: ProviderFailure[];

  constructor(failures: ProviderFailure[]) {
    const summary = failures.length
      ? failures.map((f) => `${f.provider}: ${f.message}`).join("; ")
      : "no source providers configured";
    super(`All source providers failed. ${summary}`, { failures });
    this.name = "ProviderUnavailableError";
    this.failures = failures;
  }
}

export class InsufficientSourcesError extends ResearchPipelineError {
  public readonly code = "insufficient_sources";
  public readonly report: SufficiencyReport;

  constructor(report: SufficiencyReport, provider: string) {
    super(
      `Insufficient sources from ${provider}: ${report.issues.join("; ")}`,
      { provider, ...report }
    );
    this.name = "InsufficientSourcesError";
    this.report = report;
  }
}

export class AnalysisExhaustedError extends ResearchPipelineError {
  public readonly code = "analysis_exhausted";

  constructor(args: { attempted: number; failures: number; timedOut: boolean }) {
    super(
      `No source analysis succeeded (${args.failures} of ${args.attempted} failed${
        args.timedOut ? ", stage timed out" : ""
      })`,
      args
    );
    this.name = "AnalysisExhaustedError";
  }
}

export class DraftingExhaustedError extends ResearchPipelineError {
  public readonly code = "drafting_exhausted";

  constructor(args: { section: string; attempt: number; cause: string }) {
    super(`Drafting the ${args.section} failed on attempt ${args.attempt}: ${args.cause}`, args);
    this.name = "DraftingExhaustedError";
  }
}

export class StageTimeoutError extends ResearchPipelineError {
  public readonly code = "stage_timeout";
  public readonly stage: StageName;

  constructor(stage: StageName, allowanceMs: number) {
    super(`Stage ${stage} exceeded its ${allowanceMs}ms allowance`, { stage, allowanceMs });
    this.name = "StageTimeoutError";
    this.stage = stage;
  }
}
