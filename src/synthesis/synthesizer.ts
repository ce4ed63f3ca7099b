import type { DeadlineContext } from "../budget/deadline_context";
import type { SynthesisConfig } from "../config/research_config";
import type { Draft, GateVerdict, SynthesisState } from "../contracts/research";
import { StageTimeoutError } from "../errors/pipeline_errors";
import type { DraftGate } from "../gates/gate_interfaces";
import { allGatesPassed, failingVerdicts, runGatesPipeline } from "../gates/gates_pipeline";
import type { Logger } from "../logging/logger";
import type { ReasoningClient } from "../providers/reasoning_client";
import type { CitedSource } from "./cited_sources";
import { writeDraft } from "./draft_writer";

export type StateTransition = {
  from: SynthesisState;
  to: SynthesisState;
  attempt: number;
  remainingMs: number;
};

export type SynthesisOutcome = {
  draft: Draft;
  finalState: "ACCEPTED" | "DEGRADED_ACCEPT";
  degraded: boolean;
  attempts: number;
  verdicts: GateVerdict[];
  warnings: string[];
  transitions: StateTransition[];
};

export type SynthesisInput = {
  query: string;
  cited: CitedSource[];
  deadline: DeadlineContext;
  signal?: AbortSignal;
  allowanceMs?: number;
  onStateChange?: (state: SynthesisState, attempt: number, draft: Draft | null) => void;
};

type Candidate = {
  draft: Draft;
  verdicts: GateVerdict[];
};

function verdictWarnings(verdicts: GateVerdict[]): string[] {
  return failingVerdicts(verdicts).flatMap((verdict) =>
    verdict.issues.length
      ? verdict.issues.map((issue) => `${verdict.gateName}: ${issue}`)
      : [`${verdict.gateName}: failed`]
  );
}

/**
 * DRAFTING -> GATE_CHECKING -> (ACCEPTED | REGENERATING | DEGRADED_ACCEPT)
 * REGENERATING -> DRAFTING
 *
 * The loop is bounded by maxRegenerations + 1 drafts. Once a draft exists the
 * caller always gets one back; only a drafting failure with nothing to fall
 * back on is raised.
 */
export class Synthesizer {
  constructor(
    private readonly options: {
      client: ReasoningClient;
      gates: readonly DraftGate[];
      config: SynthesisConfig;
      log: Logger;
    }
  ) {}

  get maxAttempts(): number {
    return this.options.config.maxRegenerations + 1;
  }

  async synthesize(input: SynthesisInput): Promise<SynthesisOutcome> {
    const { client, gates, config, log } = this.options;
    const { deadline, signal } = input;
    const maxAttempts = this.maxAttempts;

    const transitions: StateTransition[] = [];
    let state: SynthesisState = "DRAFTING";
    let attempt = 1;
    let draft: Draft | null = null;
    let latest: Candidate | null = null;
    let feedback: string[] = [];
    let degradeReason = "";

    const transition = (from: SynthesisState, to: SynthesisState): SynthesisState => {
      const entry = { from, to, attempt, remainingMs: deadline.remaining() };
      transitions.push(entry);
      log.debug(entry, "synthesis.transition");
      input.onStateChange?.(to, attempt, draft);
      return to;
    };

    input.onStateChange?.(state, attempt, null);

    while (state !== "ACCEPTED" && state !== "DEGRADED_ACCEPT") {
      switch (state) {
        case "DRAFTING": {
          try {
            draft = await writeDraft({
              client,
              request: { query: input.query, cited: input.cited, attempt, feedback, targetWords: config.targetWords },
              policy: {
                timeoutMs: config.callTimeoutMs,
                maxAttempts: config.maxAttempts,
                baseDelayMs: config.baseDelayMs,
              },
              signal,
              log,
            });
            state = transition(state, "GATE_CHECKING");
          } catch (error) {
            const timedOut = Boolean(signal?.aborted);
            if (!latest) {
              if (timedOut) throw new StageTimeoutError("synthesis", input.allowanceMs ?? 0);
              throw error;
            }
            draft = latest.draft;
            degradeReason = timedOut
              ? "synthesis stage timed out during regeneration; returning the previous draft"
              : `regeneration failed (${error instanceof Error ? error.message : String(error)}); returning the previous draft`;
            state = transition(state, "DEGRADED_ACCEPT");
          }
          break;
        }

        case "GATE_CHECKING": {
          if (!draft) throw new Error("gate check without a draft");
          const verdicts = await runGatesPipeline(gates, { draft, cited: input.cited, signal, log });
          latest = { draft, verdicts };

          if (allGatesPassed(verdicts)) {
            state = transition(state, "ACCEPTED");
          } else if (signal?.aborted) {
            degradeReason = "synthesis stage timed out during gate checks";
            state = transition(state, "DEGRADED_ACCEPT");
          } else if (attempt >= maxAttempts) {
            degradeReason = `regeneration attempts exhausted (${attempt} of ${maxAttempts} drafts)`;
            state = transition(state, "DEGRADED_ACCEPT");
          } else if (deadline.pastDegradationThreshold()) {
            degradeReason = `time budget past degradation threshold (${deadline.remaining()}ms remaining)`;
            state = transition(state, "DEGRADED_ACCEPT");
          } else {
            state = transition(state, "REGENERATING");
          }
          break;
        }

        case "REGENERATING": {
          feedback = latest ? verdictWarnings(latest.verdicts) : [];
          attempt += 1;
          state = transition(state, "DRAFTING");
          break;
        }
      }
    }

    if (!latest) {
      throw new Error("synthesis finished without a draft");
    }

    const accepted = state === "ACCEPTED";
    const warnings = accepted ? [] : [degradeReason, ...verdictWarnings(latest.verdicts)];
    log.info(
      { finalState: state, attempts: attempt, degraded: !accepted, wordCount: latest.draft.wordCount },
      "synthesis.completed"
    );

    return {
      draft: latest.draft,
      finalState: accepted ? "ACCEPTED" : "DEGRADED_ACCEPT",
      degraded: !accepted,
      attempts: attempt,
      verdicts: latest.verdicts,
      warnings,
      transitions,
    };
  }
}
