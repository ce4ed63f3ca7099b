import type { Draft, GateName, GateVerdict } from "../contracts/research";
import type { Logger } from "../logging/logger";
import type { CitedSource } from "../synthesis/cited_sources";

export const GATE_QUALITY_SCORE = "quality_score" as const;
export const GATE_CITATION_CONSISTENCY = "citation_consistency" as const;
export const GATE_CLAIM_VERIFICATION = "claim_verification" as const;

export type GateContext = {
  draft: Draft;
  cited: CitedSource[];
  signal?: AbortSignal;
  log: Logger;
};

export interface DraftGate {
  readonly name: GateName;
  evaluate(context: GateContext): Promise<GateVerdict>;
}

export function draftText(draft: Draft): string {
  return [draft.introduction, draft.body, draft.conclusion].join("\n\n");
}
