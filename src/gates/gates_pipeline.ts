import type { GateVerdict } from "../contracts/research";
import type { DraftGate, GateContext } from "./gate_interfaces";

export const NOT_EVALUATED_ISSUE = "not evaluated: synthesis stage timed out";

export function allGatesPassed(verdicts: GateVerdict[]): boolean {
  return verdicts.length > 0 && verdicts.every((verdict) => verdict.passed);
}

export function failingVerdicts(verdicts: GateVerdict[]): GateVerdict[] {
  return verdicts.filter((verdict) => !verdict.passed);
}

/**
 * Run the gate chain
 *
 * Ordering:
 * 1. Quality score
 * 2. Citation consistency
 * 3. Claim verification
 *
 * Every gate runs on every attempt so the regeneration prompt sees all
 * failures at once. When the stage signal fires, the remaining gates are
 * reported as failed and not evaluated.
 */
export async function runGatesPipeline(
  gates: readonly DraftGate[],
  context: GateContext
): Promise<GateVerdict[]> {
  const verdicts: GateVerdict[] = [];

  for (const gate of gates) {
    if (context.signal?.aborted) {
      verdicts.push({ gateName: gate.name, passed: false, score: 0, issues: [NOT_EVALUATED_ISSUE] });
      continue;
    }

    let verdict: GateVerdict;
    try {
      verdict = await gate.evaluate(context);
    } catch (error) {
      if (!context.signal?.aborted) throw error;
      verdict = { gateName: gate.name, passed: false, score: 0, issues: [NOT_EVALUATED_ISSUE] };
    }

    context.log.debug(
      { gateName: verdict.gateName, passed: verdict.passed, score: verdict.score, issues: verdict.issues.length },
      "gates.verdict"
    );
    verdicts.push(verdict);
  }

  return verdicts;
}
