import type { BudgetConfig, StageName } from "../config/research_config";

export type Clock = () => number;

/**
 * One per session, created when the pipeline starts and handed to every
 * stage. Stages ask it how much time is left; they never measure elapsed time
 * on their own.
 */
export class DeadlineContext {
  readonly startedAtMs: number;
  private readonly now: Clock;

  constructor(
    private readonly budget: BudgetConfig,
    now: Clock = Date.now
  ) {
    this.now = now;
    this.startedAtMs = now();
  }

  get deadlineMs(): number {
    return this.startedAtMs + this.budget.totalBudgetMs;
  }

  remaining(): number {
    return Math.max(0, this.budget.totalBudgetMs - (this.now() - this.startedAtMs));
  }

  expired(): boolean {
    return this.remaining() <= 0;
  }

  /**
   * min(stageNominal, max(stageFloor, remaining - safetyMargin))
   */
  stageAllowance(stage: StageName): number {
    const nominal = this.budget.stageTimeoutsMs[stage];
    const available = this.remaining() - this.budget.safetyMarginMs;
    return Math.min(nominal, Math.max(this.budget.stageFloorMs, available));
  }

  pastDegradationThreshold(): boolean {
    return this.remaining() <= this.budget.degradationThresholdMs;
  }
}
