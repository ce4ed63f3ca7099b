import { describe, it, expect } from "vitest";
import { DeadlineContext } from "../src/budget/deadline_context";
import type { BudgetConfig } from "../src/config/research_config";

const budget: BudgetConfig = {
  totalBudgetMs: 600_000,
  safetyMarginMs: 10_000,
  degradationThresholdMs: 90_000,
  stageFloorMs: 5_000,
  stageTimeoutsMs: { fetch: 60_000, analysis: 240_000, synthesis: 240_000 },
};

function manualClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("DeadlineContext", () => {
  it("reports the full budget at start", () => {
    const clock = manualClock();
    const deadline = new DeadlineContext(budget, clock.now);

    expect(deadline.remaining()).toBe(600_000);
    expect(deadline.expired()).toBe(false);
    expect(deadline.deadlineMs).toBe(1_600_000);
  });

  it("gives each stage its nominal timeout while time is plentiful", () => {
    const deadline = new DeadlineContext(budget, manualClock().now);

    expect(deadline.stageAllowance("fetch")).toBe(60_000);
    expect(deadline.stageAllowance("analysis")).toBe(240_000);
  });

  it("shrinks the allowance to the remaining time minus the safety margin", () => {
    const clock = manualClock();
    const deadline = new DeadlineContext(budget, clock.now);
    clock.advance(450_000);

    expect(deadline.remaining()).toBe(150_000);
    expect(deadline.stageAllowance("synthesis")).toBe(140_000);
  });

  it("never goes below the stage floor", () => {
    const clock = manualClock();
    const deadline = new DeadlineContext(budget, clock.now);
    clock.advance(598_000);

    expect(deadline.stageAllowance("synthesis")).toBe(5_000);
  });

  it("clamps remaining at zero and reports expiry", () => {
    const clock = manualClock();
    const deadline = new DeadlineContext(budget, clock.now);
    clock.advance(700_000);

    expect(deadline.remaining()).toBe(0);
    expect(deadline.expired()).toBe(true);
  });

  it("flags the degradation threshold once remaining time drops to it", () => {
    const clock = manualClock();
    const deadline = new DeadlineContext(budget, clock.now);
    clock.advance(509_999);
    expect(deadline.pastDegradationThreshold()).toBe(false);

    clock.advance(1);
    expect(deadline.remaining()).toBe(90_000);
    expect(deadline.pastDegradationThreshold()).toBe(true);
  });
});
