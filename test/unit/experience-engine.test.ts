import { describe, it, expect } from "vitest";
import { ExperienceEngine, inferOutcome } from "../../src/experience/engine.js";
import { counterIds } from "../helpers/fixtures.js";

describe("inferOutcome", () => {
  it("treats a failed responder as failure above everything else", () => {
    expect(inferOutcome({ responderFailed: true, hint: "joy", sentiment: 1 })).toBe("failure");
  });

  it("prefers the responder's hint", () => {
    expect(inferOutcome({ responderFailed: false, hint: "success", sentiment: -1 })).toBe("success");
  });

  it("counts a rejected reply as friction", () => {
    expect(inferOutcome({ responderFailed: false, filterAction: "reject", sentiment: 0.9 })).toBe("friction");
  });

  it.each([
    [0.6, "joy"],
    [0.2, "success"],
    [0, "neutral"],
    [-0.2, "neutral"],
    [-0.7, "friction"],
  ] as const)("maps sentiment %s to %s", (sentiment, outcome) => {
    expect(inferOutcome({ responderFailed: false, sentiment })).toBe(outcome);
  });
});

describe("ExperienceEngine", () => {
  it("appends frozen records", () => {
    const engine = new ExperienceEngine({ ids: counterIds("exp"), clock: () => 42 });
    const rec = engine.record("turn-1", "joy", "they laughed", ["jokes"]);

    expect(rec).toEqual({
      id: "exp-1",
      interactionId: "turn-1",
      outcome: "joy",
      evidence: "they laughed",
      tags: ["jokes"],
      timestamp: 42,
    });
    expect(Object.isFrozen(rec)).toBe(true);
    expect(engine.get("exp-1")).toBe(rec);
    expect(engine.size).toBe(1);
  });

  it("computes frequencies over the inspected window", () => {
    const engine = new ExperienceEngine({ ids: counterIds() });
    engine.record("a", "success", "");
    engine.record("b", "friction", "");
    engine.record("c", "friction", "");
    engine.record("d", "joy", "");

    const trend = engine.recentTrend(3);

    expect(trend.window).toBe(3);
    expect(trend.counts).toEqual({ success: 0, failure: 0, friction: 2, joy: 1, neutral: 0 });
    expect(trend.frequencies.friction).toBeCloseTo(2 / 3);
    expect(trend.dominant).toBe("friction");
  });

  it("reports an empty trend", () => {
    const trend = new ExperienceEngine().recentTrend(5);
    expect(trend.window).toBe(0);
    expect(trend.dominant).toBeNull();
    expect(trend.frequencies.success).toBe(0);
  });

  it("breaks dominance ties in outcome order", () => {
    const engine = new ExperienceEngine({ ids: counterIds() });
    engine.record("a", "joy", "");
    engine.record("b", "success", "");
    expect(engine.recentTrend(10).dominant).toBe("success");
  });
});
