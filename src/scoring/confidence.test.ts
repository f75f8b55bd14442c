import { describe, it, expect } from "vitest";
import { calculateConfidence, normalizeExtractedTask } from "./confidence.js";
import type { RawTask } from "../types/pipeline.js";

function makeTask(overrides: Partial<RawTask>): RawTask {
  return {
    task_description: "Send the signed contract",
    assignee: "Priya",
    deadline: "2024-05-01",
    priority: "medium",
    confidence_score: 0.9,
    reasoning: "Explicit request",
    ...overrides,
  };
}

describe("calculateConfidence", () => {
  it("keeps the base confidence when no rule fires", () => {
    const metrics = calculateConfidence(makeTask({ confidence_score: 0.83 }));
    expect(metrics.final_confidence).toBe(0.83);
    expect(metrics.penalty_total).toBe(0);
    expect(metrics.adjustments).toEqual([]);
    expect(metrics.needs_review).toBe(false);
  });

  it("applies deadline and assignee penalties in rule order", () => {
    const metrics = calculateConfidence(
      makeTask({ deadline: null, assignee: "unspecified", confidence_score: 0.9 })
    );
    expect(metrics.penalty_total).toBeCloseTo(0.35, 10);
    expect(metrics.final_confidence).toBeCloseTo(0.55, 10);
    expect(metrics.adjustments).toEqual([
      "No deadline specified (-0.15)",
      "Assignee not specified (-0.20)",
    ]);
    expect(metrics.needs_review).toBe(true);
  });

  it("matches the assignee sentinel case-sensitively", () => {
    const metrics = calculateConfidence(makeTask({ assignee: "Unspecified" }));
    expect(metrics.adjustments).toEqual([]);
  });

  it("applies the vague language penalty once for several hedge words", () => {
    const metrics = calculateConfidence(
      makeTask({ task_description: "Maybe consider possibly updating the wiki" })
    );
    expect(metrics.penalty_total).toBeCloseTo(0.1, 10);
    expect(metrics.adjustments).toEqual(["Vague language detected (-0.10)"]);
  });

  it("matches hedge words as substrings", () => {
    const metrics = calculateConfidence(
      makeTask({ task_description: "Report the considerable budget overrun" })
    );
    expect(metrics.adjustments).toEqual(["Vague language detected (-0.10)"]);
  });

  it("fires all three rules together", () => {
    const metrics = calculateConfidence(
      makeTask({
        task_description: "Think about a team offsite",
        assignee: "unspecified",
        deadline: null,
        confidence_score: 0.5,
      })
    );
    expect(metrics.adjustments).toHaveLength(3);
    expect(metrics.penalty_total).toBeCloseTo(0.45, 10);
    expect(metrics.final_confidence).toBeCloseTo(0.05, 10);
  });

  it("clamps the final confidence at zero", () => {
    const metrics = calculateConfidence(
      makeTask({ deadline: null, assignee: "unspecified", confidence_score: 0.2 })
    );
    expect(metrics.final_confidence).toBe(0);
  });

  it("clamps out-of-range base confidence", () => {
    expect(calculateConfidence(makeTask({ confidence_score: 1.7 })).final_confidence).toBe(1);
    expect(calculateConfidence(makeTask({ confidence_score: -3 })).final_confidence).toBe(0);
  });

  it("flags needs_review strictly below 0.7", () => {
    expect(calculateConfidence(makeTask({ confidence_score: 0.7 })).needs_review).toBe(false);
    expect(calculateConfidence(makeTask({ confidence_score: 0.69 })).needs_review).toBe(true);
  });
});

describe("normalizeExtractedTask", () => {
  it("turns absent, null and blank assignees into the sentinel", () => {
    expect(normalizeExtractedTask({ task_description: "a" }).assignee).toBe("unspecified");
    expect(normalizeExtractedTask({ task_description: "a", assignee: null }).assignee).toBe("unspecified");
    expect(normalizeExtractedTask({ task_description: "a", assignee: "  " }).assignee).toBe("unspecified");
    expect(normalizeExtractedTask({ task_description: "a", assignee: " Ana " }).assignee).toBe("Ana");
  });

  it("treats blank deadlines as missing", () => {
    expect(normalizeExtractedTask({ task_description: "a", deadline: "" }).deadline).toBeNull();
    expect(normalizeExtractedTask({ task_description: "a", deadline: "2024-04-05" }).deadline).toBe("2024-04-05");
  });

  it("defaults unknown priorities to medium and lower-cases known ones", () => {
    expect(normalizeExtractedTask({ task_description: "a", priority: "urgent" }).priority).toBe("medium");
    expect(normalizeExtractedTask({ task_description: "a", priority: "HIGH" }).priority).toBe("high");
    expect(normalizeExtractedTask({ task_description: "a" }).priority).toBe("medium");
  });

  it("clamps confidence and defaults missing values to zero", () => {
    expect(normalizeExtractedTask({ task_description: "a", confidence_score: 1.4 }).confidence_score).toBe(1);
    expect(normalizeExtractedTask({ task_description: "a", confidence_score: -0.2 }).confidence_score).toBe(0);
    expect(normalizeExtractedTask({ task_description: "a", confidence_score: null }).confidence_score).toBe(0);
    expect(normalizeExtractedTask({ task_description: "a" }).reasoning).toBe("");
  });

  it("replaces fields of the wrong type with their defaults", () => {
    expect(
      normalizeExtractedTask({
        task_description: "Archive old tickets",
        assignee: 42,
        deadline: { day: 3 },
        priority: ["high"],
        confidence_score: "0.8",
        reasoning: false,
      })
    ).toEqual({
      task_description: "Archive old tickets",
      assignee: "unspecified",
      deadline: null,
      priority: "medium",
      confidence_score: 0,
      reasoning: "",
    });
  });

  it("gives an absent assignee the assignee penalty", () => {
    const metrics = calculateConfidence(
      normalizeExtractedTask({ task_description: "Ship it", deadline: "2024-01-02", confidence_score: 0.9 })
    );
    expect(metrics.adjustments).toEqual(["Assignee not specified (-0.20)"]);
  });
});
