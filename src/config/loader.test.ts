import { describe, it, expect } from "vitest";
import {
  loadPrompt,
  loadReviewThresholds,
  validateExtraction,
  validateReviewThresholds,
} from "./loader.js";

describe("loadReviewThresholds", () => {
  it("loads the shipped defaults", () => {
    expect(loadReviewThresholds()).toEqual({ autoApproveThreshold: 0.7, highPriorityThreshold: 0.5 });
  });
});

describe("validateReviewThresholds", () => {
  it("rejects values outside [0, 1]", () => {
    expect(() => validateReviewThresholds({ autoApproveThreshold: 1.5, highPriorityThreshold: 0.5 })).toThrow(
      "Config validation failed for review_thresholds.json: /autoApproveThreshold must be <= 1"
    );
  });

  it("rejects missing and non-numeric thresholds", () => {
    expect(() => validateReviewThresholds({ autoApproveThreshold: 0.7 })).toThrow(
      "/ must have required property 'highPriorityThreshold'"
    );
    expect(() => validateReviewThresholds({ autoApproveThreshold: "high", highPriorityThreshold: 0.5 })).toThrow(
      "/autoApproveThreshold must be number"
    );
  });

  it("rejects inverted thresholds", () => {
    expect(() => validateReviewThresholds({ autoApproveThreshold: 0.4, highPriorityThreshold: 0.6 })).toThrow(
      "highPriorityThreshold must not exceed autoApproveThreshold"
    );
  });
});

describe("loadPrompt", () => {
  it("loads the extractor template with its placeholders", () => {
    const template = loadPrompt("task_extractor.md");
    expect(template).toContain("{{sender_context}}");
    expect(template).toContain("{{email_content}}");
  });
});

describe("validateExtraction", () => {
  it("accepts a minimal envelope and fills defaults", () => {
    const result = validateExtraction({ tasks: [{ task_description: "Call the vendor" }] });
    expect(result).toEqual({
      ok: true,
      value: {
        tasks: [{ task_description: "Call the vendor" }],
        overall_confidence: 0,
        ambiguities: [],
      },
    });
  });

  it("keeps out-of-range confidence for the scorer to clamp", () => {
    const result = validateExtraction({
      tasks: [{ task_description: "Call the vendor", confidence_score: 4, deadline: null }],
      overall_confidence: 0.6,
      ambiguities: ["Which vendor?"],
    });
    expect(result.ok).toBe(true);
  });

  it("rejects a missing task list", () => {
    const result = validateExtraction({ overall_confidence: 0.5 });
    expect(result).toEqual({
      ok: false,
      error: "Extraction validation failed: / must have required property 'tasks'",
    });
  });

  it("rejects tasks without a description", () => {
    const result = validateExtraction({ tasks: [{ assignee: "Kim" }] });
    expect(result).toEqual({
      ok: false,
      error: "Extraction validation failed: /tasks/0 must have required property 'task_description'",
    });
  });
});
