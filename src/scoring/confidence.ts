import type {
  ConfidenceMetrics,
  ExtractedTask,
  RawTask,
  TaskPriority,
} from "../types/pipeline.js";

export const UNSPECIFIED_ASSIGNEE = "unspecified";

/** Below this final confidence a task is flagged as needing review. */
export const NEEDS_REVIEW_BELOW = 0.7;

const MISSING_DEADLINE_PENALTY = 0.15;
const UNSPECIFIED_ASSIGNEE_PENALTY = 0.2;
const VAGUE_LANGUAGE_PENALTY = 0.1;

/** Hedge words matched as substrings of the lower-cased description. */
export const VAGUE_WORDS = ["maybe", "might", "possibly", "consider", "think about"] as const;

const PRIORITIES: readonly TaskPriority[] = ["high", "medium", "low"];

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function isPriority(value: string): value is TaskPriority {
  return PRIORITIES.some((p) => p === value);
}

function trimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Normalize a task record from the extractor. Never throws: a missing, blank or
 * non-string assignee becomes "unspecified", deadline likewise becomes null,
 * unknown priority becomes "medium", and confidence is clamped to [0, 1]
 * (anything but a finite number → 0).
 */
export function normalizeExtractedTask(task: ExtractedTask): RawTask {
  const priority = trimmedString(task.priority).toLowerCase();
  const score = task.confidence_score;
  return {
    task_description: task.task_description,
    assignee: trimmedString(task.assignee) || UNSPECIFIED_ASSIGNEE,
    deadline: trimmedString(task.deadline) || null,
    priority: isPriority(priority) ? priority : "medium",
    confidence_score: typeof score === "number" && Number.isFinite(score) ? clamp(score, 0, 1) : 0,
    reasoning: typeof task.reasoning === "string" ? task.reasoning : "",
  };
}

/**
 * Apply rule-based penalties to the extractor's confidence.
 * Rules fire independently, in order: missing deadline, unspecified assignee, vague language.
 */
export function calculateConfidence(task: RawTask): ConfidenceMetrics {
  const base = clamp(task.confidence_score, 0, 1);
  let penalties = 0;
  const adjustments: string[] = [];

  if (task.deadline === null) {
    penalties += MISSING_DEADLINE_PENALTY;
    adjustments.push("No deadline specified (-0.15)");
  }

  if (task.assignee === UNSPECIFIED_ASSIGNEE) {
    penalties += UNSPECIFIED_ASSIGNEE_PENALTY;
    adjustments.push("Assignee not specified (-0.20)");
  }

  const description = task.task_description.toLowerCase();
  if (VAGUE_WORDS.some((word) => description.includes(word))) {
    penalties += VAGUE_LANGUAGE_PENALTY;
    adjustments.push("Vague language detected (-0.10)");
  }

  const finalConfidence = clamp(base - penalties, 0, 1);
  return {
    base_confidence: base,
    penalty_total: penalties,
    final_confidence: finalConfidence,
    adjustments,
    needs_review: finalConfidence < NEEDS_REVIEW_BELOW,
  };
}
