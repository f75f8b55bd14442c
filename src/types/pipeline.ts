export type TaskPriority = "high" | "medium" | "low";

/**
 * One task as emitted by the extraction model. Only task_description is checked by
 * schemas/extraction_result.json; the other fields are whatever the model sent.
 */
export interface ExtractedTask {
  task_description: string;
  assignee?: unknown;
  deadline?: unknown;
  priority?: unknown;
  confidence_score?: unknown;
  reasoning?: unknown;
}

/** Output of the task extractor (Anthropic), or its error response when `error` is set. */
export interface ExtractionResult {
  tasks: ExtractedTask[];
  overall_confidence: number;
  ambiguities: string[];
  extraction_timestamp?: string;
  model_used?: string;
  error?: boolean;
}

/** Normalized task record consumed by scoring and routing. */
export interface RawTask {
  task_description: string;
  /** Person responsible, or the sentinel "unspecified". */
  assignee: string;
  /** ISO date (YYYY-MM-DD) or null when none was given. */
  deadline: string | null;
  priority: TaskPriority;
  /** Base confidence reported by the extractor, clamped to [0, 1]. */
  confidence_score: number;
  reasoning: string;
}

export interface ConfidenceMetrics {
  base_confidence: number;
  penalty_total: number;
  final_confidence: number;
  /** One entry per penalty rule that fired, in rule order. */
  adjustments: string[];
  needs_review: boolean;
}

export type ReviewStatus = "auto_approved" | "needs_review" | "needs_urgent_review";

export type ReviewLane = "auto_approved" | "standard_review" | "high_priority_review";

export interface RoutedTask extends RawTask {
  confidence_metrics: ConfidenceMetrics;
  review_status: ReviewStatus;
  queue: ReviewLane;
  routed_at: string;
}

export interface QueueSummary {
  total_tasks: number;
  auto_approved: number;
  standard_review: number;
  high_priority_review: number;
}

export type BatchResult =
  | {
      success: true;
      extraction_result: ExtractionResult;
      /** Routed tasks in extraction order. */
      processed_tasks: RoutedTask[];
      queue_summary: QueueSummary;
      auto_approved_tasks: RoutedTask[];
      /** Urgent lane first, then standard lane. */
      review_tasks: RoutedTask[];
    }
  | {
      success: false;
      error: string;
      extraction_result: ExtractionResult;
    };
