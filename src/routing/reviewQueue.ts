import type {
  ConfidenceMetrics,
  QueueSummary,
  RawTask,
  ReviewLane,
  ReviewStatus,
  RoutedTask,
} from "../types/pipeline.js";

export const DEFAULT_AUTO_APPROVE_THRESHOLD = 0.7;
export const DEFAULT_HIGH_PRIORITY_THRESHOLD = 0.5;

/** Absorbs float drift from penalty subtraction (0.85 - 0.15 must still reach 0.7). */
const SCORE_EPSILON = 1e-9;

export interface ReviewThresholds {
  /** Final confidence at or above this is auto-approved. */
  autoApproveThreshold: number;
  /** Final confidence at or above this (and below auto-approve) gets standard review. */
  highPriorityThreshold: number;
}

export interface ReviewQueueOptions extends Partial<ReviewThresholds> {
  /** Clock for routed_at; defaults to the current time. */
  now?: () => Date;
}

function assertThreshold(name: string, value: number): void {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid review threshold ${name}: ${String(value)} (expected a number in [0, 1])`);
  }
}

/**
 * Routes scored tasks into auto_approved / standard_review / high_priority_review lanes.
 * One instance per batch; lanes keep insertion order. Not safe to share between concurrent batches.
 */
export class ReviewQueue {
  readonly autoApproveThreshold: number;
  readonly highPriorityThreshold: number;
  private readonly now: () => Date;

  private readonly lanes: Record<ReviewLane, RoutedTask[]> = {
    auto_approved: [],
    standard_review: [],
    high_priority_review: [],
  };

  constructor(options: ReviewQueueOptions = {}) {
    const autoApprove = options.autoApproveThreshold ?? DEFAULT_AUTO_APPROVE_THRESHOLD;
    const highPriority = options.highPriorityThreshold ?? DEFAULT_HIGH_PRIORITY_THRESHOLD;
    assertThreshold("autoApproveThreshold", autoApprove);
    assertThreshold("highPriorityThreshold", highPriority);
    if (highPriority > autoApprove) {
      throw new Error(
        `Invalid review thresholds: highPriorityThreshold (${highPriority}) must not exceed autoApproveThreshold (${autoApprove})`
      );
    }
    this.autoApproveThreshold = autoApprove;
    this.highPriorityThreshold = highPriority;
    this.now = options.now ?? (() => new Date());
  }

  /** Lane for a final confidence; lower bounds are inclusive. */
  classify(finalConfidence: number): { queue: ReviewLane; review_status: ReviewStatus } {
    if (finalConfidence + SCORE_EPSILON >= this.autoApproveThreshold) {
      return { queue: "auto_approved", review_status: "auto_approved" };
    }
    if (finalConfidence + SCORE_EPSILON >= this.highPriorityThreshold) {
      return { queue: "standard_review", review_status: "needs_review" };
    }
    return { queue: "high_priority_review", review_status: "needs_urgent_review" };
  }

  routeTask(task: RawTask, metrics: ConfidenceMetrics): RoutedTask {
    const { queue, review_status } = this.classify(metrics.final_confidence);
    const routed: RoutedTask = {
      ...task,
      confidence_metrics: metrics,
      review_status,
      queue,
      routed_at: this.now().toISOString(),
    };
    this.lanes[queue].push(routed);
    return routed;
  }

  getSummary(): QueueSummary {
    const { auto_approved, standard_review, high_priority_review } = this.lanes;
    return {
      total_tasks: auto_approved.length + standard_review.length + high_priority_review.length,
      auto_approved: auto_approved.length,
      standard_review: standard_review.length,
      high_priority_review: high_priority_review.length,
    };
  }

  getAutoApproved(): RoutedTask[] {
    return [...this.lanes.auto_approved];
  }

  /** Worklist for reviewers: urgent lane first, then standard, each in routing order. */
  getReviewTasks(): RoutedTask[] {
    return [...this.lanes.high_priority_review, ...this.lanes.standard_review];
  }
}
