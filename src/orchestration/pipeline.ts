import { logger } from "@trigger.dev/sdk/v3";
import type { BatchResult, ExtractionResult, RoutedTask } from "../types/pipeline.js";
import { calculateConfidence, normalizeExtractedTask } from "../scoring/confidence.js";
import { ReviewQueue, type ReviewQueueOptions } from "../routing/reviewQueue.js";

/**
 * Score and route every task of one extraction result.
 * An extraction error short-circuits: nothing is scored or routed.
 * Invalid thresholds throw before any task is routed.
 */
export function processExtraction(
  extraction: ExtractionResult,
  options: ReviewQueueOptions = {}
): BatchResult {
  if (extraction.error) {
    const error = extraction.ambiguities[0] ?? "Unknown error";
    logger.warn("Task extraction failed; skipping scoring", { error });
    return { success: false, error, extraction_result: extraction };
  }

  const queue = new ReviewQueue(options);
  const processed_tasks: RoutedTask[] = [];
  for (const extracted of extraction.tasks) {
    const task = normalizeExtractedTask(extracted);
    const metrics = calculateConfidence(task);
    processed_tasks.push(queue.routeTask(task, metrics));
  }

  const queue_summary = queue.getSummary();
  logger.info("Tasks routed", { ...queue_summary });
  return {
    success: true,
    extraction_result: extraction,
    processed_tasks,
    queue_summary,
    auto_approved_tasks: queue.getAutoApproved(),
    review_tasks: queue.getReviewTasks(),
  };
}
