import { logger } from "@trigger.dev/sdk/v3";
import type { TaskExtractionStateType } from "./state.js";
import { loadReviewThresholds } from "../config/loader.js";
import { createErrorResponse, extractTasks } from "../providers/anthropic.js";
import { processExtraction } from "./pipeline.js";

const NODE_EXTRACT = "extract";
const NODE_SCORE_AND_ROUTE = "score_and_route";

/** Node: extract tasks with Anthropic (template from prompts/task_extractor.md). */
export async function extractNode(
  state: TaskExtractionStateType
): Promise<Partial<TaskExtractionStateType>> {
  const email = state.email;
  const subject = email.subject.slice(0, 80);
  if (!email.bodyText) {
    logger.warn("Pipeline node failed", {
      node: NODE_EXTRACT,
      subject,
      error: "No email content",
    });
    return { extraction: createErrorResponse("No email content"), error: "No email content" };
  }
  const extraction = await extractTasks(email);
  if (extraction.error) {
    const error = extraction.ambiguities[0] ?? "Unknown error";
    logger.warn("Pipeline node failed", { node: NODE_EXTRACT, subject, error });
    return { extraction, error };
  }
  return { extraction, error: null };
}

/**
 * Node: score every extracted task and route it into a review lane.
 * Threshold config errors are not caught: they fail the run rather than the batch.
 */
export async function scoreAndRouteNode(
  state: TaskExtractionStateType
): Promise<Partial<TaskExtractionStateType>> {
  const subject = state.email.subject.slice(0, 80);
  if (!state.extraction) {
    logger.warn("Pipeline node failed", {
      node: NODE_SCORE_AND_ROUTE,
      subject,
      error: "No extraction result",
    });
    return { error: state.error ?? "No extraction result" };
  }
  const thresholds = loadReviewThresholds();
  const result = processExtraction(state.extraction, thresholds);
  if (!result.success) return { result, error: result.error };
  logger.info("Review queue summary", {
    node: NODE_SCORE_AND_ROUTE,
    subject,
    ...result.queue_summary,
  });
  return { result, error: null };
}
