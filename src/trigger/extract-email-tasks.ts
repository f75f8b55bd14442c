import { task, logger } from "@trigger.dev/sdk/v3";
import { normalizeEmail, type EmailInput } from "../email/parse.js";
import { processEmail } from "../orchestration/index.js";
import type { BatchResult } from "../types/pipeline.js";

export type ExtractEmailTasksPayload = EmailInput;

/**
 * Extracts action items from one email and routes them into review lanes.
 *
 * Flow: normalizeEmail → runTaskExtractionGraph (extract → score_and_route)
 *       → BatchResult. Extraction failures come back as { success: false };
 *       config errors (thresholds) throw and fall under the task retry policy.
 */
export const extractEmailTasksTask = task({
  id: "extract-email-tasks",
  machine: "small-1x",
  run: async (payload: ExtractEmailTasksPayload): Promise<BatchResult> => {
    const email = normalizeEmail(payload);
    logger.info("extract-email-tasks started", {
      subject: email.subject.slice(0, 80),
      from: email.from || null,
      bodyChars: email.bodyText.length,
    });

    const result = await processEmail(email);
    if (!result.success) {
      logger.warn("extract-email-tasks failed", { error: result.error });
      return result;
    }

    for (const routed of result.review_tasks) {
      logger.info("Task needs review", {
        task: routed.task_description.slice(0, 120),
        queue: routed.queue,
        finalConfidence: routed.confidence_metrics.final_confidence,
        adjustments: routed.confidence_metrics.adjustments,
      });
    }
    logger.info("extract-email-tasks finished", { ...result.queue_summary });
    return result;
  },
});
