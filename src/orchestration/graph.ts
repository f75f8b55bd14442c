import { logger } from "@trigger.dev/sdk/v3";
import { StateGraph, START, END } from "@langchain/langgraph";
import { TaskExtractionState } from "./state.js";
import { extractNode, scoreAndRouteNode } from "./nodes.js";
import type { NormalizedEmail } from "../email/parse.js";
import type { TaskExtractionStateType } from "./state.js";
import type { BatchResult } from "../types/pipeline.js";
import { createErrorResponse } from "../providers/anthropic.js";

/**
 * Compiled LangGraph for the task extraction pipeline:
 *   START → extract → score_and_route → END
 *
 * The extract node is the only one doing I/O; score_and_route is synchronous
 * and leaves the batch result (or a failure) in state.result.
 */
const graphBuilder = new StateGraph(TaskExtractionState)
  .addNode("extract", extractNode)
  .addNode("score_and_route", scoreAndRouteNode)
  .addEdge(START, "extract")
  .addEdge("extract", "score_and_route")
  .addEdge("score_and_route", END);

export const taskExtractionGraph = graphBuilder.compile();

/**
 * Run the pipeline for a normalized email. Returns final state with extraction and routed result.
 */
export async function runTaskExtractionGraph(
  email: NormalizedEmail
): Promise<TaskExtractionStateType> {
  const state: TaskExtractionStateType = await taskExtractionGraph.invoke({ email });
  if (state.error) {
    logger.warn("Pipeline run failed", {
      trace: "task_extraction",
      subject: email.subject.slice(0, 80),
      from: email.from || null,
      error: state.error,
    });
  }
  return state;
}

/** Run the graph and always hand back a batch result, failed when any node failed. */
export async function processEmail(email: NormalizedEmail): Promise<BatchResult> {
  const state = await runTaskExtractionGraph(email);
  if (state.result) return state.result;
  const error = state.error ?? "Unknown error";
  return {
    success: false,
    error,
    extraction_result: state.extraction ?? createErrorResponse(error),
  };
}
