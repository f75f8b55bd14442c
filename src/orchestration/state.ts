import { Annotation } from "@langchain/langgraph";
import { emptyEmail, type NormalizedEmail } from "../email/parse.js";
import type { BatchResult, ExtractionResult } from "../types/pipeline.js";

/** Replace semantics: take the update (right) as new value. */
const replace = <T>(_: T, right: T): T => right;

/**
 * Graph state for the task extraction pipeline.
 * Each node returns a partial update; LangGraph merges into shared state.
 */
export const TaskExtractionState = Annotation.Root({
  email: Annotation<NormalizedEmail>({
    reducer: replace,
    default: emptyEmail,
  }),
  /** Extractor output, or its error response. */
  extraction: Annotation<ExtractionResult | null>({
    reducer: replace,
    default: () => null,
  }),
  result: Annotation<BatchResult | null>({
    reducer: replace,
    default: () => null,
  }),
  error: Annotation<string | null>({
    reducer: replace,
    default: () => null,
  }),
});

export type TaskExtractionStateType = typeof TaskExtractionState.State;
