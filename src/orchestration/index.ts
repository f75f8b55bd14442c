export { TaskExtractionState, type TaskExtractionStateType } from "./state.js";
export { extractNode, scoreAndRouteNode } from "./nodes.js";
export { taskExtractionGraph, runTaskExtractionGraph, processEmail } from "./graph.js";
export { processExtraction } from "./pipeline.js";
