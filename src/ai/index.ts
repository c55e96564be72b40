export { evaluate, evaluateFeatures, Evaluator, WEIGHTS } from "./evaluate";
export type { EvalBreakdown } from "./evaluate";

export { searchBestMove, searchFixedDepth, DEFAULT_MAX_DEPTH, DEFAULT_CHECK_INTERVAL } from "./search";
export type { SearchOptions, SearchResult, SearchStopReason, IterationResult } from "./search";

export { chooseGreedyMove } from "./greedy";

export { makeStrategy, makeSearchStrategy, makeGreedyStrategy } from "./strategy";
export type { Strategy, StrategyName, StrategyOptions, Decision, DecisionContext } from "./strategy";
