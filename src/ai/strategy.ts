import type { BoardState, Move, PlayerIndex } from "../types";
import { chooseGreedyMove } from "./greedy";
import { searchBestMove, type SearchResult } from "./search";

export type StrategyName = "search" | "greedy";

export type Decision =
  | { kind: "move"; move: Move; details?: Record<string, unknown> }
  | { kind: "pass"; details?: Record<string, unknown> };

export type DecisionContext = {
  board: BoardState;
  player: PlayerIndex;
  /** Time the strategy may spend, already net of any safety margin. */
  budgetMs: number;
};

export type Strategy = {
  name: StrategyName;
  chooseMove: (ctx: DecisionContext) => Decision;
};

export type StrategyOptions = {
  maxDepth?: number;
  now?: () => number;
};

function searchDetails(result: SearchResult): Record<string, unknown> {
  if (result.kind === "pass") return { nodes: result.nodes, elapsedMs: result.elapsedMs };
  return {
    score: result.score,
    depth: result.depth,
    nodes: result.nodes,
    elapsedMs: Math.round(result.elapsedMs),
    stopReason: result.stopReason,
  };
}

export function makeSearchStrategy(opts: StrategyOptions = {}): Strategy {
  return {
    name: "search",
    chooseMove: ({ board, player, budgetMs }) => {
      const result = searchBestMove(board, player, { budgetMs, maxDepth: opts.maxDepth, now: opts.now });
      const details = searchDetails(result);
      return result.kind === "pass" ? { kind: "pass", details } : { kind: "move", move: result.move, details };
    },
  };
}

export function makeGreedyStrategy(): Strategy {
  return {
    name: "greedy",
    chooseMove: ({ board, player }) => {
      const move = chooseGreedyMove(board, player);
      return move ? { kind: "move", move } : { kind: "pass" };
    },
  };
}

export function makeStrategy(name: StrategyName, opts: StrategyOptions = {}): Strategy {
  switch (name) {
    case "greedy":
      return makeGreedyStrategy();
    case "search":
      return makeSearchStrategy(opts);
  }
}
