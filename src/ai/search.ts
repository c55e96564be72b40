// src/ai/search.ts
//
// Iterative-deepening minimax with alpha-beta pruning.
//
// One decision walks NotStarted -> Deepening(1, 2, ...) -> stopped (time,
// exhausted tree, depth cap) -> Done. Only iterations that finished are
// trusted: a move from an iteration cut short by the deadline is discarded.
// Depth 1 is the exception. It is never thrown away: once its first root move
// is scored, running out of time ends it with the best move so far.

import type { BoardState, Move, PlayerIndex } from "../types";
import { applyMove, cloneBoard, collectLegalMoves, isTerminal, listLegalMoves, nextPlayer, undoMove } from "../engine";
import { Evaluator } from "./evaluate";

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_CHECK_INTERVAL = 4;

export type SearchStopReason =
  | "budget" // no time to deepen: depth-1 answer
  | "time" // deadline hit inside an iteration
  | "exhausted" // last iteration reached every terminal position
  | "maxDepth";

export type SearchOptions = {
  /** Wall-clock budget for this decision in milliseconds. <= 0 means depth 1 only. */
  budgetMs: number;
  maxDepth?: number;
  /** Millisecond clock; injectable for tests. */
  now?: () => number;
  /** Nodes between clock reads below the root from depth 2 on. Root moves read it before each one but the very first. */
  checkInterval?: number;
};

export type IterationResult = {
  depth: number;
  move: Move;
  score: number;
  /** No visited position was cut off by the depth limit. */
  exact: boolean;
  /** Every root move was scored. Only a depth-1 iteration can end without. */
  complete: boolean;
};

export type SearchResult =
  | { kind: "pass"; nodes: number; elapsedMs: number }
  | {
      kind: "move";
      move: Move;
      score: number;
      depth: number;
      nodes: number;
      elapsedMs: number;
      stopReason: SearchStopReason;
      iterations: IterationResult[];
    };

class AlphaBeta {
  nodes = 0;
  aborted = false;
  private hitHorizon = false;
  private deadline: number | null = null;
  private interruptible = false;
  private readonly evaluator: Evaluator;
  // one move buffer per ply below the root
  private readonly plyMoves: Move[][] = [];

  constructor(
    private readonly board: BoardState,
    private readonly root: PlayerIndex,
    private readonly now: () => number,
    private readonly checkInterval: number
  ) {
    this.evaluator = new Evaluator(board);
  }

  /**
   * Search every root move to `depth` plies. Returns null when the deadline
   * interrupted the iteration, except at depth 1, which stops between root
   * moves and keeps what it has.
   */
  iterate(rootMoves: readonly Move[], order: readonly number[], depth: number, deadline: number | null): IterationResult | null {
    this.deadline = deadline;
    this.aborted = false;
    this.hitHorizon = false;
    const keepPartial = depth === 1;
    this.interruptible = !keepPartial;

    const child = nextPlayer(this.board, this.root);
    let bestIndex = -1;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const index of order) {
      if ((!keepPartial || bestIndex >= 0) && this.timeUp()) {
        if (!keepPartial) return null;
        return { depth, move: rootMoves[bestIndex], score: bestScore, exact: false, complete: false };
      }

      const move = rootMoves[index];
      // Earlier-enumerated moves win ties, so they only need to match the best score.
      const alpha = bestIndex < 0 ? Number.NEGATIVE_INFINITY : index < bestIndex ? bestScore - 1 : bestScore;

      const delta = applyMove(this.board, move, this.root);
      const score = this.search(child, depth - 1, alpha, Number.POSITIVE_INFINITY, 0);
      undoMove(this.board, move, this.root, delta);

      if (this.aborted) return null;

      if (score > bestScore || (score === bestScore && index < bestIndex)) {
        bestScore = score;
        bestIndex = index;
      }
    }

    return { depth, move: rootMoves[bestIndex], score: bestScore, exact: !this.hitHorizon, complete: true };
  }

  private timeUp(): boolean {
    if (this.deadline === null) return false;
    if (this.now() >= this.deadline) this.aborted = true;
    return this.aborted;
  }

  private movesAt(ply: number, player: PlayerIndex): Move[] {
    let buffer = this.plyMoves[ply];
    if (buffer === undefined) {
      buffer = [];
      this.plyMoves[ply] = buffer;
    }
    return collectLegalMoves(this.board, player, buffer);
  }

  private search(player: PlayerIndex, depth: number, alpha: number, beta: number, ply: number): number {
    this.nodes++;
    if (this.interruptible && this.nodes % this.checkInterval === 0 && this.timeUp()) return 0;

    if (depth <= 0) {
      if (!isTerminal(this.board)) this.hitHorizon = true;
      return this.evaluator.score(this.board, this.root);
    }

    const moves = this.movesAt(ply, player);
    const child = nextPlayer(this.board, player);
    if (moves.length === 0) {
      if (isTerminal(this.board)) return this.evaluator.score(this.board, this.root);
      // pass-through
      return this.search(child, depth - 1, alpha, beta, ply + 1);
    }

    const maximizing = player === this.root;
    let value = maximizing ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;

    for (let i = 0; i < moves.length; i++) {
      const move = moves[i];
      const delta = applyMove(this.board, move, player);
      const score = this.search(child, depth - 1, alpha, beta, ply + 1);
      undoMove(this.board, move, player, delta);
      if (this.aborted) return 0;

      if (maximizing) {
        if (score > value) value = score;
        if (value > alpha) alpha = value;
      } else {
        if (score < value) value = score;
        if (value < beta) beta = value;
      }
      if (alpha >= beta) break;
    }
    return value;
  }
}

function rootOrder(count: number, first: number): number[] {
  const order = [first];
  for (let i = 0; i < count; i++) if (i !== first) order.push(i);
  return order;
}

/**
 * One complete minimax iteration to `depth` plies without a deadline.
 * Returns null when `player` has no legal move.
 */
export function searchFixedDepth(board: BoardState, player: PlayerIndex, depth: number): IterationResult | null {
  const work = cloneBoard(board);
  const rootMoves = listLegalMoves(work, player);
  if (rootMoves.length === 0) return null;

  const engine = new AlphaBeta(work, player, () => 0, DEFAULT_CHECK_INTERVAL);
  return engine.iterate(rootMoves, rootOrder(rootMoves.length, 0), Math.max(1, depth), null);
}

/**
 * Pick a move for `player` within `budgetMs`. The caller's board is never
 * mutated; the search works on its own copy.
 */
export function searchBestMove(board: BoardState, player: PlayerIndex, opts: SearchOptions): SearchResult {
  const now = opts.now ?? (() => performance.now());
  const maxDepth = Math.max(1, opts.maxDepth ?? DEFAULT_MAX_DEPTH);
  const checkInterval = Math.max(1, opts.checkInterval ?? DEFAULT_CHECK_INTERVAL);
  const startedAt = now();

  const work = cloneBoard(board);
  const rootMoves = listLegalMoves(work, player);
  if (rootMoves.length === 0) {
    return { kind: "pass", nodes: 0, elapsedMs: now() - startedAt };
  }

  const engine = new AlphaBeta(work, player, now, checkInterval);
  const iterations: IterationResult[] = [];
  const deadline = opts.budgetMs > 0 ? startedAt + opts.budgetMs : null;

  const first = engine.iterate(rootMoves, rootOrder(rootMoves.length, 0), 1, deadline);
  if (!first) throw new Error("depth-1 iteration returned no move");
  iterations.push(first);

  let best = first;
  let stopReason: SearchStopReason;
  let bestIndex = rootMoves.indexOf(first.move);

  if (deadline === null) {
    stopReason = "budget";
  } else if (!first.complete) {
    stopReason = "time";
  } else if (first.exact) {
    stopReason = "exhausted";
  } else {
    stopReason = "maxDepth";
    for (let depth = 2; depth <= maxDepth; depth++) {
      const result = engine.iterate(rootMoves, rootOrder(rootMoves.length, bestIndex), depth, deadline);
      if (!result) {
        stopReason = "time";
        break;
      }
      iterations.push(result);
      best = result;
      bestIndex = rootMoves.indexOf(result.move);
      if (result.exact) {
        stopReason = "exhausted";
        break;
      }
    }
  }

  return {
    kind: "move",
    move: best.move,
    score: best.score,
    depth: best.depth,
    nodes: engine.nodes,
    elapsedMs: now() - startedAt,
    stopReason,
    iterations,
  };
}
