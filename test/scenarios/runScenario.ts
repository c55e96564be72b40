import { applyMove, cloneBoard, isTerminal, listLegalMoves } from "../../src/engine";
import { searchBestMove, type SearchResult } from "../../src/ai";
import type { BoardState, Move, PlayerIndex } from "../../src/types";

export type Scenario = {
  name: string;

  // Player to move
  player: PlayerIndex;

  // Starting board; left untouched
  initial: BoardState;

  budgetMs?: number;
  maxDepth?: number;

  // Assertions (optional)
  expectLegalMoveCount?: number;
  expectMove?: Move | "pass";

  // After playing the chosen move
  expectTerminal?: boolean;
};

function sameMove(a: Move, b: Move): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

export function runScenario(s: Scenario): { moves: Move[]; result: SearchResult } {
  const moves = listLegalMoves(s.initial, s.player);

  if (typeof s.expectLegalMoveCount === "number" && moves.length !== s.expectLegalMoveCount) {
    throw new Error(`[${s.name}] expected ${s.expectLegalMoveCount} legal moves, got ${moves.length}`);
  }

  const result = searchBestMove(s.initial, s.player, {
    budgetMs: s.budgetMs ?? 1000,
    maxDepth: s.maxDepth,
    now: () => 0,
  });

  if (s.expectMove === "pass") {
    if (result.kind !== "pass") throw new Error(`[${s.name}] expected a pass, got ${JSON.stringify(result.move)}`);
  } else if (s.expectMove) {
    if (result.kind !== "move" || !sameMove(result.move, s.expectMove)) {
      throw new Error(`[${s.name}] expected ${JSON.stringify(s.expectMove)}, got ${JSON.stringify(result)}`);
    }
  }

  if (typeof s.expectTerminal === "boolean" && result.kind === "move") {
    const after = cloneBoard(s.initial);
    applyMove(after, result.move, s.player);
    if (isTerminal(after) !== s.expectTerminal) {
      throw new Error(`[${s.name}] expected terminal=${s.expectTerminal} after ${JSON.stringify(result.move)}`);
    }
  }

  return { moves, result };
}
