import type { BoardState, Move, PlayerIndex } from "../types";
import { legalMoves } from "../engine";

function targetOf(move: Move): number {
  return move.kind === "place" ? move.at : move.to;
}

/**
 * One-ply greedy choice: land on the richest tile available (for a placement,
 * the richest allowed cell). Ties go to the first move enumerated.
 * Returns null when the player has no legal move.
 */
export function chooseGreedyMove(board: BoardState, player: PlayerIndex): Move | null {
  let best: Move | null = null;
  let bestFish = Number.NEGATIVE_INFINITY;
  for (const move of legalMoves(board, player)) {
    const fish = board.fish[targetOf(move)];
    if (fish > bestFish) {
      bestFish = fish;
      best = move;
    }
  }
  return best;
}
