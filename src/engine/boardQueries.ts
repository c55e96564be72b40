// src/engine/boardQueries.ts

import type { BoardState, CellIndex, Penguin, PlayerIndex } from "../types";
import { NO_PENGUIN } from "../types";

export function penguinAtCell(board: BoardState, cell: CellIndex): Penguin | null {
  const id = board.penguinAt[cell];
  return id === NO_PENGUIN || id === undefined ? null : board.penguins[id] ?? null;
}

export function occupantOf(board: BoardState, cell: CellIndex): PlayerIndex | null {
  return penguinAtCell(board, cell)?.owner ?? null;
}

/** Free tile: fish-bearing and nobody standing on it. */
export function isOpenTile(board: BoardState, cell: CellIndex): boolean {
  return board.fish[cell] > 0 && board.penguinAt[cell] === NO_PENGUIN;
}

export function penguinsOf(board: BoardState, player: PlayerIndex): Penguin[] {
  return board.penguins.filter((p) => p.owner === player);
}

export function placedCount(board: BoardState, player: PlayerIndex): number {
  let n = 0;
  for (const p of board.penguins) if (p.owner === player) n++;
  return n;
}

export function isPlacementPhase(board: BoardState): boolean {
  if (board.placementClosed) return false;
  return board.penguins.length < board.playerCount * board.penguinsPerPlayer;
}

export function hasPenguinsToPlace(board: BoardState, player: PlayerIndex): boolean {
  return isPlacementPhase(board) && placedCount(board, player) < board.penguinsPerPlayer;
}

/** The judge ends placement explicitly; from then on only slides are legal. */
export function closePlacement(board: BoardState): void {
  board.placementClosed = true;
}

export function fishOnBoard(board: BoardState): number {
  let total = 0;
  for (const n of board.fish) total += n;
  return total;
}

export function totalCaptured(board: BoardState): number {
  let total = 0;
  for (const n of board.captured) total += n;
  return total;
}

export function nextPlayer(board: BoardState, player: PlayerIndex): PlayerIndex {
  return (player + 1) % board.playerCount;
}
