import type { BoardState } from "../types";

/**
 * Deterministic hash of a BoardState.
 * Used to check apply/undo round trips and to tag diagnostics.
 */
export function hashBoard(board: BoardState): string {
  return JSON.stringify(snapshotBoard(board));
}

export type BoardSnapshot = {
  width: number;
  height: number;
  fish: number[];
  penguins: { id: number; owner: number; cell: number }[];
  penguinAt: number[];
  captured: number[];
  placementClosed: boolean;
};

export function snapshotBoard(board: BoardState): BoardSnapshot {
  return {
    width: board.width,
    height: board.height,
    fish: [...board.fish],
    penguins: board.penguins.map((p) => ({ id: p.id, owner: p.owner, cell: p.cell })),
    penguinAt: [...board.penguinAt],
    captured: [...board.captured],
    placementClosed: board.placementClosed,
  };
}
