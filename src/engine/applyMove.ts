// src/engine/applyMove.ts
//
// In-place transitions on a BoardState. applyMove returns the delta undoMove
// needs; undoMove restores every field applyMove touched, so search can walk
// the tree on a single board instead of copying it per node.

import type { BoardState, CellIndex, Move, MoveDelta, PlayerIndex } from "../types";
import { NO_PENGUIN } from "../types";
import { isOpenTile, isPlacementPhase, placedCount } from "./boardQueries";
import { InvalidMoveError } from "./errors";
import { formatCell, lineBetween, stepCell } from "./hexGrid";

function requireCell(board: BoardState, cell: CellIndex, role: string): void {
  if (!Number.isInteger(cell) || cell < 0 || cell >= board.fish.length) {
    throw new InvalidMoveError("MOVE_OUT_OF_BOUNDS", `${role} cell ${cell} is off the board`);
  }
}

function applyPlacement(board: BoardState, at: CellIndex, player: PlayerIndex): MoveDelta {
  requireCell(board, at, "placement");

  if (!isPlacementPhase(board)) {
    throw new InvalidMoveError("MOVE_WRONG_PHASE", "placement outside the placement phase", { player });
  }
  if (placedCount(board, player) >= board.penguinsPerPlayer) {
    throw new InvalidMoveError("MOVE_NO_PENGUINS_LEFT", `player ${player} has no penguins left to place`);
  }
  if (!isOpenTile(board, at)) {
    throw new InvalidMoveError(
      "MOVE_CELL_UNAVAILABLE",
      `cannot place on ${formatCell(board, at)}: removed or occupied`,
      { player }
    );
  }

  const penguinId = board.penguins.length;
  board.penguins.push({ id: penguinId, owner: player, cell: at });
  board.penguinAt[at] = penguinId;
  return { captured: 0, penguinId };
}

function applySlide(board: BoardState, from: CellIndex, to: CellIndex, player: PlayerIndex): MoveDelta {
  requireCell(board, from, "origin");
  requireCell(board, to, "destination");

  if (isPlacementPhase(board)) {
    throw new InvalidMoveError("MOVE_WRONG_PHASE", "slide during the placement phase", { player });
  }

  const penguinId = board.penguinAt[from];
  if (penguinId === NO_PENGUIN) {
    throw new InvalidMoveError("MOVE_NO_PENGUIN", `no penguin on ${formatCell(board, from)}`);
  }
  const penguin = board.penguins[penguinId];
  if (penguin.owner !== player) {
    throw new InvalidMoveError(
      "MOVE_WRONG_OWNER",
      `penguin on ${formatCell(board, from)} belongs to player ${penguin.owner}, not ${player}`
    );
  }

  const line = lineBetween(board, from, to);
  if (!line) {
    throw new InvalidMoveError(
      "MOVE_NOT_STRAIGHT",
      `${formatCell(board, from)} -> ${formatCell(board, to)} is not a straight hex line`
    );
  }

  let cell = from;
  for (let i = 0; i < line.steps; i++) {
    cell = stepCell(board, cell, line.dir);
    if (!isOpenTile(board, cell)) {
      throw new InvalidMoveError(
        "MOVE_PATH_BLOCKED",
        `slide ${formatCell(board, from)} -> ${formatCell(board, to)} crosses ${formatCell(board, cell)}`
      );
    }
  }

  const captured = board.fish[from];
  board.fish[from] = 0;
  board.captured[player] += captured;
  board.penguinAt[from] = NO_PENGUIN;
  board.penguinAt[to] = penguinId;
  penguin.cell = to;
  return { captured, penguinId };
}

/**
 * Apply `move` for `player`, mutating the board.
 * Throws InvalidMoveError for anything legalMoves would not have produced
 * (the placement rule itself is the generator's concern).
 */
export function applyMove(board: BoardState, move: Move, player: PlayerIndex): MoveDelta {
  switch (move.kind) {
    case "place":
      return applyPlacement(board, move.at, player);
    case "slide":
      return applySlide(board, move.from, move.to, player);
  }
}

function undoMismatch(message: string): InvalidMoveError {
  return new InvalidMoveError("UNDO_MISMATCH", message);
}

/**
 * Reverse the most recent applyMove. Callers pass the same move, player and
 * the delta that applyMove returned.
 */
export function undoMove(board: BoardState, move: Move, player: PlayerIndex, delta: MoveDelta): void {
  const penguin = board.penguins[delta.penguinId];
  if (!penguin || penguin.owner !== player) {
    throw undoMismatch(`penguin ${delta.penguinId} does not belong to player ${player}`);
  }

  if (move.kind === "place") {
    if (delta.penguinId !== board.penguins.length - 1 || penguin.cell !== move.at) {
      throw undoMismatch(`placement on ${formatCell(board, move.at)} is not the latest placement`);
    }
    board.penguins.pop();
    board.penguinAt[move.at] = NO_PENGUIN;
    return;
  }

  if (penguin.cell !== move.to || board.penguinAt[move.from] !== NO_PENGUIN) {
    throw undoMismatch(`slide ${formatCell(board, move.from)} -> ${formatCell(board, move.to)} is not on the board`);
  }
  board.penguinAt[move.to] = NO_PENGUIN;
  board.penguinAt[move.from] = delta.penguinId;
  penguin.cell = move.from;
  board.fish[move.from] = delta.captured;
  board.captured[player] -= delta.captured;
}
