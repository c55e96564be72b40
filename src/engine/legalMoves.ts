// src/engine/legalMoves.ts

import type { BoardState, CellIndex, Move, PlayerIndex } from "../types";
import { NO_PENGUIN } from "../types";
import { hasPenguinsToPlace, isOpenTile, isPlacementPhase, penguinsOf } from "./boardQueries";
import { DIRECTIONS, NO_CELL, stepCell } from "./hexGrid";

/**
 * Lazy, restartable view over a player's legal moves.
 * Each iteration walks the board as it is at that moment, so callers that
 * mutate the board must materialise the moves first (listLegalMoves).
 */
export class MoveSequence implements Iterable<Move> {
  constructor(
    private readonly board: BoardState,
    private readonly player: PlayerIndex
  ) {}

  [Symbol.iterator](): Iterator<Move> {
    return generateMoves(this.board, this.player);
  }

  isEmpty(): boolean {
    return this[Symbol.iterator]().next().done === true;
  }

  toArray(): Move[] {
    return Array.from(this);
  }
}

function allowsPlacement(board: BoardState, cell: CellIndex): boolean {
  if (!isOpenTile(board, cell)) return false;
  return board.rules.placementRule === "any" || board.fish[cell] === 1;
}

/**
 * Cells a penguin on `from` can slide to: every open tile along each
 * direction up to the first removed or occupied cell, in direction order then
 * by distance.
 */
export function* slideTargets(board: BoardState, from: CellIndex): Generator<CellIndex> {
  for (const dir of DIRECTIONS) {
    let cell = stepCell(board, from, dir);
    while (cell !== NO_CELL && isOpenTile(board, cell)) {
      yield cell;
      cell = stepCell(board, cell, dir);
    }
  }
}

// Increasing cell order, whatever the placement order.
function ownedCellsAscending(board: BoardState, player: PlayerIndex): CellIndex[] {
  return penguinsOf(board, player)
    .map((p) => p.cell)
    .sort((a, b) => a - b);
}

function* generateMoves(board: BoardState, player: PlayerIndex): Generator<Move> {
  if (isPlacementPhase(board)) {
    if (!hasPenguinsToPlace(board, player)) return;
    for (let cell = 0; cell < board.fish.length; cell++) {
      if (allowsPlacement(board, cell)) yield { kind: "place", at: cell };
    }
    return;
  }

  for (const from of ownedCellsAscending(board, player)) {
    for (const to of slideTargets(board, from)) {
      yield { kind: "slide", from, to };
    }
  }
}

export function legalMoves(board: BoardState, player: PlayerIndex): MoveSequence {
  return new MoveSequence(board, player);
}

/**
 * Eager form of the same enumeration, written into `out` (cleared first).
 * The search hands in one buffer per ply and never builds a generator.
 */
export function collectLegalMoves(board: BoardState, player: PlayerIndex, out: Move[]): Move[] {
  out.length = 0;
  if (isPlacementPhase(board)) {
    if (!hasPenguinsToPlace(board, player)) return out;
    for (let cell = 0; cell < board.fish.length; cell++) {
      if (allowsPlacement(board, cell)) out.push({ kind: "place", at: cell });
    }
    return out;
  }

  // a cell scan visits the player's penguins in increasing cell order
  for (let from = 0; from < board.penguinAt.length; from++) {
    const id = board.penguinAt[from];
    if (id === NO_PENGUIN || board.penguins[id].owner !== player) continue;
    for (const dir of DIRECTIONS) {
      let to = stepCell(board, from, dir);
      while (to !== NO_CELL && isOpenTile(board, to)) {
        out.push({ kind: "slide", from, to });
        to = stepCell(board, to, dir);
      }
    }
  }
  return out;
}

export function listLegalMoves(board: BoardState, player: PlayerIndex): Move[] {
  return collectLegalMoves(board, player, []);
}

function canSlideFrom(board: BoardState, cell: CellIndex): boolean {
  for (const dir of DIRECTIONS) {
    const next = stepCell(board, cell, dir);
    if (next !== NO_CELL && isOpenTile(board, next)) return true;
  }
  return false;
}

export function hasLegalMove(board: BoardState, player: PlayerIndex): boolean {
  if (isPlacementPhase(board)) {
    if (!hasPenguinsToPlace(board, player)) return false;
    for (let cell = 0; cell < board.fish.length; cell++) {
      if (allowsPlacement(board, cell)) return true;
    }
    return false;
  }
  for (const p of board.penguins) {
    if (p.owner === player && canSlideFrom(board, p.cell)) return true;
  }
  return false;
}

/** Number of slides available from `cell`, ignoring whose turn it is. */
export function countSlidesFrom(board: BoardState, cell: CellIndex): number {
  let n = 0;
  for (const dir of DIRECTIONS) {
    let next = stepCell(board, cell, dir);
    while (next !== NO_CELL && isOpenTile(board, next)) {
      n++;
      next = stepCell(board, next, dir);
    }
  }
  return n;
}

/** Slide mobility of a player's placed penguins, whatever the phase. */
export function countSlides(board: BoardState, player: PlayerIndex): number {
  let n = 0;
  for (const p of board.penguins) if (p.owner === player) n += countSlidesFrom(board, p.cell);
  return n;
}

/** No player has a legal move. */
export function isTerminal(board: BoardState): boolean {
  for (let player = 0; player < board.playerCount; player++) {
    if (hasLegalMove(board, player)) return false;
  }
  return true;
}
