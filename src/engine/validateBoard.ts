import type { BoardState } from "../types";
import { NO_PENGUIN } from "../types";
import { InvalidBoardError } from "./errors";
import { MAX_FISH_PER_TILE } from "./makeBoard";

const VALIDATE = process.env.FLOE_VALIDATE_BOARD !== "0";

/**
 * validateBoard (occupancy bookkeeping only)
 *
 * Intent:
 * - Catch drift between the penguin list, the per-cell penguin map and the fish grid
 * - Avoid rule duplication (NO move legality here)
 *
 * Runs at checkpoints outside the search hot path, e.g. after each judge update.
 */
export function validateBoard(board: BoardState, where = "unknown"): void {
  if (!VALIDATE) return;

  const cells = board.width * board.height;
  assert(board.fish.length === cells, "fish grid size mismatch", where);
  assert(board.penguinAt.length === cells, "penguin map size mismatch", where);
  assert(board.captured.length === board.playerCount, "captured totals size mismatch", where);

  for (let cell = 0; cell < cells; cell++) {
    const n = board.fish[cell];
    assert(Number.isInteger(n) && n >= 0 && n <= MAX_FISH_PER_TILE, `fish out of range at cell ${cell}`, where);
  }

  for (const n of board.captured) {
    assert(Number.isInteger(n) && n >= 0, "captured total invalid", where);
  }

  const perPlayer = new Array<number>(board.playerCount).fill(0);
  board.penguins.forEach((p, id) => {
    assert(p.id === id, `penguin ${id} has id ${p.id}`, where);
    assert(Number.isInteger(p.owner) && p.owner >= 0 && p.owner < board.playerCount, `penguin ${id} owner invalid`, where);
    assert(board.penguinAt[p.cell] === id, `penguin ${id} not recorded on cell ${p.cell}`, where);
    // A penguin stands on the tile it arrived on; the tile is removed only when it leaves.
    assert(board.fish[p.cell] > 0, `penguin ${id} stands on removed cell ${p.cell}`, where);
    perPlayer[p.owner]++;
  });

  for (let player = 0; player < board.playerCount; player++) {
    assert(perPlayer[player] <= board.penguinsPerPlayer, `player ${player} has too many penguins`, where);
  }

  for (let cell = 0; cell < cells; cell++) {
    const id = board.penguinAt[cell];
    if (id === NO_PENGUIN) continue;
    assert(board.penguins[id]?.cell === cell, `cell ${cell} points at penguin ${id} which is elsewhere`, where);
  }
}

function assert(cond: unknown, msg: string, where: string): asserts cond {
  if (!cond) throw new InvalidBoardError("BOARD_INVARIANT", `[validateBoard:${where}] ${msg}`);
}
