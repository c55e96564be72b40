import type { BoardState, CellIndex, Move, PlacementRule, PlayerIndex } from "../src/types";
import { applyMove, cellIndex, closePlacement, makeBoard } from "../src/engine";

export interface BoardArgs {
  /** One string per row, fish counts separated by spaces: ["1 2 3", "0 1 1"]. */
  rows: readonly string[];
  playerCount?: number;
  penguinsPerPlayer?: number;
  placementRule?: PlacementRule;
}

export function makeTestBoard(args: BoardArgs): BoardState {
  const grid = args.rows.map((r) => r.trim().split(/\s+/).map(Number));
  const width = grid[0].length;
  for (const row of grid) {
    if (row.length !== width) throw new Error("ragged test board");
  }
  return makeBoard({
    width,
    height: grid.length,
    playerCount: args.playerCount ?? 2,
    penguinsPerPlayer: args.penguinsPerPlayer ?? 1,
    fish: grid.flat(),
    rules: args.placementRule ? { placementRule: args.placementRule } : undefined,
  });
}

export function cell(board: BoardState, y: number, x: number): CellIndex {
  return cellIndex(board, { y, x });
}

export type PenguinSpec = [player: PlayerIndex, y: number, x: number];

/**
 * Board in the movement phase with the given penguins placed in order.
 * penguinsPerPlayer defaults to the largest number any player owns.
 */
export function boardWithPenguins(args: BoardArgs & { penguins: readonly PenguinSpec[] }): BoardState {
  const counts = new Map<number, number>();
  for (const [p] of args.penguins) counts.set(p, (counts.get(p) ?? 0) + 1);
  const perPlayer = args.penguinsPerPlayer ?? Math.max(1, ...counts.values());

  const board = makeTestBoard({ ...args, penguinsPerPlayer: perPlayer });
  for (const [player, y, x] of args.penguins) {
    applyMove(board, { kind: "place", at: cell(board, y, x) }, player);
  }
  closePlacement(board);
  return board;
}

export function slide(board: BoardState, from: [number, number], to: [number, number]): Move {
  return { kind: "slide", from: cell(board, from[0], from[1]), to: cell(board, to[0], to[1]) };
}

/** Small deterministic PRNG for randomized playouts. */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function pickOne<T>(arr: readonly T[], rng: () => number): T {
  if (arr.length === 0) throw new Error("pickOne called with empty array");
  const idx = Math.floor(rng() * arr.length);
  return arr[Math.min(idx, arr.length - 1)];
}

/** Clock that reads 0 for the first `calls` reads and then jumps far past any deadline. */
export function expiringClock(calls: number): () => number {
  let n = 0;
  return () => {
    n++;
    return n <= calls ? 0 : 1e9;
  };
}
