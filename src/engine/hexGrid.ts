// src/engine/hexGrid.ts

import type { BoardState, CellIndex, Coord } from "../types";

export type Direction = { dy: number; dx: number };

// Fixed enumeration order: up, right, down-right, down, left, up-left.
export const DIRECTIONS: readonly Direction[] = [
  { dy: -1, dx: 0 },
  { dy: 0, dx: 1 },
  { dy: 1, dx: 1 },
  { dy: 1, dx: 0 },
  { dy: 0, dx: -1 },
  { dy: -1, dx: -1 },
];

export const NO_CELL = -1;

type Grid = Pick<BoardState, "width" | "height">;

export function inBounds(grid: Grid, y: number, x: number): boolean {
  return y >= 0 && y < grid.height && x >= 0 && x < grid.width;
}

export function cellIndex(grid: Grid, coord: Coord): CellIndex {
  return coord.y * grid.width + coord.x;
}

export function coordOf(grid: Grid, cell: CellIndex): Coord {
  return { y: Math.floor(cell / grid.width), x: cell % grid.width };
}

/** Neighbour of `cell` in direction `dir`, or NO_CELL past the edge. */
export function stepCell(grid: Grid, cell: CellIndex, dir: Direction): CellIndex {
  const y = Math.floor(cell / grid.width) + dir.dy;
  const x = (cell % grid.width) + dir.dx;
  return inBounds(grid, y, x) ? y * grid.width + x : NO_CELL;
}

/**
 * Direction that carries `from` onto `to` along a straight hex line, with the
 * number of steps, or null when the two cells are not aligned.
 */
export function lineBetween(
  grid: Grid,
  from: CellIndex,
  to: CellIndex
): { dir: Direction; steps: number } | null {
  const a = coordOf(grid, from);
  const b = coordOf(grid, to);
  const dy = b.y - a.y;
  const dx = b.x - a.x;
  if (dy === 0 && dx === 0) return null;

  const steps = Math.max(Math.abs(dy), Math.abs(dx));
  for (const dir of DIRECTIONS) {
    if (dir.dy * steps === dy && dir.dx * steps === dx) return { dir, steps };
  }
  return null;
}

export function formatCell(grid: Grid, cell: CellIndex): string {
  const { y, x } = coordOf(grid, cell);
  return `(${y},${x})`;
}
