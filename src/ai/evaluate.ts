// src/ai/evaluate.ts
//
// Static evaluation from one player's point of view. Everything here is a
// function of the board alone: no lookahead, no mutation.

import type { BoardState, PlayerIndex } from "../types";
import { NO_PENGUIN } from "../types";
import { DIRECTIONS, NO_CELL, stepCell } from "../engine";

// Integer weights keep scores exact, which the search relies on for tie-breaks.
export const WEIGHTS = {
  captured: 100,
  mobility: 2,
  territory: 6,
  isolation: 30,
} as const;

export type EvalBreakdown = {
  captured: number;
  mobility: number;
  territory: number;
  isolation: number;
  total: number;
};

const UNREACHED = -1;
const CONTESTED = -2;

type Shape = Pick<BoardState, "width" | "height" | "playerCount">;

function strongest(values: ArrayLike<number>, exclude: PlayerIndex): number {
  let best = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < values.length; i++) {
    if (i !== exclude && values[i] > best) best = values[i];
  }
  return best === Number.NEGATIVE_INFINITY ? 0 : best;
}

/**
 * Evaluation scratch space for one board shape. Building one costs a few
 * typed arrays; every call after that works in place, so the search keeps a
 * single instance for a whole decision.
 */
export class Evaluator {
  private readonly cells: number;
  private readonly playerCount: number;
  // cells * DIRECTIONS.length, NO_CELL past the edge
  private readonly neighbours: Int32Array;
  private readonly dist: Int32Array;
  private readonly owner: Int32Array;
  private readonly queue: Int32Array;
  private readonly mobility: Int32Array;
  private readonly isolated: Int32Array;
  private readonly territory: Int32Array;
  // captured, mobility, territory, isolation
  private readonly diffs = new Int32Array(4);

  constructor(shape: Shape) {
    this.cells = shape.width * shape.height;
    this.playerCount = shape.playerCount;

    this.neighbours = new Int32Array(this.cells * DIRECTIONS.length);
    for (let cell = 0; cell < this.cells; cell++) {
      for (let d = 0; d < DIRECTIONS.length; d++) {
        this.neighbours[cell * DIRECTIONS.length + d] = stepCell(shape, cell, DIRECTIONS[d]);
      }
    }

    this.dist = new Int32Array(this.cells);
    this.owner = new Int32Array(this.cells);
    this.queue = new Int32Array(this.cells);
    this.mobility = new Int32Array(this.playerCount);
    this.isolated = new Int32Array(this.playerCount);
    this.territory = new Int32Array(this.playerCount);
  }

  score(board: BoardState, perspective: PlayerIndex): number {
    this.measure(board, perspective);
    return this.weighted();
  }

  /**
   * Each feature is "own minus strongest opponent", so with two players it is a
   * plain difference and with more it measures the gap to the leader.
   */
  features(board: BoardState, perspective: PlayerIndex): EvalBreakdown {
    this.measure(board, perspective);
    const [captured, mobility, territory, isolation] = this.diffs;
    return { captured, mobility, territory, isolation, total: this.weighted() };
  }

  private measure(board: BoardState, perspective: PlayerIndex): void {
    if (board.fish.length !== this.cells || board.playerCount !== this.playerCount) {
      throw new Error(
        `evaluator built for ${this.cells} cells and ${this.playerCount} players, got ${board.fish.length} and ${board.playerCount}`
      );
    }
    this.countMobility(board);
    this.countTerritory(board);

    this.diffs[0] = board.captured[perspective] - strongest(board.captured, perspective);
    this.diffs[1] = this.mobility[perspective] - strongest(this.mobility, perspective);
    this.diffs[2] = this.territory[perspective] - strongest(this.territory, perspective);
    this.diffs[3] = strongest(this.isolated, perspective) - this.isolated[perspective];
  }

  private weighted(): number {
    return (
      WEIGHTS.captured * this.diffs[0] +
      WEIGHTS.mobility * this.diffs[1] +
      WEIGHTS.territory * this.diffs[2] +
      WEIGHTS.isolation * this.diffs[3]
    );
  }

  private isOpen(board: BoardState, cell: number): boolean {
    return board.fish[cell] > 0 && board.penguinAt[cell] === NO_PENGUIN;
  }

  private countMobility(board: BoardState): void {
    this.mobility.fill(0);
    this.isolated.fill(0);
    for (let i = 0; i < board.penguins.length; i++) {
      const p = board.penguins[i];
      let n = 0;
      for (let d = 0; d < DIRECTIONS.length; d++) {
        let cell = this.neighbours[p.cell * DIRECTIONS.length + d];
        while (cell !== NO_CELL && this.isOpen(board, cell)) {
          n++;
          cell = this.neighbours[cell * DIRECTIONS.length + d];
        }
      }
      this.mobility[p.owner] += n;
      if (n === 0) this.isolated[p.owner]++;
    }
  }

  /**
   * One breadth-first pass from every penguin at once, in slides. A tile
   * belongs to the single player who reaches it first; equal distances from
   * different players leave it contested, and so does anything reached first
   * through a contested tile by more than one player.
   */
  private countTerritory(board: BoardState): void {
    const { dist, owner, queue, neighbours } = this;
    dist.fill(UNREACHED);
    owner.fill(UNREACHED);

    let tail = 0;
    for (let i = 0; i < board.penguins.length; i++) {
      const p = board.penguins[i];
      dist[p.cell] = 0;
      owner[p.cell] = p.owner;
      queue[tail++] = p.cell;
    }

    // Level order: every tile at distance d is labelled before any is expanded.
    for (let head = 0; head < tail; head++) {
      const from = queue[head];
      const d = dist[from] + 1;
      const label = owner[from];
      for (let k = 0; k < DIRECTIONS.length; k++) {
        let cell = neighbours[from * DIRECTIONS.length + k];
        while (cell !== NO_CELL && this.isOpen(board, cell)) {
          if (dist[cell] === UNREACHED) {
            dist[cell] = d;
            owner[cell] = label;
            queue[tail++] = cell;
          } else if (dist[cell] === d && owner[cell] !== label) {
            owner[cell] = CONTESTED;
          }
          cell = neighbours[cell * DIRECTIONS.length + k];
        }
      }
    }

    this.territory.fill(0);
    for (let cell = 0; cell < this.cells; cell++) {
      if (owner[cell] >= 0 && this.isOpen(board, cell)) this.territory[owner[cell]]++;
    }
  }
}

export function evaluateFeatures(board: BoardState, perspective: PlayerIndex): EvalBreakdown {
  return new Evaluator(board).features(board, perspective);
}

export function evaluate(board: BoardState, perspective: PlayerIndex): number {
  return new Evaluator(board).score(board, perspective);
}
