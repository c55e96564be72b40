// src/engine/makeBoard.ts

import type { BoardState, RulesOptions } from "../types";
import { NO_PENGUIN } from "../types";
import { InvalidBoardError } from "./errors";

export const MAX_FISH_PER_TILE = 3;

export const DEFAULT_RULES: RulesOptions = { placementRule: "single-fish" };

export type MakeBoardOptions = {
  width: number;
  height: number;
  playerCount: number;
  penguinsPerPlayer: number;

  /** Row-major fish counts, width * height entries. */
  fish: readonly number[];

  /** Row-major broken flags. A broken cell starts removed whatever its fish count. */
  broken?: readonly boolean[];

  rules?: Partial<RulesOptions>;
};

function requirePositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidBoardError("BOARD_SHAPE", `${name} must be a positive integer, got ${value}`);
  }
}

export function makeBoard(opts: MakeBoardOptions): BoardState {
  const { width, height, playerCount, penguinsPerPlayer } = opts;

  requirePositiveInt(width, "width");
  requirePositiveInt(height, "height");
  requirePositiveInt(penguinsPerPlayer, "penguinsPerPlayer");
  if (!Number.isInteger(playerCount) || playerCount < 2) {
    throw new InvalidBoardError("BOARD_SHAPE", `playerCount must be at least 2, got ${playerCount}`);
  }

  const cells = width * height;
  if (opts.fish.length !== cells) {
    throw new InvalidBoardError("BOARD_SHAPE", `expected ${cells} fish counts, got ${opts.fish.length}`);
  }
  if (opts.broken && opts.broken.length !== cells) {
    throw new InvalidBoardError("BOARD_SHAPE", `expected ${cells} broken flags, got ${opts.broken.length}`);
  }

  const fish = opts.fish.map((n, i) => {
    if (!Number.isInteger(n) || n < 0 || n > MAX_FISH_PER_TILE) {
      throw new InvalidBoardError("BOARD_SHAPE", `fish count out of range at cell ${i}: ${n}`);
    }
    return opts.broken?.[i] ? 0 : n;
  });

  return {
    width,
    height,
    playerCount,
    penguinsPerPlayer,
    rules: { ...DEFAULT_RULES, ...opts.rules },
    fish,
    penguinAt: new Array<number>(cells).fill(NO_PENGUIN),
    penguins: [],
    captured: new Array<number>(playerCount).fill(0),
    placementClosed: false,
  };
}

/** Independent copy for search and tests. */
export function cloneBoard(board: BoardState): BoardState {
  return {
    ...board,
    rules: { ...board.rules },
    fish: [...board.fish],
    penguinAt: [...board.penguinAt],
    penguins: board.penguins.map((p) => ({ ...p })),
    captured: [...board.captured],
  };
}
