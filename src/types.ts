// src/types.ts

/** Seat of a player as the judge numbers them: 0 .. playerCount - 1. */
export type PlayerIndex = number;

/** Row-major cell index: y * width + x. */
export type CellIndex = number;

/** Global penguin id: order of placement across all players. */
export type PenguinId = number;

export interface Coord {
  y: number;
  x: number;
}

export type Move =
  | {
      kind: "place";
      at: CellIndex;
    }
  | {
      // Straight hex-line slide; `to` is reachable from `from` over fish-bearing, unoccupied cells.
      kind: "slide";
      from: CellIndex;
      to: CellIndex;
    };

export type PlacementRule = "single-fish" | "any";

export interface RulesOptions {
  placementRule: PlacementRule;
}

export interface Penguin {
  id: PenguinId;
  owner: PlayerIndex;
  cell: CellIndex;
}

export interface BoardState {
  width: number;
  height: number;
  playerCount: number;
  penguinsPerPlayer: number;
  rules: RulesOptions;

  // Per cell. 0 means removed (water); 1..3 is a tile.
  fish: number[];

  // Per cell. Penguin id standing on the cell, or NO_PENGUIN.
  penguinAt: number[];

  // Global placement order. A penguin's `cell` is updated in place when it slides.
  penguins: Penguin[];

  // Per player.
  captured: number[];

  // Set when the judge ends placement; slides are legal from then on.
  placementClosed: boolean;
}

/**
 * What applyMove changed, as undoMove needs it.
 * `captured` is the fish taken from the departure cell (always 0 for a placement).
 */
export interface MoveDelta {
  captured: number;
  penguinId: PenguinId;
}

export const NO_PENGUIN = -1;
