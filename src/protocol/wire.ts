// src/protocol/wire.ts
//
// Judge wire format. Every message is a line of whitespace-separated
// integers; -1 is the sentinel for "end of phase" and for a pass.
//
//   header      width height penguinsPerPlayer me playerCount
//   grids       width*height fish counts, then width*height broken flags
//   placement   me [budgetMs]       -> we answer "y x"        (pass: "-1 -1")
//               p y x               -> player p placed
//               -1                  -> placement over
//   movement    me [budgetMs]       -> we answer "penguin y x" (pass: "-1 -1 -1")
//               p penguin y x       -> player p slid a penguin
//               -1                  -> game over

import type { Coord, PenguinId, PlayerIndex } from "../types";
import { ProtocolError } from "./errors";

export const END_OF_PHASE = -1;
export const PASS_PLACEMENT = "-1 -1";
export const PASS_MOVE = "-1 -1 -1";

export type Header = {
  width: number;
  height: number;
  penguinsPerPlayer: number;
  me: PlayerIndex;
  playerCount: number;
};

export type PlacementNotice =
  | { type: "yourTurn"; budgetMs?: number }
  | { type: "placed"; player: PlayerIndex; at: Coord }
  | { type: "passed"; player: PlayerIndex }
  | { type: "phaseEnd" };

export type MovementNotice =
  | { type: "yourTurn"; budgetMs?: number }
  | { type: "moved"; player: PlayerIndex; penguinId: PenguinId; to: Coord }
  | { type: "passed"; player: PlayerIndex }
  | { type: "gameOver" };

const INT_TOKEN = /^-?\d+$/;

/** Split a line into integers; any other token is a protocol error. */
export function parseIntegers(line: string, lineNumber?: number): number[] {
  const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
  return tokens.map((t) => {
    if (!INT_TOKEN.test(t)) {
      throw new ProtocolError("MALFORMED_LINE", `not an integer: "${t}"`, { lineNumber });
    }
    return Number.parseInt(t, 10);
  });
}

function fieldCountError(what: string, got: number, expected: string, lineNumber?: number): ProtocolError {
  return new ProtocolError("MALFORMED_LINE", `${what}: expected ${expected} fields, got ${got}`, { lineNumber });
}

export function parseHeader(line: string, lineNumber?: number): Header {
  const ints = parseIntegers(line, lineNumber);
  if (ints.length !== 5) throw fieldCountError("header", ints.length, "5", lineNumber);

  const [width, height, penguinsPerPlayer, me, playerCount] = ints;
  if (width < 1 || height < 1) {
    throw new ProtocolError("BAD_HEADER", `board size ${width}x${height} is empty`, { lineNumber });
  }
  if (penguinsPerPlayer < 1) {
    throw new ProtocolError("BAD_HEADER", `penguins per player must be positive, got ${penguinsPerPlayer}`, {
      lineNumber,
    });
  }
  if (playerCount < 2) {
    throw new ProtocolError("BAD_HEADER", `need at least 2 players, got ${playerCount}`, { lineNumber });
  }
  if (me < 0 || me >= playerCount) {
    throw new ProtocolError("BAD_HEADER", `own player id ${me} outside 0..${playerCount - 1}`, { lineNumber });
  }
  return { width, height, penguinsPerPlayer, me, playerCount };
}

function parseOwnTurn(ints: number[], lineNumber?: number): { type: "yourTurn"; budgetMs?: number } {
  if (ints.length === 1) return { type: "yourTurn" };
  if (ints.length === 2) return { type: "yourTurn", budgetMs: ints[1] };
  throw fieldCountError("own turn", ints.length, "1 or 2", lineNumber);
}

function leadingField(ints: number[], lineNumber?: number): number {
  if (ints.length === 0) throw new ProtocolError("MALFORMED_LINE", "empty notification", { lineNumber });
  return ints[0];
}

function requirePlayer(player: number, header: Header, lineNumber?: number): void {
  if (player < 0 || player >= header.playerCount) {
    throw new ProtocolError("UNKNOWN_PLAYER", `player ${player} outside 0..${header.playerCount - 1}`, {
      lineNumber,
    });
  }
}

export function parsePlacementNotice(line: string, header: Header, lineNumber?: number): PlacementNotice {
  const ints = parseIntegers(line, lineNumber);
  const player = leadingField(ints, lineNumber);
  if (player === END_OF_PHASE) {
    if (ints.length !== 1) throw fieldCountError("end of placement", ints.length, "1", lineNumber);
    return { type: "phaseEnd" };
  }
  requirePlayer(player, header, lineNumber);
  if (player === header.me) return parseOwnTurn(ints, lineNumber);

  if (ints.length !== 3) throw fieldCountError("placement", ints.length, "3", lineNumber);
  const [, y, x] = ints;
  if (y === -1 && x === -1) return { type: "passed", player };
  return { type: "placed", player, at: { y, x } };
}

export function parseMovementNotice(line: string, header: Header, lineNumber?: number): MovementNotice {
  const ints = parseIntegers(line, lineNumber);
  const player = leadingField(ints, lineNumber);
  if (player === END_OF_PHASE) {
    if (ints.length !== 1) throw fieldCountError("end of game", ints.length, "1", lineNumber);
    return { type: "gameOver" };
  }
  requirePlayer(player, header, lineNumber);
  if (player === header.me) return parseOwnTurn(ints, lineNumber);

  if (ints.length !== 4) throw fieldCountError("move", ints.length, "4", lineNumber);
  const [, penguinId, y, x] = ints;
  if (penguinId === -1 && y === -1 && x === -1) return { type: "passed", player };
  return { type: "moved", player, penguinId, to: { y, x } };
}

export function formatPlacement(at: Coord): string {
  return `${at.y} ${at.x}`;
}

export function formatSlide(penguinId: PenguinId, to: Coord): string {
  return `${penguinId} ${to.y} ${to.x}`;
}
