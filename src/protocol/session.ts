// src/protocol/session.ts
//
// Judge-facing state machine:
//   awaitInit -> awaitTurn (placement) -> awaitTurn (movement) -> gameOver
// Computing a move is not a state of its own: the turn line's handleLine call
// runs the strategy synchronously and returns to awaitTurn with the answer.
//
// handleLine consumes one input line and returns the next session state plus
// at most one output line. The board inside the session is the single
// long-lived game board; it is mutated in place as moves are applied.

import type { BoardState, Coord, Move, PlayerIndex, RulesOptions } from "../types";
import {
  applyMove,
  cellIndex,
  closePlacement,
  coordOf,
  DEFAULT_RULES,
  formatCell,
  inBounds,
  InvalidMoveError,
  makeBoard,
  MAX_FISH_PER_TILE,
  validateBoard,
} from "../engine";
import type { Decision, Strategy } from "../ai";
import { silentLogger, type Logger } from "../obs/log";
import { ProtocolError } from "./errors";
import {
  formatPlacement,
  formatSlide,
  type Header,
  parseHeader,
  parseIntegers,
  parseMovementNotice,
  parsePlacementNotice,
  PASS_MOVE,
  PASS_PLACEMENT,
} from "./wire";

export type GameStage = "placement" | "movement";

export type SessionState =
  | { phase: "awaitInit"; linesRead: number; header?: Header; fish: number[]; broken: boolean[] }
  | { phase: "awaitTurn"; linesRead: number; header: Header; stage: GameStage; board: BoardState }
  | { phase: "gameOver"; linesRead: number; header?: Header; board?: BoardState };

type AwaitTurnState = Extract<SessionState, { phase: "awaitTurn" }>;

export type SessionConfig = {
  strategy: Strategy;
  /** Per-move budget when the judge does not send one. */
  moveTimeMs: number;
  /** Subtracted from every budget to leave room for I/O. */
  safetyMarginMs: number;
  rules?: Partial<RulesOptions>;
  log?: Logger;
};

export type HandleResult = {
  nextState: SessionState;
  output?: string;
};

export function initialSession(): SessionState {
  return { phase: "awaitInit", linesRead: 0, fish: [], broken: [] };
}

function gridValues(
  line: string,
  lineNumber: number,
  into: number[],
  capacity: number,
  what: string,
  max: number
): number[] {
  const ints = parseIntegers(line, lineNumber);
  if (into.length + ints.length > capacity) {
    throw new ProtocolError("GRID_OVERFLOW", `${what} grid holds ${capacity} values, line brings it to ${into.length + ints.length}`, {
      lineNumber,
    });
  }
  for (const n of ints) {
    if (n < 0 || n > max) {
      throw new ProtocolError("BAD_GRID_VALUE", `${what} value ${n} outside 0..${max}`, { lineNumber });
    }
  }
  return [...into, ...ints];
}

function handleInit(
  s: Extract<SessionState, { phase: "awaitInit" }>,
  line: string,
  lineNumber: number,
  cfg: SessionConfig
): HandleResult {
  if (!s.header) {
    const header = parseHeader(line, lineNumber);
    return { nextState: { ...s, linesRead: lineNumber, header } };
  }

  const cells = s.header.width * s.header.height;
  if (s.fish.length < cells) {
    const fish = gridValues(line, lineNumber, s.fish, cells, "fish", MAX_FISH_PER_TILE);
    return { nextState: { ...s, linesRead: lineNumber, fish } };
  }

  const flags = gridValues(line, lineNumber, s.broken.map(Number), cells, "broken", 1);
  const broken = flags.map((n) => n === 1);
  if (broken.length < cells) {
    return { nextState: { ...s, linesRead: lineNumber, broken } };
  }

  const board = makeBoard({
    width: s.header.width,
    height: s.header.height,
    playerCount: s.header.playerCount,
    penguinsPerPlayer: s.header.penguinsPerPlayer,
    fish: s.fish,
    broken,
    rules: { ...DEFAULT_RULES, ...cfg.rules },
  });
  (cfg.log ?? silentLogger).info("board ready", {
    width: board.width,
    height: board.height,
    me: s.header.me,
    players: board.playerCount,
    penguinsPerPlayer: board.penguinsPerPlayer,
  });
  return {
    nextState: { phase: "awaitTurn", linesRead: lineNumber, header: s.header, stage: "placement", board },
  };
}

function cellAt(board: BoardState, at: Coord, lineNumber: number): number {
  if (!inBounds(board, at.y, at.x)) {
    throw new ProtocolError("OFF_BOARD", `(${at.y},${at.x}) is outside the ${board.height}x${board.width} board`, {
      lineNumber,
    });
  }
  return cellIndex(board, at);
}

// Judge-reported moves go through the same checks as ours; a rejection means our board and the judge disagree.
function applyReported(board: BoardState, move: Move, player: PlayerIndex, lineNumber: number, cfg: SessionConfig): void {
  const log = cfg.log ?? silentLogger;
  if (move.kind === "place") {
    log.debug("opponent placed", { player, at: formatCell(board, move.at) });
  } else {
    log.debug("opponent moved", { player, penguin: board.penguinAt[move.from], to: formatCell(board, move.to) });
  }
  try {
    applyMove(board, move, player);
  } catch (err) {
    if (err instanceof InvalidMoveError) {
      throw new ProtocolError("ILLEGAL_REPORTED_MOVE", `player ${player}: ${err.message}`, { lineNumber, cause: err });
    }
    throw err;
  }
  validateBoard(board, `judge:${move.kind}`);
}

function budgetFor(requested: number | undefined, cfg: SessionConfig): number {
  const base = requested ?? cfg.moveTimeMs;
  return base - cfg.safetyMarginMs;
}

/**
 * Ask the strategy for our move, apply it to the board and only then format
 * the answer, so a failure leaves nothing half-written.
 */
function takeOwnTurn(
  s: AwaitTurnState,
  requestedBudget: number | undefined,
  lineNumber: number,
  cfg: SessionConfig
): HandleResult {
  const log = cfg.log ?? silentLogger;
  const { board, header, stage } = s;
  const budgetMs = budgetFor(requestedBudget, cfg);

  const decision: Decision = cfg.strategy.chooseMove({ board, player: header.me, budgetMs });
  const back: AwaitTurnState = { ...s, linesRead: lineNumber };

  if (decision.kind === "pass") {
    log.info("pass", { stage, ...decision.details });
    return { nextState: back, output: stage === "placement" ? PASS_PLACEMENT : PASS_MOVE };
  }

  const { move } = decision;
  if (stage === "placement" && move.kind !== "place") {
    throw new InvalidMoveError("MOVE_WRONG_PHASE", `strategy ${cfg.strategy.name} answered a placement turn with a ${move.kind}`);
  }
  if (stage === "movement" && move.kind !== "slide") {
    throw new InvalidMoveError("MOVE_WRONG_PHASE", `strategy ${cfg.strategy.name} answered a movement turn with a ${move.kind}`);
  }

  const delta = applyMove(board, move, header.me);
  const output =
    move.kind === "place"
      ? formatPlacement(coordOf(board, move.at))
      : formatSlide(delta.penguinId, coordOf(board, move.to));

  log.info("move", { stage, budgetMs, output, ...decision.details });
  return { nextState: back, output };
}

function handlePlacement(
  s: AwaitTurnState,
  line: string,
  lineNumber: number,
  cfg: SessionConfig
): HandleResult {
  const notice = parsePlacementNotice(line, s.header, lineNumber);
  switch (notice.type) {
    case "yourTurn":
      return takeOwnTurn(s, notice.budgetMs, lineNumber, cfg);
    case "placed": {
      const at = cellAt(s.board, notice.at, lineNumber);
      applyReported(s.board, { kind: "place", at }, notice.player, lineNumber, cfg);
      return { nextState: { ...s, linesRead: lineNumber } };
    }
    case "passed":
      return { nextState: { ...s, linesRead: lineNumber } };
    case "phaseEnd":
      closePlacement(s.board);
      return { nextState: { ...s, linesRead: lineNumber, stage: "movement" } };
  }
}

function handleMovement(
  s: AwaitTurnState,
  line: string,
  lineNumber: number,
  cfg: SessionConfig
): HandleResult {
  const notice = parseMovementNotice(line, s.header, lineNumber);
  switch (notice.type) {
    case "yourTurn":
      return takeOwnTurn(s, notice.budgetMs, lineNumber, cfg);
    case "moved": {
      const penguin = s.board.penguins[notice.penguinId];
      if (!penguin || penguin.owner !== notice.player) {
        throw new ProtocolError("UNKNOWN_PENGUIN", `penguin ${notice.penguinId} is not a penguin of player ${notice.player}`, {
          lineNumber,
        });
      }
      const to = cellAt(s.board, notice.to, lineNumber);
      applyReported(s.board, { kind: "slide", from: penguin.cell, to }, notice.player, lineNumber, cfg);
      return { nextState: { ...s, linesRead: lineNumber } };
    }
    case "passed":
      return { nextState: { ...s, linesRead: lineNumber } };
    case "gameOver":
      (cfg.log ?? silentLogger).info("game over", { captured: s.board.captured });
      return { nextState: { phase: "gameOver", linesRead: lineNumber, header: s.header, board: s.board } };
  }
}

/** Consume one judge line. Throws ProtocolError (or InvalidMoveError on an internal fault). */
export function handleLine(s: SessionState, line: string, cfg: SessionConfig): HandleResult {
  const lineNumber = s.linesRead + 1;
  if (line.trim().length === 0) return { nextState: { ...s, linesRead: lineNumber } };

  switch (s.phase) {
    case "awaitInit":
      return handleInit(s, line, lineNumber, cfg);
    case "awaitTurn":
      return s.stage === "placement"
        ? handlePlacement(s, line, lineNumber, cfg)
        : handleMovement(s, line, lineNumber, cfg);
    case "gameOver":
      throw new ProtocolError("UNEXPECTED_MESSAGE", "input after the end of the game", { lineNumber });
  }
}

/** End of input. Fine once the board exists; before that the judge hung up mid-setup. */
export function handleEndOfInput(s: SessionState): SessionState {
  if (s.phase === "awaitInit") {
    throw new ProtocolError("TRUNCATED_INPUT", "input ended before the board was complete", {
      lineNumber: s.linesRead,
    });
  }
  if (s.phase === "gameOver") return s;
  return { phase: "gameOver", linesRead: s.linesRead, header: s.header, board: s.board };
}
