// Public engine surface

export { makeBoard, cloneBoard, DEFAULT_RULES, MAX_FISH_PER_TILE } from "./makeBoard";
export type { MakeBoardOptions } from "./makeBoard";

export { applyMove, undoMove } from "./applyMove";

export {
  legalMoves,
  listLegalMoves,
  collectLegalMoves,
  hasLegalMove,
  slideTargets,
  countSlides,
  countSlidesFrom,
  isTerminal,
  MoveSequence,
} from "./legalMoves";

export {
  penguinAtCell,
  occupantOf,
  isOpenTile,
  penguinsOf,
  placedCount,
  isPlacementPhase,
  hasPenguinsToPlace,
  closePlacement,
  fishOnBoard,
  totalCaptured,
  nextPlayer,
} from "./boardQueries";

export { DIRECTIONS, NO_CELL, cellIndex, coordOf, inBounds, stepCell, lineBetween, formatCell } from "./hexGrid";
export type { Direction } from "./hexGrid";

export { validateBoard } from "./validateBoard";

export { hashBoard, snapshotBoard } from "./boardHash";
export type { BoardSnapshot } from "./boardHash";

export { EngineError, InvalidMoveError, InvalidBoardError, isEngineError } from "./errors";
export type { EngineErrorCode } from "./errors";
