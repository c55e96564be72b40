// src/engine/errors.ts
//
// Engine-level failures. Both are contract violations: the search must only
// apply moves produced by legalMoves, and boards must be built from a
// well-formed layout. Callers are expected to abort rather than continue.

export type EngineErrorCode =
  | "MOVE_OUT_OF_BOUNDS"
  | "MOVE_NO_PENGUIN"
  | "MOVE_WRONG_OWNER"
  | "MOVE_NOT_STRAIGHT"
  | "MOVE_PATH_BLOCKED"
  | "MOVE_WRONG_PHASE"
  | "MOVE_NO_PENGUINS_LEFT"
  | "MOVE_CELL_UNAVAILABLE"
  | "UNDO_MISMATCH"
  | "BOARD_SHAPE"
  | "BOARD_INVARIANT";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = details;
  }
}

export class InvalidMoveError extends EngineError {
  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "InvalidMoveError";
  }
}

export class InvalidBoardError extends EngineError {
  constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "InvalidBoardError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
