export type ProtocolErrorCode =
  | "MALFORMED_LINE"
  | "UNEXPECTED_MESSAGE"
  | "BAD_HEADER"
  | "BAD_GRID_VALUE"
  | "GRID_OVERFLOW"
  | "UNKNOWN_PLAYER"
  | "UNKNOWN_PENGUIN"
  | "OFF_BOARD"
  | "ILLEGAL_REPORTED_MOVE"
  | "TRUNCATED_INPUT";

/**
 * The judge sent something this agent cannot interpret. Always fatal: the
 * agent exits without answering rather than guess at the game state.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  readonly lineNumber?: number;

  constructor(code: ProtocolErrorCode, message: string, opts: { lineNumber?: number; cause?: unknown } = {}) {
    super(opts.lineNumber === undefined ? message : `line ${opts.lineNumber}: ${message}`, { cause: opts.cause });
    this.name = "ProtocolError";
    this.code = code;
    this.lineNumber = opts.lineNumber;
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}
