import readline from "node:readline";
import { makeStrategy } from "../ai";
import { isEngineError } from "../engine";
import type { Logger } from "../obs/log";
import { isProtocolError } from "../protocol/errors";
import { handleEndOfInput, handleLine, initialSession, type SessionConfig, type SessionState } from "../protocol/session";
import type { AgentConfig } from "./config";

export const EXIT_OK = 0;
export const EXIT_FAULT = 1;
export const EXIT_PROTOCOL = 2;
export const EXIT_ENGINE = 3;

export type LineWriter = { write: (chunk: string) => unknown };

export type RunAgentOptions = {
  input: NodeJS.ReadableStream;
  output: LineWriter;
  config: AgentConfig;
  log: Logger;
  /** Clock for the search deadline; defaults to performance.now. */
  now?: () => number;
};

export function exitCodeFor(err: unknown): number {
  if (isProtocolError(err)) return EXIT_PROTOCOL;
  if (isEngineError(err)) return EXIT_ENGINE;
  return EXIT_FAULT;
}

export function sessionConfigFrom(config: AgentConfig, log: Logger, now?: () => number): SessionConfig {
  return {
    strategy: makeStrategy(config.strategy, { maxDepth: config.maxDepth, now }),
    moveTimeMs: config.moveTimeMs,
    safetyMarginMs: config.safetyMarginMs,
    rules: { placementRule: config.placementRule },
    log,
  };
}

/**
 * Play one game: read judge lines until game over or end of input, answer
 * each of our turns with exactly one complete line. Resolves to the process
 * exit code; fatal errors are logged, never rethrown.
 */
export async function runAgent(opts: RunAgentOptions): Promise<number> {
  const { input, output, config, log } = opts;
  const cfg = sessionConfigFrom(config, log, opts.now);
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  let state: SessionState = initialSession();
  try {
    for await (const line of rl) {
      const result = handleLine(state, line, cfg);
      state = result.nextState;
      if (result.output !== undefined) output.write(`${result.output}\n`);
      if (state.phase === "gameOver") break;
    }
    state = handleEndOfInput(state);
    log.info("session finished", { linesRead: state.linesRead });
    return EXIT_OK;
  } catch (err) {
    log.error(isProtocolError(err) ? "protocol error" : "fatal error", { err, linesRead: state.linesRead });
    return exitCodeFor(err);
  } finally {
    rl.close();
  }
}
