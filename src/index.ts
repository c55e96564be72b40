export * from "./types";
export * from "./engine";
export * from "./ai";
export { ProtocolError, isProtocolError } from "./protocol/errors";
export type { ProtocolErrorCode } from "./protocol/errors";
export { handleLine, handleEndOfInput, initialSession } from "./protocol/session";
export type { SessionState, SessionConfig, HandleResult, GameStage } from "./protocol/session";
export { runAgent, exitCodeFor, EXIT_OK, EXIT_FAULT, EXIT_PROTOCOL, EXIT_ENGINE } from "./agent/runAgent";
export { loadConfig, AgentConfigSchema } from "./agent/config";
export type { AgentConfig } from "./agent/config";
export { createLogger, silentLogger } from "./obs/log";
export type { Logger, LogLevel } from "./obs/log";
