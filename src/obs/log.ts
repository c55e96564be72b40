export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export type Logger = {
  level: LogLevel;
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogSink = (line: string) => void;

// stdout belongs to the judge protocol; every log line goes to stderr.
const stderrSink: LogSink = (line) => {
  // eslint-disable-next-line no-console
  console.error(line);
};

// Own fields (code, details, lineNumber, ...) ride along with name and message.
function serializeError(err: Error): LogFields {
  return { ...Object.fromEntries(Object.entries(err)), name: err.name, message: err.message };
}

function normalizeFields(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

export function createLogger(opts: { level?: LogLevel; sink?: LogSink } = {}): Logger {
  const level = opts.level ?? "info";
  const sink = opts.sink ?? stderrSink;
  const threshold = LEVEL_RANK[level];

  const emit = (lvl: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const payload = {
      timestamp: new Date().toISOString(),
      level: lvl,
      message,
      ...(fields ? normalizeFields(fields) : {}),
    };
    sink(JSON.stringify(payload));
  };

  return {
    level,
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}

/** Logger that drops everything; the default for library callers and tests. */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => {} });
