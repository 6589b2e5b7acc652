export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  component: string;
  event: string;
  data?: Record<string, unknown>;
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
  child(component: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel | "silent";
  sink?: LogSink;
};

function isLevel(value: string | undefined): value is LogLevel | "silent" {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): LogLevel | "silent" {
  const normalized = raw?.trim().toLowerCase();
  return isLevel(normalized) ? normalized : "info";
}

/** One JSON line per entry; warnings and errors go to stderr. */
export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "warn" || entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_RANK[level];

  const emit = (entryLevel: LogLevel, event: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[entryLevel] < threshold) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      component,
      event,
    };
    if (data && Object.keys(data).length > 0) entry.data = data;
    sink(entry);
  };

  return {
    debug: (event, data) => emit("debug", event, data),
    info: (event, data) => emit("info", event, data),
    warn: (event, data) => emit("warn", event, data),
    error: (event, data) => emit("error", event, data),
    child: (name) => createLogger(`${component}.${name}`, { level, sink }),
  };
}

export const noopLogger: Logger = createLogger("noop", { level: "silent" });
