export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, detail?: string): void;
  info(message: string, detail?: string): void;
  warn(message: string, detail?: string): void;
  error(message: string, detail?: string): void;
  scoped(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createConsoleLogger(
  level: LogLevel = "info",
  sink: LogSink = consoleSink,
  scope?: string
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (msgLevel: LogLevel, message: string, detail?: string): void => {
    if (LOG_LEVELS.indexOf(msgLevel) < threshold) {
      return;
    }
    const prefix = scope ? `[${msgLevel}] [${scope}]` : `[${msgLevel}]`;
    const emit = msgLevel === "warn" || msgLevel === "error" ? sink.err : sink.out;
    emit(`${prefix} ${message}`);
    if (detail) {
      emit(detail);
    }
  };

  return {
    debug: (message, detail) => write("debug", message, detail),
    info: (message, detail) => write("info", message, detail),
    warn: (message, detail) => write("warn", message, detail),
    error: (message, detail) => write("error", message, detail),
    scoped: (child) => createConsoleLogger(level, sink, scope ? `${scope}:${child}` : child)
  };
}

/** Drops everything. Handy for tests and library callers that bring no logger. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  scoped: () => silentLogger
};
