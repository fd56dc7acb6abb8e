export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Where log lines end up. `out` gets debug/info, `err` gets warn/error. */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/** Leveled console logger; messages below `level` are dropped. */
export function createLogger(level: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug: (message) => {
      if (enabled("debug")) sink.out(`[debug] ${message}`);
    },
    info: (message) => {
      if (enabled("info")) sink.out(message);
    },
    warn: (message) => {
      if (enabled("warn")) sink.err(message);
    },
    error: (message) => {
      if (enabled("error")) sink.err(message);
    },
  };
}
