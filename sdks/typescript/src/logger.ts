export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit =
    (name: Exclude<LogLevel, "silent">) =>
    (message: string, context?: Record<string, unknown>) => {
      if (LEVEL_ORDER[name] < threshold) return;
      const line = `[fuga] ${name.toUpperCase()} ${message}`;
      if (context && Object.keys(context).length > 0) {
        sink[name](line, context);
      } else {
        sink[name](line);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
