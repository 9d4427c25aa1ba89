export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Console-backed logger that drops messages below `level`. */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const enabled = (l: LogLevel) => SEVERITY[l] >= SEVERITY[level];
  const write =
    (l: Exclude<LogLevel, "silent">) =>
    (message: string, context?: Record<string, unknown>) => {
      if (!enabled(l)) return;
      const line = `[furnilytics] ${message}`;
      if (context) console[l](line, context);
      else console[l](line);
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}
