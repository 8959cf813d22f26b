export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

type ConsoleMethod = "debug" | "info" | "warn" | "error";

export function createConsoleLogger(tag: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_RANK[level];

  function write(method: ConsoleMethod, message: string, details: unknown): void {
    if (LEVEL_RANK[method] < threshold) {
      return;
    }

    const line = `[${tag}] ${message}`;
    if (details === undefined) {
      console[method](line);
    } else {
      console[method](line, details);
    }
  }

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details)
  };
}

export const silentLogger: Logger = createConsoleLogger("silent", "silent");
