export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function normalizeLevel(level: string): LogLevel {
  const normalized = level.trim().toLowerCase();

  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }

  return "info";
}

export function createLogger(level: string, sink: Pick<Console, "log" | "warn" | "error"> = console): Logger {
  const threshold = LEVEL_ORDER[normalizeLevel(level)];
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] >= threshold;

  return {
    debug(message: string): void {
      if (enabled("debug")) {
        sink.log(message);
      }
    },
    info(message: string): void {
      if (enabled("info")) {
        sink.log(message);
      }
    },
    warn(message: string): void {
      if (enabled("warn")) {
        sink.warn(message);
      }
    },
    error(message: string, error?: unknown): void {
      if (!enabled("error")) {
        return;
      }

      if (error === undefined) {
        sink.error(message);
      } else {
        sink.error(message, error);
      }
    }
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
