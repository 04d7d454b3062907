import { sanitizeForLog } from "./utils";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return normalized;
    default:
      return fallback;
  }
}

function normalizeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(typeof code === "string" ? { code } : {}),
    };
  }

  if (error && typeof error === "object") {
    return { value: sanitizeForLog(error) };
  }

  return { value: String(error) };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVEL_ORDER[level];

  const write = (targetLevel: Exclude<LogLevel, "silent">, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVEL_ORDER[targetLevel] < threshold) {
      return;
    }

    const payload = context ? ` ${JSON.stringify(sanitizeForLog(context))}` : "";
    const line = `[desk:${scope}] ${message}${payload}`;

    switch (targetLevel) {
      case "error":
        console.error(line);
        return;
      case "warn":
        console.warn(line);
        return;
      case "info":
        console.info(line);
        return;
      default:
        console.debug(line);
    }
  };

  return {
    debug(message, context) {
      write("debug", message, context);
    },
    info(message, context) {
      write("info", message, context);
    },
    warn(message, context) {
      write("warn", message, context);
    },
    error(message, error, context) {
      write("error", message, {
        ...context,
        error: normalizeError(error),
      });
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
