type LogLevel = "debug" | "info" | "warn" | "error";

type LogSink = Pick<Console, LogLevel>;

type LogContext = {
  prefix?: string;
  /** Lowest level that is written. Defaults to `info`. */
  level?: LogLevel;
  sanitize?: (value: unknown) => unknown;
  sink?: LogSink;
};

/**
 * Shape accepted by every locator component. Methods are optional so callers
 * can pass a partial logger (tests often only capture warnings).
 */
export interface LocatorLogger {
  debug?(message: string, data?: Record<string, unknown>): void;
  info?(message: string, data?: Record<string, unknown>): void;
  warn?(message: string, data?: Record<string, unknown>): void;
  error?(message: string, data?: Record<string, unknown>): void;
}

const DEFAULT_PREFIX = "[ANCHOR]";

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLevelEnabled(level: LogLevel, threshold: LogLevel = "info"): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function sanitizePayload(value: unknown, context?: LogContext): unknown {
  if (!context?.sanitize) {
    return value;
  }

  try {
    return context.sanitize(value);
  } catch {
    return value;
  }
}

export function log(level: LogLevel, message: string, data?: unknown, context?: LogContext): void {
  if (!isLevelEnabled(level, context?.level)) {
    return;
  }

  const sink = context?.sink ?? console;
  const line = `${context?.prefix ?? DEFAULT_PREFIX} ${message}`;
  const payload = sanitizePayload(data, context);

  if (typeof payload === "undefined") {
    sink[level](line);
  } else {
    sink[level](line, payload);
  }
}

export function createConsoleLogger(context?: LogContext): Required<LocatorLogger> {
  return {
    debug: (message, data) => log("debug", message, data, context),
    info: (message, data) => log("info", message, data, context),
    warn: (message, data) => log("warn", message, data, context),
    error: (message, data) => log("error", message, data, context)
  };
}

export const consoleLogger: Required<LocatorLogger> = createConsoleLogger();

export type { LogContext, LogLevel, LogSink };
