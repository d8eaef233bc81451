export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = Readonly<{
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}>;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  const keys = Object.keys(context);
  if (keys.length === 0) return "";
  return ` ${keys.map((key) => `${key}=${JSON.stringify(context[key])}`).join(" ")}`;
}

export function createConsoleLogger(prefix = "[ChatRelay]", level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug(message, context) {
      if (enabled("debug")) console.debug(`${prefix} ${message}${formatContext(context)}`);
    },
    info(message, context) {
      if (enabled("info")) console.log(`${prefix} ${message}${formatContext(context)}`);
    },
    warn(message, context) {
      if (enabled("warn")) console.warn(`${prefix} ${message}${formatContext(context)}`);
    },
    error(message, context) {
      if (enabled("error")) console.error(`${prefix} ${message}${formatContext(context)}`);
    }
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
