export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const resolveLevel = (): LogLevel => {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
};

const enabled = (level: Exclude<LogLevel, "silent">) =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(resolveLevel());

export const createLogger = (scope: string): Logger => {
  const tag = `[${scope}]`;
  return {
    debug: (message, context = {}) => {
      if (enabled("debug")) console.debug(tag, message, context);
    },
    info: (message, context = {}) => {
      if (enabled("info")) console.info(tag, message, context);
    },
    warn: (message, context = {}) => {
      if (enabled("warn")) console.warn(tag, message, context);
    },
    error: (message, context = {}) => {
      if (enabled("error")) console.error(tag, message, context);
    }
  };
};
