export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export type Logger = {
  debug(context: LogContext, message: string): void;
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  child(bindings: LogContext): Logger;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

// ANSI colors for local development output.
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\u001b[36m",
  info: "\u001b[32m",
  warn: "\u001b[33m",
  error: "\u001b[31m"
};
const COLOR_RESET = "\u001b[0m";

const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value);
};

/**
 * `LOG_LEVEL` wins when set. Otherwise tests are silent, production logs from
 * `info` and everything else from `debug`.
 */
const resolveMinimumLevel = (): LogLevel | null => {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }

  switch (process.env.NODE_ENV) {
    case "test":
      return null;
    case "production":
      return "info";
    default:
      return "debug";
  }
};

const isEnabled = (level: LogLevel): boolean => {
  const minimum = resolveMinimumLevel();
  return minimum !== null && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
};

const toLoggable = (value: unknown, ancestors: readonly object[]): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }

  if (typeof value !== "object" || value === null) {
    return value;
  }

  if (ancestors.includes(value)) {
    return "[Circular]";
  }

  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toLoggable(item, path));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, toLoggable(item, path)])
  );
};

const render = (level: LogLevel, context: LogContext, message: string): string => {
  const timestamp = new Date().toISOString();
  const fields = Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, toLoggable(value, [])])
  );

  if (process.env.NODE_ENV === "production") {
    return JSON.stringify({ timestamp, level, message, ...fields });
  }

  const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `${timestamp} ${LEVEL_COLORS[level]}${level.toUpperCase()}${COLOR_RESET} ${message}${suffix}`;
};

const createLogger = (bindings: LogContext): Logger => {
  const emit = (level: LogLevel, context: LogContext, message: string): void => {
    if (isEnabled(level)) {
      CONSOLE_WRITERS[level](render(level, { ...bindings, ...context }, message));
    }
  };

  return {
    debug: (context, message) => emit("debug", context, message),
    info: (context, message) => emit("info", context, message),
    warn: (context, message) => emit("warn", context, message),
    error: (context, message) => emit("error", context, message),
    child: (childBindings) => createLogger({ ...bindings, ...childBindings })
  };
};

export const logger = createLogger({});
