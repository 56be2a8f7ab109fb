export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function emit(level: LogLevel, message: string, meta: LogMeta): void {
  const payload = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  const line = `[${level.toUpperCase()}] ${message}${payload}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** Messages below `threshold` are dropped. */
export function createLogger(threshold: LogLevel = "info"): Logger {
  const at = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]) {
      emit(level, message, meta);
    }
  };
  return {
    level: threshold,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error")
  };
}

export const logger = createLogger();
