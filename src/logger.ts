// Presentation Analyzer - Console Logger
//
// Components receive a Logger through their dependency objects so tests can
// inject spies. Lines are prefixed `[LEVEL] [Component]`.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Creates a console-backed logger for one component. Messages below
 * `minLevel` are dropped.
 */
export function createLogger(component: string, minLevel: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const prefix = (level: LogLevel) => `[${level.toUpperCase()}] [${component}]`;

  return {
    debug: (msg, ...args) => {
      if (LEVEL_ORDER.debug >= threshold) console.debug(`${prefix("debug")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (LEVEL_ORDER.info >= threshold) console.log(`${prefix("info")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (LEVEL_ORDER.warn >= threshold) console.warn(`${prefix("warn")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (LEVEL_ORDER.error >= threshold) console.error(`${prefix("error")} ${msg}`, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
