/**
 * Tagged console logger.
 * Every line is written as "[Tag] message", the same form the services have
 * always used with console.log, behind an interface so tests can capture it.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(tag: string): Logger;
}

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
    child(childTag) {
      return createLogger(`${tag}:${childTag}`);
    },
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
