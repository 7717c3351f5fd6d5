export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console logger. Lines read `<iso time> <name> <LEVEL> <message>`;
 * anything below `level` is dropped.
 */
export function createLogger(name: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (at: LogLevel, message: string): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `${new Date().toISOString()} ${name} ${at.toUpperCase()} ${message}`;
    switch (at) {
      case "debug": console.debug(line); break;
      case "info": console.info(line); break;
      case "warn": console.warn(line); break;
      case "error": console.error(line); break;
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
