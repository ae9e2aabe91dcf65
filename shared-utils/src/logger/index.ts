/**
 * Shared logging for listing-sync packages
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Parse a LOG_LEVEL style string, falling back to "info"
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private serviceName: string,
    private level: LogLevel = "info"
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Derive a logger for a sub-component, e.g. "marketplace:driver"
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${component}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

/**
 * Logger that drops everything; handy in tests
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createLogger(
  serviceName: string,
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): ConsoleLogger {
  return new ConsoleLogger(serviceName, level);
}
