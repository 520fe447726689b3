/**
 * Shared logging utilities for services
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
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
   * Derive a logger for a component of the same service
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${component}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return levelRank[level] >= levelRank[this.level];
  }
}

/**
 * Create a console logger, honouring LOG_LEVEL when no level is given
 */
export function createLogger(serviceName: string, level?: string): ConsoleLogger {
  const requested = (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
  return new ConsoleLogger(serviceName, isLogLevel(requested) ? requested : "info");
}

/**
 * Logger that drops everything, for tests and embedded use
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
