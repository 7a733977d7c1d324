/**
 * Simple leveled logger used by every Brokerline component
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Simple logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'info'
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.component}] DEBUG:`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.component}] INFO:`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.component}] WARN:`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[${this.component}] ERROR:`, message, ...args);
  }

  /**
   * Create a logger for a sub-component sharing this logger's level
   */
  child(name: string): ConsoleLogger {
    return new ConsoleLogger(`${this.component}:${name}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createLogger(component: string, level: LogLevel = 'info'): ConsoleLogger {
  return new ConsoleLogger(component, level);
}

/**
 * Derive a component logger when the parent supports it
 */
export function childLogger(parent: Logger, name: string): Logger {
  return parent instanceof ConsoleLogger ? parent.child(name) : parent;
}
