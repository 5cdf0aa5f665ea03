/**
 * @eventframe/core - Logger Port
 *
 * Leveled, structured logging. Every method takes a message followed by
 * alternating keys and values:
 *
 * ```typescript
 * logger.info('Command handled', 'type', 'CreateOrder', 'duration_ms', 12);
 * ```
 *
 * `fatal` marks an unrecoverable condition; adapters must not exit the
 * process. Terminating is the host's decision.
 */

export interface ILogger {
  debug(message: string, ...keysAndValues: unknown[]): void;
  info(message: string, ...keysAndValues: unknown[]): void;
  warn(message: string, ...keysAndValues: unknown[]): void;
  error(message: string, ...keysAndValues: unknown[]): void;
  fatal(message: string, ...keysAndValues: unknown[]): void;
}

export type LogLevel = keyof ILogger;

/**
 * Console logger with a level prefix.
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
  fatal: (message, ...args) => console.error(`[FATAL] ${message}`, ...args),
};

/**
 * Discards everything.
 */
export const noopLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
};
