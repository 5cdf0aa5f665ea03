/**
 * @eventframe/core - Pino Logger Adapter
 *
 * Structured JSON logging behind the {@link ILogger} port.
 */

import pino from 'pino';
import type { ILogger } from '../../application/logging/ILogger';
import type { AppConfig } from '../config/config';

export type LoggerConfig = Pick<AppConfig, 'LOG_LEVEL' | 'LOG_FORMAT' | 'SERVICE_NAME'>;

/**
 * Turn `key, value, key, value` pairs into a pino merge object. `Error`
 * values are serialized with pino's error serializer; a trailing key with
 * no value is kept under `extra`.
 */
export function toFields(keysAndValues: unknown[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (let i = 0; i < keysAndValues.length; i += 2) {
    if (i + 1 >= keysAndValues.length) {
      fields.extra = keysAndValues[i];
      break;
    }
    const value = keysAndValues[i + 1];
    fields[String(keysAndValues[i])] =
      value instanceof Error ? pino.stdSerializers.err(value) : value;
  }
  return fields;
}

/**
 * ILogger over a pino instance.
 */
export class PinoLogger implements ILogger {
  constructor(private readonly logger: pino.Logger) {}

  debug(message: string, ...keysAndValues: unknown[]): void {
    this.logger.debug(toFields(keysAndValues), message);
  }

  info(message: string, ...keysAndValues: unknown[]): void {
    this.logger.info(toFields(keysAndValues), message);
  }

  warn(message: string, ...keysAndValues: unknown[]): void {
    this.logger.warn(toFields(keysAndValues), message);
  }

  error(message: string, ...keysAndValues: unknown[]): void {
    this.logger.error(toFields(keysAndValues), message);
  }

  /** Logged at pino's `fatal` level; the process is not exited. */
  fatal(message: string, ...keysAndValues: unknown[]): void {
    this.logger.fatal(toFields(keysAndValues), message);
  }
}

/**
 * Build the production logger from configuration.
 *
 * @param destination - Where lines are written; stdout when omitted
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger(loadConfig());
 * await commandBus.handle(ctx, logger, command);
 * ```
 */
export function createPinoLogger(
  config: LoggerConfig,
  destination?: pino.DestinationStream,
): PinoLogger {
  const options: pino.LoggerOptions = {
    name: config.SERVICE_NAME,
    level: config.LOG_LEVEL,
    msgPrefix: config.LOG_FORMAT === 'text' ? `[${config.SERVICE_NAME}] ` : undefined,
  };
  const instance = destination ? pino(options, destination) : pino(options);
  return new PinoLogger(instance);
}
