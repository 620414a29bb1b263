import { pino, type BaseLogger, type DestinationStream, type LoggerOptions } from 'pino';

/**
 * Structural logger accepted by every core component. Both a plain pino
 * instance and Fastify's request/server loggers satisfy it.
 */
export type Logger = BaseLogger;

export function createLogger(name: string, options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const merged: LoggerOptions = {
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    redact: { paths: ['password', '*.password', 'apiKey'], censor: '[REDACTED]' },
    ...options,
  };
  return destination ? pino(merged, destination) : pino(merged);
}
