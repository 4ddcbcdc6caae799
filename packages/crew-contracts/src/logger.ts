/**
 * Logging port consumed by every devcrew component.
 *
 * Components never write to the console directly; they receive a `Logger`
 * through their config and call it with a message plus structured metadata.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error | LogMeta): void;
}

/**
 * Logger that drops everything. Default for components constructed without one.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
