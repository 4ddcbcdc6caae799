/**
 * Console implementation of the Logger port.
 */

import type { LogLevel, LogMeta, Logger } from '@devcrew/crew-contracts';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Output sink, defaults to the console */
  write?: (level: Exclude<LogLevel, 'silent'>, line: string) => void;
}

export interface ScopedLogger extends Logger {
  child(name: string): ScopedLogger;
}

function defaultWrite(level: Exclude<LogLevel, 'silent'>, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function formatMeta(meta: Error | LogMeta | undefined): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return ` ${meta.stack ?? meta.message}`;
  }
  return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
}

/**
 * `[timestamp] [name] [LEVEL] message {meta}` lines filtered by level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ScopedLogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const name = options.name ?? 'devcrew';
  const write = options.write ?? defaultWrite;

  const log = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: Error | LogMeta): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    write(level, `[${new Date().toISOString()}] [${name}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, error) => log('error', message, error),
    child: (childName) => createConsoleLogger({ ...options, name: `${name}:${childName}` }),
  };
}
