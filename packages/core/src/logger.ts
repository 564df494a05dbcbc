/**
 * winston logger shared by the pipeline. Everything goes to stderr so that
 * command output on stdout stays clean.
 */

import winston from 'winston';

const { combine, timestamp, printf, json, errors } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  silent?: boolean;
}

const humanFormat = printf(({ level, message, timestamp: ts, ...metadata }) => {
  let line = `${String(ts)} [${level}]: ${String(message)}`;
  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }
  return line;
});

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const format = options.json
    ? combine(timestamp(), errors({ stack: true }), json())
    : combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), humanFormat);

  return winston.createLogger({
    level: options.level ?? 'warn',
    silent: options.silent ?? false,
    format,
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
    exitOnError: false,
  });
}

/** Logger that drops everything; used by tests and as a default */
export function silentLogger(): winston.Logger {
  return createLogger({ silent: true });
}

export type Logger = winston.Logger;
