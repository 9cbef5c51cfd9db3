/**
 * Logger
 * winston logger factory; each run builds its own instance and hands
 * child loggers to the pipeline stages
 */

import * as winston from 'winston';
import type { Logger } from 'winston';

export type { Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  /** Append JSON lines to this file as well as the console */
  file?: string;
  /** Discard all output (tests) */
  silent?: boolean;
}

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Safe JSON stringify to handle circular references in metadata
const safeStringify = (value: unknown): string => {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key, val: unknown) => {
    if (val !== null && typeof val === 'object') {
      if (seen.has(val)) return '[Circular]';
      seen.add(val);
    }
    return val;
  });
};

const consoleFormat = printf((info) => {
  const { level, message, timestamp: time, component, ...meta } = info;
  const prefix = typeof component === 'string' ? `[${component}] ` : '';
  const metaString = Object.keys(meta).length ? ` ${safeStringify(meta)}` : '';
  return `${String(time)} ${level}: ${prefix}${String(message)}${metaString}`;
});

export function createLogger(options: LoggerOptions = {}): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: options.silent,
      format: combine(colorize(), timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), consoleFormat),
    }),
  ];

  if (options.file && !options.silent) {
    transports.push(
      new winston.transports.File({
        filename: options.file,
        format: combine(timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: options.level || 'info',
    format: errors({ stack: true }),
    transports,
    exitOnError: false,
  });
}
