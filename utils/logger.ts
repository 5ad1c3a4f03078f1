/**
 * Logging Utility
 *
 * Centralized logging using Winston for structured, level-based logging.
 */

import winston from 'winston';
import path from 'path';
import env from '../config/env';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogLevel = keyof typeof levels;

// Define colors for each level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const REDACTED = '***REDACTED***';
const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'authorization'];

const isSensitiveKey = (key: string): boolean =>
  SENSITIVE_KEYS.some(k => key.toLowerCase().includes(k));

const redactValue = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(redactValue);
  if (!value || typeof value !== 'object' || value instanceof Error) return value;

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return copy;
};

/**
 * Masks metadata fields whose names look like credentials.
 * Mutates the info object in place so winston's symbol keys survive.
 */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

const formatLine = (info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, ...meta } = info;
  const metaText = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${metaText}`;
};

const logFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(formatLine)
);

const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.printf(formatLine)
);

const logger = winston.createLogger({
  level: env.logLevel === 'silent' ? 'error' : env.logLevel,
  levels,
  format: logFormat,
  silent: env.logLevel === 'silent',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
  exitOnError: false
});

if (env.enableFileLogging) {
  logger.add(
    new winston.transports.File({
      filename: path.join(env.logDir, 'error.log'),
      level: 'error',
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(env.logDir, 'all.log'),
    })
  );
}

logger.debug(`Logger initialized at level: ${env.logLevel}`, {
  environment: env.env
});

export interface LoggerInterface {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  logger: winston.Logger;
}

const loggerExport: LoggerInterface = {
  debug: (message, meta) => { logger.debug(message, meta); },
  info: (message, meta) => { logger.info(message, meta); },
  warn: (message, meta) => { logger.warn(message, meta); },
  error: (message, meta) => { logger.error(message, meta); },

  // Raw logger instance (for advanced usage)
  logger
};

export default loggerExport;
