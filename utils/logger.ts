/**
 * Logging Utility
 *
 * Centralized, level-based logging using Winston.
 * The parser logs at debug level only, so a host application sees nothing
 * unless it turns LOG_LEVEL up.
 */

import winston from 'winston';
import path from 'path';
import { configure } from 'safe-stable-stringify';
import config from '../config/env';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogLevel = keyof typeof levels;

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

// Same serializer winston's own json format uses; cycles become "[Circular]"
const stringifyMeta = configure({ circularValue: '[Circular]', deterministic: false });

/**
 * Render log metadata as a JSON suffix, or an empty string when there is none.
 */
export function formatMeta(meta: Record<string, unknown>): string {
  return Object.keys(meta).length > 0 ? ` ${stringifyMeta(meta)}` : '';
}

// Metadata is appended as JSON so structured fields survive the printf format
const printLine = winston.format.printf((info) => {
  const { timestamp, level, message, ...meta } = info;
  return `${String(timestamp)} ${level}: ${String(message)}${formatMeta(meta)}`;
});

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  printLine
);

const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  printLine
);

const isSilent = config.logLevel === 'silent';

const logger = winston.createLogger({
  level: isSilent ? 'error' : config.logLevel,
  levels,
  format: logFormat,
  silent: isSilent,
  transports: [
    // Console goes to stderr so CLI output on stdout stays clean
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: Object.keys(levels),
    }),
  ],
  exitOnError: false
});

if (config.enableFileLogging) {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(config.logDir, 'all.log'),
    })
  );
}

logger.debug(`Logger initialized at level: ${config.logLevel}`, {
  environment: config.env
});

if (config.ignoredSettings.length > 0) {
  logger.warn('⚠️ Ignoring invalid environment settings, using defaults', {
    settings: config.ignoredSettings
  });
}

function logWithContext(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  logger.log(level, message, meta);
}

export interface LoggerInterface {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  logger: winston.Logger;
}

const loggerExport: LoggerInterface = {
  debug: (message, meta) => logWithContext('debug', message, meta),
  info: (message, meta) => logWithContext('info', message, meta),
  warn: (message, meta) => logWithContext('warn', message, meta),
  error: (message, meta) => logWithContext('error', message, meta),

  // Raw logger instance (for advanced usage)
  logger
};

export default loggerExport;
