import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { config } from '../config/config';

const MAX_LOG_FILE_BYTES = 5 * 1024 * 1024;

/**
 * "2026-03-02 09:00:00 [INFO]: message {meta}"
 */
const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const line = `${timestamp} [${level.toUpperCase()}]: ${message}`;
    return Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
  })
);

function fileTransports(logFile: string): winston.transport[] {
  const logDir = path.dirname(logFile);
  fs.mkdirSync(logDir, { recursive: true });

  return [
    new winston.transports.File({ filename: logFile, maxsize: MAX_LOG_FILE_BYTES, maxFiles: 5 }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: MAX_LOG_FILE_BYTES,
      maxFiles: 5,
    }),
  ];
}

/**
 * Console always; files only when LOG_FILE is set. Silent under tests.
 */
export const logger = winston.createLogger({
  level: config.logging.level,
  format: lineFormat,
  silent: config.nodeEnv === 'test',
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), lineFormat),
    }),
    ...(config.logging.file ? fileTransports(config.logging.file) : []),
  ],
});

/**
 * One line per finished request. Client errors log at warn so failed logins
 * and rejected sessions stand out.
 */
export function logRequest(
  method: string,
  url: string,
  statusCode: number,
  duration: number
): void {
  const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

  logger.log(level, `${method} ${url} ${statusCode}`, { duration: `${duration}ms` });
}

export function logError(message: string, error: unknown, context?: Record<string, unknown>): void {
  if (error instanceof Error) {
    logger.error(message, { error: error.message, stack: error.stack, ...context });
    return;
  }

  logger.error(message, { error: String(error), ...context });
}
