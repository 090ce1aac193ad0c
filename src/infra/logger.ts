import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

/**
 * Walks up from this module until a package.json is found.
 */
export function findProjectRoot(): string {
  let currentDir = path.dirname(fileURLToPath(import.meta.url));
  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return process.cwd();
}

export class WinstonLogger implements ILogger {
  private logger: winston.Logger;
  private static sharedLogger: winston.Logger | null = null;

  constructor() {
    // One logger per process so every component appends to the same file
    if (!WinstonLogger.sharedLogger) {
      const logsDir = path.join(findProjectRoot(), 'logs');
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      WinstonLogger.sharedLogger = winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.colorize(),
              winston.format.printf(({ timestamp, level, message, ...meta }) => {
                return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
              })
            ),
          }),
          new winston.transports.File({
            filename: path.join(logsDir, 'stepcoach.log'),
            level: 'debug',
            options: { flags: 'a' },
          }),
        ],
      });

      WinstonLogger.sharedLogger.on('error', (err) => {
        console.error('Winston logger error:', err);
      });
    }

    this.logger = WinstonLogger.sharedLogger;
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        errorMessage: error.message,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      this.logger.error(message, { error });
    } else {
      this.logger.error(message);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}
