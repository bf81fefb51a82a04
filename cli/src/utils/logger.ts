/**
 * xbe CLI Logger Module
 *
 * Diagnostic logging to stderr, plus an optional log file. Command output and
 * user-facing errors never go through here.
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { LogLevel } from '../types/config';

export interface LoggerOptions {
  logLevel: LogLevel;
  componentName: string;
  logFile?: string;
  silent?: boolean;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Create a Winston logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const { logFile, logLevel, componentName } = options;

  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [
    new winston.transports.Console({
      stderrLevels: ALL_LEVELS,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message }) => `${level} [${componentName}]: ${message}`)
      )
    })
  ];

  if (logFile) {
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: logFile,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
        tailable: true
      })
    );
  }

  return winston.createLogger({
    level: logLevel,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.printf(({ timestamp, level, message, ...rest }) => {
        const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
        return `[${timestamp}] ${level.toUpperCase()} [${componentName}]: ${message}${extra}`;
      })
    ),
    transports
  });
}

/**
 * Format a request duration for debug output
 */
export function formatDuration(milliseconds: number): string {
  if (milliseconds < 1000) {
    return `${Math.round(milliseconds)}ms`;
  }
  return `${(milliseconds / 1000).toFixed(1)}s`;
}
