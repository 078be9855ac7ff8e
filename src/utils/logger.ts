import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';
import { LoggingOptions } from '../types';

const MAX_LOG_SIZE = 10 * 1024 * 1024;

let defaultLogger: winston.Logger | undefined;

/**
 * Setup Winston logger with console and optional file transports
 */
export function createLogger(options: LoggingOptions = { level: 'info' }): winston.Logger {
  const logFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.simple()
  );

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: process.env.NODE_ENV === 'test' ? 'error' : options.level,
    stderrLevels: ['error', 'warn', 'info', 'debug']
  });

  const fileTransports = options.logPath ? createFileTransports(options.logPath) : [];

  return winston.createLogger({
    level: options.level,
    format: logFormat,
    transports: [consoleTransport, ...fileTransports]
  });
}

/**
 * Console logger shared by clients and transports constructed without one
 */
export function getDefaultLogger(): winston.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

function createFileTransports(logPath: string) {
  ensureLogDirectorySync(logPath);

  return [
    new winston.transports.File({
      filename: path.join(logPath, 'docksock.log'),
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true
    }),
    new winston.transports.File({
      filename: path.join(logPath, 'docksock-error.log'),
      level: 'error',
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true
    })
  ];
}

function ensureLogDirectorySync(logPath: string): void {
  try {
    fs.accessSync(logPath);
  } catch {
    fs.mkdirSync(logPath, { recursive: true });
  }
}
