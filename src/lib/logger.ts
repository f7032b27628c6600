/**
 * Diagnostic logging
 *
 * Console output goes to stderr so command output on stdout stays
 * pipeable. When a log file is configured, JSON lines are appended there
 * instead.
 */

import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface LoggerConfig {
  logFile?: string;
  logLevel?: LogLevel;
  silent?: boolean;
}

class Logger {
  private static instance: winston.Logger | null = null;
  private static config: LoggerConfig = {};

  private static createLogger(): winston.Logger {
    const { logFile, logLevel = 'info', silent = false } = Logger.config;
    const transports: winston.transport[] = [];

    if (logFile) {
      const logDir = path.dirname(logFile);
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      transports.push(
        new winston.transports.File({
          filename: logFile,
          level: logLevel,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.json()
          )
        })
      );
    } else {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug'],
          level: logLevel,
          format: winston.format.combine(
            winston.format.timestamp({ format: 'HH:mm:ss' }),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ timestamp, level, message, ...meta }) => {
              let line = `${timestamp} [egeria] [${level}] ${message}`;
              if (Object.keys(meta).length > 0) {
                line += ` ${JSON.stringify(meta)}`;
              }
              return line;
            })
          )
        })
      );
    }

    return winston.createLogger({
      level: logLevel,
      transports,
      exitOnError: false,
      silent
    });
  }

  static getLogger(): winston.Logger {
    if (Logger.instance === null) {
      Logger.config = Logger.configFromEnv();
      Logger.instance = Logger.createLogger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure at runtime (CLI flags, tests)
   */
  static reconfigure(config: LoggerConfig): void {
    Logger.config = { ...Logger.config, ...config };
    Logger.instance = Logger.createLogger();
  }

  private static configFromEnv(): LoggerConfig {
    const level = process.env.EGERIA_LOG_LEVEL;
    return {
      logFile: process.env.EGERIA_LOG_FILE || undefined,
      logLevel: isLogLevel(level) ? level : 'info',
      silent: process.env.EGERIA_LOG_SILENT === 'true'
    };
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'error' || value === 'warn' || value === 'info' || value === 'verbose' || value === 'debug';
}

export function getLogger(): winston.Logger {
  return Logger.getLogger();
}

export default Logger;
