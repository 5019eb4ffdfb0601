// src/utils/logger.ts
import * as winston from 'winston';
import { ConfigurableLogger } from './configurable-logger';
import { LoggingConfig, LogLevel } from '../types/config.types';

const logger: winston.Logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      )
    })
  ]
});

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Initialize logger with configuration
   * Call this at application startup with your config. An explicit level
   * replaces the one from the logging profile.
   */
  static initialize(config: LoggingConfig, logLevel?: LogLevel): void {
    const configured = ConfigurableLogger.create(config, logLevel);

    // Replace all transports in the shared logger instance
    logger.clear();
    configured.transports.forEach((transport) => {
      logger.add(transport);
    });
    logger.level = configured.level;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error !== undefined) {
      logger.error(`[${this.context}] ${message}: ${error instanceof Error ? error.message : String(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}
