// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile, LogLevel } from '../types/config.types';
import { formatTimestampForFilename } from './dateUtils';

const DEFAULT_PROFILES: Record<string, LoggingProfile> = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export class ConfigurableLogger {
  /**
   * Build a winston logger from a logging configuration.
   * File transports are added only when the log directory can be created.
   */
  static create(config?: LoggingConfig, logLevel?: LogLevel): winston.Logger {
    const profile = this.resolveConfig(config, logLevel);
    const logsDir = path.resolve(process.cwd(), profile.logDirectory);

    const logger = winston.createLogger({
      level: profile.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), lineFormat)
        })
      ]
    });

    try {
      fs.mkdirSync(logsDir, { recursive: true });
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, using console only: ${error}`);
      return logger;
    }

    const combined = path.join(logsDir, this.generateLogFilename('combined.log', profile));
    const errorFile = path.join(logsDir, this.generateLogFilename('error.log', profile));
    logger.add(new winston.transports.File({ filename: combined, format: lineFormat }));
    logger.add(
      new winston.transports.File({
        filename: errorFile,
        level: 'error',
        format: winston.format.printf(({ level, message, timestamp, stack }) => {
          return `${timestamp} [${level}]: ${message}${stack ? '\n' + stack : ''}`;
        })
      })
    );

    if (profile.enableWarningLog) {
      const warning = path.join(logsDir, this.generateLogFilename('warning.log', profile));
      logger.add(new winston.transports.File({ filename: warning, level: 'warn', format: lineFormat }));
    }

    return logger;
  }

  static resolveConfig(config?: LoggingConfig, logLevel?: LogLevel): LoggingProfile {
    const profile = this.selectProfile(config);
    return logLevel ? { ...profile, logLevel } : profile;
  }

  private static selectProfile(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.Default;
    }

    if (config.profile) {
      const custom = config.profiles?.[config.profile];
      if (custom) return custom;
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) return builtIn;
      console.warn(`Logging profile '${config.profile}' not found, using Default`);
      return DEFAULT_PROFILES.Default;
    }

    return {
      appendTimestamp: config.appendTimestamp ?? false,
      timestampFormat: config.timestampFormat ?? 'YYYY-MM-DD-HHmmss',
      logLevel: config.logLevel ?? 'info',
      enableWarningLog: config.enableWarningLog !== false,
      logDirectory: config.logDirectory ?? 'logs'
    };
  }

  static generateLogFilename(baseName: string, profile: LoggingProfile, now?: Date): string {
    if (!profile.appendTimestamp) {
      return baseName;
    }
    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);
    return `${name}-${formatTimestampForFilename(now, profile.timestampFormat)}${ext}`;
  }
}
