// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LoggingConfig, LogLevel } from '../types/config.types';
import { Logger } from './logger';

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const LoggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: LogLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string()
});

export const LoggingConfigSchema = z.object({
  profile: z.string().optional(),
  profiles: z.record(LoggingProfileSchema).optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  enableWarningLog: z.boolean().optional(),
  logDirectory: z.string().optional()
});

/**
 * Load logging configuration from the LOGGING_CONFIG environment variable,
 * then config/log-config.json. Returns the fallback when neither is usable.
 */
export function loadLoggingConfig(fallbackConfig?: LoggingConfig): LoggingConfig | undefined {
  if (process.env.LOGGING_CONFIG) {
    const fromEnv = parseLoggingConfig(process.env.LOGGING_CONFIG, 'LOGGING_CONFIG');
    if (fromEnv) return fromEnv;
  }

  const logConfigPath = path.join(process.cwd(), 'config', 'log-config.json');
  if (fs.existsSync(logConfigPath)) {
    const fromFile = parseLoggingConfig(fs.readFileSync(logConfigPath, 'utf-8'), logConfigPath);
    if (fromFile) return fromFile;
  }

  return fallbackConfig;
}

export function parseLoggingConfig(json: string, source: string): LoggingConfig | undefined {
  try {
    const result = LoggingConfigSchema.safeParse(JSON.parse(json));
    if (result.success) return result.data;
    console.warn(`Ignoring invalid logging config in ${source}: ${result.error.issues[0]?.message}`);
  } catch (error) {
    console.warn(`Failed to parse logging config in ${source}: ${error}`);
  }
  return undefined;
}

/**
 * Initialize logger with centralized config or fallback
 * This should be called at the start of any CLI command. `logLevel`, when
 * given, wins over the level of whichever logging profile is loaded.
 */
export function initializeLogger(fallbackConfig?: LoggingConfig, logLevel?: LogLevel): void {
  const loggingConfig = loadLoggingConfig(fallbackConfig);

  if (loggingConfig) {
    Logger.initialize(loggingConfig, logLevel);
    new Logger('LogConfigLoader').debug(`Initialized logger with profile: ${loggingConfig.profile || 'default'}`);
  }
}
