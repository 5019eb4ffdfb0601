// src/utils/config.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_TABLE_EXTRACTION } from '../parsers/PopplerTableSource';
import { AppConfig, LogLevel } from '../types/config.types';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const StrategySchema = z.object({
  name: z.string(),
  rowTolerance: z.number().positive(),
  edgeTolerance: z.number().positive()
});

const AppConfigFileSchema = z.object({
  databaseUrl: z.string().optional(),
  popplerPath: z.string().optional(),
  captionWeightsFile: z.string().optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
  tables: z
    .object({
      primary: StrategySchema.optional(),
      fallback: StrategySchema.optional(),
      minColumns: z.number().int().min(2).optional(),
      minRows: z.number().int().min(3).optional()
    })
    .optional()
});

export type AppConfigFile = z.infer<typeof AppConfigFileSchema>;

export const DEFAULT_CAPTION_WEIGHTS_FILE = path.join('config', 'caption-weights.json');

export function readAppConfigFile(configPath: string): AppConfigFile {
  const result = AppConfigFileSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid config in ${configPath} at ${issue?.path.join('.') ?? '?'}: ${issue?.message}`);
  }
  return result.data;
}

function envLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Build the runtime configuration. Environment variables (normally loaded
 * from .env by the CLI) override the optional JSON file, which overrides
 * the defaults.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, configPath?: string): AppConfig {
  const file: AppConfigFile = configPath ? readAppConfigFile(configPath) : {};
  const popplerPath = env.POPPLER_PATH || file.popplerPath;

  return {
    databaseUrl: env.DATABASE_URL || file.databaseUrl,
    poppler: popplerPath ? { popplerPath } : {},
    tables: {
      primary: file.tables?.primary ?? DEFAULT_TABLE_EXTRACTION.primary,
      fallback: file.tables?.fallback ?? DEFAULT_TABLE_EXTRACTION.fallback,
      minColumns: file.tables?.minColumns ?? DEFAULT_TABLE_EXTRACTION.minColumns,
      minRows: file.tables?.minRows ?? DEFAULT_TABLE_EXTRACTION.minRows
    },
    captionWeightsFile: file.captionWeightsFile ?? DEFAULT_CAPTION_WEIGHTS_FILE,
    logLevel: envLogLevel(env.LOG_LEVEL) ?? file.logLevel
  };
}

export function requireDatabaseUrl(config: AppConfig): string {
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is not set (use .env or --config)');
  }
  return config.databaseUrl;
}
