// src/types/config.types.ts

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: LogLevel;
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig {
  profile?: string;
  profiles?: Record<string, LoggingProfile>;
  appendTimestamp?: boolean;
  timestampFormat?: string;
  logLevel?: LogLevel;
  enableWarningLog?: boolean;
  logDirectory?: string;
}

export interface PopplerConfig {
  // Directory holding the pdftotext executable; PATH lookup when absent
  popplerPath?: string;
}

export interface TableExtractionStrategy {
  name: string;
  // Max vertical distance (pt) between word baselines on the same text line
  rowTolerance: number;
  // Max horizontal gap (pt) between word spans that still share a column
  edgeTolerance: number;
}

export interface TableExtractionConfig {
  primary: TableExtractionStrategy;
  fallback: TableExtractionStrategy;
  minColumns: number;
  minRows: number;
}

export interface AppConfig {
  databaseUrl?: string;
  poppler: PopplerConfig;
  tables: TableExtractionConfig;
  captionWeightsFile: string;
  // Unset unless LOG_LEVEL or the config file names one; the logging profile decides then
  logLevel?: LogLevel;
}
