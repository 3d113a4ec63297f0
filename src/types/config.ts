/**
 * Configuration types for attack-workbook.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AttackWorkbookConfig {
  logging: LogConfig;
  source: SourceConfig;
}

export interface LogConfig {
  level: LogLevel;
}

export interface SourceConfig {
  stixBaseUrl: string;      // <base>/<domain>/<domain>.json
  fetchTimeoutMs: number;
}
