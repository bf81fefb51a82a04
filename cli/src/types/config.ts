/**
 * xbe CLI - Configuration Types
 *
 * Shape of the optional JSON configuration file and its normalized form.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ===== File format =====

export interface LoggingConfig {
  logLevel?: string;                   // One of LOG_LEVELS, checked by ConfigLoader.validate
  logFile?: string;                    // Optional file transport path
}

export interface DefaultsConfig {
  output?: 'table' | 'json';
  timeout?: string;                    // "30s", "2m"
  color?: 'auto' | 'always' | 'never';
}

export interface XbeCliConfig {
  baseUrl?: string;                    // API base URL
  logging?: LoggingConfig;
  defaults?: DefaultsConfig;
}

// ===== Normalized config =====

export interface ResolvedConfig {
  baseUrl: string;
  configPath?: string;                 // File the values were read from, if any
  logging: {
    logLevel: LogLevel;
    logFile?: string;
  };
  defaults: Required<DefaultsConfig>;
  timeoutMs: number;
}

// ===== Default Values =====

export const DEFAULT_DEFAULTS_CONFIG: Required<DefaultsConfig> = {
  output: 'table',
  timeout: '30s',
  color: 'auto'
};
