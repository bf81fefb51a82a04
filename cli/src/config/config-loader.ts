/**
 * xbe CLI - Configuration Loader
 *
 * Loads the optional JSON config file, expands environment variables in it,
 * validates it and merges it with environment overrides and built-in defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { CLI_CONFIG } from './defaults';
import { errorMessage } from '../utils/error-handler';
import {
  XbeCliConfig,
  ResolvedConfig,
  LogLevel,
  LOG_LEVELS,
  DEFAULT_DEFAULTS_CONFIG
} from '../types/config';

export interface LoadOptions {
  configPath?: string;                 // --config
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
  private static readonly CONFIG_FILE_NAME = 'config.json';
  private static readonly LOCAL_CONFIG_PATH = './xbe-config.json';

  /**
   * Load configuration from file with fallbacks and validation
   */
  static load(options: LoadOptions = {}): ResolvedConfig {
    const env = options.env ?? process.env;
    const { config, configPath } = this.loadConfigFile(options.configPath, env);

    const errors = this.validate(config);
    if (errors.length > 0) {
      throw new Error(`Invalid configuration${configPath ? ` in ${configPath}` : ''}:\n  ${errors.join('\n  ')}`);
    }

    return this.processConfig(config, configPath, env);
  }

  /**
   * Directory holding config.json and credentials.json
   */
  static configHome(env: NodeJS.ProcessEnv = process.env): string {
    return this.expandPath(env[CLI_CONFIG.ENV.CONFIG_HOME] || CLI_CONFIG.DEFAULT_CONFIG_HOME, env);
  }

  private static loadConfigFile(
    configPath: string | undefined,
    env: NodeJS.ProcessEnv
  ): { config: XbeCliConfig; configPath?: string } {
    if (configPath) {
      const expanded = this.expandPath(configPath, env);
      return { config: this.loadFromPath(expanded, env), configPath: expanded };
    }

    const candidates = [
      path.join(this.configHome(env), this.CONFIG_FILE_NAME),
      this.expandPath(this.LOCAL_CONFIG_PATH, env)
    ];
    for (const candidate of candidates) {
      if (fs.existsSync(candidate)) {
        return { config: this.loadFromPath(candidate, env), configPath: candidate };
      }
    }

    // No config file found
    return { config: {} };
  }

  private static loadFromPath(filePath: string, env: NodeJS.ProcessEnv): XbeCliConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load config from ${filePath}: ${errorMessage(error)}`);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Failed to load config from ${filePath}: expected a JSON object`);
    }
    const expanded = this.expandEnvironmentVariables(parsed, env);
    return this.toConfig(expanded);
  }

  private static toConfig(value: unknown): XbeCliConfig {
    const config: XbeCliConfig = {};
    if (!isRecord(value)) {
      return config;
    }
    if (typeof value.baseUrl === 'string') {
      config.baseUrl = value.baseUrl;
    }
    if (isRecord(value.logging)) {
      config.logging = {};
      const { logLevel, logFile } = value.logging;
      if (typeof logLevel === 'string') {
        config.logging.logLevel = logLevel;
      }
      if (typeof logFile === 'string') {
        config.logging.logFile = logFile;
      }
    }
    if (isRecord(value.defaults)) {
      config.defaults = {};
      const { output, timeout, color } = value.defaults;
      if (output === 'table' || output === 'json') {
        config.defaults.output = output;
      }
      if (typeof timeout === 'string') {
        config.defaults.timeout = timeout;
      }
      if (color === 'auto' || color === 'always' || color === 'never') {
        config.defaults.color = color;
      }
    }
    return config;
  }

  /**
   * Merge file values with environment overrides and built-in defaults
   */
  private static processConfig(
    rawConfig: XbeCliConfig,
    configPath: string | undefined,
    env: NodeJS.ProcessEnv
  ): ResolvedConfig {
    const baseUrl = trimTrailingSlashes(
      env[CLI_CONFIG.ENV.BASE_URL] || rawConfig.baseUrl || CLI_CONFIG.DEFAULT_BASE_URL
    );

    const defaults = {
      ...DEFAULT_DEFAULTS_CONFIG,
      ...rawConfig.defaults
    };
    const envTimeout = env[CLI_CONFIG.ENV.TIMEOUT];
    if (envTimeout) {
      defaults.timeout = envTimeout;
    }

    const envLevel = env[CLI_CONFIG.ENV.LOG_LEVEL];
    const logLevel: LogLevel =
      parseLogLevel(envLevel) ?? parseLogLevel(rawConfig.logging?.logLevel) ?? CLI_CONFIG.DEFAULT_LOG_LEVEL;
    const logFile = rawConfig.logging?.logFile ? this.expandPath(rawConfig.logging.logFile, env) : undefined;

    return {
      baseUrl,
      configPath,
      logging: { logLevel, logFile },
      defaults,
      timeoutMs: this.parseTimeout(defaults.timeout) * 1000
    };
  }

  /**
   * Expand ~ and environment variables in paths
   */
  static expandPath(inputPath: string, env: NodeJS.ProcessEnv = process.env): string {
    if (!inputPath) return inputPath;

    const expandedPath = this.expandEnvironmentVariable(inputPath.replace(/^~/, os.homedir()), env);
    return path.resolve(expandedPath);
  }

  /**
   * Recursively expand environment variables in configuration object
   */
  private static expandEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv): unknown {
    if (typeof value === 'string') {
      return this.expandEnvironmentVariable(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.expandEnvironmentVariables(item, env));
    }

    if (isRecord(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.expandEnvironmentVariables(item, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Expand ${VAR} and $VAR patterns in a string value
   */
  private static expandEnvironmentVariable(value: string, env: NodeJS.ProcessEnv): string {
    return value
      .replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] || '')
      .replace(/\$([A-Z_][A-Z0-9_]*)/g, (_, varName: string) => env[varName] || '');
  }

  /**
   * Parse timeout string to seconds; zero is rejected
   */
  static parseTimeout(timeout: string): number {
    const match = timeout.trim().match(/^(\d+)([smh]?)$/);
    if (!match) {
      throw new Error(`Invalid timeout format: ${timeout}. Use format like '30s', '5m', '1h'`);
    }

    const value = parseInt(match[1], 10);
    if (value === 0) {
      throw new Error(`Invalid timeout: ${timeout}. Timeout must be greater than zero`);
    }
    const unit = match[2] || 's';

    switch (unit) {
      case 'm': return value * 60;
      case 'h': return value * 3600;
      default: return value;
    }
  }

  /**
   * Validate configuration schema
   */
  static validate(config: XbeCliConfig): string[] {
    const errors: string[] = [];

    if (config.baseUrl !== undefined && !/^https?:\/\//.test(config.baseUrl)) {
      errors.push("'baseUrl' must start with http:// or https://");
    }

    if (config.logging?.logLevel !== undefined && parseLogLevel(config.logging.logLevel) === undefined) {
      errors.push("Logging 'logLevel' must be one of: debug, info, warn, error");
    }

    if (config.defaults?.timeout !== undefined) {
      try {
        this.parseTimeout(config.defaults.timeout);
      } catch (error) {
        errors.push(errorMessage(error));
      }
    }

    return errors;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value);
}

export function trimTrailingSlashes(url: string): string {
  return url.trim().replace(/\/+$/, '');
}
