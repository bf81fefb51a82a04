/**
 * Per-invocation state shared by every command: resolved configuration, the
 * logger, the colour instance and the output streams.
 */

import chalk from 'chalk';
import type { Logger } from 'winston';
import { ApiClient } from '../lib/client';
import { ConfigLoader, trimTrailingSlashes } from '../config/config-loader';
import { COMPONENT_NAME } from '../config/defaults';
import { CliIO, ConnectionFlags, GlobalFlags, OutputStream, ReadFlags } from '../types/cli';
import { ResolvedConfig } from '../types/config';
import { createLogger } from '../utils/logger';
import { resolveToken } from '../utils/credentials';
import { AuthRequiredError, TokenNotFoundError } from '../utils/error-handler';

interface Runtime {
  config: ResolvedConfig;
  logger: Logger;
  verbose: boolean;
}

export class CommandContext {
  ui: chalk.Chalk;
  private runtime?: Runtime;

  constructor(readonly io: CliIO) {
    this.ui = new chalk.Instance({ level: io.color ? 1 : 0 });
  }

  get stdout(): OutputStream {
    return this.io.stdout;
  }

  get stderr(): OutputStream {
    return this.io.stderr;
  }

  get verbose(): boolean {
    return this.runtime?.verbose ?? false;
  }

  get config(): ResolvedConfig {
    return this.require().config;
  }

  get logger(): Logger {
    return this.require().logger;
  }

  get configHome(): string {
    return ConfigLoader.configHome(this.io.env);
  }

  /**
   * Load configuration and set up logging. Runs once, before the first action.
   */
  configure(flags: GlobalFlags): void {
    const config = ConfigLoader.load({ configPath: flags.config, env: this.io.env });

    const colorSetting = config.defaults.color;
    const color = flags.color && (colorSetting === 'always' || (colorSetting === 'auto' && this.io.color));
    this.ui = new chalk.Instance({ level: color ? 1 : 0 });

    const logger = createLogger({
      logLevel: flags.verbose ? 'debug' : config.logging.logLevel,
      componentName: COMPONENT_NAME,
      logFile: config.logging.logFile
    });
    logger.debug(`Using base URL ${config.baseUrl}${config.configPath ? ` from ${config.configPath}` : ''}`);

    this.runtime = { config, logger, verbose: flags.verbose ?? false };
  }

  baseUrl(flags: ConnectionFlags): string {
    const fromFlag = flags.baseUrl?.trim();
    return fromFlag ? trimTrailingSlashes(fromFlag) : this.config.baseUrl;
  }

  /**
   * Token for a read-only command. Missing credentials mean an anonymous
   * request; --no-auth skips the lookup entirely.
   */
  readToken(flags: ReadFlags): string | undefined {
    if (!flags.auth) {
      return undefined;
    }
    try {
      return resolveToken(this.baseUrl(flags), flags.token, { configHome: this.configHome, env: this.io.env }).token;
    } catch (error) {
      if (error instanceof TokenNotFoundError) {
        this.logger.debug('No token found, continuing without authentication');
        return undefined;
      }
      throw error;
    }
  }

  /** Token for a mutating command. */
  writeToken(flags: ConnectionFlags): string {
    try {
      return resolveToken(this.baseUrl(flags), flags.token, { configHome: this.configHome, env: this.io.env }).token;
    } catch (error) {
      if (error instanceof TokenNotFoundError) {
        throw new AuthRequiredError();
      }
      throw error;
    }
  }

  createClient(flags: ConnectionFlags, token: string | undefined): ApiClient {
    return new ApiClient({
      baseUrl: this.baseUrl(flags),
      token,
      logger: this.logger,
      timeoutMs: this.config.timeoutMs,
      signal: this.io.signal,
      fetchImplementation: this.io.fetchImplementation
    });
  }

  private require(): Runtime {
    if (!this.runtime) {
      throw new Error('Command context used before configuration was loaded');
    }
    return this.runtime;
  }
}
