import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigLoader, trimTrailingSlashes } from '../cli/src/config/config-loader';
import { makeTempDir, removeDir } from './helpers/io';

describe('ConfigLoader', () => {
  let home: string;

  beforeEach(() => {
    home = makeTempDir();
  });

  afterEach(() => {
    removeDir(home);
  });

  function writeConfig(name: string, value: unknown): string {
    const file = path.join(home, name);
    fs.writeFileSync(file, JSON.stringify(value));
    return file;
  }

  it('uses built-in defaults without a config file', () => {
    const config = ConfigLoader.load({ env: { XBE_CONFIG_HOME: home } });
    expect(config.baseUrl).toBe('https://server.x-b-e.com');
    expect(config.logging.logLevel).toBe('warn');
    expect(config.defaults).toEqual({ output: 'table', timeout: '30s', color: 'auto' });
    expect(config.timeoutMs).toBe(30_000);
    expect(config.configPath).toBeUndefined();
  });

  it('reads config.json from the config home and expands variables', () => {
    const file = writeConfig('config.json', {
      baseUrl: 'https://${XBE_HOST}/',
      logging: { logLevel: 'info' },
      defaults: { output: 'json', timeout: '2m' }
    });

    const config = ConfigLoader.load({ env: { XBE_CONFIG_HOME: home, XBE_HOST: 'staging.test' } });

    expect(config.configPath).toBe(file);
    expect(config.baseUrl).toBe('https://staging.test');
    expect(config.logging.logLevel).toBe('info');
    expect(config.defaults.output).toBe('json');
    expect(config.timeoutMs).toBe(120_000);
  });

  it('lets environment variables override the file', () => {
    writeConfig('config.json', { baseUrl: 'https://file.test', defaults: { timeout: '10s' } });
    const config = ConfigLoader.load({
      env: { XBE_CONFIG_HOME: home, XBE_BASE_URL: 'https://env.test//', XBE_TIMEOUT: '1h', XBE_LOG_LEVEL: 'debug' }
    });
    expect(config.baseUrl).toBe('https://env.test');
    expect(config.timeoutMs).toBe(3_600_000);
    expect(config.logging.logLevel).toBe('debug');
  });

  it('loads an explicit --config path', () => {
    const file = writeConfig('other.json', { baseUrl: 'http://localhost:3000' });
    const config = ConfigLoader.load({ configPath: file, env: { XBE_CONFIG_HOME: home } });
    expect(config.baseUrl).toBe('http://localhost:3000');
  });

  it('rejects invalid files', () => {
    const file = writeConfig('bad.json', { baseUrl: 'ftp://nope', logging: { logLevel: 'loud' } });
    expect(() => ConfigLoader.load({ configPath: file, env: {} })).toThrow(
      `Invalid configuration in ${file}:\n  'baseUrl' must start with http:// or https://\n  Logging 'logLevel' must be one of: debug, info, warn, error`
    );

    const notJson = path.join(home, 'broken.json');
    fs.writeFileSync(notJson, '{');
    expect(() => ConfigLoader.load({ configPath: notJson, env: {} })).toThrow(`Failed to load config from ${notJson}`);
  });

  it('parses durations', () => {
    expect(ConfigLoader.parseTimeout('45')).toBe(45);
    expect(ConfigLoader.parseTimeout('5m')).toBe(300);
    expect(() => ConfigLoader.parseTimeout('soon')).toThrow(
      "Invalid timeout format: soon. Use format like '30s', '5m', '1h'"
    );
  });

  it('validate collects every problem', () => {
    expect(ConfigLoader.validate({ defaults: { timeout: '3 days' } })).toEqual([
      "Invalid timeout format: 3 days. Use format like '30s', '5m', '1h'"
    ]);
    expect(ConfigLoader.validate({ baseUrl: 'https://ok.test' })).toEqual([]);
  });

  it('rejects a zero timeout from the file or the environment', () => {
    expect(ConfigLoader.validate({ defaults: { timeout: '0s' } })).toEqual([
      'Invalid timeout: 0s. Timeout must be greater than zero'
    ]);
    expect(() => ConfigLoader.load({ env: { XBE_CONFIG_HOME: home, XBE_TIMEOUT: '0' } })).toThrow(
      'Invalid timeout: 0. Timeout must be greater than zero'
    );
  });

  it('trims trailing slashes from base URLs', () => {
    expect(trimTrailingSlashes(' https://api.test/// ')).toBe('https://api.test');
  });
});
