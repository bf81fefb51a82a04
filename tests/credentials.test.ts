import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import {
  clearToken,
  getCredentialsPath,
  getStoredToken,
  readCredentials,
  resolveToken,
  storeToken
} from '../cli/src/utils/credentials';
import { TokenNotFoundError } from '../cli/src/utils/error-handler';
import { makeTempDir, removeDir } from './helpers/io';

describe('credentials', () => {
  let home: string;

  beforeEach(() => {
    home = makeTempDir();
  });

  afterEach(() => {
    removeDir(home);
  });

  it('treats a missing file as an empty store', () => {
    expect(readCredentials(home)).toEqual({ tokens: {} });
  });

  it('stores tokens per base URL with owner-only permissions', () => {
    storeToken(home, 'https://api.test/', 'test-secret', new Date('2024-01-01T00:00:00Z'));
    storeToken(home, 'https://staging.test', 'other-secret', new Date('2024-01-02T00:00:00Z'));

    expect(getStoredToken(home, 'https://api.test')).toEqual({
      token: 'test-secret',
      storedAt: '2024-01-01T00:00:00.000Z'
    });
    expect(getStoredToken(home, 'https://staging.test')?.token).toBe('other-secret');
    if (process.platform !== 'win32') {
      expect(fs.statSync(getCredentialsPath(home)).mode & 0o777).toBe(0o600);
    }
  });

  it('clears a stored token', () => {
    storeToken(home, 'https://api.test', 'test-secret');
    expect(clearToken(home, 'https://api.test/')).toBe(true);
    expect(clearToken(home, 'https://api.test')).toBe(false);
    expect(getStoredToken(home, 'https://api.test')).toBeUndefined();
  });

  it('rejects a file with an unexpected shape', () => {
    fs.writeFileSync(getCredentialsPath(home), '{"tokens":{"https://api.test":{"token":""}}}');
    expect(() => readCredentials(home)).toThrow(`Failed to read ${getCredentialsPath(home)}: unexpected format`);
  });

  describe('resolveToken', () => {
    it('prefers the explicit flag, then XBE_TOKEN, then the file', () => {
      storeToken(home, 'https://api.test', 'file-secret');

      expect(resolveToken('https://api.test', ' flag-secret ', { configHome: home, env: { XBE_TOKEN: 'env-secret' } })).toEqual({
        token: 'flag-secret',
        source: 'flag'
      });
      expect(resolveToken('https://api.test', undefined, { configHome: home, env: { XBE_TOKEN: 'env-secret' } })).toEqual({
        token: 'env-secret',
        source: 'env'
      });
      expect(resolveToken('https://api.test', '  ', { configHome: home, env: {} })).toEqual({
        token: 'file-secret',
        source: 'file'
      });
    });

    it('throws TokenNotFoundError when nothing is configured', () => {
      expect(() => resolveToken('https://api.test/', undefined, { configHome: home, env: {} })).toThrow(
        new TokenNotFoundError('https://api.test')
      );
    });
  });
});
