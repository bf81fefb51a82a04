/**
 * Credential storage for the xbe CLI.
 *
 * Tokens live in <config home>/credentials.json, keyed by API base URL so that
 * staging and production logins can coexist.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CLI_CONFIG } from '../config/defaults';
import { trimTrailingSlashes } from '../config/config-loader';
import { TokenNotFoundError, parseJsonWithContext } from './error-handler';

export type TokenSource = 'flag' | 'env' | 'file';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

const storedTokenSchema = z.object({
  token: z.string().min(1),
  storedAt: z.string()
});

const credentialsFileSchema = z.object({
  tokens: z.record(storedTokenSchema).default({})
});

export type StoredToken = z.infer<typeof storedTokenSchema>;
export type CredentialsFile = z.infer<typeof credentialsFileSchema>;

export function getCredentialsPath(configHome: string): string {
  return path.join(configHome, 'credentials.json');
}

/**
 * Read the credentials file. A missing file is an empty store; a file that
 * exists but cannot be parsed is an error.
 */
export function readCredentials(configHome: string): CredentialsFile {
  const credPath = getCredentialsPath(configHome);
  if (!fs.existsSync(credPath)) {
    return { tokens: {} };
  }
  const parsed = parseJsonWithContext(fs.readFileSync(credPath, 'utf-8'), `Failed to read ${credPath}`);
  const result = credentialsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Failed to read ${credPath}: unexpected format`);
  }
  return result.data;
}

/**
 * Write the credentials file with owner-only permissions.
 */
export function writeCredentials(configHome: string, credentials: CredentialsFile): void {
  if (!fs.existsSync(configHome)) {
    fs.mkdirSync(configHome, { recursive: true, mode: 0o700 });
  }
  const credPath = getCredentialsPath(configHome);
  fs.writeFileSync(credPath, JSON.stringify(credentials, null, 2) + '\n', { mode: 0o600 });
  // writeFileSync only applies mode when it creates the file
  fs.chmodSync(credPath, 0o600);
}

export function storeToken(configHome: string, baseUrl: string, token: string, now: Date = new Date()): void {
  const credentials = readCredentials(configHome);
  credentials.tokens[trimTrailingSlashes(baseUrl)] = { token, storedAt: now.toISOString() };
  writeCredentials(configHome, credentials);
}

export function getStoredToken(configHome: string, baseUrl: string): StoredToken | undefined {
  return readCredentials(configHome).tokens[trimTrailingSlashes(baseUrl)];
}

/**
 * Remove the token stored for a base URL.
 * Returns true if a token was removed, false if none existed.
 */
export function clearToken(configHome: string, baseUrl: string): boolean {
  const credentials = readCredentials(configHome);
  const key = trimTrailingSlashes(baseUrl);
  if (!(key in credentials.tokens)) {
    return false;
  }
  delete credentials.tokens[key];
  writeCredentials(configHome, credentials);
  return true;
}

export interface ResolveTokenOptions {
  configHome: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Find the token for a request: --token, then XBE_TOKEN, then the stored
 * credential for the base URL. Throws TokenNotFoundError when none is set.
 */
export function resolveToken(
  baseUrl: string,
  explicitToken: string | undefined,
  options: ResolveTokenOptions
): ResolvedToken {
  const flagToken = explicitToken?.trim();
  if (flagToken) {
    return { token: flagToken, source: 'flag' };
  }

  const envToken = options.env[CLI_CONFIG.ENV.TOKEN]?.trim();
  if (envToken) {
    return { token: envToken, source: 'env' };
  }

  const stored = getStoredToken(options.configHome, baseUrl);
  if (stored) {
    return { token: stored.token, source: 'file' };
  }

  throw new TokenNotFoundError(trimTrailingSlashes(baseUrl));
}
