/**
 * Central defaults for the xbe CLI
 *
 * Built-in values and the names of the environment variables that override
 * them. Precedence is resolved in ConfigLoader.
 */

import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../utils/error-handler';

// Walk up from this file until the package manifest is found; the depth differs
// between the TypeScript sources and the compiled output.
function getVersion(): string {
  let dir = __dirname;
  for (let depth = 0; depth < 6; depth++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      try {
        const manifest: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
        if (
          typeof manifest === 'object' &&
          manifest !== null &&
          'name' in manifest &&
          manifest.name === 'xbe-cli' &&
          'version' in manifest &&
          typeof manifest.version === 'string'
        ) {
          return manifest.version;
        }
      } catch (error) {
        console.error('Warning: Could not read package.json:', errorMessage(error));
        break;
      }
    }
    dir = path.dirname(dir);
  }
  return '0.0.0';
}

export const CLI_CONFIG = {
  VERSION: getVersion(),
  COMPONENT_NAME: 'xbe',

  DEFAULT_BASE_URL: 'https://server.x-b-e.com',
  DEFAULT_LOG_LEVEL: 'warn',

  // Base directory for config.json and credentials.json
  DEFAULT_CONFIG_HOME: '~/.config/xbe',

  API_PREFIX: '/v1',
  CONTENT_TYPE: 'application/vnd.api+json',

  // Environment overrides, read when the configuration is resolved
  ENV: {
    BASE_URL: 'XBE_BASE_URL',
    TOKEN: 'XBE_TOKEN',
    TIMEOUT: 'XBE_TIMEOUT',
    LOG_LEVEL: 'XBE_LOG_LEVEL',
    CONFIG_HOME: 'XBE_CONFIG_HOME'
  }
} as const;

export const { VERSION, COMPONENT_NAME } = CLI_CONFIG;
