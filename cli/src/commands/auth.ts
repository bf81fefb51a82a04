import { Command } from 'commander';
import { CommandContext } from './context';
import { ConnectionFlags, OptionValues } from '../types/cli';
import { TokenSource, clearToken, getCredentialsPath, resolveToken, storeToken } from '../utils/credentials';
import { TokenNotFoundError, ValidationError } from '../utils/error-handler';
import { optionBoolean, optionString } from '../utils/flags';
import { writeJSON } from '../output/json';

const SOURCE_LABELS: Record<TokenSource, string> = {
  flag: '--token',
  env: 'XBE_TOKEN',
  file: 'credentials file'
};

function authFlags(options: OptionValues): ConnectionFlags {
  return {
    baseUrl: optionString(options, 'baseUrl'),
    token: optionString(options, 'token'),
    json: optionBoolean(options, 'json')
  };
}

function login(context: CommandContext, options: OptionValues): void {
  const flags = authFlags(options);
  const token = flags.token?.trim() ?? '';
  if (token === '') {
    throw new ValidationError('--token is required');
  }
  const baseUrl = context.baseUrl(flags);
  storeToken(context.configHome, baseUrl, token);
  context.logger.debug(`Stored token in ${getCredentialsPath(context.configHome)}`);
  context.stdout.write(`${context.ui.green('Logged in')} to ${baseUrl}\n`);
}

function status(context: CommandContext, options: OptionValues): void {
  const flags = authFlags(options);
  const baseUrl = context.baseUrl(flags);

  let source: TokenSource | undefined;
  try {
    source = resolveToken(baseUrl, undefined, { configHome: context.configHome, env: context.io.env }).source;
  } catch (error) {
    if (!(error instanceof TokenNotFoundError)) {
      throw error;
    }
  }

  if (flags.json) {
    writeJSON(context.stdout, { base_url: baseUrl, authenticated: source !== undefined, source: source ?? null });
    return;
  }
  if (source === undefined) {
    context.stdout.write(`Not logged in to ${baseUrl}\n`);
    return;
  }
  context.stdout.write(`Logged in to ${baseUrl} (token from ${SOURCE_LABELS[source]})\n`);
}

function logout(context: CommandContext, options: OptionValues): void {
  const baseUrl = context.baseUrl(authFlags(options));
  if (clearToken(context.configHome, baseUrl)) {
    context.stdout.write(`Logged out of ${baseUrl}\n`);
  } else {
    context.stdout.write(`No stored token for ${baseUrl}\n`);
  }
}

export function authCommand(program: Command, context: CommandContext): void {
  const auth = program.command('auth').description('Manage stored API tokens');

  auth
    .command('login')
    .description('Store an API token for a base URL')
    .option('--token <token>', 'API token to store')
    .option('--base-url <url>', 'API base URL')
    .action((options: OptionValues) => login(context, options));

  auth
    .command('status')
    .description('Show which token would be used')
    .option('--base-url <url>', 'API base URL')
    .option('--json', 'Output JSON')
    .action((options: OptionValues) => status(context, options));

  auth
    .command('logout')
    .description('Remove the stored token for a base URL')
    .option('--base-url <url>', 'API base URL')
    .action((options: OptionValues) => logout(context, options));
}
