/**
 * Command tree for the xbe CLI.
 *
 *   xbe view <resource> list|show     read-only browsing
 *   xbe do <resource> create|update|delete
 *   xbe auth login|status|logout
 */

import { Command, CommanderError } from 'commander';
import { CommandContext } from './commands/context';
import { authCommand } from './commands/auth';
import { RESOURCE_CATEGORIES, ResourceCommands } from './commands/resource-commands';
import { CLI_CONFIG } from './config/defaults';
import { RESOURCES } from './resources';
import { CliIO, GlobalFlags, OptionValues } from './types/cli';
import { optionBoolean, optionString } from './utils/flags';
import { reportError } from './utils/error-handler';

/** Resource list for `xbe view --help` and `xbe do --help`, grouped by category. */
export function formatResourceHelp(resources: readonly ResourceCommands[]): string {
  const width = Math.max(...resources.map(resource => resource.name.length));
  const sections: string[] = [];
  for (const { category, title } of RESOURCE_CATEGORIES) {
    const members = resources.filter(resource => resource.category === category);
    if (members.length === 0) {
      continue;
    }
    const lines = members.map(resource => `  ${resource.name.padEnd(width)}  ${resource.description}`);
    sections.push(`${title}:\n${lines.join('\n')}`);
  }
  return `\nResources:\n\n${sections.join('\n\n')}\n`;
}

function globalFlags(options: OptionValues): GlobalFlags {
  return {
    verbose: optionBoolean(options, 'verbose'),
    color: optionBoolean(options, 'color') ?? true,
    config: optionString(options, 'config')
  };
}

function addResourceGroup(
  program: Command,
  name: string,
  description: string,
  resources: readonly ResourceCommands[],
  register: (resource: ResourceCommands, group: Command) => void
): void {
  const group = program.command(name).description(description);
  for (const resource of resources) {
    register(resource, group);
  }
  // Subcommands copy help settings when created, so this must come after registration
  group.configureHelp({ visibleCommands: () => [] }).addHelpText('after', formatResourceHelp(resources));
}

export function createProgram(context: CommandContext): Command {
  const program = new Command();

  program
    .name('xbe')
    .description('Command-line client for the XBE platform API')
    .version(CLI_CONFIG.VERSION)
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--no-color', 'Disable colored output')
    .option('--config <path>', 'Path to a config file')
    .exitOverride()
    .configureOutput({
      writeOut: str => context.stdout.write(str),
      writeErr: str => context.stderr.write(str),
      outputError: (str, write) => write(context.ui.red(str))
    });

  program.hook('preAction', () => {
    context.configure(globalFlags(program.opts()));
  });

  addResourceGroup(program, 'view', 'Browse resources', RESOURCES, (resource, group) =>
    resource.registerView(group, context)
  );
  addResourceGroup(
    program,
    'do',
    'Create, update and delete resources',
    RESOURCES.filter(resource => resource.hasWriteCommands),
    (resource, group) => resource.registerDo(group, context)
  );
  authCommand(program, context);

  return program;
}

/**
 * Run one invocation and return the process exit code.
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const context = new CommandContext(io);
  const program = createProgram(context);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    reportError(io.stderr, error, context.ui, context.verbose);
    return 1;
  }
}
