import { Command } from 'commander';
import type { CommandConfig, CommandArguments } from './types.js';
import { addParametersToCommand } from './parameter-options.js';

/**
 * Check if verbose help is requested
 */
function isVerboseHelp(): boolean {
  return process.argv.includes('--verbose');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStrings(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string');
  }
  return typeof value === 'string' ? [value] : [];
}

/**
 * Create a command pattern string based on argument specification
 */
function createCommandPattern(
  name: string,
  argumentSpec?: CommandArguments
): string {
  if (!argumentSpec || argumentSpec.type === 'none') {
    return name;
  }

  if (argumentSpec.type === 'required') {
    return `${name} <${argumentSpec.name}>`;
  }

  return `${name} [${argumentSpec.name}...]`;
}

/**
 * Split commander's action arguments into positional args and options
 */
export function parseActionArguments(
  args: unknown[],
  argumentSpec?: CommandArguments
): { commandArgs: string[]; opts: Record<string, unknown> } {
  if (!argumentSpec || argumentSpec.type === 'none') {
    // No positional arguments - first argument is options
    return { commandArgs: [], opts: isRecord(args[0]) ? args[0] : {} };
  }

  // Positional argument(s) first, options second
  const [positional, options] = args;
  return {
    commandArgs: toStrings(positional),
    opts: isRecord(options) ? options : {},
  };
}

/**
 * Action shared by a command and its aliases: run it, print what it returns,
 * and turn a thrown error into its message and exit status 1
 */
function createAction(config: CommandConfig) {
  return async (...args: unknown[]): Promise<void> => {
    const { commandArgs, opts } = parseActionArguments(
      args,
      config.command.argumentSpec
    );

    try {
      const result = await new config.command().exec(commandArgs, opts);
      if (result !== undefined && result !== null) {
        console.log(result);
      }
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  };
}

/**
 * NAME / USAGE block of a command class, when it provides one
 */
function usageOf(config: CommandConfig): string | undefined {
  const { command } = config;
  return 'describeUsage' in command ? String(command.describeUsage) : undefined;
}

/**
 * Add one commander command. Aliases are hidden from the main help and
 * point back at the command they stand for.
 */
function defineCommand(
  program: Command,
  name: string,
  config: CommandConfig,
  aliasOf?: string
): void {
  const cmd = program
    .command(createCommandPattern(name, config.command.argumentSpec), {
      hidden: aliasOf !== undefined,
    })
    .description(
      aliasOf ? `Alias for '${aliasOf}' command` : config.description
    );

  addParametersToCommand(cmd, config.command.params ?? []);
  cmd.action(createAction(config));

  if (aliasOf) {
    cmd.addHelpText(
      'after',
      `\nNote: This is an alias for 'orbit ${aliasOf}'. Use 'orbit ${aliasOf} --help' for full documentation.`
    );
    return;
  }

  const usage = usageOf(config);
  if (usage) {
    cmd.addHelpText('after', `\n${usage}`);
  }
}

/**
 * `--verbose` help lists every alias; plain help points at `--verbose`
 */
function addAliasHelpText(
  program: Command,
  commands: Record<string, CommandConfig>
): void {
  if (!isVerboseHelp()) {
    program.addHelpText(
      'after',
      '\nUse --verbose to see available command aliases.'
    );
    return;
  }

  const lines = Object.entries(commands)
    .filter(([, config]) => (config.aliases ?? []).length > 0)
    .map(([name, config]) => `  ${(config.aliases ?? []).join(', ')} -> ${name}`);

  if (lines.length > 0) {
    program.addHelpText('after', `\nAliases:\n${lines.join('\n')}`);
  }
}

/**
 * Register all commands, then their aliases, with the commander program
 */
export function registerCommands(
  program: Command,
  commands: Record<string, CommandConfig>
): void {
  const entries = Object.entries(commands);

  for (const [name, config] of entries) {
    defineCommand(program, name, config);
  }

  for (const [name, config] of entries) {
    for (const alias of config.aliases ?? []) {
      defineCommand(program, alias, config, name);
    }
  }

  addAliasHelpText(program, commands);
}
