import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';
import { registerCommands } from './command-registry.js';
import { commands } from './commands.js';
import type { CommandConfig } from './types.js';

const require = createRequire(import.meta.url);
const PackageSchema = z.object({ version: z.string() });

/**
 * Build the `orbit` program over a command registry.
 * `orbit --verbose <command>` turns on diagnostic output for the run.
 */
export function createCLI(
  registry: Record<string, CommandConfig> = commands
): Command {
  const { version } = PackageSchema.parse(require('../../package.json'));

  const program = new Command()
    .name('orbit')
    .description(
      'Log in to the Orbit application platform and target an org and space'
    )
    .version(version)
    .option('--verbose', 'show aliases in help and trace API requests');

  program.hook('preAction', (root) => {
    if (root.opts().verbose === true) {
      process.env.ORBIT_VERBOSE = 'true';
    }
  });

  registerCommands(program, registry);

  return program;
}

export function main(argv: string[] = process.argv): Promise<Command> {
  return createCLI()
    .parseAsync(argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
