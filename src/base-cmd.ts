import { ConfigStore } from './lib/config.js';
import type { CommandArguments } from './lib/types.js';

/**
 * Base command class for Orbit CLI commands
 */
export abstract class BaseCommand {
  static description: string;
  static commandName: string;
  static usage: string[];
  static params?: string[];
  static argumentSpec?: CommandArguments;

  abstract exec(
    args: string[],
    opts?: Record<string, unknown>
  ): unknown | Promise<unknown>;

  /**
   * Configuration store for one run; tests substitute a temporary one
   */
  protected createConfig(): ConfigStore {
    return new ConfigStore();
  }

  /**
   * NAME / USAGE help block
   */
  static get describeUsage(): string {
    const { description, usage = [''], commandName } = this;

    return [
      'NAME:',
      `   ${commandName} - ${description}`,
      '',
      'USAGE:',
      ...usage.map((u) => `   ${`orbit ${commandName} ${u}`.trim()}`),
    ].join('\n');
  }

  /**
   * `Incorrect usage: <message>` followed by the command's help block
   */
  usageError(message?: string): Error {
    const ctor = this.constructor;
    const usage =
      ctor instanceof Function && 'describeUsage' in ctor
        ? String(ctor.describeUsage)
        : '';
    const prefix = message ? `Incorrect usage: ${message}\n\n` : '';
    return new Error(`${prefix}${usage}`);
  }
}
