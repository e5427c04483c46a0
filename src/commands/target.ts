import { BaseCommand } from '../base-cmd.js';
import { describeConfiguration } from '../lib/status.js';

export class Target extends BaseCommand {
  static description = 'Show the current API endpoint, user, org and space';
  static commandName = 'target';
  static usage = [''];
  static params: string[] = [];
  static argumentSpec = { type: 'none' } as const;

  exec(): string {
    return describeConfiguration(this.createConfig()).join('\n');
  }
}
