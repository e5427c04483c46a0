import { BaseCommand } from '../base-cmd.js';
import { restoreSession } from '../lib/session-store.js';
import { describeConfiguration } from '../lib/status.js';
import { entityName } from '../lib/terminal.js';
import { logActivity } from '../lib/utils/log.js';

export class Endpoint extends BaseCommand {
  static description = 'Switch to a remembered API endpoint';
  static commandName = 'endpoint';
  static usage = ['-a <api endpoint pattern>'];
  static params = ['api-pattern'];
  static argumentSpec = { type: 'none' } as const;

  exec(_args: string[], opts: Record<string, unknown> = {}): string {
    const pattern = typeof opts.api === 'string' ? opts.api.trim() : '';
    if (pattern === '') {
      throw this.usageError('api endpoint is required');
    }

    const config = this.createConfig();
    const session = restoreSession(config, pattern);
    if (!session) {
      throw new Error(
        `No remembered endpoint matches '${pattern}'. Use 'orbit login -a <API_URL>' to log in to it.`
      );
    }

    logActivity('endpoint-switch', session.endpointURL, {
      org: session.orgFields.name || undefined,
      space: session.spaceFields.name || undefined,
    });

    return [
      `Found existing endpoint ${entityName(session.authEndpoint)}`,
      '',
      ...describeConfiguration(config),
    ].join('\n');
  }
}
