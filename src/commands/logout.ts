import { BaseCommand } from '../base-cmd.js';
import { logActivity } from '../lib/utils/log.js';

export class Logout extends BaseCommand {
  static description = 'Log user out';
  static commandName = 'logout';
  static usage = [''];
  static params: string[] = [];
  static argumentSpec = { type: 'none' } as const;

  exec(): string {
    const config = this.createConfig();
    const wasLoggedIn = config.isLoggedIn();

    config.clearSession();
    config.update({ uaaGrantType: '' });

    if (wasLoggedIn) {
      logActivity('logout', config.get('target'));
    }

    return ['Logging out...', 'OK'].join('\n');
  }
}
