import { z } from 'zod';
import { BaseCommand } from '../base-cmd.js';
import { HttpAuthenticator } from '../lib/authenticator.js';
import { HttpDirectoryClient } from '../lib/directory-client.js';
import { HttpEndpointRepository } from '../lib/endpoint-repository.js';
import { isLoginError } from '../lib/errors.js';
import {
  performLogin,
  type LoginContext,
  type LoginOptions,
} from '../lib/login-flow.js';
import { describeConfiguration } from '../lib/status.js';
import { TerminalUI, type UI } from '../lib/terminal.js';
import { logActivity } from '../lib/utils/log.js';

const LoginFlagsSchema = z.object({
  api: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  org: z.string().optional(),
  space: z.string().optional(),
  sso: z.boolean().optional(),
  ssoPasscode: z.string().optional(),
  skipSslValidation: z.boolean().optional(),
});

export type LoginFlags = z.infer<typeof LoginFlagsSchema>;

export function toLoginOptions(flags: LoginFlags): LoginOptions {
  return {
    endpoint: flags.api,
    skipSSLValidation: flags.skipSslValidation,
    username: flags.username,
    password: flags.password,
    org: flags.org,
    space: flags.space,
    sso: flags.sso,
    ssoPasscode: flags.ssoPasscode,
  };
}

export class Login extends BaseCommand {
  static description = 'Log user in';
  static commandName = 'login';
  static usage = [
    '[-a API_URL] [-u USERNAME] [-p PASSWORD] [-o ORG] [-s SPACE] [--sso | --sso-passcode PASSCODE]',
    '# omit username and password to be prompted for both',
    '--sso  # prints a URL to obtain a one-time passcode',
  ];
  static params = [
    'api',
    'username',
    'password',
    'org',
    'space',
    'sso',
    'sso-passcode',
    'skip-ssl-validation',
  ];
  static argumentSpec = { type: 'none' } as const;

  /**
   * Build the collaborators for one run; replaced in tests
   */
  protected createContext(): LoginContext & { ui: UI & { close(): void } } {
    const config = this.createConfig();
    return {
      config,
      ui: new TerminalUI(),
      authenticator: new HttpAuthenticator(config),
      directory: new HttpDirectoryClient(config),
      endpoints: new HttpEndpointRepository(config),
    };
  }

  async exec(
    _args: string[],
    opts: Record<string, unknown> = {}
  ): Promise<string | undefined> {
    const flags = LoginFlagsSchema.safeParse(opts);
    if (!flags.success) {
      throw this.usageError(
        `invalid value for ${flags.error.issues[0]?.path.join('.') ?? 'an option'}`
      );
    }

    const ctx = this.createContext();
    const { config, ui } = ctx;

    try {
      const result = await performLogin(ctx, toLoginOptions(flags.data));
      logActivity('login', result.endpoint, {
        org: result.org?.name,
        space: result.space?.name,
      });
      this.showConfiguration(ctx);
      return undefined;
    } catch (error) {
      if (error instanceof Error && error.message === 'SIGINT') {
        return 'Login cancelled by user';
      }
      // The summary is only shown once an endpoint has been set up
      if (
        !isLoginError(error, 'ConflictingAuthMode') &&
        !isLoginError(error, 'InvalidEndpoint') &&
        config.get('target') !== ''
      ) {
        this.showConfiguration(ctx);
      }
      throw error;
    } finally {
      ui.close();
    }
  }

  private showConfiguration({ config, ui }: LoginContext): void {
    ui.say('');
    describeConfiguration(config).forEach((line) => ui.say(line));
  }
}
