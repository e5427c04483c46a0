import { describe, expect, it } from 'vitest';
import { LoginError } from '../../lib/errors.js';
import { performLogin, type LoginContext } from '../../lib/login-flow.js';
import type { ConfigStore } from '../../lib/config.js';
import type { Organization, PromptCatalog, Space } from '../../lib/types.js';
import {
  FakeUI,
  PASSWORD_PROMPTS,
  fakeAuthenticator,
  fakeDirectory,
  fakeEndpoints,
  promptCatalog,
  useTempOrbitHome,
} from '../fixtures/login-fakes.js';

function buildContext(
  config: ConfigStore,
  options: {
    ui?: FakeUI;
    catalog?: PromptCatalog;
    failures?: Error[];
    orgs?: Organization[];
    spaces?: Record<string, Space[]>;
    apiVersion?: string;
  } = {}
) {
  const ui = options.ui ?? new FakeUI();
  const authenticator = fakeAuthenticator(
    options.catalog ?? promptCatalog(...PASSWORD_PROMPTS),
    options.failures,
    config
  );
  const directory = fakeDirectory(options.orgs ?? [], options.spaces);
  const endpoints = fakeEndpoints(config, options.apiVersion);
  const ctx: LoginContext = { config, ui, authenticator, directory, endpoints };
  return { ctx, ui, authenticator, directory, endpoints };
}

describe('performLogin', () => {
  const home = useTempOrbitHome();

  it('should log in, target the only org and space and record the session', async () => {
    const config = home.config();
    const { ctx, ui, authenticator } = buildContext(config, {
      ui: new FakeUI(['user@example.com'], ['wrong', 'right']),
      failures: [new Error('Credentials were rejected, please try again.')],
      orgs: [{ guid: 'org-guid', name: 'org1' }],
      spaces: { 'org-guid': [{ guid: 'space-guid', name: 'space1' }] },
    });

    const result = await performLogin(ctx, {
      endpoint: 'https://api.example.com',
      skipSSLValidation: false,
    });

    expect(authenticator.authenticate).toHaveBeenCalledTimes(2);
    expect(result.attempts).toBe(2);
    expect(result.org).toEqual({ guid: 'org-guid', name: 'org1' });
    expect(result.space).toEqual({ guid: 'space-guid', name: 'space1' });
    expect(result.history).toHaveLength(1);
    expect(result.history[0]).toMatchObject({
      endpointURL: 'https://api.example.com',
      authEndpoint: 'https://login.example.com',
      accessToken: 'bearer test-token',
      orgFields: { guid: 'org-guid', name: 'org1' },
      spaceFields: { guid: 'space-guid', name: 'space1' },
    });
    expect(config.get('instances')).toEqual(result.history);
    expect(config.get('sslDisabled')).toBe(false);
    expect(ui.said).toContain('Targeted org org1\n');
    expect(ui.said).toContain('Targeted space space1\n');
  });

  it('should log in with an explicit SSO passcode without prompting', async () => {
    const config = home.config();
    const { ctx, ui, authenticator } = buildContext(config);

    await performLogin(ctx, {
      endpoint: 'https://api.example.com',
      ssoPasscode: '123456',
    });

    expect(authenticator.authenticate).toHaveBeenCalledTimes(1);
    expect(authenticator.authenticate).toHaveBeenCalledWith({
      passcode: '123456',
    });
    expect(ui.secretsAsked).toEqual([]);
    expect(ui.asked).toEqual([]);
  });

  it('should prompt for a passcode when --sso is given alone', async () => {
    const config = home.config();
    const { ctx, ui, authenticator } = buildContext(config, {
      ui: new FakeUI([], ['654321']),
    });

    await performLogin(ctx, { endpoint: 'https://api.example.com', sso: true });

    expect(ui.secretsAsked).toEqual([
      'Temporary Authentication Code ( Get one at https://login.example.com/passcode )',
    ]);
    expect(authenticator.authenticate).toHaveBeenCalledWith({
      passcode: '654321',
    });
  });

  it('should reject --sso with --sso-passcode before any network call', async () => {
    const config = home.config();
    config.update({ accessToken: 'bearer keep-me' });
    const { ctx, authenticator, endpoints } = buildContext(config);

    const error = await performLogin(ctx, {
      endpoint: 'https://api.example.com',
      sso: true,
      ssoPasscode: '123456',
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoginError);
    expect(error).toMatchObject({ kind: 'ConflictingAuthMode' });
    expect(authenticator.fetchPrompts).not.toHaveBeenCalled();
    expect(authenticator.authenticate).not.toHaveBeenCalled();
    expect(endpoints.updateEndpoint).not.toHaveBeenCalled();
    expect(config.get('accessToken')).toBe('bearer keep-me');
  });

  it('should refuse the password flow while a service account is logged in', async () => {
    const config = home.config();
    config.update({ uaaGrantType: 'client_credentials' });
    const { ctx, authenticator } = buildContext(config);

    await expect(
      performLogin(ctx, { endpoint: 'https://api.example.com' })
    ).rejects.toMatchObject({ kind: 'ServiceAccountActive' });
    expect(authenticator.fetchPrompts).not.toHaveBeenCalled();
    expect(authenticator.authenticate).not.toHaveBeenCalled();
  });

  it('should clear the previous session before logging in', async () => {
    const config = home.config();
    config.update({
      accessToken: 'bearer old',
      organizationFields: { guid: 'old-org', name: 'old' },
    });
    const { ctx } = buildContext(config, {
      ui: new FakeUI(['user'], ['pw']),
    });

    const result = await performLogin(ctx, {
      endpoint: 'https://api.example.com',
    });

    expect(result.org).toBeUndefined();
    expect(config.get('organizationFields')).toEqual({ guid: '', name: '' });
    expect(config.get('accessToken')).toBe('bearer test-token');
  });

  it('should skip space selection when no org was targeted', async () => {
    const config = home.config();
    const { ctx, directory } = buildContext(config, {
      ui: new FakeUI(['user'], ['pw']),
    });

    const result = await performLogin(ctx, {
      endpoint: 'https://api.example.com',
    });

    expect(result.space).toBeUndefined();
    expect(directory.listSpaces).not.toHaveBeenCalled();
  });

  it('should fail after three rejected attempts without recording a session', async () => {
    const config = home.config();
    const rejected = () => new Error('Credentials were rejected, please try again.');
    const { ctx, authenticator, directory } = buildContext(config, {
      ui: new FakeUI(['user'], ['a', 'b', 'c']),
      failures: [rejected(), rejected(), rejected()],
    });

    await expect(
      performLogin(ctx, { endpoint: 'https://api.example.com' })
    ).rejects.toMatchObject({
      kind: 'AuthenticationFailed',
      message: 'Unable to authenticate.',
    });
    expect(authenticator.authenticate).toHaveBeenCalledTimes(3);
    expect(directory.listOrganizations).not.toHaveBeenCalled();
    expect(config.get('instances')).toEqual([]);
  });

  it('should keep sessions for other endpoints in the history', async () => {
    const config = home.config();
    const other = {
      endpointURL: 'https://api.other.example.com',
      accessToken: 'bearer other',
      refreshToken: '',
      apiVersion: '2.200.0',
      authEndpoint: 'https://login.other.example.com',
      uaaEndpoint: '',
      dopplerEndpoint: '',
      logCacheEndpoint: '',
      orgFields: { guid: '', name: '' },
      spaceFields: { guid: '', name: '' },
    };
    config.update({ instances: [other] });
    const { ctx } = buildContext(config, { ui: new FakeUI(['user'], ['pw']) });

    const result = await performLogin(ctx, {
      endpoint: 'https://api.example.com',
    });

    expect(result.history.map((s) => s.authEndpoint)).toEqual([
      'https://login.example.com',
      'https://login.other.example.com',
    ]);
  });

  it('should warn when the API version is no longer supported', async () => {
    const config = home.config();
    const { ctx, ui } = buildContext(config, {
      ui: new FakeUI(['user'], ['pw']),
      apiVersion: '2.100.0',
    });

    await performLogin(ctx, { endpoint: 'https://api.example.com' });

    expect(ui.warnings).toEqual([
      'Your API version is no longer supported. Upgrade to a newer version of the API.',
    ]);
  });

  it('should pass username and password overrides to the first attempt', async () => {
    const config = home.config();
    const { ctx, ui, authenticator } = buildContext(config);

    await performLogin(ctx, {
      endpoint: 'https://api.example.com',
      username: 'user@example.com',
      password: 'test-password',
    });

    expect(authenticator.authenticate).toHaveBeenCalledWith({
      username: 'user@example.com',
      password: 'test-password',
    });
    expect(ui.asked).toEqual([]);
    expect(ui.secretsAsked).toEqual([]);
  });
});
