import {
  runAuthenticationLoop,
  type AuthenticationOutcome,
} from './authentication-loop.js';
import type { Authenticator } from './authenticator.js';
import type { ConfigStore } from './config.js';
import {
  fetchPromptCatalog,
  passcodeCredentialPlan,
  passwordCredentialPlan,
} from './credential-negotiator.js';
import type { DirectoryClient } from './directory-client.js';
import {
  isVersionBelow,
  MIN_SUPPORTED_API_VERSION,
  type EndpointRepository,
} from './endpoint-repository.js';
import { resolveEndpoint } from './endpoint-resolver.js';
import { LoginError } from './errors.js';
import { saveCurrentSession } from './session-store.js';
import { selectOrganization, selectSpace } from './target-selector.js';
import type { UI } from './terminal.js';
import type { Organization, SessionRecord, Space } from './types.js';

/**
 * Everything one login run reads from or writes to
 */
export interface LoginContext {
  config: ConfigStore;
  ui: UI;
  authenticator: Authenticator;
  directory: DirectoryClient;
  endpoints: EndpointRepository;
}

export interface LoginOptions {
  endpoint?: string;
  skipSSLValidation?: boolean;
  username?: string;
  password?: string;
  org?: string;
  space?: string;
  sso?: boolean;
  ssoPasscode?: string;
}

export interface LoginResult {
  endpoint: string;
  attempts: number;
  org?: Organization;
  space?: Space;
  session: SessionRecord;
  history: SessionRecord[];
}

async function authenticate(
  ctx: LoginContext,
  options: LoginOptions
): Promise<AuthenticationOutcome> {
  const { config, ui, authenticator } = ctx;

  if (options.sso || options.ssoPasscode !== undefined) {
    const catalog = await fetchPromptCatalog(authenticator);
    const plan = passcodeCredentialPlan(
      catalog,
      config.get('authorizationEndpoint'),
      ui,
      options.ssoPasscode
    );
    return runAuthenticationLoop(plan, authenticator, ui);
  }

  if (config.get('uaaGrantType') === 'client_credentials') {
    throw new LoginError(
      'ServiceAccountActive',
      "Service account currently logged in. Use 'orbit logout' to log out service account and try again."
    );
  }

  const catalog = await fetchPromptCatalog(authenticator);
  const plan = passwordCredentialPlan(catalog, ui, {
    username: options.username,
    password: options.password,
  });
  return runAuthenticationLoop(plan, authenticator, ui);
}

/**
 * Resolve the endpoint, authenticate, target an org and space, and record
 * the session in the history. Any stage failure is a LoginError.
 */
export async function performLogin(
  ctx: LoginContext,
  options: LoginOptions = {}
): Promise<LoginResult> {
  if (options.sso && options.ssoPasscode !== undefined) {
    throw new LoginError(
      'ConflictingAuthMode',
      'Incorrect usage: --sso-passcode flag cannot be used with --sso'
    );
  }

  const { config, ui, directory } = ctx;
  config.clearSession();

  const endpoint = await resolveEndpoint(config, ui, {
    endpoint: options.endpoint,
    skipSSLValidation: options.skipSSLValidation,
  });
  const url = await ctx.endpoints.updateEndpoint(endpoint);

  const apiVersion = config.get('apiVersion');
  if (apiVersion && isVersionBelow(apiVersion, MIN_SUPPORTED_API_VERSION)) {
    ui.warn(
      'Your API version is no longer supported. Upgrade to a newer version of the API.'
    );
  }

  const { attempts } = await authenticate(ctx, options);

  const org = await selectOrganization(config, directory, ui, options.org);
  const space = org
    ? await selectSpace(config, directory, ui, org, options.space)
    : undefined;

  const history = saveCurrentSession(config);

  return {
    endpoint: url,
    attempts,
    org,
    space,
    session: history[0],
    history,
  };
}
