import type { CredentialPlan } from './authentication-loop.js';
import type { Authenticator } from './authenticator.js';
import { LoginError, errorMessage } from './errors.js';
import type { UI } from './terminal.js';
import type { Credentials, PromptCatalog } from './types.js';

const USERNAME = 'username';
const PASSWORD = 'password';
const PASSCODE = 'passcode';

export async function fetchPromptCatalog(
  authenticator: Authenticator
): Promise<PromptCatalog> {
  try {
    return await authenticator.fetchPrompts();
  } catch (error) {
    throw new LoginError('RemoteUnavailable', errorMessage(error), {
      cause: error,
    });
  }
}

/**
 * Username/password flow.
 *
 * - `username` (text) takes the override when one is given, otherwise it is
 *   asked once.
 * - Other text prompts are asked once, in catalog order.
 * - `password` is asked on every attempt; the override stands in for the
 *   first answer only.
 * - Remaining secrets are asked on every attempt, after the password.
 * - `passcode` belongs to the SSO flow and is never asked here.
 */
export function passwordCredentialPlan(
  catalog: PromptCatalog,
  ui: UI,
  overrides: { username?: string; password?: string } = {}
): CredentialPlan {
  let pendingPassword = overrides.password ?? '';

  return {
    async collectStatic() {
      const credentials: Credentials = {};

      const usernamePrompt = catalog.get(USERNAME);
      if (usernamePrompt) {
        credentials[USERNAME] =
          usernamePrompt.kind === 'text' && overrides.username
            ? overrides.username
            : await ui.ask(usernamePrompt.displayLabel);
      }

      for (const prompt of catalog.values()) {
        if (
          prompt.kind === 'text' &&
          prompt.name !== USERNAME &&
          prompt.name !== PASSCODE
        ) {
          credentials[prompt.name] = await ui.ask(prompt.displayLabel);
        }
      }

      return credentials;
    },

    async collectForAttempt() {
      const credentials: Credentials = {};

      const passwordPrompt = catalog.get(PASSWORD);
      if (passwordPrompt) {
        if (pendingPassword !== '') {
          credentials[PASSWORD] = pendingPassword;
          pendingPassword = '';
        } else {
          credentials[PASSWORD] = await ui.askSecret(passwordPrompt.displayLabel);
        }
      }

      for (const prompt of catalog.values()) {
        if (
          prompt.kind === 'secret' &&
          prompt.name !== USERNAME &&
          prompt.name !== PASSWORD &&
          prompt.name !== PASSCODE
        ) {
          credentials[prompt.name] = await ui.askSecret(prompt.displayLabel);
        }
      }

      return credentials;
    },
  };
}

export function passcodeLabel(
  catalog: PromptCatalog,
  authEndpoint: string
): string {
  return (
    catalog.get(PASSCODE)?.displayLabel ||
    `Temporary Authentication Code ( Get one at ${authEndpoint}/passcode )`
  );
}

/**
 * One-time passcode flow. A supplied passcode is used for the first
 * attempt only.
 */
export function passcodeCredentialPlan(
  catalog: PromptCatalog,
  authEndpoint: string,
  ui: UI,
  passcode?: string
): CredentialPlan {
  const label = passcodeLabel(catalog, authEndpoint);

  return {
    async collectStatic() {
      return {};
    },

    async collectForAttempt(attempt) {
      if (attempt === 1 && passcode !== undefined) {
        return { [PASSCODE]: passcode };
      }
      return { [PASSCODE]: await ui.askSecret(label) };
    },
  };
}
