import type { Authenticator } from './authenticator.js';
import { LoginError, errorMessage } from './errors.js';
import type { UI } from './terminal.js';
import type { Credentials } from './types.js';

export const MAX_LOGIN_TRIES = 3;

/**
 * How one login flow gathers its credentials
 */
export interface CredentialPlan {
  /** Fields asked once, before the first attempt, and reused verbatim */
  collectStatic(): Promise<Credentials>;
  /** Fields gathered again for every attempt (1-based) */
  collectForAttempt(attempt: number): Promise<Credentials>;
}

type LoopState =
  | { phase: 'collect-static' }
  | {
      phase: 'attempt';
      attempt: number;
      remaining: number;
      staticCredentials: Credentials;
    }
  | { phase: 'success'; attempts: number }
  | { phase: 'exhausted' };

export interface AuthenticationOutcome {
  attempts: number;
}

/**
 * CollectStatic -> AttemptLoop(remaining, credentials) -> Success | Exhausted
 *
 * Failed attempts only print the server's message. Running out of attempts
 * raises one generic error; the last cause is not repeated.
 */
export async function runAuthenticationLoop(
  plan: CredentialPlan,
  authenticator: Authenticator,
  ui: UI,
  maxTries: number = MAX_LOGIN_TRIES
): Promise<AuthenticationOutcome> {
  let state: LoopState = { phase: 'collect-static' };

  for (;;) {
    switch (state.phase) {
      case 'collect-static': {
        const staticCredentials = await plan.collectStatic();
        state = {
          phase: 'attempt',
          attempt: 1,
          remaining: maxTries,
          staticCredentials,
        };
        break;
      }

      case 'attempt': {
        const current: Extract<LoopState, { phase: 'attempt' }> = state;
        const credentials: Credentials = {
          ...current.staticCredentials,
          ...(await plan.collectForAttempt(current.attempt)),
        };

        ui.say('Authenticating...');
        try {
          await authenticator.authenticate(credentials);
          ui.ok();
          ui.say('');
          state = { phase: 'success', attempts: current.attempt };
        } catch (error) {
          ui.say(errorMessage(error));
          state =
            current.remaining > 1
              ? {
                  ...current,
                  attempt: current.attempt + 1,
                  remaining: current.remaining - 1,
                }
              : { phase: 'exhausted' };
        }
        break;
      }

      case 'success':
        return { attempts: state.attempts };

      case 'exhausted':
        throw new LoginError('AuthenticationFailed', 'Unable to authenticate.');
    }
  }
}
