import type { ConfigStore } from './config.js';
import { entityName, type UI } from './terminal.js';
import type { Endpoint } from './types.js';

/**
 * Decide which API endpoint to log in to.
 *
 * An explicit endpoint wins, then the persisted one, then an interactive
 * prompt. Skip-SSL is sticky: a persisted `true` cannot be turned off here.
 * The URL is not validated; the endpoint repository rejects bad ones.
 */
export async function resolveEndpoint(
  config: ConfigStore,
  ui: UI,
  explicit: { endpoint?: string; skipSSLValidation?: boolean }
): Promise<Endpoint> {
  const skipSSLValidation =
    config.get('sslDisabled') || explicit.skipSSLValidation === true;

  let url = explicit.endpoint ?? '';
  if (url === '') {
    url = config.get('target');
  }

  if (url === '') {
    while (url === '') {
      url = await ui.ask('API endpoint');
    }
  } else {
    ui.say(`API endpoint: ${entityName(url)}`);
  }

  return { url, skipSSLValidation };
}
