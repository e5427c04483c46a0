import type { ConfigStore } from './config.js';
import type { SessionRecord } from './types.js';

/**
 * Put `newSession` at the head of `history`, dropping any entry with the
 * same `authEndpoint`. Other entries keep their relative order.
 */
export function mergeCurrentSession(
  newSession: SessionRecord,
  history: readonly SessionRecord[]
): SessionRecord[] {
  return [
    newSession,
    ...history.filter(
      (entry) => entry.authEndpoint !== newSession.authEndpoint
    ),
  ];
}

export function sessionFromConfig(config: ConfigStore): SessionRecord {
  return {
    endpointURL: config.get('target'),
    accessToken: config.get('accessToken'),
    refreshToken: config.get('refreshToken'),
    apiVersion: config.get('apiVersion'),
    authEndpoint: config.get('authorizationEndpoint'),
    uaaEndpoint: config.get('uaaEndpoint'),
    dopplerEndpoint: config.get('dopplerEndpoint'),
    logCacheEndpoint: config.get('logCacheEndpoint'),
    orgFields: { ...config.get('organizationFields') },
    spaceFields: { ...config.get('spaceFields') },
  };
}

/**
 * Record the store's current session in its history
 */
export function saveCurrentSession(config: ConfigStore): SessionRecord[] {
  const instances = mergeCurrentSession(
    sessionFromConfig(config),
    config.get('instances')
  );
  config.update({ instances });
  return instances;
}

/**
 * Make the first remembered session whose auth endpoint contains `pattern`
 * the current one. Returns it, or undefined when nothing matches.
 */
export function restoreSession(
  config: ConfigStore,
  pattern: string
): SessionRecord | undefined {
  const history = config.get('instances');
  const match = history.find((entry) => entry.authEndpoint.includes(pattern));
  if (!match) {
    return undefined;
  }

  config.update({
    target: match.endpointURL,
    accessToken: match.accessToken,
    refreshToken: match.refreshToken,
    apiVersion: match.apiVersion,
    authorizationEndpoint: match.authEndpoint,
    uaaEndpoint: match.uaaEndpoint,
    dopplerEndpoint: match.dopplerEndpoint,
    logCacheEndpoint: match.logCacheEndpoint,
    organizationFields: { ...match.orgFields },
    spaceFields: { ...match.spaceFields },
    instances: mergeCurrentSession(match, history),
  });
  return match;
}
