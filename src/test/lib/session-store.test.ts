import { describe, expect, it } from 'vitest';
import {
  mergeCurrentSession,
  restoreSession,
  saveCurrentSession,
  sessionFromConfig,
} from '../../lib/session-store.js';
import type { SessionRecord } from '../../lib/types.js';
import { useTempOrbitHome } from '../fixtures/login-fakes.js';

function session(
  authEndpoint: string,
  overrides: Partial<SessionRecord> = {}
): SessionRecord {
  return {
    endpointURL: authEndpoint.replace('login.', 'api.'),
    accessToken: `bearer token-for-${authEndpoint}`,
    refreshToken: 'test-refresh',
    apiVersion: '2.200.0',
    authEndpoint,
    uaaEndpoint: authEndpoint.replace('login.', 'uaa.'),
    dopplerEndpoint: '',
    logCacheEndpoint: '',
    orgFields: { guid: '', name: '' },
    spaceFields: { guid: '', name: '' },
    ...overrides,
  };
}

describe('mergeCurrentSession', () => {
  it('should put the new session first in an empty history', () => {
    const current = session('https://login.x.example.com');

    expect(mergeCurrentSession(current, [])).toEqual([current]);
  });

  it('should keep one entry after two logins to the same endpoint', () => {
    const first = session('https://login.x.example.com');
    const second = session('https://login.x.example.com', {
      accessToken: 'bearer second',
    });

    const history = mergeCurrentSession(
      second,
      mergeCurrentSession(first, [])
    );

    expect(history).toHaveLength(1);
    expect(history[0].accessToken).toBe('bearer second');
  });

  it('should replace the matching entry and keep unrelated ones in order', () => {
    const a = session('https://login.x.example.com');
    const b = session('https://login.y.example.com');
    const fresh = session('https://login.x.example.com', {
      accessToken: 'bearer fresh',
    });

    const history = mergeCurrentSession(fresh, [a, b]);

    expect(history).toEqual([fresh, b]);
  });

  it('should preserve the relative order of every other entry', () => {
    const a = session('https://login.a.example.com');
    const b = session('https://login.b.example.com');
    const c = session('https://login.c.example.com');
    const fresh = session('https://login.b.example.com', {
      accessToken: 'bearer fresh',
    });

    expect(mergeCurrentSession(fresh, [a, b, c])).toEqual([fresh, a, c]);
  });

  it('should not modify the input history', () => {
    const a = session('https://login.x.example.com');
    const history = [a];

    mergeCurrentSession(session('https://login.y.example.com'), history);

    expect(history).toEqual([a]);
  });
});

describe('session history in the config store', () => {
  const home = useTempOrbitHome();

  it('should build the session record from the store', () => {
    const config = home.config();
    config.update({
      target: 'https://api.x.example.com',
      accessToken: 'bearer abc',
      refreshToken: 'refresh-abc',
      apiVersion: '2.200.0',
      authorizationEndpoint: 'https://login.x.example.com',
      uaaEndpoint: 'https://uaa.x.example.com',
      dopplerEndpoint: 'wss://doppler.x.example.com',
      logCacheEndpoint: 'https://log-cache.x.example.com',
      organizationFields: { guid: 'org-guid', name: 'org1' },
      spaceFields: { guid: 'space-guid', name: 'space1' },
    });

    expect(sessionFromConfig(config)).toEqual({
      endpointURL: 'https://api.x.example.com',
      accessToken: 'bearer abc',
      refreshToken: 'refresh-abc',
      apiVersion: '2.200.0',
      authEndpoint: 'https://login.x.example.com',
      uaaEndpoint: 'https://uaa.x.example.com',
      dopplerEndpoint: 'wss://doppler.x.example.com',
      logCacheEndpoint: 'https://log-cache.x.example.com',
      orgFields: { guid: 'org-guid', name: 'org1' },
      spaceFields: { guid: 'space-guid', name: 'space1' },
    });
  });

  it('should save the current session at the head of the history', () => {
    const config = home.config();
    const other = session('https://login.y.example.com');
    config.update({
      target: 'https://api.x.example.com',
      authorizationEndpoint: 'https://login.x.example.com',
      accessToken: 'bearer abc',
      instances: [session('https://login.x.example.com'), other],
    });

    const history = saveCurrentSession(config);

    expect(history).toHaveLength(2);
    expect(history[0].accessToken).toBe('bearer abc');
    expect(history[1]).toEqual(other);
    expect(config.get('instances')).toEqual(history);
  });

  it('should restore a remembered session by endpoint pattern', () => {
    const config = home.config();
    const x = session('https://login.x.example.com');
    const y = session('https://login.y.example.com', {
      orgFields: { guid: 'org-y', name: 'org-y' },
    });
    config.update({ instances: [x, y] });

    const restored = restoreSession(config, 'y.example');

    expect(restored).toEqual(y);
    expect(config.get('target')).toBe('https://api.y.example.com');
    expect(config.get('authorizationEndpoint')).toBe(
      'https://login.y.example.com'
    );
    expect(config.get('organizationFields')).toEqual({
      guid: 'org-y',
      name: 'org-y',
    });
    expect(config.get('instances')).toEqual([y, x]);
  });

  it('should return undefined when no remembered session matches', () => {
    const config = home.config();
    config.update({ instances: [session('https://login.x.example.com')] });

    expect(restoreSession(config, 'nowhere')).toBeUndefined();
    expect(config.get('target')).toBe('');
  });
});
