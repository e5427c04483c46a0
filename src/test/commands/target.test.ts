import { describe, expect, it } from 'vitest';
import { Target } from '../../commands/target.js';
import type { ConfigStore } from '../../lib/config.js';
import { useTempOrbitHome } from '../fixtures/login-fakes.js';

class TestTarget extends Target {
  constructor(private readonly config: ConfigStore) {
    super();
  }

  protected createConfig(): ConfigStore {
    return this.config;
  }
}

describe('Target Command', () => {
  const home = useTempOrbitHome();

  it('should explain how to set an endpoint', () => {
    expect(new TestTarget(home.config()).exec()).toBe(
      "No API endpoint set. Use 'orbit login' to set an endpoint."
    );
  });

  it('should describe the current endpoint and target', () => {
    const config = home.config();
    config.update({
      target: 'https://api.example.com',
      accessToken: 'bearer test-token',
      organizationFields: { guid: 'org-guid', name: 'org1' },
      spaceFields: { guid: 'space-guid', name: 'space1' },
    });

    expect(new TestTarget(config).exec()).toBe(
      [
        'API endpoint:   https://api.example.com',
        'User:           ',
        'Org:            org1',
        'Space:          space1',
      ].join('\n')
    );
  });
});
