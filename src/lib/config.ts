import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getConfigPath } from './utils/path.js';

const FieldsSchema = z.object({
  guid: z.string().default(''),
  name: z.string().default(''),
});

export const SessionRecordSchema = z.object({
  endpointURL: z.string().default(''),
  accessToken: z.string().default(''),
  refreshToken: z.string().default(''),
  apiVersion: z.string().default(''),
  authEndpoint: z.string(),
  uaaEndpoint: z.string().default(''),
  dopplerEndpoint: z.string().default(''),
  logCacheEndpoint: z.string().default(''),
  orgFields: FieldsSchema.default({}),
  spaceFields: FieldsSchema.default({}),
});

export const OrbitConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  target: z.string().default(''),
  apiVersion: z.string().default(''),
  authorizationEndpoint: z.string().default(''),
  uaaEndpoint: z.string().default(''),
  dopplerEndpoint: z.string().default(''),
  logCacheEndpoint: z.string().default(''),
  accessToken: z.string().default(''),
  refreshToken: z.string().default(''),
  uaaGrantType: z.string().default(''),
  uaaOAuthClient: z.string().default('orbit'),
  uaaOAuthClientSecret: z.string().default(''),
  sslDisabled: z.boolean().default(false),
  organizationFields: FieldsSchema.default({}),
  spaceFields: FieldsSchema.default({}),
  instances: z.array(SessionRecordSchema).default([]),
});

export type OrbitConfig = z.infer<typeof OrbitConfigSchema>;

export function defaultConfig(): OrbitConfig {
  return OrbitConfigSchema.parse({});
}

/**
 * Load configuration from file, creating default if it doesn't exist
 */
export function loadConfig(configPath: string = getConfigPath()): OrbitConfig {
  if (!existsSync(configPath)) {
    const config = defaultConfig();
    saveConfig(config, configPath);
    return config;
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
    const parsed = OrbitConfigSchema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }
    console.warn(
      `Warning: Invalid config file, using defaults: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
    );
  } catch (error) {
    console.warn(
      `Warning: Failed to load config file, using defaults: ${String(error)}`
    );
  }
  return defaultConfig();
}

/**
 * Save configuration to file
 */
export function saveConfig(
  config: OrbitConfig,
  configPath: string = getConfigPath()
): void {
  const configDir = dirname(configPath);

  // Ensure config directory exists
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf8');
  } catch (error) {
    console.warn(`Warning: Failed to save config file: ${String(error)}`);
  }
}

/**
 * Process-wide configuration, read once and written through on every update.
 * Login is its only writer while it runs.
 */
export class ConfigStore {
  private data: OrbitConfig;

  constructor(private readonly configPath: string = getConfigPath()) {
    this.data = loadConfig(configPath);
  }

  get<K extends keyof OrbitConfig>(key: K): OrbitConfig[K] {
    return this.data[key];
  }

  update(patch: Partial<OrbitConfig>): void {
    this.data = { ...this.data, ...patch };
    saveConfig(this.data, this.configPath);
  }

  snapshot(): OrbitConfig {
    return structuredClone(this.data);
  }

  isLoggedIn(): boolean {
    return this.data.accessToken !== '';
  }

  /**
   * Forget tokens and targets of the current session.
   * Endpoint details and the grant type survive.
   */
  clearSession(): void {
    this.update({
      accessToken: '',
      refreshToken: '',
      organizationFields: { guid: '', name: '' },
      spaceFields: { guid: '', name: '' },
    });
  }
}
