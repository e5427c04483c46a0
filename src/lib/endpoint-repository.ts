import { z } from 'zod';
import type { ConfigStore } from './config.js';
import { LoginError, errorMessage } from './errors.js';
import { requestJson } from './http.js';
import type { Endpoint } from './types.js';
import { normalizeEndpointUrl } from './utils/path.js';

/** Oldest API version this client still supports */
export const MIN_SUPPORTED_API_VERSION = '2.128.0';

const LinkSchema = z.object({ href: z.string() }).nullable().optional();

const RootInfoSchema = z.object({
  links: z.object({
    cloud_controller_v2: z
      .object({
        href: z.string(),
        meta: z.object({ version: z.string() }).optional(),
      })
      .nullable()
      .optional(),
    login: LinkSchema,
    uaa: LinkSchema,
    logging: LinkSchema,
    log_cache: LinkSchema,
  }),
});

export interface EndpointRepository {
  /**
   * Point the configuration at `endpoint` and record its companion URLs.
   * Returns the normalized endpoint URL.
   */
  updateEndpoint(endpoint: Endpoint): Promise<string>;
}

/**
 * Compare dotted numeric versions; non-numeric parts count as 0
 */
export function isVersionBelow(version: string, minimum: string): boolean {
  const parts = version.split('.').map((p) => parseInt(p, 10) || 0);
  const min = minimum.split('.').map((p) => parseInt(p, 10) || 0);

  for (let i = 0; i < Math.max(parts.length, min.length); i++) {
    const a = parts[i] ?? 0;
    const b = min[i] ?? 0;
    if (a !== b) {
      return a < b;
    }
  }
  return false;
}

export class HttpEndpointRepository implements EndpointRepository {
  constructor(private readonly config: ConfigStore) {}

  async updateEndpoint(endpoint: Endpoint): Promise<string> {
    const url = normalizeEndpointUrl(endpoint.url);

    let info: z.infer<typeof RootInfoSchema>;
    try {
      info = await requestJson(`${url}/`, RootInfoSchema);
    } catch (error) {
      throw new LoginError(
        'InvalidEndpoint',
        `Request error: ${errorMessage(error)}\nTIP: If you are behind a firewall and require an HTTP proxy, verify the https_proxy environment variable is correctly set.`,
        { cause: error }
      );
    }

    const { links } = info;
    const authEndpoint = links.login?.href ?? '';
    if (authEndpoint === '') {
      throw new LoginError(
        'InvalidEndpoint',
        `API endpoint ${url} does not advertise a login server`
      );
    }

    this.config.update({
      target: url,
      sslDisabled: endpoint.skipSSLValidation,
      apiVersion: links.cloud_controller_v2?.meta?.version ?? '',
      authorizationEndpoint: authEndpoint,
      uaaEndpoint: links.uaa?.href ?? authEndpoint,
      dopplerEndpoint: links.logging?.href ?? '',
      logCacheEndpoint: links.log_cache?.href ?? '',
    });

    return url;
  }
}
