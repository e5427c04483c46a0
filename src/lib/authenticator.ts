import { z } from 'zod';
import type { ConfigStore } from './config.js';
import { HttpError } from './errors.js';
import { requestJson } from './http.js';
import type { Credentials, PromptCatalog, PromptKind } from './types.js';

/**
 * Remote authentication service
 */
export interface Authenticator {
  fetchPrompts(): Promise<PromptCatalog>;
  authenticate(credentials: Credentials): Promise<void>;
}

const LoginInfoSchema = z.object({
  prompts: z.record(z.tuple([z.string(), z.string()])).default({}),
  links: z
    .object({ uaa: z.string().optional() })
    .passthrough()
    .optional(),
});

const TokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().default(''),
  token_type: z.string().default('bearer'),
});

/**
 * Map the service's field type onto a prompt kind. Anything the service
 * hides as a password is a secret; the rest is plain text.
 */
function toPromptKind(type: string): PromptKind {
  return type === 'password' ? 'secret' : 'text';
}

export class HttpAuthenticator implements Authenticator {
  constructor(private readonly config: ConfigStore) {}

  /**
   * Fetch the prompt catalog and remember the token service URL it names
   */
  async fetchPrompts(): Promise<PromptCatalog> {
    const authEndpoint = this.config.get('authorizationEndpoint');
    const info = await requestJson(`${authEndpoint}/login`, LoginInfoSchema);

    const uaa = info.links?.uaa;
    if (uaa) {
      this.config.update({ uaaEndpoint: uaa });
    }

    const catalog: PromptCatalog = new Map();
    for (const [name, [type, displayLabel]] of Object.entries(info.prompts)) {
      catalog.set(name, { name, kind: toPromptKind(type), displayLabel });
    }
    return catalog;
  }

  async authenticate(credentials: Credentials): Promise<void> {
    const tokenEndpoint =
      this.config.get('uaaEndpoint') || this.config.get('authorizationEndpoint');
    const client = this.config.get('uaaOAuthClient');
    const secret = this.config.get('uaaOAuthClientSecret');

    const form = new URLSearchParams({
      grant_type: 'password',
      scope: '',
      ...credentials,
    });

    let token: z.infer<typeof TokenResponseSchema>;
    try {
      token = await requestJson(
        `${tokenEndpoint}/oauth/token`,
        TokenResponseSchema,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Authorization: `Basic ${Buffer.from(`${client}:${secret}`).toString('base64')}`,
          },
          body: form.toString(),
        }
      );
    } catch (error) {
      if (error instanceof HttpError && error.status === 401) {
        throw new Error('Credentials were rejected, please try again.');
      }
      throw error;
    }

    this.config.update({
      accessToken: `${token.token_type} ${token.access_token}`,
      refreshToken: token.refresh_token,
      uaaGrantType: 'password',
    });
  }
}
