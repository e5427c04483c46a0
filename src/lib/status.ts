import { z } from 'zod';
import type { ConfigStore } from './config.js';
import { entityName } from './terminal.js';
import { getLastLogin } from './utils/log.js';

const TokenClaimsSchema = z.object({
  user_name: z.string().optional(),
  email: z.string().optional(),
  client_id: z.string().optional(),
});

/**
 * Read the user name from a "bearer <jwt>" access token
 */
export function userFromAccessToken(accessToken: string): string {
  const jwt = accessToken.replace(/^bearer\s+/i, '');
  const payload = jwt.split('.')[1];
  if (!payload) {
    return '';
  }

  try {
    const claims = TokenClaimsSchema.safeParse(
      JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'))
    );
    if (!claims.success) {
      return '';
    }
    return (
      claims.data.user_name ?? claims.data.email ?? claims.data.client_id ?? ''
    );
  } catch {
    // Not a JWT
    return '';
  }
}

/**
 * Lines describing the current endpoint, user and target
 */
export function describeConfiguration(config: ConfigStore): string[] {
  const target = config.get('target');
  if (target === '') {
    return ["No API endpoint set. Use 'orbit login' to set an endpoint."];
  }

  const apiVersion = config.get('apiVersion');
  const lines = [
    `API endpoint:   ${target}${apiVersion ? ` (API version: ${apiVersion})` : ''}`,
  ];

  if (!config.isLoggedIn()) {
    lines.push("Not logged in. Use 'orbit login' to log in.");
    return lines;
  }

  const org = config.get('organizationFields').name;
  const space = config.get('spaceFields').name;

  lines.push(
    `User:           ${entityName(userFromAccessToken(config.get('accessToken')))}`,
    `Org:            ${org ? entityName(org) : "No org targeted, use 'orbit login -o ORG'"}`,
    `Space:          ${space ? entityName(space) : "No space targeted, use 'orbit login -s SPACE'"}`
  );

  const lastLogin = getLastLogin(target);
  if (lastLogin) {
    lines.push(`Last login:     ${lastLogin.timestamp}`);
  }

  return lines;
}
