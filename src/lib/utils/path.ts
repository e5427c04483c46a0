import { join } from 'node:path';

/**
 * Get the Orbit configuration directory
 * ORBIT_HOME wins; otherwise ~/.orbit
 */
export function getConfigDir(): string {
  if (process.env.ORBIT_HOME) {
    return process.env.ORBIT_HOME;
  }

  // On Windows, use USERPROFILE; on Unix-like systems, use HOME
  const homeDir = process.env.HOME || process.env.USERPROFILE;
  if (!homeDir) {
    throw new Error('HOME or USERPROFILE environment variable is not set');
  }
  return join(homeDir, '.orbit');
}

/**
 * Get the path to the configuration file
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Get the path to the activity log
 */
export function getActivityLogPath(): string {
  return join(getConfigDir(), 'activity.log');
}

/**
 * Normalize an API endpoint URL
 * - Defaults to https:// when no scheme is given
 * - Removes trailing slashes
 */
export function normalizeEndpointUrl(endpoint: string): string {
  let url = endpoint.trim();

  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = `https://${url}`;
  }

  return url.replace(/\/+$/, '');
}
