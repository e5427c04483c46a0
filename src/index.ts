#!/usr/bin/env node
/**
 * orbit: log in to the Orbit application platform and target an org and space.
 *
 * Importing this module gives the programmatic API; running it starts the CLI.
 */
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { main } from './lib/cli.js';

export { main };
export * from './lib/api.js';

/**
 * True when node was started on this file, directly or through the npm bin link
 */
export function isEntryPoint(
  script: string | undefined = process.argv[1],
  moduleUrl: string = import.meta.url
): boolean {
  if (!script) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(script)).href === moduleUrl;
  } catch {
    // Script path does not exist (e.g. node -e)
    return false;
  }
}

/* c8 ignore next 3 */
if (isEntryPoint()) {
  await main();
}
