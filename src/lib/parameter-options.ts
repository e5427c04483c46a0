/**
 * CLI parameter configuration definitions
 */
import { Command } from 'commander';

/**
 * Parameter configuration for CLI options
 */
export interface ParameterConfig {
  flags: string;
  description: string;
}

/**
 * Map of parameter names to their CLI option configuration
 */
export const PARAMETER_OPTIONS: Record<string, ParameterConfig> = {
  api: {
    flags: '-a, --api <url>',
    description: 'API endpoint (e.g. https://api.example.com)',
  },
  'api-pattern': {
    flags: '-a, --api <pattern>',
    description: 'part of a remembered API endpoint',
  },
  username: {
    flags: '-u, --username <username>',
    description: 'username',
  },
  password: {
    flags: '-p, --password <password>',
    description: 'password',
  },
  org: {
    flags: '-o, --org <org>',
    description: 'org',
  },
  space: {
    flags: '-s, --space <space>',
    description: 'space',
  },
  sso: {
    flags: '--sso',
    description: 'prompt for a one-time passcode to login',
  },
  'sso-passcode': {
    flags: '--sso-passcode <passcode>',
    description: 'one-time passcode',
  },
  'skip-ssl-validation': {
    flags: '--skip-ssl-validation',
    description: 'skip verification of the API endpoint. Not recommended!',
  },
};

/**
 * Add parameters to a command based on the parameter configuration
 */
export function addParametersToCommand(cmd: Command, params: string[]): void {
  params.forEach((param) => {
    const config = PARAMETER_OPTIONS[param];
    if (config) {
      cmd.option(config.flags, config.description);
    } else {
      console.warn(`Unknown parameter: ${param}`);
    }
  });
}
