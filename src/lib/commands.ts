import { Endpoint } from '../commands/endpoint.js';
import { Login } from '../commands/login.js';
import { Logout } from '../commands/logout.js';
import { Target } from '../commands/target.js';
import type { CommandConfig } from './types.js';

/**
 * Command registry - all available commands and their aliases
 */
export const commands: Record<string, CommandConfig> = {
  login: {
    command: Login,
    description: Login.description,
    aliases: ['l'],
  },
  logout: {
    command: Logout,
    description: Logout.description,
    aliases: ['lo'],
  },
  endpoint: {
    command: Endpoint,
    description: Endpoint.description,
    aliases: ['e'],
  },
  target: {
    command: Target,
    description: Target.description,
    aliases: ['t'],
  },
};
