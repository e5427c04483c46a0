/**
 * Common types for the Orbit CLI
 */

/**
 * Command argument type - defines how the command accepts arguments
 */
export type CommandArguments =
  | { type: 'required'; name: string } // <name>
  | { type: 'variadic'; name: string } // [args...]
  | { type: 'none' }; // no arguments

/**
 * Command class interface
 */
export interface CommandClass {
  new (): {
    exec: (args: string[], opts?: Record<string, unknown>) => unknown;
  };
  description: string;
  commandName: string;
  params?: string[];
  argumentSpec?: CommandArguments;
}

/**
 * Command configuration for registration
 */
export interface CommandConfig {
  command: CommandClass;
  description: string;
  aliases?: string[];
}

/**
 * Kind of a server-declared credential field
 */
export type PromptKind = 'text' | 'secret';

export interface PromptSpec {
  name: string;
  kind: PromptKind;
  displayLabel: string;
}

/**
 * Prompts declared by the authentication service, in the order it sent them
 */
export type PromptCatalog = Map<string, PromptSpec>;

/**
 * Prompt name to value; rebuilt for every attempt and never persisted
 */
export type Credentials = Record<string, string>;

export interface OrganizationFields {
  guid: string;
  name: string;
}

export interface SpaceFields {
  guid: string;
  name: string;
}

export type Organization = OrganizationFields;
export type Space = SpaceFields;

/**
 * Authenticated state remembered for one API endpoint.
 * Identity key is `authEndpoint`.
 */
export interface SessionRecord {
  endpointURL: string;
  accessToken: string;
  refreshToken: string;
  apiVersion: string;
  authEndpoint: string;
  uaaEndpoint: string;
  dopplerEndpoint: string;
  logCacheEndpoint: string;
  orgFields: OrganizationFields;
  spaceFields: SpaceFields;
}

export interface Endpoint {
  url: string;
  skipSSLValidation: boolean;
}
