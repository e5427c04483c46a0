/**
 * Programmatic entry points, for callers that drive login without the CLI
 */
export { HttpAuthenticator, type Authenticator } from './authenticator.js';
export { ConfigStore, type OrbitConfig } from './config.js';
export {
  HttpDirectoryClient,
  type DirectoryClient,
} from './directory-client.js';
export {
  HttpEndpointRepository,
  type EndpointRepository,
} from './endpoint-repository.js';
export {
  HttpError,
  LoginError,
  isLoginError,
  type LoginErrorKind,
} from './errors.js';
export {
  performLogin,
  type LoginContext,
  type LoginOptions,
  type LoginResult,
} from './login-flow.js';
export {
  mergeCurrentSession,
  restoreSession,
  saveCurrentSession,
} from './session-store.js';
export { TerminalUI, type UI } from './terminal.js';
export type {
  Credentials,
  Organization,
  PromptCatalog,
  PromptSpec,
  SessionRecord,
  Space,
} from './types.js';
