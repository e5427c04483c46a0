export type LoginErrorKind =
  | 'ConflictingAuthMode'
  | 'InvalidEndpoint'
  | 'RemoteUnavailable'
  | 'ServiceAccountActive'
  | 'AuthenticationFailed'
  | 'OrganizationNotFound'
  | 'SpaceNotFound';

/**
 * Failure of one login stage. `kind` lets callers branch without parsing
 * the message; `queriedName` carries the queried org or space for not-found kinds.
 */
export class LoginError extends Error {
  readonly kind: LoginErrorKind;
  readonly queriedName?: string;

  constructor(
    kind: LoginErrorKind,
    message: string,
    options: { queriedName?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'LoginError';
    this.kind = kind;
    this.queriedName = options.queriedName;
  }
}

export function isLoginError(
  error: unknown,
  kind?: LoginErrorKind
): error is LoginError {
  return (
    error instanceof LoginError && (kind === undefined || error.kind === kind)
  );
}

/**
 * Non-2xx response from a platform API
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
