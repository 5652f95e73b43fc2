/**
 * Error taxonomy shared by the credential resolver, the storage adapter and the tool dispatcher
 */

export type ErrorKind =
  | 'InvalidArguments'
  | 'AuthError'
  | 'NotFound'
  | 'PermissionDenied'
  | 'AlreadyExists'
  | 'DecodeError'
  | 'TransportError';

export type AuthErrorReason = 'IncompleteCredentials' | 'Unavailable';

export abstract class SharePointError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentsError extends SharePointError {
  readonly kind = 'InvalidArguments';
}

export class AuthError extends SharePointError {
  readonly kind = 'AuthError';

  constructor(
    readonly reason: AuthErrorReason,
    message: string
  ) {
    super(message);
  }
}

export class NotFoundError extends SharePointError {
  readonly kind = 'NotFound';
}

export class PermissionDeniedError extends SharePointError {
  readonly kind = 'PermissionDenied';
}

export class AlreadyExistsError extends SharePointError {
  readonly kind = 'AlreadyExists';
}

export class DecodeError extends SharePointError {
  readonly kind = 'DecodeError';
}

/**
 * Network failures, timeouts, throttling and server-side errors. Callers may retry these.
 */
export class TransportError extends SharePointError {
  readonly kind = 'TransportError';

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Replaces every occurrence of the given secret values with a placeholder
 */
export function redact(message: string, secrets: readonly string[]): string {
  return secrets
    .filter((secret) => secret.length > 0)
    .reduce((text, secret) => text.split(secret).join('[REDACTED]'), message);
}
