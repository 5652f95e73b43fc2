/**
 * Normalizes Graph client failures into the storage error taxonomy
 */

import { GraphError } from '@microsoft/microsoft-graph-client';
import {
  AlreadyExistsError,
  InvalidArgumentsError,
  NotFoundError,
  PermissionDeniedError,
  SharePointError,
  TransportError,
  errorMessage,
} from '../errors.js';

function describe(err: GraphError): string {
  if (err.message) return err.message;
  if (err.code) return err.code;
  return err.statusCode > 0 ? `Graph API error (${err.statusCode})` : 'Graph request failed';
}

/**
 * Maps a Graph status code onto an error kind. `subject` names the path or
 * resource the failed call was about.
 */
export function fromGraphStatus(status: number, message: string, subject?: string): SharePointError {
  const detail = subject ? `${subject}: ${message}` : message;

  switch (status) {
    case 400:
      return new InvalidArgumentsError(`Request rejected by SharePoint (${detail})`);
    case 401:
    case 403:
      return new PermissionDeniedError(`Permission denied (${detail})`);
    case 404:
      return new NotFoundError(`Not found (${detail})`);
    case 409:
      return new AlreadyExistsError(`Already exists (${detail})`);
    default:
      return new TransportError(
        status > 0 ? `Graph API error ${status} (${detail})` : `Graph request failed (${detail})`,
        status > 0 ? status : undefined
      );
  }
}

export function graphStatus(err: unknown): number | undefined {
  return err instanceof GraphError ? err.statusCode : undefined;
}

/**
 * Anything that is not already a typed storage error becomes one. Errors
 * without an HTTP status (network, timeouts, open breaker) are TransportError.
 */
export function toStorageError(err: unknown, subject?: string): SharePointError {
  if (err instanceof SharePointError) return err;
  if (err instanceof GraphError) return fromGraphStatus(err.statusCode, describe(err), subject);

  const message = errorMessage(err);
  return new TransportError(subject ? `${subject}: ${message}` : message);
}
