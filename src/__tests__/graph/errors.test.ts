import { GraphError } from '@microsoft/microsoft-graph-client';
import { describe, expect, it } from 'vitest';
import {
  AlreadyExistsError,
  InvalidArgumentsError,
  NotFoundError,
  PermissionDeniedError,
  TransportError,
} from '../../errors.js';
import { graphStatus, toStorageError } from '../../graph/errors.js';

describe('toStorageError', () => {
  it.each([
    [400, InvalidArgumentsError, 'Request rejected by SharePoint (/a.txt: Bad name)'],
    [401, PermissionDeniedError, 'Permission denied (/a.txt: Bad name)'],
    [403, PermissionDeniedError, 'Permission denied (/a.txt: Bad name)'],
    [404, NotFoundError, 'Not found (/a.txt: Bad name)'],
    [409, AlreadyExistsError, 'Already exists (/a.txt: Bad name)'],
  ])('maps Graph status %i', (status, type, message) => {
    const error = toStorageError(new GraphError(status, 'Bad name'), '/a.txt');

    expect(error).toBeInstanceOf(type);
    expect(error.message).toBe(message);
  });

  it('maps throttling and server errors to retryable transport errors', () => {
    const throttled = toStorageError(new GraphError(429, 'Too many requests'), '/a.txt');
    const unavailable = toStorageError(new GraphError(503, 'Service unavailable'));

    expect(throttled).toBeInstanceOf(TransportError);
    expect(throttled).toMatchObject({ status: 429, message: 'Graph API error 429 (/a.txt: Too many requests)' });
    expect(unavailable).toMatchObject({ status: 503, message: 'Graph API error 503 (Service unavailable)' });
  });

  it('treats a Graph error without a status as a failed request', () => {
    const error = toStorageError(new GraphError(-1, 'fetch failed'), '/a.txt');

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: undefined, message: 'Graph request failed (/a.txt: fetch failed)' });
  });

  it('falls back to the Graph error code when there is no message', () => {
    const graphError = new GraphError(404);
    graphError.code = 'itemNotFound';

    expect(toStorageError(graphError).message).toBe('Not found (itemNotFound)');
  });

  it('wraps unknown failures as transport errors', () => {
    const error = toStorageError(new Error('socket hang up'), '/a.txt');

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe('/a.txt: socket hang up');
  });

  it('passes storage errors through unchanged', () => {
    const original = new NotFoundError('gone');
    expect(toStorageError(original, '/a.txt')).toBe(original);
  });
});

describe('graphStatus', () => {
  it('reads the status of Graph errors only', () => {
    expect(graphStatus(new GraphError(404))).toBe(404);
    expect(graphStatus(new Error('nope'))).toBeUndefined();
  });
});
