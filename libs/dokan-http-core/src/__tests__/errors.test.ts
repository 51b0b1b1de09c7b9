import { describe, it, expect } from 'vitest';
import {
  DokanError,
  TimeoutError,
  authFailure,
  isErrorKind,
  isRetryableError,
  networkFailure,
  serializationError,
  validationError,
} from '../errors';

describe('DokanError', () => {
  it('formats a message for every kind', () => {
    expect(networkFailure(new Error('connection refused')).message).toBe('network error: connection refused');
    expect(authFailure('JWT token is required').message).toBe('authentication error: JWT token is required');
    expect(new DokanError({ type: 'unauthorized', message: 'forbidden access', statusCode: 403 }).message).toBe(
      'authentication error: forbidden access',
    );
    expect(new DokanError({ type: 'not_found', resource: 'product', id: 42, statusCode: 404 }).message).toBe(
      'resource not found: product with ID 42',
    );
    expect(new DokanError({ type: 'rate_limited', retryAfterSeconds: 60, statusCode: 429 }).message).toBe(
      'rate limit exceeded, retry after 60 seconds',
    );
    expect(validationError('name', 'required', 'product name is required').message).toBe(
      "validation error on field 'name': product name is required",
    );
    expect(
      new DokanError({ type: 'api_error', code: 'dokan_rest_invalid', message: 'Invalid', statusCode: 400 }).message,
    ).toBe('dokan api error: dokan_rest_invalid - Invalid');
    expect(serializationError('failed to parse response').message).toBe('serialization error: failed to parse response');
  });

  it('keeps the underlying cause', () => {
    const cause = new TimeoutError('request timed out after 20ms');
    const error = networkFailure(cause);

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('DokanError');
    expect(error).toBeInstanceOf(Error);
  });

  it('exposes the status code of HTTP kinds only', () => {
    expect(new DokanError({ type: 'rate_limited', retryAfterSeconds: 1, statusCode: 429 }).statusCode).toBe(429);
    expect(networkFailure(new Error('reset')).statusCode).toBeUndefined();
  });
});

describe('isErrorKind', () => {
  it('narrows on the kind tag', () => {
    const error: unknown = new DokanError({ type: 'not_found', resource: 'order', id: 7, statusCode: 404 });

    expect(isErrorKind(error, 'not_found')).toBe(true);
    expect(isErrorKind(error, 'unauthorized')).toBe(false);
    expect(isErrorKind(new Error('plain'), 'not_found')).toBe(false);
    if (isErrorKind(error, 'not_found')) {
      expect(error.kind.id).toBe(7);
    }
  });
});

describe('isRetryableError', () => {
  it('retries transport failures, throttling and server errors', () => {
    expect(isRetryableError(networkFailure(new Error('reset')))).toBe(true);
    expect(isRetryableError(new DokanError({ type: 'rate_limited', retryAfterSeconds: 60, statusCode: 429 }))).toBe(
      true,
    );
    expect(
      isRetryableError(
        new DokanError({ type: 'api_error', code: 'internal_error', message: 'internal server error', statusCode: 500 }),
      ),
    ).toBe(true);
    expect(
      isRetryableError(new DokanError({ type: 'api_error', code: 'http_error', message: 'HTTP 600 error', statusCode: 600 })),
    ).toBe(true);
    expect(isRetryableError(new Error('something else'))).toBe(true);
  });

  it('stops on client errors', () => {
    expect(isRetryableError(new DokanError({ type: 'not_found', resource: 'resource', id: 'unknown', statusCode: 404 }))).toBe(
      false,
    );
    expect(isRetryableError(new DokanError({ type: 'unauthorized', message: 'unauthorized access', statusCode: 401 }))).toBe(
      false,
    );
    expect(
      isRetryableError(
        new DokanError({ type: 'api_error', code: 'dokan_rest_invalid', message: 'Invalid', statusCode: 422 }),
      ),
    ).toBe(false);
  });

  it('stops on failures raised before any request was sent', () => {
    expect(isRetryableError(authFailure('JWT token is required'))).toBe(false);
    expect(isRetryableError(validationError('id', 'invalid_id', 'id must be a positive integer'))).toBe(false);
    expect(isRetryableError(serializationError('failed to parse response'))).toBe(false);
  });
});
