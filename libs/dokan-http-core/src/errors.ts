import type { ResponseEnvelope } from './types';

/**
 * Closed set of failure kinds. Exactly one kind describes a failed call;
 * callers branch on `kind.type`.
 */
export type ErrorKind =
  | { type: 'network_failure'; cause: unknown }
  | { type: 'auth_failure'; message: string }
  | { type: 'unauthorized'; message: string; statusCode: number }
  | { type: 'not_found'; resource: string; id: string | number; statusCode: number }
  | { type: 'rate_limited'; retryAfterSeconds: number; statusCode: number }
  | { type: 'validation'; field: string; code: string; message: string }
  | { type: 'api_error'; code: string; message: string; statusCode: number; data?: unknown }
  | { type: 'serialization'; message: string; cause?: unknown };

export type ErrorKindType = ErrorKind['type'];

export interface DokanErrorOptions {
  /** The exchange that produced the error, when there was one. */
  response?: ResponseEnvelope;
}

export class DokanError extends Error {
  readonly kind: ErrorKind;
  readonly response?: ResponseEnvelope;

  constructor(kind: ErrorKind, options: DokanErrorOptions = {}) {
    super(describeErrorKind(kind), hasCause(kind) ? { cause: kind.cause } : undefined);
    this.name = 'DokanError';
    this.kind = kind;
    this.response = options.response;
  }

  get statusCode(): number | undefined {
    switch (this.kind.type) {
      case 'unauthorized':
      case 'not_found':
      case 'rate_limited':
      case 'api_error':
        return this.kind.statusCode;
      default:
        return undefined;
    }
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function isDokanError(error: unknown): error is DokanError {
  return error instanceof DokanError;
}

export function isErrorKind<T extends ErrorKindType>(
  error: unknown,
  type: T,
): error is DokanError & { kind: Extract<ErrorKind, { type: T }> } {
  return error instanceof DokanError && error.kind.type === type;
}

export function networkFailure(cause: unknown): DokanError {
  return new DokanError({ type: 'network_failure', cause });
}

export function authFailure(message: string): DokanError {
  return new DokanError({ type: 'auth_failure', message });
}

export function validationError(field: string, code: string, message: string): DokanError {
  return new DokanError({ type: 'validation', field, code, message });
}

export function serializationError(message: string, cause?: unknown): DokanError {
  return new DokanError({ type: 'serialization', message, cause });
}

/**
 * Client errors other than 429 are terminal, as are failures raised before any
 * network I/O. Everything else (transport failures, 5xx, 429) may be
 * retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof DokanError)) {
    return true;
  }

  switch (error.kind.type) {
    case 'auth_failure':
    case 'validation':
    case 'serialization':
      return false;
    case 'network_failure':
      return true;
    default: {
      const status = error.statusCode ?? 0;
      return !(status >= 400 && status < 500 && status !== 429);
    }
  }
}

export function describeErrorKind(kind: ErrorKind): string {
  switch (kind.type) {
    case 'network_failure':
      return `network error: ${causeMessage(kind.cause)}`;
    case 'auth_failure':
    case 'unauthorized':
      return `authentication error: ${kind.message}`;
    case 'not_found':
      return `resource not found: ${kind.resource} with ID ${kind.id}`;
    case 'rate_limited':
      return `rate limit exceeded, retry after ${kind.retryAfterSeconds} seconds`;
    case 'validation':
      return `validation error on field '${kind.field}': ${kind.message}`;
    case 'api_error':
      return `dokan api error: ${kind.code} - ${kind.message}`;
    case 'serialization':
      return `serialization error: ${kind.message}`;
  }
}

function hasCause(
  kind: ErrorKind,
): kind is Extract<ErrorKind, { type: 'network_failure' | 'serialization' }> {
  return (kind.type === 'network_failure' || kind.type === 'serialization') && kind.cause !== undefined;
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
