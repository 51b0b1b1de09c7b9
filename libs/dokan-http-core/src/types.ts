export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/**
 * A query value before flattening. Only primitives, dates and flat arrays of
 * strings or numbers can be serialized; anything else fails the call locally.
 */
export type QueryValue =
  | string
  | number
  | boolean
  | Date
  | readonly string[]
  | readonly number[]
  | null
  | undefined;

export interface QueryFieldTag {
  /** Parameter name on the wire. An empty name leaves the field out. */
  name: string;
  /** Skip the field when it holds the zero value for its type. */
  omitEmpty?: boolean;
}

/**
 * Declares how every field of a params object maps onto the query string.
 * `null` marks a field that never reaches the wire.
 */
export type QuerySchema<T> = { readonly [K in keyof T]-?: QueryFieldTag | null };

export interface TaggedQueryField {
  readonly field: string;
  readonly tag: QueryFieldTag | null;
  readonly value: unknown;
}

export interface TaggedQuery {
  readonly fields: readonly TaggedQueryField[];
}

/**
 * Abstract description of one API call. Built fresh per call and never
 * mutated by the pipeline.
 */
export interface RequestDescription {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: TaggedQuery;
  readonly body?: unknown;
  readonly headers?: HttpHeaders;
}

export interface ResponseEnvelope {
  status: number;
  headers: Headers;
  body: Uint8Array;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

export interface RawHttpResponse {
  status: number;
  headers: Headers;
  body: ArrayBuffer | Uint8Array;
}

export interface HttpTransport {
  (request: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug?(message: string, meta?: LoggerMeta): void;
  info?(message: string, meta?: LoggerMeta): void;
  warn?(message: string, meta?: LoggerMeta): void;
  error?(message: string, meta?: LoggerMeta): void;
}

export interface RetryPolicy {
  /** Total attempts including the first one. Always at least 1. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
}

export interface CallOptions {
  /** Cancels the whole call, including backoff waits and in-flight I/O. */
  signal?: AbortSignal;
}
