import { z } from 'zod';
import type { ErrorKind } from './errors';

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

/**
 * Error body the marketplace returns on failure:
 * `{"code": "...", "message": "...", "data": ...}`.
 */
export const apiErrorPayloadSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

export type ApiErrorPayload = z.infer<typeof apiErrorPayloadSchema>;

export interface ClassifyOptions {
  /** Parsed from a `Retry-After` header when the server sent one. */
  retryAfterSeconds?: number;
  /** Used for 429 responses without a usable `Retry-After` header. */
  defaultRetryAfterSeconds?: number;
}

/**
 * Parses a response body as the structured error payload. Anything that is
 * not a JSON object of that shape yields `undefined`.
 */
export function parseErrorPayload(body: Uint8Array | string): ApiErrorPayload | undefined {
  const text = typeof body === 'string' ? body : new TextDecoder().decode(body);
  if (!text.trim()) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  const result = apiErrorPayloadSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Maps an HTTP status and optional error payload to an error kind. A payload
 * with a non-empty code always wins over the status table. Statuses below 400
 * are not errors.
 */
export function classifyHttpError(
  status: number,
  payload?: ApiErrorPayload,
  options: ClassifyOptions = {},
): ErrorKind | undefined {
  if (status < 400) {
    return undefined;
  }

  if (payload?.code) {
    return {
      type: 'api_error',
      code: payload.code,
      message: payload.message ?? '',
      statusCode: status,
      data: payload.data,
    };
  }

  switch (status) {
    case 401:
      return { type: 'unauthorized', message: 'unauthorized access', statusCode: status };
    case 403:
      return { type: 'unauthorized', message: 'forbidden access', statusCode: status };
    case 404:
      return { type: 'not_found', resource: 'resource', id: 'unknown', statusCode: status };
    case 429:
      return {
        type: 'rate_limited',
        retryAfterSeconds:
          options.retryAfterSeconds ?? options.defaultRetryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS,
        statusCode: status,
      };
    case 400:
      return { type: 'api_error', code: 'bad_request', message: 'bad request', statusCode: status };
    case 500:
      return { type: 'api_error', code: 'internal_error', message: 'internal server error', statusCode: status };
    default:
      return { type: 'api_error', code: 'http_error', message: `HTTP ${status} error`, statusCode: status };
  }
}

/**
 * Reads `Retry-After` as whole seconds. Accepts delta-seconds or an HTTP date;
 * dates in the past count as zero.
 */
export function parseRetryAfterSeconds(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    const diff = Math.ceil((date - now) / 1000);
    return diff > 0 ? diff : 0;
  }

  return undefined;
}
