import { decodeJson, serializationError, validationError } from '@libs/dokan-http-core';
import type { CallOptions, ResponseEnvelope } from '@libs/dokan-http-core';
import type { ListParams, ListResult } from '../types';

export const MAX_PER_PAGE = 100;

export function assertId(id: number, field: string): void {
  if (!Number.isInteger(id) || id <= 0) {
    throw validationError(field, 'invalid_id', `${field} must be a positive integer`);
  }
}

export function assertListParams(params: ListParams): void {
  if (params.page !== undefined && (!Number.isInteger(params.page) || params.page < 0)) {
    throw validationError('page', 'invalid_page', 'page must be a non-negative integer');
  }
  if (
    params.perPage !== undefined &&
    (!Number.isInteger(params.perPage) || params.perPage < 1 || params.perPage > MAX_PER_PAGE)
  ) {
    throw validationError('per_page', 'invalid_per_page', `per_page must be between 1 and ${MAX_PER_PAGE}`);
  }
}

/** Decodes a body that must be present. */
export function requireBody<T>(response: ResponseEnvelope, what: string): T {
  const decoded = decodeJson<T>(response);
  if (decoded === undefined) {
    throw serializationError(`empty response body, expected ${what}`);
  }
  return decoded;
}

/**
 * Reads an integer pagination header. A missing header counts as 0; a value
 * with trailing garbage keeps its leading integer.
 */
export function readIntHeader(headers: Headers, name: string): number {
  const match = /^\s*([+-]?\d+)/.exec(headers.get(name) ?? '');
  return match ? Number(match[1]) : 0;
}

export function toListResult<T>(response: ResponseEnvelope, params: ListParams): ListResult<T> {
  const items = decodeJson<T[]>(response) ?? [];
  if (!Array.isArray(items)) {
    throw serializationError('failed to parse response: expected a JSON array');
  }

  return {
    items,
    totalItems: readIntHeader(response.headers, 'X-WP-Total'),
    totalPages: readIntHeader(response.headers, 'X-WP-TotalPages'),
    page: params.page ?? 0,
    perPage: params.perPage ?? 0,
  };
}

/**
 * Walks every page of a listing, starting at `params.page` (or 1), until a
 * page comes back empty or the reported page count is reached. Without an
 * `X-WP-TotalPages` header the count is unknown, so a page shorter than
 * `perPage` ends the walk instead.
 */
export async function* iterateAll<T, P extends ListParams>(
  list: (params: P, options?: CallOptions) => Promise<ListResult<T>>,
  params: P,
  options?: CallOptions,
): AsyncGenerator<T, void, undefined> {
  let page = params.page && params.page > 0 ? params.page : 1;

  for (;;) {
    const result = await list({ ...params, page }, options);
    yield* result.items;

    if (result.items.length === 0) {
      return;
    }
    if (result.totalPages > 0 ? page >= result.totalPages : isShortPage(result.items.length, params.perPage)) {
      return;
    }
    page += 1;
  }
}

function isShortPage(length: number, perPage: number | undefined): boolean {
  return perPage !== undefined && length < perPage;
}
