import { vi } from 'vitest';
import type { HttpTransport, RawHttpResponse } from '@libs/dokan-http-core';

export function jsonResponse(
  status: number,
  body: unknown = '',
  headers: Record<string, string> = {},
): RawHttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return { status, headers: new Headers(headers), body: new TextEncoder().encode(text) };
}

export function queueTransport(...responses: RawHttpResponse[]) {
  const queue = [...responses];
  return vi.fn<HttpTransport>(async () => {
    const next = queue.shift();
    if (!next) {
      throw new Error('unexpected request');
    }
    return next;
  });
}
