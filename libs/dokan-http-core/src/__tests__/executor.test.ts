import { describe, it, expect, vi } from 'vitest';
import { BasicAuthenticator, BearerTokenAuthenticator } from '../auth';
import { DokanError, TimeoutError, isErrorKind } from '../errors';
import { RequestExecutor, decodeJson } from '../executor';
import { optionalField, taggedQuery } from '../query';
import type { Logger, ResponseEnvelope } from '../types';
import { hangingTransport, jsonResponse, queueTransport } from './fakeTransport';

const BASE_URL = 'https://shop.test';

describe('RequestExecutor', () => {
  it('sends an authenticated JSON request', async () => {
    const transport = queueTransport(jsonResponse(201, { id: 42, name: 'Widget' }));
    const executor = new RequestExecutor({
      authenticator: new BasicAuthenticator('user', 'pass'),
      transport,
      userAgent: 'dokan-ts-client/1.0.0',
    });

    const envelope = await executor.execute(BASE_URL, {
      method: 'POST',
      path: '/wp-json/dokan/v1/products/',
      body: { name: 'Widget' },
    });

    expect(envelope.status).toBe(201);
    expect(decodeJson(envelope)).toEqual({ id: 42, name: 'Widget' });
    expect(transport).toHaveBeenCalledTimes(1);
    const [request, signal] = transport.mock.calls[0];
    expect(request).toEqual({
      method: 'POST',
      url: 'https://shop.test/wp-json/dokan/v1/products/',
      headers: {
        Accept: 'application/json',
        'User-Agent': 'dokan-ts-client/1.0.0',
        'Content-Type': 'application/json',
        Authorization: 'Basic dXNlcjpwYXNz',
      },
      body: '{"name":"Widget"}',
    });
    expect(signal).toBeInstanceOf(AbortSignal);
  });

  it('omits the body and content type when there is nothing to send', async () => {
    const transport = queueTransport(jsonResponse(200, []));
    const executor = new RequestExecutor({ authenticator: new BearerTokenAuthenticator('test-token'), transport });

    await executor.execute(BASE_URL, {
      method: 'GET',
      path: '/wp-json/dokan/v1/stores/',
      query: taggedQuery({ page: optionalField('page') }, { page: 3 }),
    });

    const [request] = transport.mock.calls[0];
    expect(request.url).toBe('https://shop.test/wp-json/dokan/v1/stores/?page=3');
    expect(request.body).toBeUndefined();
    expect(request.headers).toEqual({ Accept: 'application/json', Authorization: 'Bearer test-token' });
  });

  it('lets caller headers replace defaults regardless of case', async () => {
    const transport = queueTransport(jsonResponse(200, {}));
    const executor = new RequestExecutor({ authenticator: new BearerTokenAuthenticator('test-token'), transport });

    await executor.execute(BASE_URL, {
      method: 'GET',
      path: '/products/1',
      headers: { accept: 'text/plain', 'X-Request-Id': 'req-1' },
    });

    const [request] = transport.mock.calls[0];
    expect(request.headers).toEqual({
      accept: 'text/plain',
      'X-Request-Id': 'req-1',
      Authorization: 'Bearer test-token',
    });
  });

  it('classifies error responses and keeps the envelope', async () => {
    const transport = queueTransport(jsonResponse(404, {}));
    const executor = new RequestExecutor({ authenticator: new BasicAuthenticator('user', 'pass'), transport });

    const error = await executor.execute(BASE_URL, { method: 'GET', path: '/products/99' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DokanError);
    expect(isErrorKind(error, 'not_found')).toBe(true);
    if (error instanceof DokanError) {
      expect(error.statusCode).toBe(404);
      expect(error.response?.status).toBe(404);
    }
  });

  it('reads Retry-After on throttled responses', async () => {
    const transport = queueTransport(jsonResponse(429, '', { 'Retry-After': '7' }));
    const executor = new RequestExecutor({ authenticator: new BasicAuthenticator('user', 'pass'), transport });

    await expect(executor.execute(BASE_URL, { method: 'GET', path: '/products' })).rejects.toThrow(
      'rate limit exceeded, retry after 7 seconds',
    );
  });

  it('uses the configured default when Retry-After is absent', async () => {
    const transport = queueTransport(jsonResponse(429));
    const executor = new RequestExecutor({
      authenticator: new BasicAuthenticator('user', 'pass'),
      transport,
      defaultRetryAfterSeconds: 15,
    });

    await expect(executor.execute(BASE_URL, { method: 'GET', path: '/products' })).rejects.toThrow(
      'rate limit exceeded, retry after 15 seconds',
    );
  });

  it('wraps transport failures as network errors', async () => {
    const cause = new TypeError('fetch failed');
    const transport = vi.fn(async () => {
      throw cause;
    });
    const executor = new RequestExecutor({ authenticator: new BasicAuthenticator('user', 'pass'), transport });

    const error = await executor.execute(BASE_URL, { method: 'GET', path: '/products' }).catch((e: unknown) => e);

    expect(isErrorKind(error, 'network_failure')).toBe(true);
    expect(error).toHaveProperty('cause', cause);
    expect(error).toHaveProperty('message', 'network error: fetch failed');
  });

  it('reports an exchange that outlives the timeout as a network error', async () => {
    const executor = new RequestExecutor({
      authenticator: new BasicAuthenticator('user', 'pass'),
      transport: hangingTransport,
      timeoutMs: 20,
    });

    const error = await executor.execute(BASE_URL, { method: 'GET', path: '/products' }).catch((e: unknown) => e);

    expect(isErrorKind(error, 'network_failure')).toBe(true);
    expect(error).toHaveProperty('message', 'network error: request timed out after 20ms');
    if (error instanceof DokanError) {
      expect(error.cause).toBeInstanceOf(TimeoutError);
    }
  });

  it('surfaces caller cancellation unchanged', async () => {
    const controller = new AbortController();
    const executor = new RequestExecutor({
      authenticator: new BasicAuthenticator('user', 'pass'),
      transport: hangingTransport,
      timeoutMs: 0,
    });
    const reason = new Error('user navigated away');

    const pending = executor.execute(BASE_URL, { method: 'GET', path: '/products' }, { signal: controller.signal });
    setTimeout(() => controller.abort(reason), 5);

    await expect(pending).rejects.toBe(reason);
  });

  it('fails before any I/O when credentials are missing', async () => {
    const transport = queueTransport(jsonResponse(200, {}));
    const executor = new RequestExecutor({ authenticator: new BearerTokenAuthenticator(''), transport });

    await expect(executor.execute(BASE_URL, { method: 'GET', path: '/products' })).rejects.toThrow(
      'authentication error: JWT token is required',
    );
    expect(transport).not.toHaveBeenCalled();
  });

  it('fails before any I/O when the body cannot be encoded', async () => {
    const transport = queueTransport(jsonResponse(200, {}));
    const executor = new RequestExecutor({ authenticator: new BasicAuthenticator('user', 'pass'), transport });

    await expect(
      executor.execute(BASE_URL, { method: 'POST', path: '/products', body: { price: 10n } }),
    ).rejects.toThrow('serialization error: failed to marshal request body');
    expect(transport).not.toHaveBeenCalled();
  });

  it('logs each exchange at debug level', async () => {
    const logger = { debug: vi.fn() } satisfies Logger;
    const executor = new RequestExecutor({
      authenticator: new BasicAuthenticator('user', 'pass'),
      transport: queueTransport(jsonResponse(200, {})),
      logger,
    });

    await executor.execute(BASE_URL, { method: 'GET', path: '/products/1' });

    expect(logger.debug).toHaveBeenCalledWith(
      'dokan.request',
      expect.objectContaining({ method: 'GET', url: 'https://shop.test/products/1', status: 200 }),
    );
  });
});

describe('decodeJson', () => {
  const envelope = (text: string): ResponseEnvelope => ({
    status: 200,
    headers: new Headers(),
    body: new TextEncoder().encode(text),
  });

  it('returns undefined for an empty body', () => {
    expect(decodeJson(envelope(''))).toBeUndefined();
    expect(decodeJson(envelope('  \n'))).toBeUndefined();
  });

  it('fails on malformed JSON', () => {
    expect(() => decodeJson(envelope('{"id":'))).toThrow('serialization error: failed to parse response');
  });
});
