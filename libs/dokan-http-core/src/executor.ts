import type { Authenticator } from './auth';
import { classifyHttpError, parseErrorPayload, parseRetryAfterSeconds } from './classifier';
import { DokanError, networkFailure, serializationError, TimeoutError } from './errors';
import { setHeader } from './headers';
import { flattenQuery } from './query';
import { fetchTransport } from './transport/fetchTransport';
import type {
  CallOptions,
  HttpHeaders,
  HttpTransport,
  Logger,
  RawHttpResponse,
  RequestDescription,
  ResponseEnvelope,
  TaggedQuery,
  TransportRequest,
} from './types';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface RequestExecutorConfig {
  authenticator: Authenticator;
  transport?: HttpTransport;
  /** Per-exchange deadline. Zero or less disables it. */
  timeoutMs?: number;
  userAgent?: string;
  defaultRetryAfterSeconds?: number;
  logger?: Logger;
}

/**
 * Turns a {@link RequestDescription} into one authenticated HTTP exchange.
 * Never retries and keeps no state between calls.
 */
export class RequestExecutor {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;

  constructor(private readonly config: RequestExecutorConfig) {
    this.transport = config.transport ?? fetchTransport;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get authenticator(): Authenticator {
    return this.config.authenticator;
  }

  async execute(baseUrl: string, request: RequestDescription, options: CallOptions = {}): Promise<ResponseEnvelope> {
    const { signal } = options;
    signal?.throwIfAborted();

    const url = buildRequestUrl(baseUrl, request.path, request.query);
    const headers: HttpHeaders = { Accept: 'application/json' };
    if (this.config.userAgent) {
      headers['User-Agent'] = this.config.userAgent;
    }

    let body: string | undefined;
    if (request.body !== undefined && request.body !== null) {
      body = serializeBody(request.body);
      setHeader(headers, 'Content-Type', 'application/json');
    }

    for (const [name, value] of Object.entries(request.headers ?? {})) {
      setHeader(headers, name, value);
    }

    await this.config.authenticator.attach(headers);
    signal?.throwIfAborted();

    const started = Date.now();
    const raw = await this.exchange({ method: request.method, url, headers, body }, signal);
    const envelope: ResponseEnvelope = {
      status: raw.status,
      headers: raw.headers,
      body: raw.body instanceof Uint8Array ? raw.body : new Uint8Array(raw.body),
    };

    this.config.logger?.debug?.('dokan.request', {
      method: request.method,
      url,
      status: envelope.status,
      durationMs: Date.now() - started,
    });

    if (envelope.status >= 400) {
      const kind = classifyHttpError(envelope.status, parseErrorPayload(envelope.body), {
        retryAfterSeconds: parseRetryAfterSeconds(envelope.headers.get('retry-after')),
        defaultRetryAfterSeconds: this.config.defaultRetryAfterSeconds,
      });
      if (kind) {
        throw new DokanError(kind, { response: envelope });
      }
    }

    return envelope;
  }

  private async exchange(request: TransportRequest, signal?: AbortSignal): Promise<RawHttpResponse> {
    const controller = new AbortController();
    const abortHandler = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', abortHandler, { once: true });

    let timedOut = false;
    const timeoutId =
      this.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort(new TimeoutError(`request timed out after ${this.timeoutMs}ms`));
          }, this.timeoutMs)
        : undefined;

    try {
      return await this.transport(request, controller.signal);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      if (timedOut) {
        throw networkFailure(new TimeoutError(`request timed out after ${this.timeoutMs}ms`));
      }
      throw networkFailure(error);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', abortHandler);
    }
  }
}

/**
 * Joins base address and path with exactly one separator and appends the
 * flattened query, sorted by parameter name.
 */
export function buildRequestUrl(baseUrl: string, path: string, query?: TaggedQuery): string {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw serializationError(`invalid base URL: ${baseUrl}`, error);
  }

  url.pathname = `${url.pathname.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;

  if (query) {
    const pairs = flattenQuery(query).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    url.search = new URLSearchParams(pairs).toString();
  }

  return url.toString();
}

function serializeBody(body: unknown): string {
  let serialized: string | undefined;
  try {
    serialized = JSON.stringify(body);
  } catch (error) {
    throw serializationError('failed to marshal request body', error);
  }
  if (serialized === undefined) {
    throw serializationError(`failed to marshal request body: unsupported type ${typeof body}`);
  }
  return serialized;
}

/**
 * Decodes a JSON response body into its wire type. Returns `undefined` for an
 * empty body.
 */
export function decodeJson<T>(envelope: ResponseEnvelope): T | undefined {
  const text = new TextDecoder().decode(envelope.body);
  if (!text.trim()) {
    return undefined;
  }

  try {
    return JSON.parse(text) as T;
  } catch (error) {
    throw serializationError('failed to parse response', error);
  }
}
