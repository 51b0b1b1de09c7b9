import {
  ConsoleLogger,
  RequestExecutor,
  createRetryPolicy,
  runWithRetry,
} from '@libs/dokan-http-core';
import type {
  Authenticator,
  CallOptions,
  HttpTransport,
  Logger,
  RequestDescription,
  ResponseEnvelope,
  RetryPolicy,
  TokenRefresher,
} from '@libs/dokan-http-core';
import { loadConfigFromEnv, resolveAuthenticator, resolveClientOptions } from './config';
import type { ClientOptions, DokanClientConfig } from './config';
import { OrdersService } from './resources/orders';
import { ProductsService } from './resources/products';
import { StoresService } from './resources/stores';
import type { DokanRequester } from './types';

/**
 * Typed client for the Dokan marketplace REST API.
 *
 * Every resource call goes through {@link DokanClient.request}, which runs the
 * authenticated exchange under the retry policy.
 */
export class DokanClient implements DokanRequester {
  readonly products: ProductsService;
  readonly orders: OrdersService;
  readonly stores: StoresService;

  private readonly options: ClientOptions;
  private readonly retryPolicy: RetryPolicy;
  private readonly transport?: HttpTransport;
  private readonly logger?: Logger;
  private executor: RequestExecutor;

  constructor(config: DokanClientConfig) {
    this.options = resolveClientOptions(config);
    this.transport = config.transport;
    this.logger = config.logger ?? (this.options.debug ? new ConsoleLogger() : undefined);
    this.retryPolicy = createRetryPolicy({
      maxAttempts: this.options.retryCount,
      baseDelayMs: this.options.retryBaseDelayMs,
      maxDelayMs: this.options.retryMaxDelayMs,
      multiplier: this.options.retryMultiplier,
    });
    this.executor = this.createExecutor(resolveAuthenticator(config));

    this.products = new ProductsService(this);
    this.orders = new OrdersService(this);
    this.stores = new StoresService(this);
  }

  async request(description: RequestDescription, options: CallOptions = {}): Promise<ResponseEnvelope> {
    const executor = this.executor;
    return runWithRetry(this.retryPolicy, () => executor.execute(this.options.baseUrl, description, options), {
      signal: options.signal,
      logger: this.logger,
      operation: `${description.method} ${description.path}`,
    });
  }

  getBaseUrl(): string {
    return this.options.baseUrl;
  }

  getAuthenticator(): Authenticator {
    return this.executor.authenticator;
  }

  /** Later calls use `authenticator`; calls already running keep the old one. */
  setAuthenticator(authenticator: Authenticator): void {
    this.executor = this.createExecutor(authenticator);
  }

  private createExecutor(authenticator: Authenticator): RequestExecutor {
    return new RequestExecutor({
      authenticator,
      transport: this.transport,
      timeoutMs: this.options.timeoutMs,
      userAgent: this.options.userAgent,
      defaultRetryAfterSeconds: this.options.defaultRetryAfterSeconds,
      logger: this.logger,
    });
  }
}

export function createDokanClient(config: DokanClientConfig): DokanClient {
  return new DokanClient(config);
}

export function createDokanClientFromEnv(overrides: Partial<DokanClientConfig> = {}): DokanClient {
  return new DokanClient(loadConfigFromEnv(overrides));
}

/** Fluent alternative to passing a {@link DokanClientConfig}. */
export class DokanClientBuilder {
  private config: DokanClientConfig = { baseUrl: '' };

  baseUrl(baseUrl: string): this {
    this.config.baseUrl = baseUrl;
    return this;
  }

  timeout(timeoutMs: number): this {
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  retryCount(retryCount: number): this {
    this.config.retryCount = retryCount;
    return this;
  }

  retryBackoff(baseDelayMs: number, maxDelayMs?: number, multiplier?: number): this {
    this.config.retryBaseDelayMs = baseDelayMs;
    if (maxDelayMs !== undefined) {
      this.config.retryMaxDelayMs = maxDelayMs;
    }
    if (multiplier !== undefined) {
      this.config.retryMultiplier = multiplier;
    }
    return this;
  }

  userAgent(userAgent: string): this {
    this.config.userAgent = userAgent;
    return this;
  }

  debug(enabled = true): this {
    this.config.debug = enabled;
    return this;
  }

  basicAuth(username: string, password: string): this {
    this.config.auth = { type: 'basic', username, password };
    return this;
  }

  jwtAuth(token: string, options: { expiresAt?: Date; refreshToken?: string; refresh?: TokenRefresher } = {}): this {
    this.config.auth = { type: 'jwt', token, ...options };
    return this;
  }

  authenticator(authenticator: Authenticator): this {
    this.config.authenticator = authenticator;
    return this;
  }

  transport(transport: HttpTransport): this {
    this.config.transport = transport;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  build(): DokanClient {
    return new DokanClient({ ...this.config });
  }
}
