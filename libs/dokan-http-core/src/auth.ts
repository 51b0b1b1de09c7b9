import { authFailure, isErrorKind } from './errors';
import { setHeader } from './headers';
import type { HttpHeaders } from './types';

export type AuthType = 'basic' | 'jwt';

/** Tokens are refreshed this long before they actually expire. */
export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/**
 * Supplies credentials for outgoing requests. Implemented by
 * {@link BasicAuthenticator} and {@link BearerTokenAuthenticator}.
 */
export interface Authenticator {
  readonly type: AuthType;
  /** Sets the `Authorization` header, refreshing first when needed. */
  attach(headers: HttpHeaders): Promise<void>;
  isValid(): boolean;
  refresh(): Promise<void>;
}

export class BasicAuthenticator implements Authenticator {
  readonly type = 'basic' as const;

  constructor(
    private readonly username: string,
    private readonly password: string,
  ) {}

  async attach(headers: HttpHeaders): Promise<void> {
    if (!this.isValid()) {
      throw authFailure('username and password are required for basic auth');
    }
    const encoded = Buffer.from(`${this.username}:${this.password}`).toString('base64');
    setHeader(headers, 'Authorization', `Basic ${encoded}`);
  }

  isValid(): boolean {
    return this.username !== '' && this.password !== '';
  }

  async refresh(): Promise<void> {
    // static credentials never change
  }
}

export interface RefreshedToken {
  token: string;
  expiresAt?: Date;
}

export type TokenRefresher = (refreshToken: string) => Promise<RefreshedToken>;

export interface BearerTokenOptions {
  expiresAt?: Date;
  refreshToken?: string;
  refresh?: TokenRefresher;
}

export class BearerTokenAuthenticator implements Authenticator {
  readonly type = 'jwt' as const;

  private token: string;
  private expiresAt?: Date;
  private refreshToken?: string;
  private readonly refresher?: TokenRefresher;
  private pendingRefresh?: Promise<void>;

  constructor(token: string, options: BearerTokenOptions = {}) {
    this.token = token;
    this.expiresAt = options.expiresAt;
    this.refreshToken = options.refreshToken;
    this.refresher = options.refresh;
  }

  async attach(headers: HttpHeaders): Promise<void> {
    if (!this.token) {
      throw authFailure('JWT token is required');
    }

    if (!this.isValid() && this.refresher) {
      try {
        await this.refresh();
      } catch (error) {
        throw authFailure(`failed to refresh token: ${refreshFailureReason(error)}`);
      }
    }

    if (!this.isValid()) {
      throw authFailure('JWT token is expired and cannot be refreshed');
    }

    setHeader(headers, 'Authorization', `Bearer ${this.token}`);
  }

  isValid(): boolean {
    if (!this.token) {
      return false;
    }
    if (!this.expiresAt) {
      return true;
    }
    return Date.now() + TOKEN_EXPIRY_MARGIN_MS < this.expiresAt.getTime();
  }

  /**
   * Exchanges the refresh token for a new access token. Concurrent callers
   * share one in-flight exchange.
   */
  refresh(): Promise<void> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.performRefresh().finally(() => {
        this.pendingRefresh = undefined;
      });
    }
    return this.pendingRefresh;
  }

  getToken(): string {
    return this.token;
  }

  getExpiresAt(): Date | undefined {
    return this.expiresAt;
  }

  setToken(token: string, expiresAt?: Date): void {
    this.token = token;
    this.expiresAt = expiresAt;
  }

  setRefreshToken(refreshToken: string): void {
    this.refreshToken = refreshToken;
  }

  private async performRefresh(): Promise<void> {
    if (!this.refresher) {
      throw authFailure('no refresh function provided');
    }
    if (!this.refreshToken) {
      throw authFailure('no refresh token available');
    }

    const refreshed = await this.refresher(this.refreshToken);
    this.token = refreshed.token;
    this.expiresAt = refreshed.expiresAt;
  }
}

function refreshFailureReason(error: unknown): string {
  if (isErrorKind(error, 'auth_failure')) {
    return error.kind.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export type AuthConfig =
  | { type: 'basic'; username: string; password: string }
  | {
      type: 'jwt';
      token: string;
      expiresAt?: Date;
      refreshToken?: string;
      refresh?: TokenRefresher;
    };

export function createAuthenticator(config: AuthConfig): Authenticator {
  switch (config.type) {
    case 'basic':
      if (!config.username || !config.password) {
        throw authFailure('username and password are required for basic auth');
      }
      return new BasicAuthenticator(config.username, config.password);
    case 'jwt':
      if (!config.token) {
        throw authFailure('token is required for JWT auth');
      }
      return new BearerTokenAuthenticator(config.token, {
        expiresAt: config.expiresAt,
        refreshToken: config.refreshToken,
        refresh: config.refresh,
      });
  }
}
