import { z } from 'zod';
import {
  DEFAULT_RETRY_AFTER_SECONDS,
  DEFAULT_RETRY_POLICY,
  authFailure,
  createAuthenticator,
  validationError,
} from '@libs/dokan-http-core';
import type { AuthConfig, Authenticator, HttpTransport, Logger } from '@libs/dokan-http-core';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'dokan-ts-client/1.0.0';

export const clientOptionsSchema = z.object({
  baseUrl: z
    .string({ required_error: 'base URL is required' })
    .trim()
    .min(1, 'base URL is required')
    .url('base URL must be an absolute URL'),
  timeoutMs: z.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
  /** Total attempts per call; 0 still makes one. */
  retryCount: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxAttempts),
  retryBaseDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  retryMaxDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
  retryMultiplier: z.number().positive().default(DEFAULT_RETRY_POLICY.multiplier),
  defaultRetryAfterSeconds: z.number().int().nonnegative().default(DEFAULT_RETRY_AFTER_SECONDS),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  debug: z.boolean().default(false),
});

export type ClientOptions = z.infer<typeof clientOptionsSchema>;

export type ClientOptionsInput = z.input<typeof clientOptionsSchema>;

export type DokanClientConfig = ClientOptionsInput & {
  auth?: AuthConfig;
  /** Takes precedence over `auth`. */
  authenticator?: Authenticator;
  transport?: HttpTransport;
  logger?: Logger;
};

const authTypeSchema = z.enum(['basic', 'jwt']);

/** Applies defaults and rejects invalid options with a `validation` error. */
export function resolveClientOptions(config: ClientOptionsInput): ClientOptions {
  const result = clientOptionsSchema.safeParse(config);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  throw validationError(field, 'invalid_config', issue?.message ?? 'invalid configuration');
}

export function resolveAuthenticator(config: Pick<DokanClientConfig, 'auth' | 'authenticator'>): Authenticator {
  if (config.authenticator) {
    return config.authenticator;
  }
  if (!config.auth) {
    throw authFailure('credentials are required');
  }
  if (!authTypeSchema.safeParse(config.auth.type).success) {
    throw authFailure(`unsupported auth type: ${String(config.auth.type)}`);
  }
  return createAuthenticator(config.auth);
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseOptionalBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Reads client settings from `DOKAN_*` variables. Values in `overrides` win.
 */
export function loadConfigFromEnv(
  overrides: Partial<DokanClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): DokanClientConfig {
  const baseUrl = overrides.baseUrl ?? env.DOKAN_BASE_URL;
  if (!baseUrl) {
    throw validationError('baseUrl', 'required', 'DOKAN_BASE_URL environment variable is required');
  }

  return {
    ...overrides,
    baseUrl,
    auth: overrides.authenticator ? overrides.auth : overrides.auth ?? authFromEnv(env),
    timeoutMs: overrides.timeoutMs ?? parseOptionalNumber(env.DOKAN_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    retryCount:
      overrides.retryCount ?? parseOptionalNumber(env.DOKAN_RETRY_COUNT) ?? DEFAULT_RETRY_POLICY.maxAttempts,
    debug: overrides.debug ?? parseOptionalBoolean(env.DOKAN_DEBUG) ?? false,
  };
}

function authFromEnv(env: NodeJS.ProcessEnv): AuthConfig {
  if (env.DOKAN_TOKEN) {
    return { type: 'jwt', token: env.DOKAN_TOKEN };
  }
  if (env.DOKAN_USERNAME && env.DOKAN_PASSWORD) {
    return { type: 'basic', username: env.DOKAN_USERNAME, password: env.DOKAN_PASSWORD };
  }
  throw authFailure('DOKAN_TOKEN, or DOKAN_USERNAME and DOKAN_PASSWORD, environment variables are required');
}
