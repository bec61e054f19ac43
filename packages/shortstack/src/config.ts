/**
 * Client configuration and defaults
 */

import { InvalidArgumentError } from './errors.js';
import { Logger, isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

/**
 * Bounded retry for transient failures.
 *
 * Attempt n (1-based) that fails with a retryable error waits
 * min(backoffMs * 2^(n-1), maxBackoffMs) before attempt n+1.
 */
export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

/**
 * Client configuration
 */
export interface ClientConfig {
  /** Server RPC endpoint URL */
  endpoint: string;
  /** Bearer token sent with every request */
  token?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  /** Retry configuration */
  retry?: Partial<RetryPolicy>;
  /** Ignored when logger is given */
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface ResolvedConfig {
  endpoint: string;
  token: string | undefined;
  timeout: number;
  retry: RetryPolicy;
  logger: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30000;

export const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 3,
  backoffMs: 100,
  maxBackoffMs: 5000,
};

/**
 * Fill in defaults and reject unusable settings
 */
export function resolveConfig(config: ClientConfig): ResolvedConfig {
  let url: URL;
  try {
    url = new URL(config.endpoint);
  } catch {
    throw new InvalidArgumentError(`endpoint is not a valid URL: ${config.endpoint}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidArgumentError(`endpoint must use http or https, got ${url.protocol}`);
  }

  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(`timeout must be a positive number of milliseconds, got ${timeout}`);
  }

  const retry: RetryPolicy = { ...DEFAULT_RETRY, ...config.retry };
  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    throw new InvalidArgumentError(`retry.maxAttempts must be an integer >= 1, got ${retry.maxAttempts}`);
  }
  if (
    !Number.isFinite(retry.backoffMs) ||
    !Number.isFinite(retry.maxBackoffMs) ||
    retry.backoffMs < 0 ||
    retry.maxBackoffMs < retry.backoffMs
  ) {
    throw new InvalidArgumentError('retry backoff must satisfy 0 <= backoffMs <= maxBackoffMs');
  }

  return {
    endpoint: config.endpoint,
    token: config.token,
    timeout,
    retry,
    logger: config.logger ?? new Logger({ level: config.logLevel ?? 'warn' }),
  };
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidArgumentError(`${name} must be a number, got ${raw}`);
  }
  return value;
}

/**
 * Read client configuration from environment variables:
 * SHORTSTACK_ENDPOINT, SHORTSTACK_TOKEN, SHORTSTACK_TIMEOUT_MS,
 * SHORTSTACK_MAX_ATTEMPTS and SHORTSTACK_LOG_LEVEL.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): ClientConfig {
  const endpoint = env.SHORTSTACK_ENDPOINT;
  if (endpoint === undefined || endpoint === '') {
    throw new InvalidArgumentError('SHORTSTACK_ENDPOINT is not set');
  }

  const config: ClientConfig = { endpoint };
  if (env.SHORTSTACK_TOKEN) {
    config.token = env.SHORTSTACK_TOKEN;
  }
  const timeout = parseNumber('SHORTSTACK_TIMEOUT_MS', env.SHORTSTACK_TIMEOUT_MS);
  if (timeout !== undefined) {
    config.timeout = timeout;
  }
  const maxAttempts = parseNumber('SHORTSTACK_MAX_ATTEMPTS', env.SHORTSTACK_MAX_ATTEMPTS);
  if (maxAttempts !== undefined) {
    config.retry = { maxAttempts };
  }
  const logLevel = env.SHORTSTACK_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    if (!isLogLevel(logLevel)) {
      throw new InvalidArgumentError(`SHORTSTACK_LOG_LEVEL must be one of debug, info, warn, error, silent`);
    }
    config.logLevel = logLevel;
  }
  return config;
}
