/**
 * Client Configuration Tests
 */

import { describe, it, expect } from 'vitest';

import { DEFAULT_RETRY, DEFAULT_TIMEOUT_MS, configFromEnv, resolveConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { Logger } from '../logger.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig({ endpoint: 'https://datastore.example.com/rpc' });

    expect(config.timeout).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.timeout).toBe(30000);
    expect(config.retry).toEqual({ maxAttempts: 3, backoffMs: 100, maxBackoffMs: 5000 });
    expect(config.token).toBeUndefined();
    expect(config.logger.level).toBe('warn');
  });

  it('should merge a partial retry policy over the defaults', () => {
    const config = resolveConfig({ endpoint: 'http://localhost:8080', retry: { maxAttempts: 5 } });
    expect(config.retry).toEqual({ ...DEFAULT_RETRY, maxAttempts: 5 });
  });

  it('should build a logger at the requested level', () => {
    expect(resolveConfig({ endpoint: 'http://localhost', logLevel: 'debug' }).logger.level).toBe('debug');
  });

  it('should use a supplied logger as is', () => {
    const logger = new Logger({ level: 'error' });
    expect(resolveConfig({ endpoint: 'http://localhost', logger, logLevel: 'debug' }).logger).toBe(logger);
  });

  it('should reject an endpoint that is not a URL', () => {
    expect(() => resolveConfig({ endpoint: 'not a url' })).toThrow(InvalidArgumentError);
  });

  it('should reject a non-http endpoint', () => {
    expect(() => resolveConfig({ endpoint: 'ftp://datastore.example.com' })).toThrow(
      'endpoint must use http or https, got ftp:'
    );
  });

  it('should reject a non-positive timeout', () => {
    expect(() => resolveConfig({ endpoint: 'http://localhost', timeout: 0 })).toThrow(
      'timeout must be a positive number of milliseconds, got 0'
    );
  });

  it('should reject fewer than one attempt', () => {
    expect(() => resolveConfig({ endpoint: 'http://localhost', retry: { maxAttempts: 0 } })).toThrow(
      'retry.maxAttempts must be an integer >= 1, got 0'
    );
  });

  it('should reject a backoff that is not a finite number', () => {
    const message = 'retry backoff must satisfy 0 <= backoffMs <= maxBackoffMs';
    expect(() => resolveConfig({ endpoint: 'http://localhost', retry: { backoffMs: Number.NaN } })).toThrow(message);
    expect(() => resolveConfig({ endpoint: 'http://localhost', retry: { backoffMs: undefined } })).toThrow(message);
    expect(() =>
      resolveConfig({ endpoint: 'http://localhost', retry: { maxBackoffMs: Number.POSITIVE_INFINITY } })
    ).toThrow(message);
  });

  it('should reject a cap below the base backoff', () => {
    expect(() =>
      resolveConfig({ endpoint: 'http://localhost', retry: { backoffMs: 200, maxBackoffMs: 100 } })
    ).toThrow('retry backoff must satisfy 0 <= backoffMs <= maxBackoffMs');
  });
});

describe('configFromEnv', () => {
  it('should read every variable', () => {
    const config = configFromEnv({
      SHORTSTACK_ENDPOINT: 'https://datastore.example.com/rpc',
      SHORTSTACK_TOKEN: 'test-secret',
      SHORTSTACK_TIMEOUT_MS: '5000',
      SHORTSTACK_MAX_ATTEMPTS: '4',
      SHORTSTACK_LOG_LEVEL: 'info',
    });

    expect(config).toEqual({
      endpoint: 'https://datastore.example.com/rpc',
      token: 'test-secret',
      timeout: 5000,
      retry: { maxAttempts: 4 },
      logLevel: 'info',
    });
  });

  it('should leave unset variables out', () => {
    expect(configFromEnv({ SHORTSTACK_ENDPOINT: 'http://localhost', SHORTSTACK_TOKEN: '' })).toEqual({
      endpoint: 'http://localhost',
    });
  });

  it('should require an endpoint', () => {
    expect(() => configFromEnv({})).toThrow('SHORTSTACK_ENDPOINT is not set');
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => configFromEnv({ SHORTSTACK_ENDPOINT: 'http://localhost', SHORTSTACK_TIMEOUT_MS: 'soon' })).toThrow(
      'SHORTSTACK_TIMEOUT_MS must be a number, got soon'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => configFromEnv({ SHORTSTACK_ENDPOINT: 'http://localhost', SHORTSTACK_LOG_LEVEL: 'loud' })).toThrow(
      InvalidArgumentError
    );
  });
});
