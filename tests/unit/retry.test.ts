/**
 * Unit Tests: Retry logic
 */

import { describe, it, expect, vi } from 'vitest';
import {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
} from '../../src/api/retry.js';
import { createLogger } from '../../src/api/logger.js';

const quiet = createLogger({ level: 'error' });
const noSleep = vi.fn(async (_ms: number) => undefined);

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    const result = await withRetry(fn, { logger: quiet, sleep: noSleep });

    expect(result).toMatchObject({ success: true, data: 'ok', attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries server errors until one succeeds', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ApiRequestError('Bad Gateway', 502))
      .mockRejectedValueOnce(new ApiRequestError('Too Many Requests', 429, { retryAfter: 1 }))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { logger: quiet, sleep: noSleep, onRetry });

    expect(result).toMatchObject({ success: true, data: 'ok', attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const error = new ApiRequestError('key has already been taken', 400);
    const fn = vi.fn().mockRejectedValue(error);

    const result = await withRetry(fn, { logger: quiet, sleep: noSleep });

    expect(result).toMatchObject({ success: false, error, attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn().mockRejectedValue(new ApiRequestError('Service Unavailable', 503));

    const result = await withRetry(fn, { logger: quiet, sleep: noSleep, maxRetries: 2 });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('wraps non-Error rejections', async () => {
    const result = await withRetry(() => Promise.reject('boom'), {
      logger: quiet,
      sleep: noSleep,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('boom');
    }
  });
});

describe('isRetryableError', () => {
  it('follows the configured statuses and network failures', () => {
    expect(isRetryableError(new ApiRequestError('x', 500), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new ApiRequestError('x', 404), DEFAULT_RETRY_CONFIG)).toBe(false);
    expect(isRetryableError(new Error('connect ECONNREFUSED 127.0.0.1:443'), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new Error('invalid json'), DEFAULT_RETRY_CONFIG)).toBe(false);
  });
});

describe('calculateDelay', () => {
  const noJitter = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0 };

  it('doubles per attempt up to the maximum', () => {
    expect(calculateDelay(1, noJitter)).toBe(1000);
    expect(calculateDelay(3, noJitter)).toBe(4000);
    expect(calculateDelay(10, noJitter)).toBe(30000);
  });

  it('honours Retry-After', () => {
    expect(calculateDelay(1, noJitter, 5)).toBe(5000);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and rejects garbage', () => {
    expect(parseRetryAfter('12')).toBe(12);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('ApiRequestError', () => {
  it('classifies statuses', () => {
    const error = new ApiRequestError('Too Many Requests', 429, { details: { message: 'slow down' } });
    expect(error.isRateLimited()).toBe(true);
    expect(error.isServerError()).toBe(false);
    expect(error.toApiError()).toEqual({
      status: 429,
      message: 'Too Many Requests',
      details: { message: 'slow down' },
    });
  });
});
