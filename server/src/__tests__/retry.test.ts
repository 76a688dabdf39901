import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../lib/retry.js';
import { HttpError } from '../lib/errors.js';

describe('withRetry', () => {
  it('retries transient HTTP statuses from upstream responses', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new HttpError(new Response('busy', { status: 503 }), 'busy');
      }
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries network errors carried on the cause', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        throw new TypeError('request failed', { cause: { code: 'ECONNRESET' } });
      }
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('honours Retry-After on the error headers', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw new HttpError(
          new Response('slow down', { status: 429, headers: { 'retry-after': '0.001' } }),
          'slow down',
        );
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1, onRetry });

    expect(result).toBe('done');
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  it('does not retry client errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new HttpError(new Response('nope', { status: 404 }), 'nope');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toBeInstanceOf(HttpError);
    expect(attempts).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('fetch failed');
    }, { maxAttempts: 2, baseDelay: 1 })).rejects.toThrow('fetch failed');
    expect(attempts).toBe(2);
  });
});
