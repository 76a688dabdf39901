const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = [
  'too many requests',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

const MAX_RETRY_AFTER_MS = 30_000;

function readProperty(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object') return undefined;
  return (value as Record<string, unknown>)[key];
}

function getStatusCode(error: unknown): number | null {
  const status = readProperty(error, 'status');
  if (typeof status === 'number') return status;
  const nested = readProperty(readProperty(error, 'response'), 'status');
  return typeof nested === 'number' ? nested : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

function isTransient(error: Error, rawError: unknown): boolean {
  const status = getStatusCode(rawError);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(rawError);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Retry-After from an upstream answer, in milliseconds; 0 when absent.
 */
function getRetryAfterMs(error: unknown): number {
  const headers = readProperty(error, 'headers');
  if (!(headers instanceof Headers)) return 0;
  const retryAfter = headers.get('retry-after');
  if (!retryAfter) return 0;

  const seconds = Number.parseFloat(retryAfter);
  if (Number.isNaN(seconds) || seconds <= 0) return 0;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 500;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
