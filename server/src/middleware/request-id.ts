import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import type { Logger } from 'pino';
import logger from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export function resolveRequestId(raw: string | undefined): string {
  const candidate = raw?.trim().slice(0, 64);
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : randomUUID();
}

/**
 * Echoes a well-formed X-Request-ID (or mints one) and binds a request-scoped
 * logger for handlers.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId, method: c.req.method, path: c.req.path }));
  c.header('X-Request-ID', requestId);
  await next();
}
