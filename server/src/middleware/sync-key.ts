import type { Context, Next } from 'hono';
import { getConfig } from '../lib/config.js';

/**
 * When SYNC_API_KEY is configured, require it as a bearer token.
 */
export async function syncKeyMiddleware(c: Context, next: Next) {
  const key = getConfig().SYNC_API_KEY;
  if (key && c.req.header('Authorization') !== `Bearer ${key}`) {
    return c.json({ error: 'Unauthorized' }, 401);
  }
  await next();
}
