import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { skillsSync } from './routes/skills-sync.js';
import { getConfig } from './lib/config.js';
import logger from './lib/logger.js';

const app = new Hono();
let shuttingDown = false;

app.use('*', requestIdMiddleware);

app.use('*', async (c, next) => {
  if (shuttingDown && c.req.path !== '/health') {
    return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
  }
  await next();
  c.header('X-Content-Type-Options', 'nosniff');
  c.header('X-Frame-Options', 'DENY');
  c.header('Referrer-Policy', 'no-referrer');
});

app.get('/health', (c) => {
  c.header('Cache-Control', 'no-store');
  return c.json({
    status: shuttingDown ? 'draining' : 'ok',
    timestamp: new Date().toISOString(),
  });
});

app.route('/api/skills-sync', skillsSync);

app.notFound((c) => {
  return c.json({ error: 'Not found' }, 404);
});

app.onError((err, c) => {
  const requestId = c.get('requestId');
  logger.error({ err, requestId, path: c.req.path }, 'Unhandled error');
  return c.json({ error: 'Internal server error', request_id: requestId }, 500);
});

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if in-flight sync runs do not drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 30_000).unref();
}

export function startServer() {
  if (server) return server;

  const { PORT: port } = getConfig();
  logger.info({ port }, 'Skills sync server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
