import { Hono } from 'hono';
import { z } from 'zod';
import { getConfig } from '../lib/config.js';
import { ConfigurationError, SyncStageError, errorMessage } from '../lib/errors.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { formatIssues, validateBody } from '../lib/validate.js';
import { syncKeyMiddleware } from '../middleware/sync-key.js';
import { stageRows } from '../staging/pipeline.js';
import { buildSyncDependencies, stagingConfigFrom } from '../sync/dependencies.js';
import { runSkillsSync } from '../sync/skills-sync.js';

const StageRequestSchema = z.object({
  headers: z.array(z.string()).min(1),
  rows: z.array(z.array(z.string())),
});

const skillsSync = new Hono();

// ---------------------------------------------------------------------------
// POST /api/skills-sync/run — download the survey, stage it and push every
// respondent to the candidate store.
// ---------------------------------------------------------------------------
skillsSync.post('/run', syncKeyMiddleware, async (c) => {
  const log = c.get('log');
  const runId = c.get('requestId');

  try {
    const report = await runSkillsSync(buildSyncDependencies(), {
      runId,
      log: log.child({ runId }),
    });
    return c.json({
      message: 'Skills sync completed. Compare candidate profiles with the survey workbook to validate submitted data.',
      report,
    });
  } catch (err) {
    if (err instanceof SyncStageError || err instanceof ConfigurationError) {
      log.error({ err }, 'Skills sync failed');
      return c.json({ error: err.message }, 500);
    }
    throw err;
  }
});

// ---------------------------------------------------------------------------
// POST /api/skills-sync/stage — dry run over posted headers and rows.
// Nothing is downloaded or uploaded.
// ---------------------------------------------------------------------------
skillsSync.post('/stage', async (c) => {
  const log = c.get('log');
  const config = getConfig();

  const parsed = await parseJsonBodyWithLimit(c, config.MAX_STAGE_BODY_BYTES);
  if (!parsed.ok) return parsed.response;

  const validated = validateBody(StageRequestSchema, parsed.data);
  if (!validated.success) {
    return c.json({ error: 'Invalid request', details: formatIssues(validated.issues) }, 400);
  }

  try {
    const result = stageRows(validated.data.headers, validated.data.rows, stagingConfigFrom(config), log);
    return c.json(result);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.warn({ error: err.message, details: err.details }, 'Rejected staging request');
      return c.json({ error: err.message, details: err.details }, 422);
    }
    log.error({ error: errorMessage(err) }, 'Staging request failed');
    throw err;
  }
});

export { skillsSync };
