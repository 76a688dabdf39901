import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { BullhornSession } from '../bullhorn/auth.js';
import type { UploadSummary } from '../bullhorn/candidate-updater.js';
import { SyncStageError, type SyncStage } from '../lib/errors.js';
import { createRunLogger } from '../lib/logger.js';
import type { StagingConfig } from '../staging/config.js';
import { stageRows } from '../staging/pipeline.js';
import type { RowRejection, StagedRecord } from '../staging/types.js';
import type { SurveySource } from '../survey/survey-source.js';
import { readSurveyWorkbook } from '../survey/workbook-reader.js';

export interface Authenticator {
  authenticate(): Promise<BullhornSession>;
}

export interface RecordUploader {
  applyAll(records: readonly StagedRecord[]): Promise<UploadSummary>;
}

export interface SyncDependencies {
  source: SurveySource;
  authenticator: Authenticator;
  createUploader: (session: BullhornSession, log: Logger) => RecordUploader;
  stagingConfig: StagingConfig;
}

/** Row indices in `unreadableRows` and `rejectedRows` count the sheet's data rows. */
export interface SyncReport {
  runId: string;
  source: string;
  stagedRecords: number;
  unreadableRows: RowRejection[];
  rejectedRows: RowRejection[];
  upload: UploadSummary;
}

async function step<T>(stage: SyncStage, log: Logger, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    const wrapped = new SyncStageError(stage, err);
    log.error({ err, stage }, wrapped.message);
    throw wrapped;
  }
}

/**
 * One full pass: download the survey, stage every row, log in to the
 * candidate store and push the records.
 */
export async function runSkillsSync(
  deps: SyncDependencies,
  options: { runId?: string; log?: Logger } = {},
): Promise<SyncReport> {
  const runId = options.runId ?? randomUUID();
  const log = options.log ?? createRunLogger(runId);
  log.info({ source: deps.source.description }, 'Skills sync started');

  const bytes = await step('fetch', log, () => deps.source.fetchWorkbook());

  const { sheet, staging } = await step('stage', log, async () => {
    const sheet = await readSurveyWorkbook(bytes, log);
    const staging = stageRows(sheet.headers, sheet.rows, deps.stagingConfig, log);
    return { sheet, staging };
  });

  const session = await step('authenticate', log, () => deps.authenticator.authenticate());

  const upload = await step('upload', log, () =>
    deps.createUploader(session, log).applyAll(staging.records),
  );

  log.info('Skills sync completed');
  return {
    runId,
    source: deps.source.description,
    stagedRecords: staging.records.length,
    unreadableRows: sheet.issues,
    rejectedRows: staging.rejected.map((rejection) => ({
      ...rejection,
      rowIndex: sheet.rowIndices[rejection.rowIndex],
    })),
    upload,
  };
}
