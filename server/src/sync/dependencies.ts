import { BullhornAuthClient } from '../bullhorn/auth.js';
import { CandidateUpdater } from '../bullhorn/candidate-updater.js';
import {
  getConfig,
  requireBlobConnectionString,
  requireBullhornCredentials,
  type AppConfig,
} from '../lib/config.js';
import logger from '../lib/logger.js';
import { createStagingConfig, type StagingConfig } from '../staging/config.js';
import { AzureBlobSurveySource } from '../survey/survey-source.js';
import type { SyncDependencies } from './skills-sync.js';

export function stagingConfigFrom(config: AppConfig): StagingConfig {
  return createStagingConfig({ strictBoundaryOrder: config.STRICT_BOUNDARY_ORDER });
}

/** Wires the production collaborators from the environment. */
export function buildSyncDependencies(config: AppConfig = getConfig()): SyncDependencies {
  const source = new AzureBlobSurveySource(
    {
      connectionString: requireBlobConnectionString(config),
      container: config.SKILLS_BLOB_CONTAINER,
      blob: config.SKILLS_BLOB_NAME,
    },
    logger.child({ component: 'survey-source' }),
  );
  const authenticator = new BullhornAuthClient(requireBullhornCredentials(config), {
    log: logger.child({ component: 'bullhorn-auth' }),
  });

  return {
    source,
    authenticator,
    createUploader: (session, log) => new CandidateUpdater(session, { log }),
    stagingConfig: stagingConfigFrom(config),
  };
}
