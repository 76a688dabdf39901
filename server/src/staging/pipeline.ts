import type { Logger } from 'pino';
import { ConfigurationError, ShapeError } from '../lib/errors.js';
import {
  BOUNDARY_HEADERS,
  checkBoundaryOrder,
  describeViolation,
  resolveBoundaries,
} from './boundaries.js';
import { classifyRow } from './classifier.js';
import { DEFAULT_STAGING_CONFIG, type StagingConfig } from './config.js';
import { flattenRecord } from './flatten.js';
import { mapWorkExperience } from './work-experience.js';
import type {
  BoundarySet,
  RowRejection,
  StagedRecord,
  StagingResult,
  SurveyRow,
} from './types.js';

/**
 * Resolves the zone boundaries once for a batch and applies the zone-order
 * policy from the config. Basic Information ends at the work-experience
 * column, so a header that puts it before `workExperienceIndex` fails here
 * rather than on every row.
 */
export function prepareBoundaries(
  headers: readonly string[],
  config: StagingConfig,
  log?: Logger,
): BoundarySet {
  const boundaries = resolveBoundaries(headers);
  if (boundaries.workExperience < config.workExperienceIndex) {
    const column = BOUNDARY_HEADERS.workExperience;
    throw new ConfigurationError(
      `Survey column "${column}" is at position ${boundaries.workExperience}; it must be at position ${config.workExperienceIndex} or later`,
      [column],
    );
  }
  const violations = checkBoundaryOrder(boundaries);
  if (violations.length > 0) {
    const details = violations.map(describeViolation);
    if (config.strictBoundaryOrder) {
      throw new ConfigurationError('Survey header zones are out of order', details);
    }
    log?.warn({ violations: details }, 'Survey header zones are out of order; buckets may be wrong');
  }
  return boundaries;
}

/** Classify, flatten and map one row. */
export function stageRow(
  headers: readonly string[],
  row: SurveyRow,
  boundaries: BoundarySet,
  config: StagingConfig,
): StagedRecord {
  const classified = classifyRow(headers, row, boundaries, config.sentinels);
  const flat = flattenRecord(classified);
  return mapWorkExperience(flat, config.experienceOrdinals, config.workExperienceIndex);
}

/**
 * Stages a whole batch. Header problems abort the batch; a malformed row is
 * reported in `rejected` and the remaining rows carry on. Records keep input
 * order.
 */
export function stageRows(
  headers: readonly string[],
  rows: readonly SurveyRow[],
  config: StagingConfig = DEFAULT_STAGING_CONFIG,
  log?: Logger,
): StagingResult {
  const boundaries = prepareBoundaries(headers, config, log);
  log?.debug({ boundaries, columns: headers.length }, 'Resolved survey column boundaries');

  const records: StagedRecord[] = [];
  const rejected: RowRejection[] = [];

  rows.forEach((row, rowIndex) => {
    try {
      records.push(stageRow(headers, row, boundaries, config));
    } catch (err) {
      if (!(err instanceof ShapeError)) throw err;
      rejected.push({ rowIndex, kind: 'shape', message: err.message });
      log?.warn({ rowIndex, error: err.message }, 'Skipping malformed survey row');
    }
  });

  log?.info({ staged: records.length, rejected: rejected.length }, 'Staged survey rows');
  return { records, rejected };
}
