import type { Logger } from 'pino';
import { HttpError, errorMessage } from '../lib/errors.js';
import { withRetry } from '../lib/retry.js';
import { ABSENT_CELL } from '../survey/workbook-reader.js';
import type { StagedRecord } from '../staging/types.js';
import { basicText, workExperienceOf } from '../staging/work-experience.js';
import type { BullhornSession } from './auth.js';

/** Basic Information positions read by the upload. */
export const BASIC_FIELDS = {
  destinationId: 0,
  name: 3,
  secondaryName: 4,
  projectRole: 5,
  oemExperience: 7,
} as const;

export interface CandidatePayload {
  customText3: string;
  customText31: string;
  customText21: string;
  customTextBlock5: string;
  customTextBlock10: string;
  customTextBlock2: string;
  customTextBlock6: string;
  customTextBlock7: string;
  customFloat3?: number;
}

export interface UploadFailure {
  destinationId: string;
  name: string;
  error: string;
}

export interface UploadSummary {
  updated: number;
  /** Named respondents with no destination id. */
  skipped: string[];
  failed: UploadFailure[];
}

export function buildCandidatePayload(record: StagedRecord): CandidatePayload {
  const payload: CandidatePayload = {
    customText3: basicText(record, BASIC_FIELDS.projectRole),
    customText31: basicText(record, BASIC_FIELDS.oemExperience),
    customText21: record['Industry Experience'],
    customTextBlock5: record.Domains,
    customTextBlock10: record.Standards,
    customTextBlock2: record.Skills,
    customTextBlock6: record.Languages,
    customTextBlock7: record.Tools,
  };

  const experience = workExperienceOf(record);
  if (experience?.kind === 'ordinal') {
    payload.customFloat3 = experience.code;
  }
  return payload;
}

/** Rows with neither name column answered are blank survey lines. */
export function isBlankRespondent(record: StagedRecord): boolean {
  return basicText(record, BASIC_FIELDS.name) === ABSENT_CELL
    && basicText(record, BASIC_FIELDS.secondaryName) === ABSENT_CELL;
}

export interface CandidateUpdaterOptions {
  fetch?: typeof fetch;
  log?: Logger;
  retry?: { maxAttempts?: number; baseDelay?: number };
}

/**
 * Pushes staged records onto candidate profiles, one POST per respondent.
 * A failed update is logged and counted; the rest of the batch continues.
 */
export class CandidateUpdater {
  private readonly session: BullhornSession;
  private readonly fetchImpl: typeof fetch;
  private readonly log?: Logger;
  private readonly retry: { maxAttempts?: number; baseDelay?: number };

  constructor(session: BullhornSession, options: CandidateUpdaterOptions = {}) {
    this.session = session;
    this.fetchImpl = options.fetch ?? fetch;
    this.log = options.log;
    this.retry = options.retry ?? {};
  }

  candidateUrl(destinationId: string): string {
    const url = new URL(`entity/Candidate/${encodeURIComponent(destinationId)}`, this.session.restUrl);
    url.searchParams.set('BhRestToken', this.session.restToken);
    return url.toString();
  }

  async update(destinationId: string, payload: CandidatePayload): Promise<void> {
    const url = this.candidateUrl(destinationId);
    await withRetry(async () => {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
      if (!response.ok) {
        throw new HttpError(response, await response.text());
      }
    }, {
      ...this.retry,
      onRetry: (attempt, error) =>
        this.log?.warn({ destinationId, attempt, error: error.message }, 'Retrying candidate update'),
    });
  }

  async applyAll(records: readonly StagedRecord[]): Promise<UploadSummary> {
    const summary: UploadSummary = { updated: 0, skipped: [], failed: [] };
    this.log?.info({ records: records.length }, 'Starting candidate modifications');

    for (const record of records) {
      if (isBlankRespondent(record)) continue;

      const destinationId = basicText(record, BASIC_FIELDS.destinationId);
      const name = basicText(record, BASIC_FIELDS.name);
      if (destinationId === ABSENT_CELL) {
        if (name !== ABSENT_CELL) {
          this.log?.warn({ name }, 'Respondent needs a destination ID entered');
          summary.skipped.push(name);
        }
        continue;
      }

      try {
        await this.update(destinationId, buildCandidatePayload(record));
        summary.updated += 1;
        this.log?.info({ destinationId, name }, 'Updated candidate profile');
      } catch (err) {
        const error = errorMessage(err);
        summary.failed.push({ destinationId, name, error });
        this.log?.error(
          { destinationId, name, status: err instanceof HttpError ? err.status : undefined, error },
          'Candidate update failed',
        );
      }
    }

    this.log?.info(
      { updated: summary.updated, skipped: summary.skipped.length, failed: summary.failed.length },
      'Candidate modifications completed',
    );
    return summary;
  }
}
