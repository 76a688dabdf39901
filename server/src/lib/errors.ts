/**
 * A required header is missing, the header zones are out of order under strict
 * checking, or the environment does not parse. Fatal for the whole run.
 */
export class ConfigurationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

/** A row does not line up with the header sequence. Fatal for that row only. */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

/** A cell could not be rendered to the string form the staging core expects. */
export class CoercionError extends Error {
  readonly column: number | null;

  constructor(message: string, column: number | null = null) {
    super(message);
    this.name = 'CoercionError';
    this.column = column;
  }
}

/**
 * Non-2xx answer from an upstream HTTP API. `status` is read by the retry
 * helper to decide whether the call is worth repeating.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly body: string;
  readonly url: string;
  readonly headers: Headers;

  constructor(response: Response, body: string) {
    super(`HTTP ${response.status} from ${response.url || 'upstream'}: ${body.slice(0, 500)}`);
    this.name = 'HttpError';
    this.status = response.status;
    this.body = body;
    this.url = response.url;
    this.headers = response.headers;
  }
}

export type SyncStage = 'fetch' | 'stage' | 'authenticate' | 'upload';

const STAGE_LABELS: Record<SyncStage, string> = {
  fetch: 'to retrieve survey workbook',
  stage: 'data operations',
  authenticate: 'authentication',
  upload: 'to upload candidate data',
};

export class SyncStageError extends Error {
  readonly stage: SyncStage;

  constructor(stage: SyncStage, cause: unknown) {
    super(`Failed ${STAGE_LABELS[stage]}: ${errorMessage(cause)}`, { cause });
    this.name = 'SyncStageError';
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
