/**
 * Answers that count as "no answer" in free-text columns. Matching is exact
 * and case-sensitive; the reader renders an empty cell as `None`.
 */
export const DEFAULT_SENTINELS: ReadonlySet<string> = new Set([
  'N', 'No', 'NO', 'Np', 'no', 'n', 'noo', 'nm',
  'none', 'None', 'NOne', 'nOne',
  ' ', '', 'null',
]);

export const DEFAULT_EXPERIENCE_ORDINALS: ReadonlyMap<string, number> = new Map([
  ['0 to 4', 1],
  ['5 to 9', 2],
  ['10 to 14', 3],
  ['15 to 19', 4],
  ['20 to 24', 5],
  ['25 to 29', 6],
  ['30 or more', 7],
]);

export const LANGUAGE_LEVEL_CODES: ReadonlySet<string> = new Set(['2', '3', '4', '5']);

/** Position of the years-of-experience descriptor inside Basic Information. */
export const WORK_EXPERIENCE_INDEX = 8;

export interface StagingConfig {
  readonly sentinels: ReadonlySet<string>;
  readonly experienceOrdinals: ReadonlyMap<string, number>;
  readonly workExperienceIndex: number;
  /** Fail the batch when the header zones are out of order instead of warning. */
  readonly strictBoundaryOrder: boolean;
}

export const DEFAULT_STAGING_CONFIG: StagingConfig = Object.freeze({
  sentinels: DEFAULT_SENTINELS,
  experienceOrdinals: DEFAULT_EXPERIENCE_ORDINALS,
  workExperienceIndex: WORK_EXPERIENCE_INDEX,
  strictBoundaryOrder: false,
});

export function createStagingConfig(overrides: Partial<StagingConfig> = {}): StagingConfig {
  return Object.freeze({ ...DEFAULT_STAGING_CONFIG, ...overrides });
}
