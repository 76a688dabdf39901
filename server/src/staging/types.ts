export const BASIC_INFORMATION = 'Basic Information' as const;

export const LIST_BUCKETS = [
  'Industry Experience',
  'Domains',
  'Standards',
  'Skills',
  'Languages',
  'Tools',
] as const;

export type ListBucket = (typeof LIST_BUCKETS)[number];
export type BucketKey = typeof BASIC_INFORMATION | ListBucket;

/** One spreadsheet row, already rendered to strings and aligned with the headers. */
export type SurveyRow = readonly string[];

/** Column indices that delimit the classification zones. */
export interface BoundarySet {
  workExperience: number;
  space: number;
  aircraftPower: number;
  otherStandards: number;
  devsecops: number;
  otherLanguages: number;
  otherTools: number;
}

export type BoundaryName = keyof BoundarySet;

/** Output of the row classifier: every bucket still list-valued. */
export type ListRecord = { [BASIC_INFORMATION]: string[] } & Record<ListBucket, string[]>;

/** Output of the flattener: list buckets joined into display strings. */
export type FlatRecord = { [BASIC_INFORMATION]: string[] } & Record<ListBucket, string>;

export type WorkExperienceValue =
  | { kind: 'ordinal'; code: number; descriptor: string }
  | { kind: 'unmapped'; descriptor: string };

export type BasicInformationCell = string | WorkExperienceValue;

/** Final per-respondent record handed to the upload step. */
export type StagedRecord = { [BASIC_INFORMATION]: BasicInformationCell[] } & Record<ListBucket, string>;

export interface RowRejection {
  /** Zero-based position of the row in the input batch. */
  rowIndex: number;
  kind: 'shape';
  message: string;
}

export interface StagingResult {
  records: StagedRecord[];
  rejected: RowRejection[];
}
