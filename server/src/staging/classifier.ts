import { ShapeError } from '../lib/errors.js';
import { encodeLanguageLevel, isLanguageLevel } from './language-level.js';
import {
  BASIC_INFORMATION,
  type BoundarySet,
  type BucketKey,
  type ListRecord,
  type SurveyRow,
} from './types.js';

export interface CellContext {
  index: number;
  value: string;
  header: string;
  boundaries: BoundarySet;
  sentinels: ReadonlySet<string>;
}

export interface ClassificationRule {
  name: string;
  bucket: BucketKey;
  matches: (cell: CellContext) => boolean;
  /** What the cell adds to its bucket; null adds nothing. */
  contribute: (cell: CellContext) => string | null;
}

export function isYes(value: string): boolean {
  return value.trim().toLowerCase() === 'yes';
}

const isAnswered = (cell: CellContext) => !cell.sentinels.has(cell.value);
const headerLabel = (cell: CellContext) => cell.header;
const rawValue = (cell: CellContext) => cell.value;

/**
 * Evaluated top to bottom; the first matching rule takes the cell. The ranges
 * overlap on purpose, so order decides which zone a column lands in.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'basic-information',
    bucket: BASIC_INFORMATION,
    matches: ({ index, boundaries }) => index <= boundaries.workExperience,
    contribute: rawValue,
  },
  {
    name: 'industry-experience',
    bucket: 'Industry Experience',
    matches: ({ index, value, boundaries }) => index <= boundaries.space && isYes(value),
    contribute: headerLabel,
  },
  {
    name: 'domains',
    bucket: 'Domains',
    matches: ({ index, value, boundaries }) => index <= boundaries.aircraftPower && isYes(value),
    contribute: headerLabel,
  },
  {
    name: 'standards',
    bucket: 'Standards',
    matches: ({ index, value, boundaries }) => index < boundaries.otherStandards && isYes(value),
    contribute: headerLabel,
  },
  {
    name: 'other-standards',
    bucket: 'Standards',
    matches: (cell) => cell.index === cell.boundaries.otherStandards && isAnswered(cell),
    contribute: rawValue,
  },
  {
    name: 'skills',
    bucket: 'Skills',
    matches: ({ index, value, boundaries }) => index <= boundaries.devsecops && isYes(value),
    contribute: headerLabel,
  },
  {
    name: 'language-levels',
    bucket: 'Languages',
    matches: ({ index, value, boundaries }) => index < boundaries.otherLanguages && isLanguageLevel(value),
    contribute: ({ header, value, sentinels }) => encodeLanguageLevel(header, value, sentinels) || null,
  },
  {
    name: 'other-languages',
    bucket: 'Languages',
    matches: (cell) => cell.index === cell.boundaries.otherLanguages && isAnswered(cell),
    contribute: rawValue,
  },
  {
    name: 'tools',
    bucket: 'Tools',
    matches: ({ index, value, boundaries }) => index < boundaries.otherTools && isYes(value),
    contribute: headerLabel,
  },
  {
    name: 'other-tools',
    bucket: 'Tools',
    matches: (cell) => cell.index === cell.boundaries.otherTools && isAnswered(cell),
    contribute: rawValue,
  },
];

export function emptyListRecord(): ListRecord {
  return {
    [BASIC_INFORMATION]: [],
    'Industry Experience': [],
    Domains: [],
    Standards: [],
    Skills: [],
    Languages: [],
    Tools: [],
  };
}

/** First rule that takes the cell, or undefined when the column is ignored. */
export function findRule(
  cell: CellContext,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES,
): ClassificationRule | undefined {
  return rules.find((rule) => rule.matches(cell));
}

export function classifyRow(
  headers: readonly string[],
  row: SurveyRow,
  boundaries: BoundarySet,
  sentinels: ReadonlySet<string>,
): ListRecord {
  if (row.length !== headers.length) {
    throw new ShapeError(`Row has ${row.length} cells but the header has ${headers.length} columns`);
  }

  const record = emptyListRecord();
  row.forEach((value, index) => {
    const cell: CellContext = { index, value, header: headers[index], boundaries, sentinels };
    const rule = findRule(cell);
    if (!rule) return;

    const contribution = rule.contribute(cell);
    if (contribution !== null) {
      record[rule.bucket].push(contribution);
    }
  });
  return record;
}
