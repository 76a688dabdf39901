import { ShapeError } from '../lib/errors.js';
import {
  BASIC_INFORMATION,
  type FlatRecord,
  type StagedRecord,
  type WorkExperienceValue,
} from './types.js';
import { WORK_EXPERIENCE_INDEX } from './config.js';

export function resolveWorkExperience(
  descriptor: string,
  ordinals: ReadonlyMap<string, number>,
): WorkExperienceValue {
  const code = ordinals.get(descriptor);
  return code === undefined
    ? { kind: 'unmapped', descriptor }
    : { kind: 'ordinal', code, descriptor };
}

/**
 * Replaces the years-of-experience descriptor in Basic Information with its
 * tagged ordinal. Unknown descriptors are kept as `unmapped`.
 */
export function mapWorkExperience(
  record: FlatRecord,
  ordinals: ReadonlyMap<string, number>,
  index: number = WORK_EXPERIENCE_INDEX,
): StagedRecord {
  const basic = record[BASIC_INFORMATION];
  if (index < 0 || index >= basic.length) {
    throw new ShapeError(
      `Basic Information has ${basic.length} values; no work experience at position ${index}`,
    );
  }

  const cells: StagedRecord[typeof BASIC_INFORMATION] = [...basic];
  cells[index] = resolveWorkExperience(basic[index], ordinals);
  return { ...record, [BASIC_INFORMATION]: cells };
}

export function workExperienceOf(
  record: StagedRecord,
  index: number = WORK_EXPERIENCE_INDEX,
): WorkExperienceValue | null {
  const cell = record[BASIC_INFORMATION][index];
  return cell !== undefined && typeof cell !== 'string' ? cell : null;
}

/** Plain-text view of a Basic Information cell; empty when the position is absent. */
export function basicText(record: StagedRecord, index: number): string {
  const cell = record[BASIC_INFORMATION][index];
  if (cell === undefined) return '';
  return typeof cell === 'string' ? cell : cell.descriptor;
}
