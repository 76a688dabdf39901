import { describe, it, expect } from 'vitest';
import { flattenRecord } from '../staging/flatten.js';
import { emptyListRecord } from '../staging/classifier.js';
import {
  basicText,
  mapWorkExperience,
  resolveWorkExperience,
  workExperienceOf,
} from '../staging/work-experience.js';
import { DEFAULT_EXPERIENCE_ORDINALS } from '../staging/config.js';
import { ShapeError } from '../lib/errors.js';
import type { FlatRecord } from '../staging/types.js';

const BASIC = ['1001', '2023-01-09', 'ann@example.com', 'Ann Lee', 'Ann', 'Engineer', 'Detroit', 'Tier 1', '5 to 9'];

function flatWith(basic: string[]): FlatRecord {
  return flattenRecord({ ...emptyListRecord(), 'Basic Information': basic });
}

describe('flattenRecord', () => {
  it('joins list buckets with a comma and space in append order', () => {
    const record = emptyListRecord();
    record['Basic Information'].push('1', 'Ann');
    record.Standards.push('DO-178C', 'ISO 26262', 'ARP 4754A');
    record.Tools.push('JIRA');

    expect(flattenRecord(record)).toEqual({
      'Basic Information': ['1', 'Ann'],
      'Industry Experience': '',
      Domains: '',
      Standards: 'DO-178C, ISO 26262, ARP 4754A',
      Skills: '',
      Languages: '',
      Tools: 'JIRA',
    });
  });

  it('does not modify the input record', () => {
    const record = emptyListRecord();
    record.Skills.push('Python');
    flattenRecord(record);
    expect(record.Skills).toEqual(['Python']);
  });
});

describe('resolveWorkExperience', () => {
  it('maps every known descriptor to its ordinal', () => {
    const codes = [...DEFAULT_EXPERIENCE_ORDINALS.keys()].map(
      (descriptor) => resolveWorkExperience(descriptor, DEFAULT_EXPERIENCE_ORDINALS),
    );
    expect(codes.map((value) => (value.kind === 'ordinal' ? value.code : null))).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('tags an unknown descriptor as unmapped', () => {
    expect(resolveWorkExperience('unknown range', DEFAULT_EXPERIENCE_ORDINALS)).toEqual({
      kind: 'unmapped',
      descriptor: 'unknown range',
    });
  });
});

describe('mapWorkExperience', () => {
  it('replaces position 8 with the resolved ordinal', () => {
    const staged = mapWorkExperience(flatWith(BASIC), DEFAULT_EXPERIENCE_ORDINALS);
    expect(staged['Basic Information'][8]).toEqual({ kind: 'ordinal', code: 2, descriptor: '5 to 9' });
    expect(staged['Basic Information'].slice(0, 8)).toEqual(BASIC.slice(0, 8));
    expect(workExperienceOf(staged)).toEqual({ kind: 'ordinal', code: 2, descriptor: '5 to 9' });
  });

  it('keeps an unknown descriptor as an unmapped value', () => {
    const basic = [...BASIC.slice(0, 8), 'unknown range'];
    const staged = mapWorkExperience(flatWith(basic), DEFAULT_EXPERIENCE_ORDINALS);
    expect(workExperienceOf(staged)).toEqual({ kind: 'unmapped', descriptor: 'unknown range' });
    expect(basicText(staged, 8)).toBe('unknown range');
  });

  it('uses a custom position and table when given', () => {
    const staged = mapWorkExperience(flatWith(['x', 'senior']), new Map([['senior', 9]]), 1);
    expect(staged['Basic Information']).toEqual(['x', { kind: 'ordinal', code: 9, descriptor: 'senior' }]);
  });

  it('throws a ShapeError when Basic Information is too short', () => {
    expect(() => mapWorkExperience(flatWith(BASIC.slice(0, 6)), DEFAULT_EXPERIENCE_ORDINALS)).toThrow(ShapeError);
  });
});
