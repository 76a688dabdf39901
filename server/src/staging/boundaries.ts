import { ConfigurationError } from '../lib/errors.js';
import type { BoundaryName, BoundarySet } from './types.js';

/** Header names that anchor each classification zone, in zone order. */
export const BOUNDARY_HEADERS: Readonly<Record<BoundaryName, string>> = Object.freeze({
  workExperience: 'Work Experience',
  space: 'Space',
  aircraftPower: 'Aircraft Power Generation',
  otherStandards: 'Other Standards',
  devsecops: 'DevSecOps',
  otherLanguages: 'Other Languages',
  otherTools: 'Other Tools',
});

const ZONE_ORDER: readonly BoundaryName[] = [
  'workExperience',
  'space',
  'aircraftPower',
  'otherStandards',
  'devsecops',
  'otherLanguages',
  'otherTools',
];

/**
 * Locates the seven anchor headers. Duplicate names resolve to the first
 * occurrence. Throws when any anchor is absent, listing all of them.
 */
export function resolveBoundaries(headers: readonly string[]): BoundarySet {
  const missing: string[] = [];
  const indexOf = (name: BoundaryName): number => {
    const index = headers.indexOf(BOUNDARY_HEADERS[name]);
    if (index < 0) missing.push(BOUNDARY_HEADERS[name]);
    return index;
  };

  const boundaries: BoundarySet = {
    workExperience: indexOf('workExperience'),
    space: indexOf('space'),
    aircraftPower: indexOf('aircraftPower'),
    otherStandards: indexOf('otherStandards'),
    devsecops: indexOf('devsecops'),
    otherLanguages: indexOf('otherLanguages'),
    otherTools: indexOf('otherTools'),
  };

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Survey headers are missing required columns: ${missing.join(', ')}`,
      missing,
    );
  }
  return boundaries;
}

export interface BoundaryOrderViolation {
  earlier: BoundaryName;
  later: BoundaryName;
  earlierIndex: number;
  laterIndex: number;
}

/**
 * Lists adjacent anchors that appear out of zone order. Columns in such a
 * sheet still classify, but into the wrong buckets.
 */
export function checkBoundaryOrder(boundaries: BoundarySet): BoundaryOrderViolation[] {
  const violations: BoundaryOrderViolation[] = [];
  for (let i = 1; i < ZONE_ORDER.length; i++) {
    const earlier = ZONE_ORDER[i - 1];
    const later = ZONE_ORDER[i];
    if (boundaries[later] < boundaries[earlier]) {
      violations.push({
        earlier,
        later,
        earlierIndex: boundaries[earlier],
        laterIndex: boundaries[later],
      });
    }
  }
  return violations;
}

export function describeViolation(v: BoundaryOrderViolation): string {
  return `"${BOUNDARY_HEADERS[v.later]}" (column ${v.laterIndex}) precedes "${BOUNDARY_HEADERS[v.earlier]}" (column ${v.earlierIndex})`;
}
