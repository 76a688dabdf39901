import { BASIC_INFORMATION, type FlatRecord, type ListBucket, type ListRecord } from './types.js';

export const BUCKET_SEPARATOR = ', ';

/**
 * Joins every list bucket into one display string, keeping append order.
 * Basic Information stays a list. Returns a new record.
 */
export function flattenRecord(record: ListRecord): FlatRecord {
  const joined = (bucket: ListBucket) => {
    const values = record[bucket];
    if (!Array.isArray(values)) {
      throw new TypeError(`Bucket "${bucket}" is already flattened`);
    }
    return values.join(BUCKET_SEPARATOR);
  };

  return {
    [BASIC_INFORMATION]: [...record[BASIC_INFORMATION]],
    'Industry Experience': joined('Industry Experience'),
    Domains: joined('Domains'),
    Standards: joined('Standards'),
    Skills: joined('Skills'),
    Languages: joined('Languages'),
    Tools: joined('Tools'),
  };
}
