/**
 * One JSON object as delivered by a source API
 */
export type RawRecord = Record<string, unknown>;

export function isRawRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * null, undefined, "", [] and {} count as empty. 0 and false do not.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isRawRecord(value) && Object.keys(value).length === 0;
}

export function hasKey(record: RawRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}
