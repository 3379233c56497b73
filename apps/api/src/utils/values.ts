import { createHash } from 'crypto';
import type { FieldType, FieldValue, JsonValue, Row } from '../types/schema';

const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const DATETIME_REGEX = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isRecord(value)) return Object.values(value).every(isJsonValue);
  return false;
};

export const isValidDate = (value: string) => {
  if (!DATE_REGEX.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.valueOf()) && d.toISOString().slice(0, 10) === value;
};

export const isValidDateTime = (value: string) =>
  DATETIME_REGEX.test(value) && !Number.isNaN(new Date(value).valueOf());

/** Whether a non-null value is a legal representation of the declared type. */
export const matchesType = (value: FieldValue, type: FieldType): boolean => {
  if (value === null) return true;
  switch (type) {
    case 'INT':
      return typeof value === 'number' && Number.isInteger(value);
    case 'FLOAT':
      return typeof value === 'number' && Number.isFinite(value);
    case 'STRING':
      return typeof value === 'string';
    case 'DATE':
      return typeof value === 'string' && isValidDate(value);
    case 'DATETIME':
      return typeof value === 'string' && isValidDateTime(value);
    case 'BOOL':
      return typeof value === 'boolean';
    case 'JSON':
      return true;
  }
};

/** JSON with object keys sorted, so equal rows always serialize identically. */
export const canonicalJson = (value: JsonValue): string => {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value);
};

export const sha256 = (text: string) => createHash('sha256').update(text).digest('hex');

export const rowHash = (row: Row) => sha256(canonicalJson(row));

export const keyValues = (row: Row, primaryKey: readonly string[]): FieldValue[] => primaryKey.map(k => row[k] ?? null);

export const rowKey = (row: Row, primaryKey: readonly string[]) => canonicalJson(keyValues(row, primaryKey));

export const pickKey = (row: Row, primaryKey: readonly string[]): Row =>
  Object.fromEntries(primaryKey.map(k => [k, row[k] ?? null]));

const compareValue = (a: FieldValue, b: FieldValue): number => {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = typeof a === 'string' ? a : canonicalJson(a);
  const sb = typeof b === 'string' ? b : canonicalJson(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
};

/** Orders rows by primary-key tuple: numbers numerically, everything else by string. */
export const compareByKey = (primaryKey: readonly string[]) => (a: Row, b: Row) => {
  for (const k of primaryKey) {
    const c = compareValue(a[k] ?? null, b[k] ?? null);
    if (c !== 0) return c;
  }
  return 0;
};

export const sortByKey = <T extends Row>(rows: T[], primaryKey: readonly string[]): T[] =>
  [...rows].sort(compareByKey(primaryKey));
