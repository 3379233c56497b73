import { FerryError, constraintViolation, transient } from '../errors';
import { findTable } from '../types/schema';
import type { FieldDef, FieldValue, SchemaVersion, TableDef } from '../types/schema';
import { isJsonValue, isRecord } from '../utils/values';

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'PROTOCOL_CONNECTION_LOST']);

export const errorCode = (err: unknown): string | null =>
  isRecord(err) && (typeof err.code === 'string' || typeof err.code === 'number') ? String(err.code) : null;

export const errno = (err: unknown): number | null => (isRecord(err) && typeof err.errno === 'number' ? err.errno : null);

/** Maps a driver error onto ConstraintViolation or Transient; anything else passes through. */
export const classifyDriverError = (
  err: unknown,
  table: string,
  isConstraint: (err: unknown) => boolean,
  isRetryable: (err: unknown) => boolean
): unknown => {
  if (err instanceof FerryError) return err;
  if (isConstraint(err)) return constraintViolation(table, err);
  const code = errorCode(err);
  if ((code && TRANSIENT_CODES.has(code)) || isRetryable(err)) {
    return transient(`I/O failure on ${table}: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  return err;
};

export const requireTable = (schema: SchemaVersion, name: string): TableDef => {
  const table = findTable(schema, name);
  if (!table) {
    throw new FerryError('SchemaInvalid', `Table ${name} is not part of schema ${schema.version}`, {
      table: name,
      version: schema.version
    });
  }
  return table;
};

const pad = (n: number) => String(n).padStart(2, '0');

// pg and mysql2 hand DATE columns back as local midnight.
const dateOnly = (d: Date) => `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;

/** Normalizes a driver value into the portable representation of the field's type. */
export const decodeValue = (value: unknown, field: FieldDef, table: string): FieldValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') {
    if (value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)) return Number(value);
    return value.toString();
  }
  if (value instanceof Date) return field.type === 'DATE' ? dateOnly(value) : value.toISOString();
  if (field.type === 'BOOL' && typeof value === 'number') return value !== 0;
  if (field.type === 'INT' && typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.trim();
  }
  if ((field.type === 'INT' || field.type === 'FLOAT') && typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  if (field.type === 'JSON' && typeof value === 'string') {
    try {
      const parsed: unknown = JSON.parse(value);
      if (isJsonValue(parsed)) return parsed;
    } catch {
      return value;
    }
  }
  if (isJsonValue(value)) return value;
  throw new FerryError('SchemaInvalid', `Unsupported value in ${table}.${field.name}`, { table, field: field.name });
};

/** Encodes a portable value for drivers that store booleans as integers and JSON as text. */
export const encodeValue = (value: FieldValue, field: FieldDef, booleansAsIntegers: boolean): unknown => {
  if (value === null) return null;
  if (field.type === 'BOOL' && booleansAsIntegers && typeof value === 'boolean') return value ? 1 : 0;
  if (field.type === 'JSON' || typeof value === 'object') return JSON.stringify(value);
  return value;
};
