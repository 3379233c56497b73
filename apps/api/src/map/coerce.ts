import { FerryError } from '../errors';
import type { FieldType, FieldValue } from '../types/schema';
import { canonicalJson, isJsonValue, isValidDate, isValidDateTime, matchesType } from '../utils/values';

export type ConversionId = `${FieldType}->${FieldType}`;

/**
 * widening: always succeeds and keeps the value exactly.
 * checked: keeps the value exactly or fails the row.
 * lossy: may change the value (truncation, dropped precision).
 */
export type ConversionClass = 'widening' | 'checked' | 'lossy';

type Conversion = {
  from: FieldType;
  to: FieldType;
  kind: ConversionClass;
  /** Eligible for automatic inference between same-named fields. */
  inferable: boolean;
  apply: (value: FieldValue) => FieldValue;
};

const fail = (value: FieldValue, to: FieldType): never => {
  throw new FerryError('RowCoercionError', `Cannot convert ${JSON.stringify(value)} to ${to}`);
};

const conversion = (
  from: FieldType,
  to: FieldType,
  kind: ConversionClass,
  inferable: boolean,
  apply: (value: FieldValue) => FieldValue
): [ConversionId, Conversion] => [`${from}->${to}`, { from, to, kind, inferable, apply }];

const CATALOGUE = new Map<ConversionId, Conversion>([
  conversion('INT', 'FLOAT', 'widening', true, v => v),
  conversion('FLOAT', 'INT', 'lossy', false, v => (typeof v === 'number' ? Math.trunc(v) : fail(v, 'INT'))),
  conversion('INT', 'STRING', 'widening', false, v => String(v)),
  conversion('FLOAT', 'STRING', 'widening', false, v => String(v)),
  conversion('STRING', 'INT', 'checked', false, v =>
    typeof v === 'string' && /^-?\d+$/.test(v.trim()) ? Number(v.trim()) : fail(v, 'INT')
  ),
  conversion('STRING', 'FLOAT', 'checked', false, v => {
    const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : Number.NaN;
    return Number.isFinite(n) ? n : fail(v, 'FLOAT');
  }),
  conversion('DATE', 'STRING', 'widening', true, v => v),
  conversion('STRING', 'DATE', 'checked', true, v => (typeof v === 'string' && isValidDate(v) ? v : fail(v, 'DATE'))),
  conversion('DATETIME', 'STRING', 'widening', true, v => v),
  conversion('STRING', 'DATETIME', 'checked', true, v =>
    typeof v === 'string' && isValidDateTime(v) ? v : fail(v, 'DATETIME')
  ),
  conversion('DATE', 'DATETIME', 'widening', false, v => `${String(v)}T00:00:00.000Z`),
  conversion('DATETIME', 'DATE', 'lossy', false, v =>
    typeof v === 'string' ? new Date(v).toISOString().slice(0, 10) : fail(v, 'DATE')
  ),
  conversion('BOOL', 'INT', 'widening', true, v => (v ? 1 : 0)),
  conversion('INT', 'BOOL', 'checked', true, v => (v === 0 ? false : v === 1 ? true : fail(v, 'BOOL'))),
  conversion('BOOL', 'STRING', 'widening', false, v => (v ? 'true' : 'false')),
  conversion('STRING', 'BOOL', 'checked', false, v => (v === 'true' ? true : v === 'false' ? false : fail(v, 'BOOL'))),
  conversion('JSON', 'STRING', 'widening', false, v => canonicalJson(v)),
  conversion('STRING', 'JSON', 'checked', false, v => {
    if (typeof v !== 'string') return fail(v, 'JSON');
    try {
      const parsed: unknown = JSON.parse(v);
      return isJsonValue(parsed) ? parsed : fail(v, 'JSON');
    } catch {
      return fail(v, 'JSON');
    }
  })
]);

export const conversionId = (from: FieldType, to: FieldType): ConversionId => `${from}->${to}`;

export const getConversion = (id: ConversionId) => CATALOGUE.get(id) ?? null;

/** Conversion Phase 2(b) may infer for a same-named field whose type changed. */
export const inferableConversion = (from: FieldType, to: FieldType): ConversionId | null => {
  const id = conversionId(from, to);
  return CATALOGUE.get(id)?.inferable ? id : null;
};

/** Any catalogued conversion, for manual rules and cascades. */
export const findConversion = (from: FieldType, to: FieldType): ConversionId | null =>
  CATALOGUE.has(conversionId(from, to)) ? conversionId(from, to) : null;

const unsupported = (message: string) => new FerryError('UnsupportedCoercionChain', message);

/** Runs a conversion pipeline over one value. Nulls pass through untouched. */
export const applyConversions = (value: FieldValue, pipeline: readonly ConversionId[]): FieldValue => {
  let current = value;
  for (const id of pipeline) {
    if (current === null) return null;
    const step = CATALOGUE.get(id);
    if (!step) throw unsupported(`Unknown conversion ${id}`);
    if (!matchesType(current, step.from)) fail(current, step.to);
    current = step.apply(current);
  }
  return current;
};

/**
 * Concatenates two conversion pipelines into one. A widening step followed by its
 * non-lossy inverse cancels out; more than one lossy step is not representable.
 */
export const composeConversions = (first: readonly ConversionId[], second: readonly ConversionId[]): ConversionId[] => {
  const steps = [...first, ...second].map(id => {
    const step = CATALOGUE.get(id);
    if (!step) throw unsupported(`Unknown conversion ${id}`);
    return { id, step };
  });

  for (let i = 1; i < steps.length; i++) {
    if (steps[i - 1].step.to !== steps[i].step.from) {
      throw unsupported(`Conversion ${steps[i - 1].id} does not feed ${steps[i].id}`);
    }
  }
  const lossy = steps.filter(s => s.step.kind === 'lossy');
  if (lossy.length > 1) {
    throw unsupported(`Chain ${steps.map(s => s.id).join(', ')} applies more than one lossy conversion`);
  }

  const result: typeof steps = [];
  for (const s of steps) {
    const prev = result[result.length - 1];
    const cancels =
      prev !== undefined &&
      prev.step.kind === 'widening' &&
      s.step.kind !== 'lossy' &&
      prev.step.from === s.step.to;
    if (cancels) result.pop();
    else result.push(s);
  }
  return result.map(s => s.id);
};
