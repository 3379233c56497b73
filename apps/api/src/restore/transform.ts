import { setImmediate as yieldToLoop } from 'timers/promises';
import type { BackupArchive, RecordBatch } from '../backup/archive';
import type { RowPolicy } from '../config';
import { cancelled, constraintViolation, errorMessage, FerryError, isFerryError } from '../errors';
import { applyConversions } from '../map/coerce';
import { ruleFor } from '../map/rules';
import type { MappingRule, RowTransform, RuleSet, TableRuleSet } from '../map/rules';
import { toFinding } from '../report';
import type { Finding } from '../report';
import { findTable } from '../types/schema';
import type { FieldDef, FieldValue, Row, SchemaVersion, TableDef } from '../types/schema';
import { isJsonValue, matchesType, pickKey, rowKey, sortByKey } from '../utils/values';

export type StagedTable = {
  table: string;
  /** Target-shaped rows in primary-key order. */
  rows: Row[];
  /** Target primary-key rows to delete. */
  deletes: Row[];
};

export type TransformContext = {
  source: SchemaVersion;
  target: SchemaVersion;
  ruleSet: RuleSet;
  transforms: Map<string, RowTransform>;
  policy: RowPolicy;
  batchSize: number;
  isCancelled: () => boolean;
  onFinding: (finding: Finding) => void;
};

export type TransformResult = {
  tables: StagedTable[];
  rowsRead: number;
  rowsSkipped: number;
};

const rowError = (message: string, table: string, field: string, key: string, cause?: unknown) =>
  new FerryError('RowCoercionError', message, { table, field, rowKey: key, cause });

const fieldValue = (
  rule: MappingRule,
  field: FieldDef,
  source: Row,
  transforms: Map<string, RowTransform>
): FieldValue => {
  switch (rule.kind) {
    case 'DirectCopy':
    case 'Rename':
      return source[rule.source] ?? null;
    case 'TypeCoerce':
      return applyConversions(source[rule.source] ?? null, rule.conversions);
    case 'DefaultFill':
      return rule.value;
    case 'Drop':
      return field.default ?? null;
    case 'ManualOverride': {
      const transform = transforms.get(rule.expressionId);
      if (!transform) throw new Error(`No transform registered for override ${rule.expressionId}`);
      const value: unknown = transform(source);
      if (value === undefined) return null;
      if (!isJsonValue(value)) throw new Error(`Override ${rule.expressionId} returned a non-JSON value`);
      return value;
    }
  }
};

/**
 * Builds one target row. Any failure is a RowCoercionError naming the target
 * field and the source row's key.
 */
export const transformRow = (
  target: TableDef,
  rules: TableRuleSet,
  source: Row,
  sourceKey: string,
  transforms: Map<string, RowTransform>
): Row => {
  const row: Row = {};
  for (const field of target.fields) {
    const rule: MappingRule = ruleFor(rules, field.name) ?? { kind: 'Drop' };
    let value: FieldValue;
    try {
      value = fieldValue(rule, field, source, transforms);
    } catch (err) {
      throw rowError(`${target.name}.${field.name}: ${errorMessage(err)}`, target.name, field.name, sourceKey, err);
    }
    if (value === null && !field.nullable) {
      throw rowError(`${target.name}.${field.name} may not be null`, target.name, field.name, sourceKey);
    }
    if (!matchesType(value, field.type)) {
      throw rowError(
        `${target.name}.${field.name}: ${JSON.stringify(value)} is not a ${field.type}`,
        target.name,
        field.name,
        sourceKey
      );
    }
    row[field.name] = value;
  }
  return row;
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
};

/** Maps source-table tombstone keys onto target primary keys through the key fields' rules. */
const mapTombstones = (target: TableDef, rules: TableRuleSet, keys: Row[], sourcePk: readonly string[], ctx: TransformContext) => {
  const deletes: Row[] = [];
  for (const key of keys) {
    const sourceKey = rowKey(key, sourcePk);
    try {
      const mapped: Row = {};
      for (const name of target.primaryKey) {
        const field = target.fields.find(f => f.name === name);
        const rule = ruleFor(rules, name);
        if (!field || !rule) throw new Error(`no rule for key field ${name}`);
        const value = fieldValue(rule, field, key, ctx.transforms);
        if (value === null) throw new Error(`key field ${name} cannot be derived from the deleted key`);
        mapped[name] = value;
      }
      deletes.push(mapped);
    } catch (err) {
      const failure = rowError(
        `Tombstone ${sourceKey} of ${target.name}: ${errorMessage(err)}`,
        target.name,
        target.primaryKey.join(', '),
        sourceKey,
        err
      );
      if (ctx.policy === 'strict') throw failure;
      ctx.onFinding(toFinding(failure));
    }
  }
  return sortByKey(deletes, target.primaryKey);
};

/**
 * Applies the resolved rules to every source row, batch by batch. Cancellation is
 * checked before each batch starts. Output rows are ordered by target primary key,
 * so the result does not depend on source row order.
 */
export const transformArchive = async (
  batches: RecordBatch[],
  tombstones: BackupArchive['tombstones'],
  ctx: TransformContext
): Promise<TransformResult> => {
  const tables: StagedTable[] = [];
  let rowsRead = 0;
  let rowsSkipped = 0;

  for (const rules of ctx.ruleSet.tables) {
    const target = findTable(ctx.target, rules.table);
    if (!target) throw new FerryError('SchemaInvalid', `Rule set names unknown table ${rules.table}`, { table: rules.table });
    const sourceDef = rules.sourceTable ? findTable(ctx.source, rules.sourceTable) : undefined;
    const sourceRows = sourceDef ? batches.filter(b => b.table === sourceDef.name).flatMap(b => b.rows) : [];
    const rows: Row[] = [];

    for (const batch of chunk(sourceRows, ctx.batchSize)) {
      if (ctx.isCancelled()) throw cancelled();
      for (const source of batch) {
        rowsRead++;
        const sourceKey = rowKey(source, sourceDef?.primaryKey ?? []);
        try {
          rows.push(transformRow(target, rules, source, sourceKey, ctx.transforms));
        } catch (err) {
          if (ctx.policy === 'strict' || !isFerryError(err) || err.kind !== 'RowCoercionError') throw err;
          rowsSkipped++;
          ctx.onFinding(toFinding(err));
        }
      }
      await yieldToLoop();
    }

    const sorted = sortByKey(rows, target.primaryKey);
    for (let i = 1; i < sorted.length; i++) {
      const key = rowKey(sorted[i], target.primaryKey);
      if (key === rowKey(sorted[i - 1], target.primaryKey)) {
        throw constraintViolation(target.name, new Error(`two source rows map to primary key ${key}`));
      }
    }

    const deletes = sourceDef
      ? mapTombstones(
          target,
          rules,
          tombstones.filter(t => t.table === sourceDef.name).flatMap(t => t.keys.map(k => pickKey(k, sourceDef.primaryKey))),
          sourceDef.primaryKey,
          ctx
        )
      : [];
    tables.push({ table: target.name, rows: sorted, deletes });
  }

  return { tables, rowsRead, rowsSkipped };
};
