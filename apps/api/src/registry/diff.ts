import type {
  ForeignKeyDef,
  NullabilityChange,
  RenameCandidate,
  SchemaDiff,
  SchemaVersion,
  TableDef,
  TableDiff,
  TypeChange
} from '../types/schema';

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const fkKey = (fk: ForeignKeyDef) => `${fk.field}->${fk.references.table}.${fk.references.field}`;

const fkDifference = (a: readonly ForeignKeyDef[], b: readonly ForeignKeyDef[]) => {
  const keys = new Set(b.map(fkKey));
  return a.filter(fk => !keys.has(fkKey(fk))).sort((x, y) => byName(fkKey(x), fkKey(y)));
};

const renameCandidates = (source: TableDef, target: TableDef, removed: string[], added: string[]) => {
  const candidates: RenameCandidate[] = [];
  for (const from of removed) {
    const sourceIndex = source.fields.findIndex(f => f.name === from);
    const sourceField = source.fields[sourceIndex];
    for (const to of added) {
      const targetIndex = target.fields.findIndex(f => f.name === to);
      const targetField = target.fields[targetIndex];
      if (sourceField.tag && sourceField.tag === targetField.tag) {
        candidates.push({ from, to, reason: 'semantic_tag' });
      } else if (sourceIndex === targetIndex && sourceField.type === targetField.type) {
        candidates.push({ from, to, reason: 'position' });
      }
    }
  }
  return candidates.sort((a, b) => byName(a.from, b.from) || byName(a.to, b.to));
};

export const diffTables = (source: TableDef, target: TableDef): TableDiff => {
  const sourceFields = new Map(source.fields.map(f => [f.name, f]));
  const targetFields = new Map(target.fields.map(f => [f.name, f]));

  const fieldsAdded = target.fields.filter(f => !sourceFields.has(f.name)).map(f => f.name).sort(byName);
  const fieldsRemoved = source.fields.filter(f => !targetFields.has(f.name)).map(f => f.name).sort(byName);

  const common = target.fields.filter(f => sourceFields.has(f.name)).map(f => f.name).sort(byName);
  const typeChanged: TypeChange[] = [];
  const nullabilityChanged: NullabilityChange[] = [];
  for (const name of common) {
    const before = sourceFields.get(name);
    const after = targetFields.get(name);
    if (!before || !after) continue;
    if (before.type !== after.type) typeChanged.push({ field: name, from: before.type, to: after.type });
    if (before.nullable !== after.nullable) {
      nullabilityChanged.push({ field: name, from: before.nullable, to: after.nullable });
    }
  }

  const foreignKeysAdded = fkDifference(target.foreignKeys, source.foreignKeys);
  const foreignKeysRemoved = fkDifference(source.foreignKeys, target.foreignKeys);
  const primaryKeyChanged = source.primaryKey.join('\u0000') !== target.primaryKey.join('\u0000');

  const unchanged =
    !fieldsAdded.length &&
    !fieldsRemoved.length &&
    !typeChanged.length &&
    !nullabilityChanged.length &&
    !foreignKeysAdded.length &&
    !foreignKeysRemoved.length &&
    !primaryKeyChanged;

  return {
    table: target.name,
    fieldsAdded,
    fieldsRemoved,
    typeChanged,
    nullabilityChanged,
    renameCandidates: renameCandidates(source, target, fieldsRemoved, fieldsAdded),
    foreignKeysAdded,
    foreignKeysRemoved,
    primaryKeyChanged,
    unchanged
  };
};

/** Structural comparison of two registered versions. Set-valued parts are sorted by name. */
export const computeDiff = (source: SchemaVersion, target: SchemaVersion): SchemaDiff => {
  const sourceTables = new Map(source.tables.map(t => [t.name, t]));
  const targetTables = new Map(target.tables.map(t => [t.name, t]));

  const tablesAdded = [...targetTables.keys()].filter(n => !sourceTables.has(n)).sort(byName);
  const tablesRemoved = [...sourceTables.keys()].filter(n => !targetTables.has(n)).sort(byName);
  const tablesMatched: TableDiff[] = [];

  for (const name of [...targetTables.keys()].sort(byName)) {
    const before = sourceTables.get(name);
    const after = targetTables.get(name);
    if (before && after) tablesMatched.push(diffTables(before, after));
  }

  return {
    sourceVersion: source.version,
    targetVersion: target.version,
    tablesAdded,
    tablesRemoved,
    tablesMatched
  };
};
