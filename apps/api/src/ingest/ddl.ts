import pkg from 'node-sql-parser';
import { schemaInvalid } from '../errors';
import type { FieldDef, FieldType, FieldValue, ForeignKeyDef, TableDef } from '../types/schema';
import { isRecord } from '../utils/values';

const { Parser } = pkg;

export type SqlDialect = 'postgresql' | 'mysql' | 'sqlite';

/** Maps a SQL column type onto the portable field types. */
export const mapSqlType = (type?: string): FieldType | null => {
  if (!type) return null;
  const t = type.toLowerCase();
  if (t.includes('bool')) return 'BOOL';
  if (t.includes('json')) return 'JSON';
  if (t.includes('int') || t.includes('serial')) return 'INT';
  if (t.includes('numeric') || t.includes('decimal') || t.includes('float') || t.includes('double') || t.includes('real')) {
    return 'FLOAT';
  }
  if (t === 'date') return 'DATE';
  if (t.includes('timestamp') || t.includes('datetime') || t.includes('time')) return 'DATETIME';
  if (t.includes('char') || t.includes('text') || t.includes('uuid') || t.includes('string') || t.includes('enum')) return 'STRING';
  return null;
};

export const normalizeDialect = (dialect: string): SqlDialect => {
  const d = dialect.toLowerCase();
  if (d === 'postgres' || d === 'postgresql') return 'postgresql';
  if (d === 'mysql') return 'mysql';
  if (d === 'sqlite') return 'sqlite';
  return 'postgresql';
};

const columnName = (raw: unknown): string | null => {
  if (typeof raw === 'string') return raw;
  if (!isRecord(raw)) return null;
  if (typeof raw.value === 'string') return raw.value;
  return columnName(raw.column) ?? columnName(raw.expr);
};

const tableName = (raw: unknown): string | null => {
  const first: unknown = Array.isArray(raw) ? raw[0] : raw;
  if (typeof first === 'string') return first;
  return isRecord(first) && typeof first.table === 'string' ? first.table : null;
};

const columnList = (raw: unknown): string[] =>
  (Array.isArray(raw) ? raw : []).map(columnName).filter((n): n is string => n !== null);

const literal = (raw: unknown): FieldValue | undefined => {
  if (!isRecord(raw)) return undefined;
  const value = isRecord(raw.value) ? raw.value : raw;
  const type = typeof value.type === 'string' ? value.type.toLowerCase() : '';
  if (type === 'null') return null;
  if (type === 'number' && typeof value.value === 'number') return value.value;
  if (type === 'bool' || type === 'boolean') return value.value === true || value.value === 'TRUE' || value.value === 'true';
  if (type.includes('string') && typeof value.value === 'string') return value.value;
  return undefined;
};

const constraintType = (def: Record<string, unknown>) =>
  typeof def.constraint_type === 'string' ? def.constraint_type.toLowerCase() : '';

const reference = (field: string, raw: unknown): ForeignKeyDef | null => {
  if (!isRecord(raw)) return null;
  const table = tableName(raw.table);
  const [target] = columnList(raw.definition);
  return table && target ? { field, references: { table, field: target } } : null;
};

const parseTable = (node: Record<string, unknown>): TableDef => {
  const name = tableName(node.table);
  if (!name) throw schemaInvalid('CREATE TABLE statement without a table name');
  const definitions = (Array.isArray(node.create_definitions) ? node.create_definitions : []).filter(isRecord);

  const fields: FieldDef[] = [];
  const primaryKey: string[] = [];
  const foreignKeys: ForeignKeyDef[] = [];

  for (const def of definitions) {
    if (def.resource === 'column') {
      const field = columnName(def.column);
      const column = isRecord(def.definition) ? def.definition : {};
      const type = mapSqlType(typeof column.dataType === 'string' ? column.dataType : undefined);
      if (!field) continue;
      if (!type) throw schemaInvalid(`Column ${name}.${field} has an unsupported type`, { table: name, field });
      const notNull = isRecord(def.nullable) && def.nullable.type === 'not null';
      const isPk = typeof def.primary_key === 'string';
      const fallback = literal(def.default_val);
      fields.push({
        name: field,
        type,
        nullable: !(notNull || isPk),
        ...(fallback !== undefined && { default: fallback })
      });
      if (isPk) primaryKey.push(field);
      const fk = reference(field, def.reference_definition);
      if (fk) foreignKeys.push(fk);
    } else if (def.resource === 'constraint') {
      const kind = constraintType(def);
      const columns = columnList(def.definition);
      if (kind === 'primary key') primaryKey.push(...columns.filter(c => !primaryKey.includes(c)));
      if (kind === 'foreign key' && columns[0]) {
        const fk = reference(columns[0], def.reference_definition);
        if (fk) foreignKeys.push(fk);
      }
    }
  }

  // Primary key fields are NOT NULL even when declared by a table constraint.
  const keyed = fields.map(f => (primaryKey.includes(f.name) ? { ...f, nullable: false } : f));
  return { name, fields: keyed, primaryKey, foreignKeys };
};

/** Parses CREATE TABLE statements into table definitions; other statements are ignored. */
export const ingestDDL = (ddl: string, dialect: string): TableDef[] => {
  const parser = new Parser();
  let ast: unknown;
  try {
    ast = parser.astify(ddl, { database: normalizeDialect(dialect) });
  } catch (err) {
    throw schemaInvalid(`DDL could not be parsed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  const nodes: unknown[] = Array.isArray(ast) ? ast : [ast];
  return nodes
    .filter(isRecord)
    .filter(node => node.type === 'create' && node.keyword === 'table')
    .map(parseTable);
};
