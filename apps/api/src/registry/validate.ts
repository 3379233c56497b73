import { schemaInvalid } from '../errors';
import { FIELD_TYPES } from '../types/schema';
import type { SchemaDefinition, TableDef } from '../types/schema';
import { matchesType } from '../utils/values';

const validateTable = (table: TableDef, tableNames: Set<string>, tables: TableDef[]): string[] => {
  const issues: string[] = [];
  const at = (msg: string) => issues.push(`${table.name}: ${msg}`);
  const names = new Set<string>();

  if (!table.fields.length) at('table has no fields');

  for (const field of table.fields) {
    if (!field.name) at('field with empty name');
    if (names.has(field.name)) at(`duplicate field ${field.name}`);
    names.add(field.name);
    if (!FIELD_TYPES.includes(field.type)) at(`field ${field.name} has unknown type ${String(field.type)}`);
    if (field.default !== undefined && field.default !== null && !matchesType(field.default, field.type)) {
      at(`default of ${field.name} is not a valid ${field.type}`);
    }
    if (field.default === null && !field.nullable) at(`non-nullable field ${field.name} has a null default`);
  }

  if (!table.primaryKey.length) at('primary key is empty');
  for (const key of table.primaryKey) {
    const field = table.fields.find(f => f.name === key);
    if (!field) at(`primary key field ${key} does not exist`);
    else if (field.nullable) at(`primary key field ${key} is nullable`);
  }

  for (const fk of table.foreignKeys) {
    if (!names.has(fk.field)) at(`foreign key field ${fk.field} does not exist`);
    if (!tableNames.has(fk.references.table)) {
      at(`foreign key ${fk.field} references unknown table ${fk.references.table}`);
      continue;
    }
    const parent = tables.find(t => t.name === fk.references.table);
    if (parent && !parent.fields.some(f => f.name === fk.references.field)) {
      at(`foreign key ${fk.field} references unknown field ${fk.references.table}.${fk.references.field}`);
    }
  }

  return issues;
};

/** Checks the TableDef/FieldDef invariants; throws SchemaInvalid listing every violation. */
export const validateDefinition = (version: string, definition: SchemaDefinition) => {
  const issues: string[] = [];
  if (!version.trim()) issues.push('version id is empty');

  const tableNames = new Set<string>();
  for (const table of definition.tables) {
    if (!table.name) issues.push('table with empty name');
    if (tableNames.has(table.name)) issues.push(`duplicate table ${table.name}`);
    tableNames.add(table.name);
  }

  for (const table of definition.tables) {
    issues.push(...validateTable(table, tableNames, definition.tables));
  }

  if (issues.length) {
    throw schemaInvalid(`Schema ${version} is invalid: ${issues[0]}`, { version, issues });
  }
};
