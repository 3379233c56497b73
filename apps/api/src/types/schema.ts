export const FIELD_TYPES = ['INT', 'FLOAT', 'STRING', 'DATE', 'DATETIME', 'BOOL', 'JSON'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// DATE values travel as 'YYYY-MM-DD', DATETIME as ISO-8601 strings.
export type FieldValue = JsonValue;

export type Row = Record<string, FieldValue>;

export type FieldDef = {
  name: string;
  type: FieldType;
  nullable: boolean;
  default?: FieldValue;
  tag?: string; // semantic hint, e.g. "patient_id"
};

export type ForeignKeyDef = {
  field: string;
  references: { table: string; field: string };
};

export type TableDef = {
  name: string;
  fields: readonly FieldDef[];
  primaryKey: readonly string[];
  foreignKeys: readonly ForeignKeyDef[];
};

export type SchemaDefinition = {
  tables: TableDef[];
  description?: string;
};

export type SchemaVersion = {
  readonly version: string;
  readonly parent: string | null;
  readonly description?: string;
  readonly tables: readonly TableDef[];
};

export type TypeChange = {
  field: string;
  from: FieldType;
  to: FieldType;
};

export type NullabilityChange = {
  field: string;
  from: boolean;
  to: boolean;
};

export type RenameCandidate = {
  from: string;
  to: string;
  reason: 'semantic_tag' | 'position';
};

export type TableDiff = {
  table: string;
  fieldsAdded: string[];
  fieldsRemoved: string[];
  typeChanged: TypeChange[];
  nullabilityChanged: NullabilityChange[];
  renameCandidates: RenameCandidate[];
  foreignKeysAdded: ForeignKeyDef[];
  foreignKeysRemoved: ForeignKeyDef[];
  primaryKeyChanged: boolean;
  unchanged: boolean;
};

export type SchemaDiff = {
  sourceVersion: string;
  targetVersion: string;
  tablesAdded: string[];
  tablesRemoved: string[];
  tablesMatched: TableDiff[];
};

export const findTable = (schema: SchemaVersion, name: string) =>
  schema.tables.find(t => t.name === name) ?? null;

export const findField = (table: TableDef, name: string) =>
  table.fields.find(f => f.name === name) ?? null;

export const isRequired = (field: FieldDef) => !field.nullable && field.default === undefined;
