import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { schemaInvalid } from '../errors';
import type { SchemaRegistry } from '../registry/registry';
import { FIELD_TYPES } from '../types/schema';
import type { FieldType, JsonValue, SchemaDefinition, SchemaVersion, TableDef } from '../types/schema';
import { compareVersions } from '../utils/version';
import { mapSqlType } from './ddl';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

const isFieldType = (value: string): value is FieldType => FIELD_TYPES.some(t => t === value);

const fieldType = z.string().transform((value, ctx): FieldType => {
  const upper = value.toUpperCase();
  const mapped = isFieldType(upper) ? upper : mapSqlType(value);
  if (!mapped) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown field type "${value}"` });
    return z.NEVER;
  }
  return mapped;
});

const fieldDocument = z.object({
  type: fieldType,
  nullable: z.boolean().default(true),
  default: jsonValue.optional(),
  primary_key: z.boolean().default(false),
  tag: z.string().min(1).optional()
});

const tableDocument = z.object({
  fields: z.record(fieldDocument),
  /** field → "table.field" */
  foreign_keys: z.record(z.string().regex(/^[^.]+\.[^.]+$/, 'expected "table.field"')).default({})
});

export const schemaDocument = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
  parent: z.string().min(1).nullable().optional(),
  tables: z.record(tableDocument)
});

export type SchemaDocument = z.input<typeof schemaDocument>;

export type ParsedDocument = {
  version: string;
  parent?: string;
  definition: SchemaDefinition;
};

const toTable = (name: string, doc: z.output<typeof tableDocument>): TableDef => {
  const entries = Object.entries(doc.fields);
  return {
    name,
    fields: entries.map(([field, f]) => ({
      name: field,
      type: f.type,
      // Primary key fields are never nullable.
      nullable: f.primary_key ? false : f.nullable,
      ...(f.default !== undefined && { default: f.default }),
      ...(f.tag !== undefined && { tag: f.tag })
    })),
    primaryKey: entries.filter(([, f]) => f.primary_key).map(([field]) => field),
    foreignKeys: Object.entries(doc.foreign_keys).map(([field, ref]) => {
      const [table, target] = ref.split('.');
      return { field, references: { table, field: target } };
    })
  };
};

/** Validates a JSON schema document and converts it into a registrable definition. */
export const parseSchemaDocument = (raw: unknown): ParsedDocument => {
  const parsed = schemaDocument.safeParse(raw);
  if (!parsed.success) {
    throw schemaInvalid('Schema document is invalid', {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    });
  }
  const doc = parsed.data;
  return {
    version: doc.version,
    ...(doc.parent ? { parent: doc.parent } : {}),
    definition: {
      description: doc.description,
      tables: Object.entries(doc.tables).map(([name, table]) => toTable(name, table))
    }
  };
};

export const registerDocument = (registry: SchemaRegistry, raw: unknown): SchemaVersion => {
  const doc = parseSchemaDocument(raw);
  return registry.register(doc.version, doc.definition, { parent: doc.parent });
};

/**
 * Registers every `*.json` schema document in a directory, oldest version first,
 * so that default parents resolve to the previous document.
 */
export const loadSchemaDirectory = async (registry: SchemaRegistry, dir: string): Promise<SchemaVersion[]> => {
  const files = (await fs.readdir(dir)).filter(f => f.endsWith('.json')).sort();
  const docs: ParsedDocument[] = [];
  for (const file of files) {
    const text = await fs.readFile(path.join(dir, file), 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw schemaInvalid(`${file} is not valid JSON`, { cause: err });
    }
    docs.push(parseSchemaDocument(raw));
  }
  docs.sort((a, b) => compareVersions(a.version, b.version));
  return docs.map(doc => registry.register(doc.version, doc.definition, { parent: doc.parent }));
};
