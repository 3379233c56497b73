import type { RetryConfig } from '../config';
import type { FieldDef, FieldType, ForeignKeyDef, TableDef } from '../types/schema';

export const io: RetryConfig = { timeoutMs: 1000, retries: 2, backoffMs: 1 };

export const field = (name: string, type: FieldType, opts: Partial<Omit<FieldDef, 'name' | 'type'>> = {}): FieldDef => ({
  name,
  type,
  nullable: false,
  ...opts
});

export const table = (
  name: string,
  fields: FieldDef[],
  primaryKey: string[] = ['id'],
  foreignKeys: ForeignKeyDef[] = []
): TableDef => ({ name, fields, primaryKey, foreignKeys });

export const fk = (fieldName: string, ref: string): ForeignKeyDef => {
  const [refTable, refField] = ref.split('.');
  return { field: fieldName, references: { table: refTable, field: refField } };
};

export const patientV1 = () =>
  table('patient', [
    field('id', 'INT'),
    field('name', 'STRING'),
    field('dob', 'DATE', { nullable: true, tag: 'birth_date' })
  ]);
