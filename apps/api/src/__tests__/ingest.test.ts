import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { FerryError } from '../errors';
import { ingestDDL, mapSqlType } from '../ingest/ddl';
import { loadSchemaDirectory, parseSchemaDocument, registerDocument } from '../ingest/document';
import { SchemaRegistry } from '../registry/registry';

describe('mapSqlType', () => {
  it('maps common column types', () => {
    expect(['integer', 'bigserial', 'numeric(10,2)', 'varchar(20)', 'uuid', 'date', 'timestamptz', 'boolean', 'jsonb'].map(mapSqlType)).toEqual([
      'INT',
      'INT',
      'FLOAT',
      'STRING',
      'STRING',
      'DATE',
      'DATETIME',
      'BOOL',
      'JSON'
    ]);
    expect(mapSqlType('blob')).toBeNull();
    expect(mapSqlType(undefined)).toBeNull();
  });
});

describe('ingestDDL', () => {
  it('parses CREATE TABLE statements', () => {
    const ddl = `
      CREATE TABLE patient (
        id integer PRIMARY KEY,
        full_name text NOT NULL,
        status varchar(20) NOT NULL DEFAULT 'active',
        balance numeric(10,2),
        joined_at timestamp
      );
      CREATE TABLE visit (
        id integer,
        patient_id integer NOT NULL REFERENCES patient(id),
        visited_on date NOT NULL,
        PRIMARY KEY (id)
      );
    `;
    const [patient, visit] = ingestDDL(ddl, 'postgres');

    expect(patient.name).toBe('patient');
    expect(patient.primaryKey).toEqual(['id']);
    expect(patient.fields).toEqual([
      { name: 'id', type: 'INT', nullable: false },
      { name: 'full_name', type: 'STRING', nullable: false },
      { name: 'status', type: 'STRING', nullable: false, default: 'active' },
      { name: 'balance', type: 'FLOAT', nullable: true },
      { name: 'joined_at', type: 'DATETIME', nullable: true }
    ]);
    expect(visit.primaryKey).toEqual(['id']);
    expect(visit.fields.map(f => [f.name, f.nullable])).toEqual([
      ['id', false],
      ['patient_id', false],
      ['visited_on', false]
    ]);
    expect(visit.foreignKeys).toEqual([{ field: 'patient_id', references: { table: 'patient', field: 'id' } }]);
  });

  it('registers parsed tables as a version', () => {
    const registry = new SchemaRegistry();
    const tables = ingestDDL('CREATE TABLE tag (id integer PRIMARY KEY, label text NOT NULL);', 'postgres');
    expect(registry.register('1.0.0', { tables }).tables[0].fields.map(f => f.name)).toEqual(['id', 'label']);
  });

  it('reports unparsable DDL as an invalid schema', () => {
    expect(() => ingestDDL('CREATE TABLE (', 'postgres')).toThrowError(FerryError);
    try {
      ingestDDL('CREATE TABLE (', 'postgres');
    } catch (err) {
      expect(err instanceof FerryError && err.kind).toBe('SchemaInvalid');
    }
  });
});

describe('parseSchemaDocument', () => {
  const doc = {
    version: '3.0.0',
    parent: '2.0.0',
    tables: {
      invoice: {
        fields: {
          id: { type: 'int', primary_key: true },
          total: { type: 'numeric(10,2)', nullable: false, default: 0 },
          issued_on: { type: 'DATE', tag: 'issue_date' }
        },
        foreign_keys: { id: 'visit.id' }
      }
    }
  };

  it('converts a document into a schema definition', () => {
    expect(parseSchemaDocument(doc)).toEqual({
      version: '3.0.0',
      parent: '2.0.0',
      definition: {
        description: undefined,
        tables: [
          {
            name: 'invoice',
            fields: [
              { name: 'id', type: 'INT', nullable: false },
              { name: 'total', type: 'FLOAT', nullable: false, default: 0 },
              { name: 'issued_on', type: 'DATE', nullable: true, tag: 'issue_date' }
            ],
            primaryKey: ['id'],
            foreignKeys: [{ field: 'id', references: { table: 'visit', field: 'id' } }]
          }
        ]
      }
    });
  });

  it('lists every problem in the document', () => {
    const bad = {
      version: '1.0.0',
      tables: { t: { fields: { x: { type: 'blob' } }, foreign_keys: { x: 'nowhere' } } }
    };
    try {
      parseSchemaDocument(bad);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FerryError);
      if (!(err instanceof FerryError)) return;
      expect(err.kind).toBe('SchemaInvalid');
      expect(err.details.issues).toEqual([
        'tables.t.fields.x.type: Unknown field type "blob"',
        'tables.t.foreign_keys.x: expected "table.field"'
      ]);
    }
  });

  it('registers under the declared parent', () => {
    const registry = new SchemaRegistry();
    const base = { version: '1.0.0', tables: { t: { fields: { id: { type: 'INT', primary_key: true } } } } };
    registerDocument(registry, base);
    registerDocument(registry, { ...base, version: '2.0.0' });
    const branch = registerDocument(registry, { ...base, version: '1.5.0', parent: '1.0.0' });
    expect(branch.parent).toBe('1.0.0');
  });
});

describe('loadSchemaDirectory', () => {
  it('names the file that is not valid JSON', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'schemas-'));
    try {
      await fs.writeFile(path.join(dir, 'broken.json'), '{ "version": ');
      await expect(loadSchemaDirectory(new SchemaRegistry(), dir)).rejects.toMatchObject({
        kind: 'SchemaInvalid',
        message: 'broken.json is not valid JSON'
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('registers documents oldest version first', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'schemas-'));
    try {
      const doc = (version: string) => JSON.stringify({ version, tables: { t: { fields: { id: { type: 'INT', primary_key: true } } } } });
      await fs.writeFile(path.join(dir, 'a.json'), doc('1.10.0'));
      await fs.writeFile(path.join(dir, 'b.json'), doc('1.2.0'));
      const registry = new SchemaRegistry();
      const versions = await loadSchemaDirectory(registry, dir);
      expect(versions.map(v => [v.version, v.parent])).toEqual([
        ['1.2.0', null],
        ['1.10.0', '1.2.0']
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
