import { Pool } from 'pg';
import type { Row, SchemaVersion, TableDef } from '../types/schema';
import type { DataStore, SinkTransaction } from './types';
import { classifyDriverError, decodeValue, encodeValue, errorCode, requireTable } from './values';

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgQueryable & { release(): void }>;
}

const quote = (name: string) => `"${name.replace(/"/g, '""')}"`;

// SQLSTATE class 23: integrity constraint violation.
const isConstraint = (err: unknown) => errorCode(err)?.startsWith('23') ?? false;
// Serialization failure, deadlock, admin shutdown, connection exceptions.
const isRetryable = (err: unknown) => {
  const code = errorCode(err);
  return code === '40001' || code === '40P01' || code === '57P01' || (code?.startsWith('08') ?? false);
};

export const upsertStatement = (table: TableDef, rows: Row[]) => {
  const cols = table.fields.map(f => quote(f.name));
  const values: unknown[] = [];
  const tuples = rows.map(row => {
    const params = table.fields.map(f => {
      values.push(encodeValue(row[f.name] ?? null, f, false));
      return `$${values.length}`;
    });
    return `(${params.join(', ')})`;
  });
  const updates = table.fields
    .filter(f => !table.primaryKey.includes(f.name))
    .map(f => `${quote(f.name)} = EXCLUDED.${quote(f.name)}`);
  const conflict = updates.length ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';
  const text = `INSERT INTO ${quote(table.name)} (${cols.join(', ')}) VALUES ${tuples.join(', ')} ON CONFLICT (${table.primaryKey
    .map(quote)
    .join(', ')}) ${conflict}`;
  return { text, values };
};

export class PostgresDataStore implements DataStore {
  constructor(
    private readonly pool: PgPoolLike,
    private readonly schema: SchemaVersion
  ) {}

  static connect(connectionString: string, schema: SchemaVersion) {
    return new PostgresDataStore(new Pool({ connectionString }), schema);
  }

  async *readTable(table: string): AsyncIterable<Row> {
    const def = requireTable(this.schema, table);
    let rows: Record<string, unknown>[];
    try {
      rows = (await this.pool.query(`SELECT * FROM ${quote(def.name)}`)).rows;
    } catch (err) {
      throw classifyDriverError(err, table, isConstraint, isRetryable);
    }
    for (const raw of rows) {
      yield Object.fromEntries(def.fields.map(f => [f.name, decodeValue(raw[f.name], f, def.name)]));
    }
  }

  async beginTransaction(): Promise<SinkTransaction> {
    const client = await this.pool.connect();
    const run = async (table: string, text: string, values?: unknown[]) => {
      try {
        await client.query(text, values);
      } catch (err) {
        throw classifyDriverError(err, table, isConstraint, isRetryable);
      }
    };
    let released = false;
    const release = () => {
      if (!released) client.release();
      released = true;
    };

    try {
      await run('(transaction)', 'BEGIN');
      await run('(transaction)', 'SET CONSTRAINTS ALL DEFERRED');
    } catch (err) {
      release();
      throw err;
    }

    return {
      writeRows: async (table, rows) => {
        if (!rows.length) return;
        const { text, values } = upsertStatement(requireTable(this.schema, table), rows);
        await run(table, text, values);
      },
      deleteRows: async (table, keys) => {
        const def = requireTable(this.schema, table);
        for (const key of keys) {
          const where = def.primaryKey.map((k, i) => `${quote(k)} = $${i + 1}`).join(' AND ');
          await run(table, `DELETE FROM ${quote(def.name)} WHERE ${where}`, def.primaryKey.map(k => key[k] ?? null));
        }
      },
      commit: async () => {
        await run('(commit)', 'COMMIT');
        release();
      },
      abort: async () => {
        if (released) return;
        try {
          await client.query('ROLLBACK');
        } finally {
          release();
        }
      }
    };
  }
}
