import Database from 'better-sqlite3';
import type { Row, SchemaVersion, TableDef } from '../types/schema';
import { FerryError } from '../errors';
import { isRecord } from '../utils/values';
import type { DataStore, SinkTransaction } from './types';
import { classifyDriverError, decodeValue, encodeValue, errorCode, requireTable } from './values';

const quote = (name: string) => `"${name.replace(/"/g, '""')}"`;

const isConstraint = (err: unknown) => errorCode(err)?.startsWith('SQLITE_CONSTRAINT') ?? false;
const isRetryable = (err: unknown) => {
  const code = errorCode(err);
  return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
};

const upsertSql = (table: TableDef) => {
  const cols = table.fields.map(f => quote(f.name));
  const keys = table.primaryKey.map(quote);
  const updates = table.fields
    .filter(f => !table.primaryKey.includes(f.name))
    .map(f => `${quote(f.name)} = excluded.${quote(f.name)}`);
  const conflict = updates.length ? `DO UPDATE SET ${updates.join(', ')}` : 'DO NOTHING';
  return `INSERT INTO ${quote(table.name)} (${cols.join(', ')}) VALUES (${cols.map(() => '?').join(', ')})
    ON CONFLICT (${keys.join(', ')}) ${conflict}`;
};

/**
 * Row source and sink over a SQLite database whose tables match `schema`.
 * Foreign keys are enforced and deferred to commit.
 */
export class SqliteDataStore implements DataStore {
  constructor(
    private readonly db: Database.Database,
    private readonly schema: SchemaVersion
  ) {
    db.pragma('foreign_keys = ON');
  }

  static open(file: string, schema: SchemaVersion) {
    return new SqliteDataStore(new Database(file), schema);
  }

  async *readTable(table: string): AsyncIterable<Row> {
    const def = requireTable(this.schema, table);
    let rows: unknown[];
    try {
      rows = this.db.prepare(`SELECT * FROM ${quote(def.name)}`).all();
    } catch (err) {
      throw classifyDriverError(err, table, isConstraint, isRetryable);
    }
    for (const raw of rows) {
      if (!isRecord(raw)) continue;
      yield Object.fromEntries(def.fields.map(f => [f.name, decodeValue(raw[f.name], f, def.name)]));
    }
  }

  async beginTransaction(): Promise<SinkTransaction> {
    const db = this.db;
    const run = <T>(table: string, op: () => T): T => {
      try {
        return op();
      } catch (err) {
        throw classifyDriverError(err, table, isConstraint, isRetryable);
      }
    };

    run('(transaction)', () => {
      db.exec('BEGIN');
      db.pragma('defer_foreign_keys = ON');
    });
    let open = true;

    return {
      writeRows: async (table, rows) => {
        const def = requireTable(this.schema, table);
        const stmt = db.prepare(upsertSql(def));
        run(table, () => {
          for (const row of rows) stmt.run(...def.fields.map(f => encodeValue(row[f.name] ?? null, f, true)));
        });
      },
      deleteRows: async (table, keys) => {
        const def = requireTable(this.schema, table);
        const where = def.primaryKey.map(k => `${quote(k)} = ?`).join(' AND ');
        const stmt = db.prepare(`DELETE FROM ${quote(def.name)} WHERE ${where}`);
        run(table, () => {
          for (const key of keys) {
            stmt.run(...def.primaryKey.map(k => {
              const field = def.fields.find(f => f.name === k);
              if (!field) throw new FerryError('SchemaInvalid', `Unknown key field ${k}`, { table });
              return encodeValue(key[k] ?? null, field, true);
            }));
          }
        });
      },
      commit: async () => {
        run('(commit)', () => db.exec('COMMIT'));
        open = false;
      },
      abort: async () => {
        if (open && db.inTransaction) db.exec('ROLLBACK');
        open = false;
      }
    };
  }

  close() {
    this.db.close();
  }
}
