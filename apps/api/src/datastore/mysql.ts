import mysql from 'mysql2/promise';
import type { Row, SchemaVersion } from '../types/schema';
import { isRecord } from '../utils/values';
import type { DataStore, SinkTransaction } from './types';
import { classifyDriverError, decodeValue, encodeValue, errno, requireTable } from './values';

export interface MySqlQueryable {
  query(sql: string, values?: unknown): Promise<[unknown, unknown]>;
}

export interface MySqlConnectionLike extends MySqlQueryable {
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface MySqlPoolLike extends MySqlQueryable {
  getConnection(): Promise<MySqlConnectionLike>;
}

// Duplicate key, foreign key (parent/child), column cannot be null.
const CONSTRAINT_ERRNOS = new Set([1062, 1216, 1217, 1451, 1452, 1048]);
// Lock wait timeout, deadlock.
const RETRYABLE_ERRNOS = new Set([1205, 1213]);

const isConstraint = (err: unknown) => CONSTRAINT_ERRNOS.has(errno(err) ?? -1);
const isRetryable = (err: unknown) => RETRYABLE_ERRNOS.has(errno(err) ?? -1);

export class MySqlDataStore implements DataStore {
  constructor(
    private readonly pool: MySqlPoolLike,
    private readonly schema: SchemaVersion
  ) {}

  static connect(connectionString: string, schema: SchemaVersion) {
    return new MySqlDataStore(mysql.createPool(connectionString), schema);
  }

  async *readTable(table: string): AsyncIterable<Row> {
    const def = requireTable(this.schema, table);
    let result: unknown;
    try {
      [result] = await this.pool.query('SELECT * FROM ??', [def.name]);
    } catch (err) {
      throw classifyDriverError(err, table, isConstraint, isRetryable);
    }
    for (const raw of Array.isArray(result) ? result : []) {
      if (!isRecord(raw)) continue;
      yield Object.fromEntries(def.fields.map(f => [f.name, decodeValue(raw[f.name], f, def.name)]));
    }
  }

  async beginTransaction(): Promise<SinkTransaction> {
    const conn = await this.pool.getConnection();
    const run = async <T>(table: string, op: () => Promise<T>) => {
      try {
        return await op();
      } catch (err) {
        throw classifyDriverError(err, table, isConstraint, isRetryable);
      }
    };
    let released = false;
    const release = () => {
      if (!released) conn.release();
      released = true;
    };

    try {
      await run('(transaction)', () => conn.beginTransaction());
    } catch (err) {
      release();
      throw err;
    }

    return {
      writeRows: async (table, rows) => {
        if (!rows.length) return;
        const def = requireTable(this.schema, table);
        const cols = def.fields.map(f => f.name);
        const values = rows.map(row => def.fields.map(f => encodeValue(row[f.name] ?? null, f, true)));
        const updates = def.fields
          .filter(f => !def.primaryKey.includes(f.name))
          .map(f => mysql.format('?? = VALUES(??)', [f.name, f.name]));
        const onDuplicate = updates.length ? ` ON DUPLICATE KEY UPDATE ${updates.join(', ')}` : '';
        const sql = mysql.format('INSERT INTO ?? (??) VALUES ?', [def.name, cols, values]) + onDuplicate;
        await run(table, () => conn.query(sql));
      },
      deleteRows: async (table, keys) => {
        const def = requireTable(this.schema, table);
        for (const key of keys) {
          const where = def.primaryKey.map(k => mysql.format('?? = ?', [k, key[k] ?? null])).join(' AND ');
          await run(table, () => conn.query(`DELETE FROM ${mysql.escapeId(def.name)} WHERE ${where}`));
        }
      },
      commit: async () => {
        await run('(commit)', () => conn.commit());
        release();
      },
      abort: async () => {
        if (released) return;
        try {
          await conn.rollback();
        } finally {
          release();
        }
      }
    };
  }
}
