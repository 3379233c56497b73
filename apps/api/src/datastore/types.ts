import type { Row } from '../types/schema';

/** Row-level read access to a database at one schema version. */
export interface DataSource {
  readTable(table: string): AsyncIterable<Row>;
}

/**
 * Scoped write access. Nothing written through a transaction is visible until
 * `commit` resolves; `abort` discards all of it.
 */
export interface SinkTransaction {
  /** Inserts rows, replacing any existing row with the same primary key. */
  writeRows(table: string, rows: Row[]): Promise<void>;
  /** Deletes rows by primary-key-only rows. */
  deleteRows(table: string, keys: Row[]): Promise<void>;
  commit(): Promise<void>;
  abort(): Promise<void>;
}

export interface DataSink {
  beginTransaction(): Promise<SinkTransaction>;
}

export interface DataStore extends DataSource, DataSink {}

export const collectRows = async (rows: AsyncIterable<Row>): Promise<Row[]> => {
  const out: Row[] = [];
  for await (const row of rows) out.push(row);
  return out;
};
