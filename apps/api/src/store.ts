import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { summarize } from './backup/archive';
import type { ArchiveSummary, BackupArchive } from './backup/archive';
import { decodeArchive, encodeArchive } from './backup/codec';
import { FerryError } from './errors';

export interface ArchiveStore {
  /** Persists an archive as one unit; readers never observe a partial archive. */
  save(archive: BackupArchive): Promise<void>;
  load(id: string): Promise<BackupArchive | null>;
  list(): Promise<ArchiveSummary[]>;
  remove(ids: string[]): Promise<void>;
}

const duplicateArchive = (id: string) =>
  new FerryError('ConstraintViolation', `Archive ${id} already exists`, { archiveId: id });

const byCreation = (a: ArchiveSummary, b: ArchiveSummary) =>
  a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : a.id < b.id ? -1 : 1;

/**
 * Archives to delete under a keep-newest-N policy. Ancestors of a kept archive are
 * kept as well, since deltas cannot be replayed without their base chain.
 */
export const planPrune = (archives: ArchiveSummary[], keep: number): string[] => {
  const byId = new Map(archives.map(a => [a.id, a]));
  const retained = new Set<string>();
  for (const archive of [...archives].sort(byCreation).reverse().slice(0, Math.max(keep, 0))) {
    let current: ArchiveSummary | undefined = archive;
    while (current && !retained.has(current.id)) {
      retained.add(current.id);
      current = current.baseArchiveId ? byId.get(current.baseArchiveId) : undefined;
    }
  }
  return archives.filter(a => !retained.has(a.id)).map(a => a.id);
};

export const pruneArchives = async (store: ArchiveStore, keep: number) => {
  const doomed = planPrune(await store.list(), keep);
  if (doomed.length) await store.remove(doomed);
  return doomed;
};

export class InMemoryArchiveStore implements ArchiveStore {
  private readonly archives = new Map<string, Buffer>();

  async save(archive: BackupArchive) {
    if (this.archives.has(archive.id)) throw duplicateArchive(archive.id);
    this.archives.set(archive.id, encodeArchive(archive));
  }

  async load(id: string) {
    const bytes = this.archives.get(id);
    return bytes ? decodeArchive(bytes) : null;
  }

  async list() {
    return [...this.archives.values()].map(b => summarize(decodeArchive(b))).sort(byCreation);
  }

  async remove(ids: string[]) {
    for (const id of ids) this.archives.delete(id);
  }
}

type ArchiveRow = {
  id: string;
  schema_version: string;
  base_archive_id: string | null;
  created_at: string;
  row_count: number;
};

export class SqliteArchiveStore implements ArchiveStore {
  private db: Database.Database | null = null;

  constructor(private readonly file: string) {}

  static inDataDir(dataDir: string) {
    return new SqliteArchiveStore(path.join(dataDir, 'archives.db'));
  }

  private getDb() {
    if (!this.db) {
      if (this.file !== ':memory:') fs.mkdirSync(path.dirname(this.file), { recursive: true });
      this.db = new Database(this.file);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS archives (
          id TEXT PRIMARY KEY,
          schema_version TEXT NOT NULL,
          base_archive_id TEXT,
          created_at TEXT NOT NULL,
          row_count INTEGER NOT NULL,
          digest TEXT NOT NULL,
          payload BLOB NOT NULL
        )
      `);
    }
    return this.db;
  }

  async save(archive: BackupArchive) {
    const database = this.getDb();
    const insert = database.transaction((a: BackupArchive) => {
      const exists = database.prepare('SELECT 1 FROM archives WHERE id = ?').get(a.id);
      if (exists) throw duplicateArchive(a.id);
      database
        .prepare(
          `
          INSERT INTO archives (id, schema_version, base_archive_id, created_at, row_count, digest, payload)
          VALUES (?, ?, ?, ?, ?, ?, ?)
          `
        )
        .run(a.id, a.schemaVersion, a.baseArchiveId, a.createdAt, a.rowCount, a.digest, encodeArchive(a));
    });
    insert(archive);
  }

  async load(id: string) {
    const row = this.getDb().prepare('SELECT payload FROM archives WHERE id = ?').get(id) as
      | { payload: Buffer }
      | undefined;
    return row ? decodeArchive(row.payload) : null;
  }

  async list() {
    const rows = this.getDb()
      .prepare('SELECT id, schema_version, base_archive_id, created_at, row_count FROM archives ORDER BY created_at, id')
      .all() as ArchiveRow[];
    return rows.map(r => ({
      id: r.id,
      schemaVersion: r.schema_version,
      baseArchiveId: r.base_archive_id,
      createdAt: r.created_at,
      rowCount: r.row_count
    }));
  }

  async remove(ids: string[]) {
    const database = this.getDb();
    const del = database.prepare('DELETE FROM archives WHERE id = ?');
    database.transaction((list: string[]) => list.forEach(id => del.run(id)))(ids);
  }

  close() {
    this.db?.close();
    this.db = null;
  }
}
