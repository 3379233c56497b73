import { randomUUID } from 'crypto';
import type { RetryConfig } from '../config';
import { brokenArchiveChain, constraintViolation, FerryError } from '../errors';
import { createModuleLogger } from '../logger';
import type { SchemaRegistry } from '../registry/registry';
import { emptyStats, errorSummary, toFinding } from '../report';
import type { OperationReport } from '../report';
import type { ArchiveStore } from '../store';
import { collectRows } from '../datastore/types';
import type { DataSource } from '../datastore/types';
import { requireTable } from '../datastore/values';
import type { Row, SchemaVersion, TableDef } from '../types/schema';
import { pickKey, rowHash, rowKey, sortByKey } from '../utils/values';
import { withRetry } from '../utils/retry';
import { computeDigest } from './archive';
import type { BackupArchive, FullRowSet, RecordBatch, Tombstone } from './archive';

const log = createModuleLogger('backup');

export type BackupEngineOptions = {
  io: RetryConfig;
  clock?: () => Date;
  idFactory?: () => string;
};

export type BackupResult = {
  /** Null when the backup failed; nothing was stored. */
  archive: BackupArchive | null;
  report: OperationReport;
};

type TableRows = Map<string, Map<string, Row>>;

const project = (table: TableDef, row: Row): Row =>
  Object.fromEntries(table.fields.map(f => [f.name, row[f.name] ?? null]));

export class BackupEngine {
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(
    private readonly registry: SchemaRegistry,
    private readonly store: ArchiveStore,
    private readonly options: BackupEngineOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Full scan of every table at `version`. With a base archive (object or stored id)
   * only rows that are new or changed since the base are kept, plus tombstones for
   * keys that disappeared. The archive is stored before the call resolves.
   */
  async backup(version: string, source: DataSource, base?: BackupArchive | string): Promise<BackupResult> {
    const id = this.idFactory();
    try {
      const schema = this.registry.get(version);
      const baseArchive = typeof base === 'string' ? await this.loadArchive(base, id) : base ?? null;
      if (baseArchive && baseArchive.schemaVersion !== version) {
        throw new FerryError(
          'BaseVersionMismatch',
          `Base archive ${baseArchive.id} is at ${baseArchive.schemaVersion}, not ${version}; take a full backup`,
          { archiveId: baseArchive.id, version }
        );
      }

      const current = await this.scan(schema, source);
      const rowsRead = current.reduce((n, b) => n + b.rows.length, 0);
      const { batches, tombstones } = baseArchive
        ? this.delta(schema, current, await this.restoreBase(baseArchive))
        : { batches: current, tombstones: [] };

      const content = { schemaVersion: version, baseArchiveId: baseArchive?.id ?? null, batches, tombstones };
      const archive: BackupArchive = {
        id,
        createdAt: this.clock().toISOString(),
        ...content,
        rowCount: batches.reduce((n, b) => n + b.rows.length, 0),
        digest: computeDigest(content)
      };
      await this.store.save(archive);

      const rowsDeleted = tombstones.reduce((n, t) => n + t.keys.length, 0);
      log.info({ archiveId: id, version, base: archive.baseArchiveId, rows: archive.rowCount, tombstones: rowsDeleted }, 'archive created');
      return {
        archive,
        report: {
          status: 'success',
          operation: 'backup',
          id,
          coverage: 1,
          findings: [],
          stats: { ...emptyStats(), rowsRead, rowsWritten: archive.rowCount, rowsDeleted }
        }
      };
    } catch (err) {
      log.warn({ archiveId: id, version, err }, 'backup failed');
      return {
        archive: null,
        report: {
          status: 'failed',
          operation: 'backup',
          id,
          coverage: 0,
          findings: [toFinding(err)],
          error: errorSummary(err),
          stats: emptyStats()
        }
      };
    }
  }

  /**
   * Full logical row set of an archive: the base chain replayed oldest first, each
   * delta's tombstones removed and its rows upserted. Rows come back in key order.
   */
  async restoreBase(archive: BackupArchive): Promise<FullRowSet> {
    const chain = [archive];
    const seen = new Set([archive.id]);
    let current = archive;
    while (current.baseArchiveId !== null) {
      const baseId = current.baseArchiveId;
      if (seen.has(baseId)) throw brokenArchiveChain(archive.id, `Archive chain of ${archive.id} loops at ${baseId}`);
      const base = await this.loadArchive(baseId, archive.id);
      if (base.schemaVersion !== archive.schemaVersion) {
        throw brokenArchiveChain(
          archive.id,
          `Ancestor ${base.id} is at ${base.schemaVersion} but ${archive.id} is at ${archive.schemaVersion}`
        );
      }
      seen.add(baseId);
      chain.push(base);
      current = base;
    }

    const schema = this.registry.get(archive.schemaVersion);
    const tables: TableRows = new Map(schema.tables.map(t => [t.name, new Map<string, Row>()]));
    for (const link of chain.reverse()) {
      for (const tomb of link.tombstones) {
        const def = requireTable(schema, tomb.table);
        for (const key of tomb.keys) tables.get(def.name)?.delete(rowKey(key, def.primaryKey));
      }
      for (const batch of link.batches) {
        const def = requireTable(schema, batch.table);
        for (const row of batch.rows) tables.get(def.name)?.set(rowKey(row, def.primaryKey), row);
      }
    }

    return {
      archiveId: archive.id,
      schemaVersion: archive.schemaVersion,
      tables: schema.tables.map(t => ({ table: t.name, rows: sortByKey([...(tables.get(t.name)?.values() ?? [])], t.primaryKey) }))
    };
  }

  private async loadArchive(id: string, requestedBy: string) {
    const archive = await withRetry(() => this.store.load(id), this.options.io, `load archive ${id}`);
    if (!archive) throw brokenArchiveChain(requestedBy, `Archive ${id} is missing from the store`);
    return archive;
  }

  private async scan(schema: SchemaVersion, source: DataSource): Promise<RecordBatch[]> {
    return Promise.all(
      schema.tables.map(async table => {
        const raw = await withRetry(
          () => collectRows(source.readTable(table.name)),
          this.options.io,
          `read ${table.name}`,
          (attempt, err) => log.warn({ table: table.name, attempt, err }, 'retrying table scan')
        );
        const seen = new Set<string>();
        const rows = raw.map(r => {
          const row = project(table, r);
          const key = rowKey(row, table.primaryKey);
          if (seen.has(key)) throw constraintViolation(table.name, new Error(`duplicate primary key ${key}`));
          seen.add(key);
          return row;
        });
        return { table: table.name, rows: sortByKey(rows, table.primaryKey) };
      })
    );
  }

  private delta(schema: SchemaVersion, current: RecordBatch[], base: FullRowSet) {
    const batches: RecordBatch[] = [];
    const tombstones: Tombstone[] = [];
    for (const batch of current) {
      const def = requireTable(schema, batch.table);
      const previous = new Map(
        (base.tables.find(t => t.table === batch.table)?.rows ?? []).map(r => [rowKey(r, def.primaryKey), r])
      );
      const changed = batch.rows.filter(row => {
        const before = previous.get(rowKey(row, def.primaryKey));
        return !before || rowHash(before) !== rowHash(row);
      });
      const present = new Set(batch.rows.map(r => rowKey(r, def.primaryKey)));
      const deleted = [...previous.entries()].filter(([key]) => !present.has(key)).map(([, row]) => pickKey(row, def.primaryKey));
      if (changed.length) batches.push({ table: batch.table, rows: changed });
      if (deleted.length) tombstones.push({ table: batch.table, keys: sortByKey(deleted, def.primaryKey) });
    }
    return { batches, tombstones };
  }
}
