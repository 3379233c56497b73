import { getConfig } from './config';
import type { AppConfig } from './config';
import { BackupEngine } from './backup/engine';
import { FieldMapper } from './map/mapper';
import { SchemaRegistry } from './registry/registry';
import { RestorePipeline } from './restore/pipeline';
import { InMemoryArchiveStore, SqliteArchiveStore } from './store';
import type { ArchiveStore } from './store';

export type Ferry = {
  registry: SchemaRegistry;
  mapper: FieldMapper;
  archives: ArchiveStore;
  backups: BackupEngine;
  restores: RestorePipeline;
};

/**
 * Wires registry, mapper, archive store, backup engine and restore pipeline with
 * one configuration. Archives default to SQLite under `dataDir`.
 */
export const createFerry = (
  options: { config?: AppConfig; registry?: SchemaRegistry; archives?: ArchiveStore | 'memory' } = {}
): Ferry => {
  const config = options.config ?? getConfig();
  const registry = options.registry ?? new SchemaRegistry();
  const mapper = new FieldMapper(registry, { threshold: config.fuzzyThreshold });
  const archives =
    options.archives === 'memory'
      ? new InMemoryArchiveStore()
      : options.archives ?? SqliteArchiveStore.inDataDir(config.dataDir);
  const backups = new BackupEngine(registry, archives, { io: config.io });
  const restores = new RestorePipeline(registry, mapper, backups, {
    io: config.io,
    policy: config.rowPolicy,
    batchSize: config.batchSize
  });
  return { registry, mapper, archives, backups, restores };
};

export { loadConfig, getConfig } from './config';
export type { AppConfig, RetryConfig, RowPolicy } from './config';
export * from './errors';
export * from './report';
export * from './types/schema';
export { SchemaRegistry } from './registry/registry';
export type { RegisterOptions } from './registry/registry';
export { computeDiff } from './registry/diff';
export { FieldMapper } from './map/mapper';
export type { ResolvedRules } from './map/mapper';
export { inferRuleSet } from './map/infer';
export { composeRuleSets, composeRules } from './map/compose';
export type * from './map/rules';
export { BackupEngine } from './backup/engine';
export type { BackupResult } from './backup/engine';
export type * from './backup/archive';
export { encodeArchive, decodeArchive } from './backup/codec';
export { InMemoryArchiveStore, SqliteArchiveStore, pruneArchives, planPrune } from './store';
export type { ArchiveStore } from './store';
export { RestorePipeline, validateRuleSet } from './restore/pipeline';
export type { RestoreOptions, RestoreResult } from './restore/pipeline';
export { RestoreSession } from './restore/session';
export type { RestoreState, RestoreMode } from './restore/session';
export type { DataSource, DataSink, DataStore, SinkTransaction } from './datastore/types';
export { MemoryDataStore } from './datastore/memory';
export { SqliteDataStore } from './datastore/sqlite';
export { PostgresDataStore } from './datastore/postgres';
export { MySqlDataStore } from './datastore/mysql';
export { parseSchemaDocument, registerDocument, loadSchemaDirectory } from './ingest/document';
export { ingestDDL } from './ingest/ddl';
export { createApp } from './app';
