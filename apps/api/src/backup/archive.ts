import type { Row } from '../types/schema';
import { canonicalJson, rowHash, sha256 } from '../utils/values';

export type RecordBatch = {
  table: string;
  rows: Row[];
};

export type Tombstone = {
  table: string;
  /** Primary-key-only rows of deleted records. */
  keys: Row[];
};

export type BackupArchive = {
  id: string;
  schemaVersion: string;
  createdAt: string;
  /** Null for a full backup. */
  baseArchiveId: string | null;
  batches: RecordBatch[];
  tombstones: Tombstone[];
  rowCount: number;
  digest: string;
};

export type ArchiveSummary = {
  id: string;
  schemaVersion: string;
  createdAt: string;
  baseArchiveId: string | null;
  rowCount: number;
};

/** Full logical row set of one archive, base chain replayed. */
export type FullRowSet = {
  archiveId: string;
  schemaVersion: string;
  tables: RecordBatch[];
};

export const isDelta = (archive: BackupArchive) => archive.baseArchiveId !== null;

export const summarize = (archive: BackupArchive): ArchiveSummary => ({
  id: archive.id,
  schemaVersion: archive.schemaVersion,
  createdAt: archive.createdAt,
  baseArchiveId: archive.baseArchiveId,
  rowCount: archive.rowCount
});

/**
 * Digest over the archive's logical content. Batch and row order do not affect it;
 * each row contributes its table and content hash, each tombstone its table and key.
 */
export const computeDigest = (archive: Pick<BackupArchive, 'schemaVersion' | 'baseArchiveId' | 'batches' | 'tombstones'>) => {
  const lines: string[] = [];
  for (const batch of archive.batches) {
    for (const row of batch.rows) lines.push(`row|${batch.table}|${rowHash(row)}`);
  }
  for (const tomb of archive.tombstones) {
    for (const key of tomb.keys) lines.push(`del|${tomb.table}|${canonicalJson(key)}`);
  }
  lines.sort();
  return sha256([archive.schemaVersion, archive.baseArchiveId ?? '', ...lines].join('\n'));
};
