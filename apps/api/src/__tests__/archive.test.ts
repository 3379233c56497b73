import { describe, it, expect, afterEach } from 'vitest';
import { computeDigest } from '../backup/archive';
import type { ArchiveSummary, BackupArchive } from '../backup/archive';
import { decodeArchive, encodeArchive } from '../backup/codec';
import { FerryError } from '../errors';
import { InMemoryArchiveStore, SqliteArchiveStore, planPrune, pruneArchives } from '../store';
import type { ArchiveStore } from '../store';

const makeArchive = (id: string, createdAt: string, baseArchiveId: string | null = null): BackupArchive => {
  const content = {
    schemaVersion: '1.0.0',
    baseArchiveId,
    batches: [
      { table: 'patient', rows: [{ id: 1, name: 'Jane Tan' }, { id: 2, name: 'Ali Rahman' }] },
      { table: 'visit', rows: [{ id: 10, patient_id: 1 }] }
    ],
    tombstones: baseArchiveId ? [{ table: 'visit', keys: [{ id: 11 }] }] : []
  };
  return { id, createdAt, ...content, rowCount: 3, digest: computeDigest(content) };
};

const summary = (id: string, createdAt: string, baseArchiveId: string | null = null): ArchiveSummary => ({
  id,
  schemaVersion: '1.0.0',
  createdAt,
  baseArchiveId,
  rowCount: 0
});

describe('archive codec', () => {
  it('decodes what it encodes', () => {
    const archive = makeArchive('a1', '2024-04-01T00:00:00.000Z');
    expect(decodeArchive(encodeArchive(archive))).toEqual(archive);
  });

  it('does not depend on batch or row order for the digest', () => {
    const archive = makeArchive('a1', '2024-04-01T00:00:00.000Z');
    const reordered = {
      ...archive,
      batches: [...archive.batches].reverse().map(b => ({ ...b, rows: [...b.rows].reverse() }))
    };
    expect(computeDigest(reordered)).toBe(archive.digest);
  });

  it('detects altered bytes', () => {
    const archive = makeArchive('a1', '2024-04-01T00:00:00.000Z');
    const tampered = Buffer.from(encodeArchive(archive).toString('utf8').replace('Jane Tan', 'Jane Doe'), 'utf8');
    try {
      decodeArchive(tampered);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FerryError);
      if (!(err instanceof FerryError)) return;
      expect(err.kind).toBe('BrokenArchiveChain');
      expect(err.details.archiveId).toBe('a1');
    }
  });

  it('rejects bytes that are not an archive', () => {
    expect(() => decodeArchive(Buffer.from('not json'))).toThrow('Archive bytes are not valid JSON');
    expect(() => decodeArchive(Buffer.from('{"id":"x"}'))).toThrow('Archive does not match the archive layout');
  });
});

const stores: Array<[string, () => ArchiveStore]> = [
  ['InMemoryArchiveStore', () => new InMemoryArchiveStore()],
  ['SqliteArchiveStore', () => new SqliteArchiveStore(':memory:')]
];

describe.each(stores)('%s', (_name, create) => {
  let store: ArchiveStore;

  afterEach(() => {
    if (store instanceof SqliteArchiveStore) store.close();
  });

  it('saves, loads and lists archives oldest first', async () => {
    store = create();
    await store.save(makeArchive('b', '2024-04-02T00:00:00.000Z', 'a'));
    await store.save(makeArchive('a', '2024-04-01T00:00:00.000Z'));

    expect(await store.load('b')).toEqual(makeArchive('b', '2024-04-02T00:00:00.000Z', 'a'));
    expect(await store.load('missing')).toBeNull();
    expect(await store.list()).toEqual([
      { id: 'a', schemaVersion: '1.0.0', createdAt: '2024-04-01T00:00:00.000Z', baseArchiveId: null, rowCount: 3 },
      { id: 'b', schemaVersion: '1.0.0', createdAt: '2024-04-02T00:00:00.000Z', baseArchiveId: 'a', rowCount: 3 }
    ]);
  });

  it('refuses to overwrite an archive id', async () => {
    store = create();
    await store.save(makeArchive('a', '2024-04-01T00:00:00.000Z'));
    await expect(store.save(makeArchive('a', '2024-04-03T00:00:00.000Z'))).rejects.toMatchObject({
      kind: 'ConstraintViolation'
    });
  });

  it('prunes old archives but keeps the chain of what it keeps', async () => {
    store = create();
    await store.save(makeArchive('full-1', '2024-04-01T00:00:00.000Z'));
    await store.save(makeArchive('full-2', '2024-04-02T00:00:00.000Z'));
    await store.save(makeArchive('delta-1', '2024-04-03T00:00:00.000Z', 'full-2'));

    expect(await pruneArchives(store, 1)).toEqual(['full-1']);
    expect((await store.list()).map(a => a.id)).toEqual(['full-2', 'delta-1']);
  });
});

describe('planPrune', () => {
  it('keeps the newest archives and their ancestors', () => {
    const archives = [
      summary('f1', '2024-01-01'),
      summary('d1', '2024-01-02', 'f1'),
      summary('f2', '2024-01-03'),
      summary('d2', '2024-01-04', 'f2'),
      summary('d3', '2024-01-05', 'd2')
    ];
    expect(planPrune(archives, 1)).toEqual(['f1', 'd1']);
    expect(planPrune(archives, 4)).toEqual([]);
    expect(planPrune(archives, 0)).toEqual(['f1', 'd1', 'f2', 'd2', 'd3']);
  });
});
