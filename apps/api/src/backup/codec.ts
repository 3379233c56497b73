import { z } from 'zod';
import { FerryError } from '../errors';
import type { JsonValue } from '../types/schema';
import { canonicalJson } from '../utils/values';
import { computeDigest } from './archive';
import type { BackupArchive } from './archive';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

const row = z.record(jsonValue);

const archiveSchema = z.object({
  id: z.string().min(1),
  schemaVersion: z.string().min(1),
  createdAt: z.string(),
  baseArchiveId: z.string().nullable(),
  batches: z.array(z.object({ table: z.string(), rows: z.array(row) })),
  tombstones: z.array(z.object({ table: z.string(), keys: z.array(row) })),
  rowCount: z.number().int().min(0),
  digest: z.string()
});

/** Canonical byte encoding; compression and storage happen outside. */
export const encodeArchive = (archive: BackupArchive): Buffer => Buffer.from(canonicalJson(archive), 'utf8');

/** Parses and verifies an encoded archive; a digest mismatch means the bytes were altered. */
export const decodeArchive = (bytes: Buffer | Uint8Array): BackupArchive => {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch (err) {
    throw new FerryError('BrokenArchiveChain', 'Archive bytes are not valid JSON', { cause: err });
  }
  const parsed = archiveSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FerryError('BrokenArchiveChain', 'Archive does not match the archive layout', {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    });
  }
  const archive = parsed.data;
  if (computeDigest(archive) !== archive.digest) {
    throw new FerryError('BrokenArchiveChain', `Archive ${archive.id} failed digest verification`, {
      archiveId: archive.id
    });
  }
  return archive;
};
