/**
 * Error taxonomy shared by the registry, mapper, backup engine and restore pipeline.
 * Every failure carries a kind from this closed set plus the identifiers a caller
 * needs to act on it (table, field, row key, candidate source fields).
 */

export const ERROR_KINDS = [
  'SchemaInvalid',
  'UnknownVersion',
  'DuplicateVersion',
  'NoMigrationPath',
  'AmbiguousMatch',
  'UnsupportedCoercionChain',
  'CoverageGap',
  'BaseVersionMismatch',
  'BrokenArchiveChain',
  'RowCoercionError',
  'ConstraintViolation',
  'Transient',
  'Cancelled'
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type MatchCandidate = {
  field: string;
  score: number;
  reason: string;
};

export type ErrorDetails = {
  table?: string;
  field?: string;
  rowKey?: string;
  version?: string;
  archiveId?: string;
  candidates?: MatchCandidate[];
  issues?: string[];
  cause?: unknown;
};

export class FerryError extends Error {
  readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = 'FerryError';
    this.kind = kind;
    this.details = details;
  }
}

export const isFerryError = (err: unknown): err is FerryError => err instanceof FerryError;

export const isTransient = (err: unknown) => isFerryError(err) && err.kind === 'Transient';

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export const schemaInvalid = (message: string, details: ErrorDetails = {}) =>
  new FerryError('SchemaInvalid', message, details);

export const unknownVersion = (version: string) =>
  new FerryError('UnknownVersion', `Schema version ${version} is not registered`, { version });

export const duplicateVersion = (version: string) =>
  new FerryError('DuplicateVersion', `Schema version ${version} is already registered`, { version });

export const noMigrationPath = (from: string, to: string) =>
  new FerryError('NoMigrationPath', `No linear migration path from ${from} to ${to}`, { version: from });

export const constraintViolation = (table: string, cause: unknown) =>
  new FerryError('ConstraintViolation', `Constraint violation while writing ${table}: ${errorMessage(cause)}`, {
    table,
    cause
  });

export const transient = (message: string, cause?: unknown) => new FerryError('Transient', message, { cause });

export const cancelled = () => new FerryError('Cancelled', 'Restore cancelled by caller');

export const brokenArchiveChain = (archiveId: string, message: string) =>
  new FerryError('BrokenArchiveChain', message, { archiveId });
