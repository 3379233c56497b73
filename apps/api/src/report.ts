import { errorMessage, isFerryError } from './errors';
import type { ErrorKind, MatchCandidate } from './errors';

export type Severity = 'info' | 'warning' | 'error';

export type Finding = {
  kind: ErrorKind | 'Internal';
  severity: Severity;
  table?: string;
  field?: string;
  rowKey?: string;
  message: string;
  candidates?: MatchCandidate[];
};

export type OperationStatus = 'success' | 'partial' | 'failed';

export type OperationStats = {
  rowsRead: number;
  rowsWritten: number;
  rowsSkipped: number;
  rowsDeleted: number;
};

/** Structured result of every backup and restore call. */
export type OperationReport = {
  status: OperationStatus;
  operation: 'backup' | 'restore';
  /** Archive id for backups, session id for restores. */
  id: string;
  coverage: number;
  findings: Finding[];
  error?: { kind: ErrorKind | 'Internal'; message: string };
  stats: OperationStats;
};

export const emptyStats = (): OperationStats => ({ rowsRead: 0, rowsWritten: 0, rowsSkipped: 0, rowsDeleted: 0 });

export const toFinding = (err: unknown): Finding => {
  if (!isFerryError(err)) return { kind: 'Internal', severity: 'error', message: errorMessage(err) };
  const { table, field, rowKey, candidates } = err.details;
  return {
    kind: err.kind,
    severity: err.kind === 'RowCoercionError' ? 'warning' : 'error',
    ...(table !== undefined && { table }),
    ...(field !== undefined && { field }),
    ...(rowKey !== undefined && { rowKey }),
    ...(candidates !== undefined && { candidates }),
    message: err.message
  };
};

export const errorSummary = (err: unknown): NonNullable<OperationReport['error']> => ({
  kind: isFerryError(err) ? err.kind : 'Internal',
  message: errorMessage(err)
});

export const statusOf = (committed: boolean, findings: Finding[], stats: OperationStats): OperationStatus => {
  if (!committed) return 'failed';
  if (stats.rowsSkipped > 0 || findings.some(f => f.severity === 'error')) return 'partial';
  return 'success';
};
