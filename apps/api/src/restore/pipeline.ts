import type { BackupArchive } from '../backup/archive';
import type { BackupEngine } from '../backup/engine';
import type { RetryConfig, RowPolicy } from '../config';
import type { DataSink, SinkTransaction } from '../datastore/types';
import { cancelled, errorMessage, FerryError, isFerryError } from '../errors';
import { createModuleLogger } from '../logger';
import type { FieldMapper } from '../map/mapper';
import type { Overrides, RuleSet } from '../map/rules';
import type { SchemaRegistry } from '../registry/registry';
import { emptyStats, errorSummary, statusOf, toFinding } from '../report';
import type { Finding, OperationReport, OperationStats } from '../report';
import { findField, findTable, isRequired } from '../types/schema';
import type { SchemaVersion } from '../types/schema';
import { parentsFirst } from '../utils/order';
import { retryTransient, withTimeout } from '../utils/retry';
import { RestoreSession } from './session';
import type { RestoreMode } from './session';
import { transformArchive } from './transform';
import type { StagedTable } from './transform';

const log = createModuleLogger('restore');

export type RestorePipelineOptions = {
  io: RetryConfig;
  policy?: RowPolicy;
  batchSize?: number;
};

export type RestoreOptions = {
  policy?: RowPolicy;
  mode?: RestoreMode;
  overrides?: Overrides;
  signal?: AbortSignal;
  batchSize?: number;
  sessionId?: string;
};

export type RestoreResult = {
  session: RestoreSession;
  report: OperationReport;
};

const gapFinding = (table: string, field: string, message: string, candidates: Finding['candidates']): Finding => ({
  kind: 'CoverageGap',
  severity: 'error',
  table,
  field,
  message,
  ...(candidates?.length ? { candidates } : {})
});

/**
 * Structural check of a resolved rule set against the target schema; no data is
 * read. Returns every finding, gaps on required fields first.
 */
export const validateRuleSet = (ruleSet: RuleSet, target: SchemaVersion): Finding[] => {
  const gaps: Finding[] = [];
  const warnings: Finding[] = [];
  for (const tableRules of ruleSet.tables) {
    const table = findTable(target, tableRules.table);
    if (!table) continue;
    for (const gap of tableRules.unresolved) {
      const message = `${table.name}.${gap.field} has no source and no default`;
      // A table with no source table receives no rows, so its gaps cannot bite.
      if (tableRules.sourceTable === null) {
        warnings.push({ ...gapFinding(table.name, gap.field, `${message}; ${table.name} receives no rows`, undefined), severity: 'info' });
      } else if (gap.required) gaps.push(gapFinding(table.name, gap.field, message, gap.candidates));
      else warnings.push({ ...gapFinding(table.name, gap.field, message, gap.candidates), severity: 'warning' });
    }
    for (const { field, rule } of tableRules.rules) {
      const def = findField(table, field);
      if (rule.kind === 'Drop' && def && isRequired(def)) {
        gaps.push(gapFinding(table.name, field, `${table.name}.${field} is required but its rule drops it`, undefined));
      }
    }
    for (const fk of table.foreignKeys) {
      const parentRules = ruleSet.tables.find(t => t.table === fk.references.table);
      const childRule = tableRules.rules.find(r => r.field === fk.field)?.rule;
      const nullFilled = childRule?.kind === 'DefaultFill' && childRule.value === null;
      if (tableRules.sourceTable && !parentRules?.sourceTable && !nullFilled) {
        warnings.push({
          kind: 'CoverageGap',
          severity: 'warning',
          table: table.name,
          field: fk.field,
          message: `${table.name}.${fk.field} references ${fk.references.table}, which receives no rows`
        });
      }
    }
  }
  return [...gaps, ...warnings];
};

/**
 * Drives one archive into a target sink through the restore states. Nothing is
 * written before Committing; a failure in any state ends the session RolledBack
 * with the error attached to the report.
 */
export class RestorePipeline {
  constructor(
    private readonly registry: SchemaRegistry,
    private readonly mapper: FieldMapper,
    private readonly engine: BackupEngine,
    private readonly options: RestorePipelineOptions
  ) {}

  async restore(
    archive: BackupArchive,
    targetVersion: string,
    sink: DataSink,
    options: RestoreOptions = {}
  ): Promise<RestoreResult> {
    const session = new RestoreSession({
      id: options.sessionId,
      archiveId: archive.id,
      sourceVersion: archive.schemaVersion,
      targetVersion,
      policy: options.policy ?? this.options.policy ?? 'skip',
      mode: options.mode ?? 'full'
    });
    const stats: OperationStats = emptyStats();
    const checkCancelled = () => {
      if (options.signal?.aborted) throw cancelled();
    };
    let coverage = 0;
    log.info({ sessionId: session.id, archiveId: archive.id, from: archive.schemaVersion, to: targetVersion, mode: session.mode }, 'restore started');

    try {
      checkCancelled();
      const source = this.registry.get(archive.schemaVersion);
      const target = this.registry.get(targetVersion);
      const resolved = await this.mapper.resolve(source.version, target.version, options.overrides);
      session.rules = resolved;
      coverage = resolved.ruleSet.coverage;
      const rows = session.mode === 'full' ? (await this.engine.restoreBase(archive)).tables : archive.batches;
      checkCancelled();
      session.transition('RuleChainReady');

      session.transition('Validating');
      checkCancelled();
      const findings = validateRuleSet(resolved.ruleSet, target);
      findings.forEach(f => session.record(f));
      const firstGap = findings.find(f => f.severity === 'error');
      if (firstGap) {
        throw new FerryError('CoverageGap', firstGap.message, {
          table: firstGap.table,
          field: firstGap.field,
          candidates: firstGap.candidates,
          version: targetVersion
        });
      }

      session.transition('Transforming');
      const staged = await transformArchive(rows, session.mode === 'incremental' ? archive.tombstones : [], {
        source,
        target,
        ruleSet: resolved.ruleSet,
        transforms: resolved.transforms,
        policy: session.policy,
        batchSize: options.batchSize ?? this.options.batchSize ?? 500,
        isCancelled: () => options.signal?.aborted ?? false,
        onFinding: f => session.record(f)
      });
      stats.rowsRead = staged.rowsRead;
      stats.rowsSkipped = staged.rowsSkipped;

      session.transition('Committing');
      await this.commit(session, target, staged.tables, sink);
      stats.rowsWritten = staged.tables.reduce((n, t) => n + t.rows.length, 0);
      stats.rowsDeleted = staged.tables.reduce((n, t) => n + t.deletes.length, 0);
      session.transition('Committed');
      log.info({ sessionId: session.id, ...stats }, 'restore committed');
    } catch (err) {
      session.record(toFinding(err));
      session.transition('RolledBack');
      log.warn({ sessionId: session.id, kind: isFerryError(err) ? err.kind : 'Internal', err: errorMessage(err) }, 'restore rolled back');
      return { session, report: this.report(session, coverage, stats, err) };
    }
    return { session, report: this.report(session, coverage, stats) };
  }

  /**
   * One transaction per attempt. Begin and each write are bounded by the I/O timeout;
   * a timed-out write aborts the transaction before the attempt fails. `commit()` is
   * never raced against a timer, so the session only reports an outcome the sink reached.
   */
  private async commit(session: RestoreSession, target: SchemaVersion, staged: StagedTable[], sink: DataSink) {
    const order = parentsFirst(target.tables).map(t => t.name);
    const byTable = new Map(staged.map(t => [t.table, t]));
    const batchSize = this.options.batchSize ?? 500;
    const { timeoutMs } = this.options.io;
    const label = `commit restore ${session.id}`;
    const abort = (tx: SinkTransaction) =>
      tx.abort().catch(abortErr => log.error({ sessionId: session.id, err: errorMessage(abortErr) }, 'transaction abort failed'));

    await retryTransient(
      async () => {
        const tx = await this.begin(sink, timeoutMs, label, abort);
        try {
          for (const name of [...order].reverse()) {
            const deletes = byTable.get(name)?.deletes ?? [];
            if (deletes.length) await withTimeout(() => tx.deleteRows(name, deletes), timeoutMs, `${label}: delete ${name}`);
          }
          for (const name of order) {
            const rows = byTable.get(name)?.rows ?? [];
            for (let i = 0; i < rows.length; i += batchSize) {
              const batch = rows.slice(i, i + batchSize);
              await withTimeout(() => tx.writeRows(name, batch), timeoutMs, `${label}: write ${name}`);
            }
          }
          await tx.commit();
        } catch (err) {
          await abort(tx);
          throw err;
        }
      },
      this.options.io,
      (attempt, err) => log.warn({ sessionId: session.id, attempt, err: errorMessage(err) }, 'retrying restore commit')
    );
  }

  /** Begins a transaction within the timeout; one that opens after the deadline is aborted as soon as it arrives. */
  private async begin(sink: DataSink, timeoutMs: number, label: string, abort: (tx: SinkTransaction) => Promise<void>) {
    const pending = sink.beginTransaction();
    try {
      return await withTimeout(() => pending, timeoutMs, `${label}: begin`);
    } catch (err) {
      void pending.then(abort, lateErr => log.warn({ err: errorMessage(lateErr) }, 'late transaction begin failed'));
      throw err;
    }
  }

  private report(session: RestoreSession, coverage: number, stats: OperationStats, err?: unknown): OperationReport {
    const committed = session.state === 'Committed';
    return {
      status: statusOf(committed, session.findings, stats),
      operation: 'restore',
      id: session.id,
      coverage,
      findings: [...session.findings],
      ...(err !== undefined && { error: errorSummary(err) }),
      stats: committed ? stats : { ...stats, rowsWritten: 0, rowsDeleted: 0 }
    };
  }
}
