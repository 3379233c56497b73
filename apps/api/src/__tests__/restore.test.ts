import { describe, it, expect } from 'vitest';
import type { BackupArchive } from '../backup/archive';
import { BackupEngine } from '../backup/engine';
import { MemoryDataStore } from '../datastore/memory';
import type { DataSink } from '../datastore/types';
import { transient } from '../errors';
import { FieldMapper } from '../map/mapper';
import { SchemaRegistry } from '../registry/registry';
import { RestorePipeline, validateRuleSet } from '../restore/pipeline';
import { loadSampleRegistry, sampleData } from '../samples';
import { InMemoryArchiveStore } from '../store';
import type { Row } from '../types/schema';
import { sleep } from '../utils/retry';
import { field, fk, io, table } from './fixtures';

const harness = (registry: SchemaRegistry) => {
  const archives = new InMemoryArchiveStore();
  let next = 0;
  const engine = new BackupEngine(registry, archives, { io, idFactory: () => `archive-${++next}` });
  const mapper = new FieldMapper(registry);
  const pipeline = new RestorePipeline(registry, mapper, engine, { io, batchSize: 2 });
  const backup = async (version: string, source: MemoryDataStore, base?: string): Promise<BackupArchive> => {
    const { archive, report } = await engine.backup(version, source, base);
    if (!archive) throw new Error(`backup failed: ${report.error?.message}`);
    return archive;
  };
  return { archives, engine, mapper, pipeline, backup };
};

const clinic = async () => {
  const registry = await loadSampleRegistry();
  const source = new MemoryDataStore(registry.get('1.0.0'), sampleData);
  return { registry, source, ...harness(registry) };
};

const flakySink = (store: MemoryDataStore, failures: number) => {
  let remaining = failures;
  let attempts = 0;
  const sink: DataSink = {
    beginTransaction: async () => {
      attempts++;
      const tx = await store.beginTransaction();
      return {
        ...tx,
        commit: async () => {
          if (remaining-- > 0) throw transient('connection lost during commit');
          await tx.commit();
        }
      };
    }
  };
  return { sink, attempts: () => attempts };
};

const slowSink = (store: MemoryDataStore, delays: { commitMs?: number; writeTable?: string; writeMs?: number }) => {
  let aborted = 0;
  const sink: DataSink = {
    beginTransaction: async () => {
      const tx = await store.beginTransaction();
      return {
        ...tx,
        writeRows: async (table, rows) => {
          if (table === delays.writeTable) await sleep(delays.writeMs ?? 0);
          await tx.writeRows(table, rows);
        },
        commit: async () => {
          await sleep(delays.commitMs ?? 0);
          await tx.commit();
        },
        abort: async () => {
          aborted++;
          await tx.abort();
        }
      };
    }
  };
  return { sink, aborted: () => aborted };
};

const COMMITTED_PATH = ['Resolving', 'RuleChainReady', 'Validating', 'Transforming', 'Committing', 'Committed'];

describe('RestorePipeline.restore', () => {
  it('restores an archive at its own version unchanged', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const target = new MemoryDataStore(registry.get('1.0.0'));
    const { session, report } = await pipeline.restore(archive, '1.0.0', target, { sessionId: 'session-1' });

    expect(target.snapshot()).toEqual(source.snapshot());
    expect(session.path).toEqual(COMMITTED_PATH);
    expect(report).toEqual({
      status: 'success',
      operation: 'restore',
      id: 'session-1',
      coverage: 1,
      findings: [],
      stats: { rowsRead: 7, rowsWritten: 7, rowsSkipped: 0, rowsDeleted: 0 }
    });
  });

  it('gives the same result when run twice', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const once = new MemoryDataStore(registry.get('1.1.0'));
    const twice = new MemoryDataStore(registry.get('1.1.0'));
    await pipeline.restore(archive, '1.1.0', once);
    await pipeline.restore(archive, '1.1.0', twice);
    await pipeline.restore(archive, '1.1.0', twice);
    expect(twice.snapshot()).toEqual(once.snapshot());
  });

  it('upgrades rows to a newer version', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const target = new MemoryDataStore(registry.get('1.1.0'));
    const { report } = await pipeline.restore(archive, '1.1.0', target);
    const rows = target.snapshot();

    expect(report.status).toBe('success');
    expect(rows.patient).toEqual([
      { id: 1, name: 'Jane Tan', date_of_birth: '1984-05-12', email: 'jane@example.org', status: 'active' },
      { id: 2, name: 'Ali Rahman', date_of_birth: '1990-11-03', email: null, status: 'active' },
      { id: 3, name: 'Maya Lee', date_of_birth: null, email: 'maya@example.org', status: 'active' }
    ]);
    expect(rows.visit.map(v => v.fee)).toEqual([40, 25, null, 60]);
  });

  it('restores across two versions and reports tables that receive no rows', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const target = new MemoryDataStore(registry.get('2.0.0'));
    const { report } = await pipeline.restore(archive, '2.0.0', target);
    const rows = target.snapshot();

    expect(report.status).toBe('success');
    expect(report.coverage).toBe(0.85);
    expect(report.findings.map(f => [f.severity, f.table, f.field])).toEqual([
      ['info', 'clinic', 'id'],
      ['info', 'clinic', 'name']
    ]);
    expect(rows.clinic).toEqual([]);
    expect(rows.patient[0]).toEqual({
      id: 1,
      full_name: 'Jane Tan',
      date_of_birth: '1984-05-12',
      email: 'jane@example.org',
      status: 'active',
      phone: null
    });
    expect(rows.visit[0]).toEqual({ id: 10, patient_id: 1, clinic_id: null, visited_on: '2024-02-15', fee: 40 });
  });

  describe('with a required field that has no source', () => {
    const tenantRegistry = () => {
      const registry = new SchemaRegistry();
      registry.register('1.0.0', { tables: [table('patient', [field('id', 'INT'), field('name', 'STRING')])] });
      registry.register('2.0.0', {
        tables: [table('patient', [field('id', 'INT'), field('name', 'STRING'), field('tenant_id', 'INT')])]
      });
      return registry;
    };
    const seed: Record<string, Row[]> = { patient: [{ id: 1, name: 'Jane Tan' }] };

    it('rolls back before writing anything', async () => {
      const registry = tenantRegistry();
      const { pipeline, backup } = harness(registry);
      const archive = await backup('1.0.0', new MemoryDataStore(registry.get('1.0.0'), seed));
      const target = new MemoryDataStore(registry.get('2.0.0'));
      const { session, report } = await pipeline.restore(archive, '2.0.0', target);

      expect(session.path).toEqual(['Resolving', 'RuleChainReady', 'Validating', 'RolledBack']);
      expect(report.status).toBe('failed');
      expect(report.error).toEqual({ kind: 'CoverageGap', message: 'patient.tenant_id has no source and no default' });
      expect(report.stats.rowsWritten).toBe(0);
      expect(target.snapshot()).toEqual({ patient: [] });
    });

    it('restores once an override supplies the value', async () => {
      const registry = tenantRegistry();
      const { pipeline, backup } = harness(registry);
      const archive = await backup('1.0.0', new MemoryDataStore(registry.get('1.0.0'), seed));
      const target = new MemoryDataStore(registry.get('2.0.0'));
      const { report } = await pipeline.restore(archive, '2.0.0', target, {
        overrides: { fields: [{ table: 'patient', field: 'tenant_id', id: 'tenant', transform: () => 7 }] }
      });

      expect(report.status).toBe('success');
      expect(target.snapshot()).toEqual({ patient: [{ id: 1, name: 'Jane Tan', tenant_id: 7 }] });
    });
  });

  describe('row policy', () => {
    const unreadableNotes = {
      fields: [
        {
          table: 'visit',
          field: 'notes',
          id: 'notes',
          transform: (row: Row) => {
            if (row.id === 12) throw new Error('unreadable notes');
            return row.notes ?? null;
          }
        }
      ]
    };

    it('skips rows that fail to convert and reports them', async () => {
      const { registry, source, pipeline, backup } = await clinic();
      const archive = await backup('1.0.0', source);
      const target = new MemoryDataStore(registry.get('1.1.0'));
      const { report } = await pipeline.restore(archive, '1.1.0', target, { overrides: unreadableNotes, policy: 'skip' });

      expect(report.status).toBe('partial');
      expect(report.stats).toEqual({ rowsRead: 7, rowsWritten: 6, rowsSkipped: 1, rowsDeleted: 0 });
      expect(report.findings).toEqual([
        {
          kind: 'RowCoercionError',
          severity: 'warning',
          table: 'visit',
          field: 'notes',
          rowKey: '[12]',
          message: 'visit.notes: unreadable notes'
        }
      ]);
      expect(target.snapshot().visit.map(v => v.id)).toEqual([10, 11, 13]);
    });

    it('aborts the whole restore under the strict policy', async () => {
      const { registry, source, pipeline, backup } = await clinic();
      const archive = await backup('1.0.0', source);
      const target = new MemoryDataStore(registry.get('1.1.0'));
      const { session, report } = await pipeline.restore(archive, '1.1.0', target, {
        overrides: unreadableNotes,
        policy: 'strict'
      });

      expect(session.state).toBe('RolledBack');
      expect(report.error?.kind).toBe('RowCoercionError');
      expect(target.snapshot()).toEqual({ patient: [], visit: [] });
    });
  });

  it('rolls back every table when the sink rejects the commit', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const orphan = { id: 99, patient_id: 99, visited_on: '2024-01-01', notes: null, fee: null };
    const target = new MemoryDataStore(registry.get('1.0.0'), { visit: [orphan] });
    const { session, report } = await pipeline.restore(archive, '1.0.0', target);

    expect(session.path.slice(-2)).toEqual(['Committing', 'RolledBack']);
    expect(report.error?.kind).toBe('ConstraintViolation');
    expect(report.findings[0]).toMatchObject({ kind: 'ConstraintViolation', table: 'visit' });
    expect(report.stats.rowsWritten).toBe(0);
    expect(target.snapshot()).toEqual({ patient: [], visit: [orphan] });
  });

  it('retries a commit that fails transiently', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const target = new MemoryDataStore(registry.get('1.0.0'));
    const { sink, attempts } = flakySink(target, 1);
    const { report } = await pipeline.restore(archive, '1.0.0', sink);

    expect(report.status).toBe('success');
    expect(attempts()).toBe(2);
    expect(target.snapshot()).toEqual(source.snapshot());
  });

  it('waits for a commit that outlasts the I/O timeout', async () => {
    const { registry, source, mapper, engine, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const pipeline = new RestorePipeline(registry, mapper, engine, { io: { timeoutMs: 30, retries: 0, backoffMs: 1 } });
    const target = new MemoryDataStore(registry.get('1.0.0'));
    const { sink, aborted } = slowSink(target, { commitMs: 80 });
    const { session, report } = await pipeline.restore(archive, '1.0.0', sink);

    expect(session.state).toBe('Committed');
    expect(report.status).toBe('success');
    expect(aborted()).toBe(0);
    expect(target.snapshot()).toEqual(source.snapshot());
  });

  it('aborts the transaction when a write times out', async () => {
    const { registry, source, mapper, engine, backup } = await clinic();
    const archive = await backup('1.0.0', source);
    const pipeline = new RestorePipeline(registry, mapper, engine, { io: { timeoutMs: 30, retries: 0, backoffMs: 1 } });
    const target = new MemoryDataStore(registry.get('1.0.0'));
    const { sink, aborted } = slowSink(target, { writeTable: 'visit', writeMs: 80 });
    const { session, report } = await pipeline.restore(archive, '1.0.0', sink, { sessionId: 'session-slow' });

    expect(session.state).toBe('RolledBack');
    expect(report.error).toEqual({ kind: 'Transient', message: 'commit restore session-slow: write visit timed out after 30ms' });
    expect(aborted()).toBe(1);

    await sleep(100);
    expect(target.snapshot()).toEqual({ patient: [], visit: [] });
  });

  describe('cancellation', () => {
    it('stops before resolving when already cancelled', async () => {
      const { registry, source, pipeline, backup } = await clinic();
      const archive = await backup('1.0.0', source);
      const controller = new AbortController();
      controller.abort();
      const { session, report } = await pipeline.restore(archive, '1.0.0', new MemoryDataStore(registry.get('1.0.0')), {
        signal: controller.signal
      });

      expect(session.path).toEqual(['Resolving', 'RolledBack']);
      expect(report.error?.kind).toBe('Cancelled');
    });

    it('stops between batches while transforming', async () => {
      const { registry, source, pipeline, backup } = await clinic();
      const archive = await backup('1.0.0', source);
      const controller = new AbortController();
      const target = new MemoryDataStore(registry.get('1.1.0'));
      const { session, report } = await pipeline.restore(archive, '1.1.0', target, {
        signal: controller.signal,
        batchSize: 1,
        overrides: {
          fields: [
            {
              table: 'visit',
              field: 'notes',
              id: 'cancel',
              transform: row => {
                controller.abort();
                return row.notes ?? null;
              }
            }
          ]
        }
      });

      expect(session.path).toEqual(['Resolving', 'RuleChainReady', 'Validating', 'Transforming', 'RolledBack']);
      expect(report.error?.kind).toBe('Cancelled');
      expect(report.stats.rowsRead).toBe(0);
      expect(target.snapshot()).toEqual({ patient: [], visit: [] });
    });
  });

  it('applies a delta incrementally, deletes included', async () => {
    const { registry, source, pipeline, backup } = await clinic();
    const full = await backup('1.0.0', source);
    const target = new MemoryDataStore(registry.get('1.1.0'));
    await pipeline.restore(full, '1.1.0', target);

    const tx = await source.beginTransaction();
    await tx.writeRows('patient', [{ id: 4, name: 'Tom Yeo', dob: null, email: null }]);
    await tx.deleteRows('visit', [{ id: 13 }]);
    await tx.commit();
    const delta = await backup('1.0.0', source, full.id);
    const { report } = await pipeline.restore(delta, '1.1.0', target, { mode: 'incremental' });

    const expected = new MemoryDataStore(registry.get('1.1.0'));
    await pipeline.restore(await backup('1.0.0', source), '1.1.0', expected);

    expect(report.stats).toEqual({ rowsRead: 1, rowsWritten: 1, rowsSkipped: 0, rowsDeleted: 1 });
    expect(target.snapshot()).toEqual(expected.snapshot());
  });
});

describe('validateRuleSet', () => {
  it('flags a required field whose rule drops it', async () => {
    const { mapper, registry } = await clinic();
    const { ruleSet } = await mapper.resolve('1.0.0', '1.1.0', {
      fields: [{ table: 'patient', field: 'name', drop: true }]
    });
    expect(validateRuleSet(ruleSet, registry.get('1.1.0'))).toEqual([
      {
        kind: 'CoverageGap',
        severity: 'error',
        table: 'patient',
        field: 'name',
        message: 'patient.name is required but its rule drops it'
      }
    ]);
  });

  it('warns when a child table references a parent that receives no rows', async () => {
    const registry = new SchemaRegistry();
    registry.register('1.0.0', { tables: [table('visit', [field('id', 'INT'), field('owner_id', 'INT')])] });
    registry.register('2.0.0', {
      tables: [
        table('owner', [field('id', 'INT')]),
        table('visit', [field('id', 'INT'), field('owner_id', 'INT')], ['id'], [fk('owner_id', 'owner.id')])
      ]
    });
    const ruleSet = await new FieldMapper(registry).ruleSet('1.0.0', '2.0.0');
    expect(validateRuleSet(ruleSet, registry.get('2.0.0'))).toEqual([
      {
        kind: 'CoverageGap',
        severity: 'info',
        table: 'owner',
        field: 'id',
        message: 'owner.id has no source and no default; owner receives no rows'
      },
      {
        kind: 'CoverageGap',
        severity: 'warning',
        table: 'visit',
        field: 'owner_id',
        message: 'visit.owner_id references owner, which receives no rows'
      }
    ]);
  });
});
