import { describe, it, expect } from 'vitest';
import { createFerry, loadConfig, MemoryDataStore } from '../lib';
import { loadSampleRegistry, sampleData } from '../samples';

describe('createFerry', () => {
  it('backs up at one version and restores at another', async () => {
    const config = loadConfig({ IO_RETRIES: '0', RESTORE_BATCH_SIZE: '2' });
    const ferry = createFerry({ config, registry: await loadSampleRegistry(), archives: 'memory' });
    const source = new MemoryDataStore(ferry.registry.get('1.0.0'), sampleData);

    const { archive } = await ferry.backups.backup('1.0.0', source);
    if (!archive) throw new Error('backup failed');
    expect(await ferry.archives.list()).toHaveLength(1);

    const target = new MemoryDataStore(ferry.registry.get('2.0.0'));
    const { session, report } = await ferry.restores.restore(archive, '2.0.0', target);

    expect(session.state).toBe('Committed');
    expect(session.policy).toBe('skip');
    expect(report.stats.rowsWritten).toBe(7);
    expect(target.snapshot().patient.map(p => p.full_name)).toEqual(['Jane Tan', 'Ali Rahman', 'Maya Lee']);
  });
});
