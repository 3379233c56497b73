import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../config';
import { FerryError, transient } from '../errors';
import { withRetry, withTimeout } from '../utils/retry';
import { io } from './fixtures';

describe('withRetry', () => {
  it('retries transient failures with backoff', async () => {
    const op = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient('reset'))
      .mockRejectedValueOnce(transient('reset'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    expect(await withRetry(op, io, 'read', onRetry)).toBe('ok');
    expect(op).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it('gives up after the configured retries', async () => {
    const op = vi.fn<() => Promise<string>>().mockRejectedValue(transient('reset'));
    await expect(withRetry(op, io, 'read')).rejects.toMatchObject({ kind: 'Transient' });
    expect(op).toHaveBeenCalledTimes(io.retries + 1);
  });

  it('rethrows other failures at once', async () => {
    const op = vi.fn<() => Promise<string>>().mockRejectedValue(new FerryError('ConstraintViolation', 'duplicate'));
    await expect(withRetry(op, io, 'write')).rejects.toMatchObject({ kind: 'ConstraintViolation' });
    expect(op).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('turns a slow operation into a transient failure', async () => {
    await expect(withTimeout(() => new Promise<never>(() => undefined), 10, 'slow read')).rejects.toMatchObject({
      kind: 'Transient',
      message: 'slow read timed out after 10ms'
    });
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/ferry' });
    expect(config).toEqual({
      port: 8080,
      dataDir: '/tmp/ferry',
      schemaDir: undefined,
      logLevel: 'info',
      rowPolicy: 'skip',
      batchSize: 500,
      io: { timeoutMs: 30_000, retries: 3, backoffMs: 100 },
      fuzzyThreshold: 0.8,
      gemini: { apiKey: undefined, model: 'gemini-2.5-flash' }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9090',
      ROW_COERCION_POLICY: 'strict',
      IO_RETRIES: '0',
      FUZZY_NAME_THRESHOLD: '0.9',
      GEMINI_API_KEY: 'test-secret'
    });
    expect(config.port).toBe(9090);
    expect(config.rowPolicy).toBe('strict');
    expect(config.io.retries).toBe(0);
    expect(config.fuzzyThreshold).toBe(0.9);
    expect(config.gemini.apiKey).toBe('test-secret');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'not-a-port' })).toThrow(/^Invalid configuration: PORT: /);
    expect(() => loadConfig({ ROW_COERCION_POLICY: 'lenient' })).toThrow(/ROW_COERCION_POLICY/);
    expect(() => loadConfig({ FUZZY_NAME_THRESHOLD: '1.5' })).toThrow(/FUZZY_NAME_THRESHOLD/);
  });
});
