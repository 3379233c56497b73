import { isTransient, transient } from '../errors';
import type { RetryConfig } from '../config';

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Rejects with a Transient error when `op` does not settle within `ms`. */
export const withTimeout = async <T>(op: () => Promise<T>, ms: number, label: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(transient(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([op(), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Retries Transient failures of `op` with exponential backoff (backoffMs, 2×, 4×, …).
 * Any other failure is rethrown at once. `op` is responsible for its own timeouts.
 */
export const retryTransient = async <T>(
  op: () => Promise<T>,
  config: RetryConfig,
  onRetry?: (attempt: number, err: unknown) => void
): Promise<T> => {
  for (let attempt = 0; ; attempt++) {
    try {
      return await op();
    } catch (err) {
      if (!isTransient(err) || attempt >= config.retries) throw err;
      onRetry?.(attempt + 1, err);
      await sleep(config.backoffMs * 2 ** attempt);
    }
  }
};

/** `retryTransient` with each attempt bounded by `config.timeoutMs`. Only for operations safe to abandon, such as reads. */
export const withRetry = <T>(
  op: () => Promise<T>,
  config: RetryConfig,
  label: string,
  onRetry?: (attempt: number, err: unknown) => void
): Promise<T> => retryTransient(() => withTimeout(op, config.timeoutMs, label), config, onRetry);
