import { createChildLogger } from '@tenet/shared/src/logger.js';

const log = createChildLogger('llm:retry');

export interface FixedIntervalRetryPolicy {
  readonly maxAttempts: number;
  readonly intervalMs: number;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it succeeds, waiting the same interval between
 * attempts. The last error is rethrown once `maxAttempts` is spent.
 * Once `signal` is aborted no further attempt starts and a pending wait
 * rejects with the abort reason.
 */
export async function retryWithFixedInterval<T>(
  operation: () => Promise<T>,
  policy: FixedIntervalRetryPolicy,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  let attempt = 0;

  for (;;) {
    attempt++;
    signal?.throwIfAborted();
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (signal?.aborted) {
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        log.error({ label, attempts: attempt, error: message }, 'Retries exhausted');
        throw error;
      }

      log.warn(
        { label, attempt, maxAttempts: policy.maxAttempts, error: message },
        'Attempt failed, retrying after fixed interval',
      );
      await sleep(policy.intervalMs, signal);
    }
  }
}
