import { describe, it, expect } from 'vitest';
import { settleAll } from './settle-all.js';

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => {
      reject(new Error('aborted'));
    });
  });
}

describe('settleAll', () => {
  it('should resolve with every result in task order', async () => {
    const results = await settleAll([
      () => new Promise<number>((resolve) => setTimeout(() => resolve(1), 10)),
      () => Promise.resolve(2),
    ]);

    expect(results).toEqual([1, 2]);
  });

  it('should abort the siblings of a failed task and wait for them', async () => {
    const events: string[] = [];

    const pending = settleAll<void>([
      () => Promise.reject(new Error('first failure')),
      async (signal) => {
        try {
          await waitForAbort(signal);
        } finally {
          events.push('sibling settled');
        }
      },
    ]);

    await expect(pending).rejects.toThrow('first failure');
    expect(events).toEqual(['sibling settled']);
  });

  it('should pass the failure on as the abort reason', async () => {
    let reason: unknown;

    await settleAll<void>([
      async (signal) => {
        await Promise.resolve();
        throw new Error(`boom ${String(signal.aborted)}`);
      },
      async (signal) => {
        await waitForAbort(signal).catch(() => {
          reason = signal.reason;
        });
      },
    ]).catch(() => undefined);

    expect(reason).toEqual(new Error('boom false'));
  });

  it('should forward an abort of the parent signal', async () => {
    const parent = new AbortController();
    parent.abort(new Error('evaluation failed'));

    let seen = false;
    await settleAll<void>(
      [
        (signal) => {
          seen = signal.aborted;
          return Promise.resolve();
        },
      ],
      parent.signal,
    );

    expect(seen).toBe(true);
  });
});
