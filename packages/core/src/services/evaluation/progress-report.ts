export type ProgressListener = (percentage: number) => Promise<void>;

export interface ProgressReport {
  /** Adds `amount` units of expected work. */
  stretch(amount: number): Promise<void>;
  increment(amount?: number): Promise<void>;
  readonly percentage: number;
}

export function createProgressReport(listener: ProgressListener): ProgressReport {
  let total = 0;
  let current = 0;

  function percentage(): number {
    return total === 0 ? 0 : Math.min(100, (current / total) * 100);
  }

  return {
    async stretch(amount: number): Promise<void> {
      total += amount;
      await listener(percentage());
    },

    async increment(amount = 1): Promise<void> {
      current += amount;
      await listener(percentage());
    },

    get percentage(): number {
      return percentage();
    },
  };
}

/**
 * Wraps `write` so that only strictly increasing percentages reach it.
 * The high-water mark moves before the write is awaited, so concurrent
 * callers issue writes in increasing order.
 */
export function createMonotonicProgressListener(
  write: (percentage: number) => Promise<void>,
): ProgressListener {
  let highest = 0;

  return async (percentage: number): Promise<void> => {
    if (percentage <= highest) {
      return;
    }
    highest = percentage;
    await write(percentage);
  };
}
