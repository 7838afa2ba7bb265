/**
 * Runs `tasks` concurrently under one abort signal. The first rejection
 * aborts that signal, and the call only settles once every task has
 * settled, rejecting with that first error. An abort of `parent` reaches
 * every task too.
 */
export async function settleAll<T>(
  tasks: readonly ((signal: AbortSignal) => Promise<T>)[],
  parent?: AbortSignal,
): Promise<T[]> {
  const controller = new AbortController();
  const forwardAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent?.aborted) {
    forwardAbort();
  } else {
    parent?.addEventListener('abort', forwardAbort, { once: true });
  }

  const failures: unknown[] = [];

  try {
    const results = await Promise.allSettled(
      tasks.map(async (task) => {
        try {
          return await task(controller.signal);
        } catch (error) {
          if (failures.length === 0) {
            failures.push(error);
            controller.abort(error);
          }
          throw error;
        }
      }),
    );

    if (failures.length > 0) {
      throw failures[0];
    }

    return results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
  } finally {
    parent?.removeEventListener('abort', forwardAbort);
  }
}
