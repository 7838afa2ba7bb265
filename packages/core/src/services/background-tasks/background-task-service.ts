import { createChildLogger } from '@tenet/shared/src/logger.js';
import { TenetError } from '@tenet/shared/src/utils/errors.js';

const log = createChildLogger('tasks:background');

export interface BackgroundTaskService {
  /**
   * Schedules `task` on a later macrotask and returns immediately. A
   * rejected task is logged here; tags must be unique while running.
   */
  start(task: () => Promise<void>, tag: string): void;
  /** Resolves once every started task, including ones started meanwhile, has settled. */
  drain(): Promise<void>;
  runningTags(): readonly string[];
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function createBackgroundTaskService(): BackgroundTaskService {
  const tasks = new Map<string, Promise<void>>();

  return {
    start(task: () => Promise<void>, tag: string): void {
      if (tasks.has(tag)) {
        throw new TenetError(`Background task already running: ${tag}`, 'TASK_CONFLICT');
      }

      const run = nextMacrotask()
        .then(task)
        .catch((error: unknown) => {
          log.error(
            {
              tag,
              error: error instanceof Error ? error.message : String(error),
              stack: error instanceof Error ? error.stack : undefined,
            },
            'Background task failed',
          );
        })
        .finally(() => {
          tasks.delete(tag);
        });

      tasks.set(tag, run);
      log.debug({ tag, running: tasks.size }, 'Background task scheduled');
    },

    async drain(): Promise<void> {
      while (tasks.size > 0) {
        await Promise.all(tasks.values());
      }
    },

    runningTags(): readonly string[] {
      return [...tasks.keys()];
    },
  };
}
