import { randomUUID } from 'node:crypto';
import type { Evaluation } from '@tenet/shared/src/types/evaluation.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import { createPendingInvoice } from '@tenet/shared/src/utils/invoice.js';
import { createReaderWriterLock } from '@tenet/shared/src/utils/reader-writer-lock.js';
import type {
  CreateEvaluationInput,
  EvaluationRepository,
  MarkRunningResult,
  UpdateEvaluationInput,
} from './evaluation.repository.js';

export function createInMemoryEvaluationRepository(): EvaluationRepository {
  const evaluations = new Map<string, Evaluation>();
  const lock = createReaderWriterLock();

  function getOrThrow(id: string): Evaluation {
    const evaluation = evaluations.get(id);
    if (!evaluation) {
      throw new NotFoundError(`Evaluation not found: ${id}`);
    }
    return evaluation;
  }

  return {
    create(input: CreateEvaluationInput): Promise<Evaluation> {
      return lock.withWriteLock(() => {
        const evaluation: Evaluation = {
          id: randomUUID(),
          ownerId: input.ownerId,
          createdAt: new Date(),
          status: 'pending',
          error: null,
          invoices: input.payloads.map(createPendingInvoice),
          progress: 0,
        };
        evaluations.set(evaluation.id, evaluation);
        return Promise.resolve(evaluation);
      });
    },

    update(id: string, updates: UpdateEvaluationInput): Promise<Evaluation> {
      return lock.withWriteLock(() => {
        const updated: Evaluation = {
          ...getOrThrow(id),
          ...(updates.status !== undefined && { status: updates.status }),
          ...(updates.error !== undefined && { error: updates.error }),
          ...(updates.invoices !== undefined && { invoices: updates.invoices }),
          ...(updates.progress !== undefined && { progress: updates.progress }),
        };
        evaluations.set(id, updated);
        return Promise.resolve(updated);
      });
    },

    read(id: string): Promise<Evaluation> {
      return lock.withReadLock(() => Promise.resolve(getOrThrow(id)));
    },

    list(): Promise<readonly Evaluation[]> {
      return lock.withReadLock(() =>
        Promise.resolve(
          [...evaluations.values()].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime()),
        ),
      );
    },

    markRunning(id: string): Promise<MarkRunningResult> {
      return lock.withWriteLock(() => {
        const current = getOrThrow(id);
        const blocking = [...evaluations.values()].find(
          (e) => e.id !== id && e.status === 'running',
        );

        if (blocking) {
          return Promise.resolve<MarkRunningResult>({
            acquired: false,
            runningEvaluationId: blocking.id,
          });
        }

        const running: Evaluation = { ...current, status: 'running' };
        evaluations.set(id, running);
        return Promise.resolve<MarkRunningResult>({ acquired: true, evaluation: running });
      });
    },
  };
}
