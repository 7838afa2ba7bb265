import { Timestamp } from '@google-cloud/firestore';
import type {
  Evaluation,
  EvaluationStatus,
  Invoice,
} from '@tenet/shared/src/types/evaluation.types.js';
import { NotFoundError, PersistenceError } from '@tenet/shared/src/utils/errors.js';
import { createPendingInvoice } from '@tenet/shared/src/utils/invoice.js';
import type {
  CreateEvaluationInput,
  EvaluationRepository,
  MarkRunningResult,
  UpdateEvaluationInput,
} from '../repositories/evaluation.repository.js';
import type { FirestoreBase } from './firestore-types.js';
import { getFirestoreClient } from './firestore-types.js';

const EVALUATIONS_COLLECTION = 'evaluations';

interface EvaluationDocument {
  ownerId: string;
  createdAt: Timestamp;
  status: EvaluationStatus;
  error: string | null;
  invoices: readonly Invoice[];
  progress: number;
}

function evaluationFromDoc(id: string, data: EvaluationDocument): Evaluation {
  return {
    id,
    ownerId: data.ownerId,
    createdAt: data.createdAt.toDate(),
    status: data.status,
    error: data.error,
    invoices: data.invoices,
    progress: data.progress,
  };
}

function toPersistenceError(action: string, error: unknown): Error {
  if (error instanceof NotFoundError) {
    return error;
  }
  return new PersistenceError(
    `Failed to ${action}`,
    error instanceof Error ? error : undefined,
  );
}

export function createFirestoreEvaluationRepository(base: FirestoreBase): EvaluationRepository {
  const db = getFirestoreClient(base);
  const evaluationsRef = base.collection(EVALUATIONS_COLLECTION);

  return {
    async create(input: CreateEvaluationInput): Promise<Evaluation> {
      const docData: EvaluationDocument = {
        ownerId: input.ownerId,
        createdAt: Timestamp.now(),
        status: 'pending',
        error: null,
        invoices: input.payloads.map(createPendingInvoice),
        progress: 0,
      };

      const docRef = evaluationsRef.doc();
      try {
        await docRef.set(docData);
      } catch (error) {
        throw toPersistenceError('create evaluation', error);
      }

      return evaluationFromDoc(docRef.id, docData);
    },

    async update(id: string, updates: UpdateEvaluationInput): Promise<Evaluation> {
      const docRef = evaluationsRef.doc(id);

      try {
        return await db.runTransaction(async (tx) => {
          const snapshot = await tx.get(docRef);
          if (!snapshot.exists) {
            throw new NotFoundError(`Evaluation not found: ${id}`);
          }

          const updateData: Partial<EvaluationDocument> = {};
          if (updates.status !== undefined) {
            updateData.status = updates.status;
          }
          if (updates.error !== undefined) {
            updateData.error = updates.error;
          }
          if (updates.invoices !== undefined) {
            updateData.invoices = updates.invoices;
          }
          if (updates.progress !== undefined) {
            updateData.progress = updates.progress;
          }

          tx.update(docRef, updateData);
          return evaluationFromDoc(id, { ...(snapshot.data() as EvaluationDocument), ...updateData });
        });
      } catch (error) {
        throw toPersistenceError(`update evaluation ${id}`, error);
      }
    },

    async read(id: string): Promise<Evaluation> {
      const doc = await evaluationsRef.doc(id).get();
      if (!doc.exists) {
        throw new NotFoundError(`Evaluation not found: ${id}`);
      }
      return evaluationFromDoc(id, doc.data() as EvaluationDocument);
    },

    async list(): Promise<readonly Evaluation[]> {
      const snapshot = await evaluationsRef.orderBy('createdAt', 'asc').get();
      return snapshot.docs.map((doc) => evaluationFromDoc(doc.id, doc.data() as EvaluationDocument));
    },

    async markRunning(id: string): Promise<MarkRunningResult> {
      const docRef = evaluationsRef.doc(id);

      try {
        return await db.runTransaction(async (tx): Promise<MarkRunningResult> => {
          const running = await tx.get(evaluationsRef.where('status', '==', 'running'));
          const blocking = running.docs.find((doc) => doc.id !== id);
          if (blocking) {
            return { acquired: false, runningEvaluationId: blocking.id };
          }

          const snapshot = await tx.get(docRef);
          if (!snapshot.exists) {
            throw new NotFoundError(`Evaluation not found: ${id}`);
          }

          tx.update(docRef, { status: 'running' });
          return {
            acquired: true,
            evaluation: evaluationFromDoc(id, {
              ...(snapshot.data() as EvaluationDocument),
              status: 'running',
            }),
          };
        });
      } catch (error) {
        throw toPersistenceError(`mark evaluation ${id} running`, error);
      }
    },
  };
}
