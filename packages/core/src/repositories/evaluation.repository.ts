import type {
  Evaluation,
  EvaluationStatus,
  Invoice,
  Payload,
} from '@tenet/shared/src/types/evaluation.types.js';

export interface CreateEvaluationInput {
  readonly ownerId: string;
  readonly payloads: readonly Payload[];
}

export interface UpdateEvaluationInput {
  readonly status?: EvaluationStatus;
  readonly error?: string | null;
  readonly invoices?: readonly Invoice[];
  readonly progress?: number;
}

export type MarkRunningResult =
  | { readonly acquired: true; readonly evaluation: Evaluation }
  | { readonly acquired: false; readonly runningEvaluationId: string };

export interface EvaluationRepository {
  create(input: CreateEvaluationInput): Promise<Evaluation>;
  update(id: string, updates: UpdateEvaluationInput): Promise<Evaluation>;
  /** Rejects with NotFoundError when the evaluation does not exist. */
  read(id: string): Promise<Evaluation>;
  list(): Promise<readonly Evaluation[]>;
  /**
   * Atomically checks that no other evaluation is running and flips this one
   * to running. Returns the blocking evaluation's id instead when one is.
   */
  markRunning(id: string): Promise<MarkRunningResult>;
}
