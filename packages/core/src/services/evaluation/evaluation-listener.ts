import type { EvaluationStatus } from '@tenet/shared/src/types/evaluation.types.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { EvaluationRepository } from '../../repositories/evaluation.repository.js';

const log = createChildLogger('evaluation:listener');

export interface EvaluationListener {
  /**
   * Resolves true once the evaluation is completed or failed, false when
   * `timeoutMs` passes first. Rejects with NotFoundError for unknown ids.
   */
  waitForCompletion(evaluationId: string, timeoutMs: number): Promise<boolean>;
}

const TERMINAL: ReadonlySet<EvaluationStatus> = new Set(['completed', 'failed']);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createEvaluationListener(
  evaluationRepository: EvaluationRepository,
  pollIntervalMs: number,
): EvaluationListener {
  return {
    async waitForCompletion(evaluationId: string, timeoutMs: number): Promise<boolean> {
      const deadline = Date.now() + timeoutMs;

      for (;;) {
        const evaluation = await evaluationRepository.read(evaluationId);
        if (TERMINAL.has(evaluation.status)) {
          return true;
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          log.debug({ evaluationId, status: evaluation.status, timeoutMs }, 'Wait timed out');
          return false;
        }

        await sleep(Math.min(pollIntervalMs, remaining));
      }
    },
  };
}
