import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { IncoherenceKind } from '@tenet/shared/src/types/evaluation.types.js';
import { chunk } from '@tenet/shared/src/utils/collections.js';
import { settleAll } from '@tenet/shared/src/utils/settle-all.js';
import type { EvaluationConfig } from '@tenet/schemas/src/evaluation-config.schema.js';
import type { CoherenceClassifier, CoherenceVerdict } from '../../agents/types.js';
import { retryWithFixedInterval } from '../../llm/retry.js';
import type { ProgressReport } from './progress-report.js';

const log = createChildLogger('evaluation:coherence-checker');

export interface Incoherence<C> {
  readonly first: C;
  readonly second: C;
  readonly issue: string;
  /** Contradiction severity, 1-10. */
  readonly severity: number;
  readonly relatednessSeverity: number;
  readonly incoherenceKind: IncoherenceKind;
}

export interface CoherenceChecker<C> {
  /**
   * Compares each candidate with the candidates after it and with every
   * rule in `comparisonSet`, so each unordered pair is judged once. A
   * failed batch aborts the others; `signal` aborts them all.
   */
  evaluate(
    candidates: readonly C[],
    comparisonSet: readonly C[],
    progress?: ProgressReport,
    signal?: AbortSignal,
  ): Promise<readonly Incoherence<C>[]>;
}

export type CoherenceCheckerConfig = Pick<EvaluationConfig, 'batchSize' | 'coherence' | 'retry'>;

interface BatchTask<C> {
  readonly candidate: C;
  readonly batch: readonly C[];
}

export function createCoherenceChecker<C>(
  classifier: CoherenceClassifier<C>,
  config: CoherenceCheckerConfig,
  ruleKind: string,
): CoherenceChecker<C> {
  const { contradictionThreshold, relatednessThreshold, criticalRelatednessThreshold } =
    config.coherence;

  function toIncoherences(task: BatchTask<C>, verdicts: readonly CoherenceVerdict[]): Incoherence<C>[] {
    const found: Incoherence<C>[] = [];

    for (const verdict of verdicts) {
      if (verdict.comparisonIndex < 0 || verdict.comparisonIndex >= task.batch.length) {
        log.warn(
          { ruleKind, comparisonIndex: verdict.comparisonIndex, batchSize: task.batch.length },
          'Classifier returned an out-of-range comparison, ignoring',
        );
        continue;
      }

      if (
        verdict.contradictionSeverity < contradictionThreshold ||
        verdict.relatednessSeverity < relatednessThreshold
      ) {
        continue;
      }

      found.push({
        first: task.candidate,
        second: task.batch[verdict.comparisonIndex],
        issue: verdict.rationale,
        severity: verdict.contradictionSeverity,
        relatednessSeverity: verdict.relatednessSeverity,
        incoherenceKind:
          verdict.relatednessSeverity >= criticalRelatednessThreshold ? 'strict' : 'contingent',
      });
    }

    return found;
  }

  return {
    async evaluate(
      candidates: readonly C[],
      comparisonSet: readonly C[],
      progress?: ProgressReport,
      signal?: AbortSignal,
    ): Promise<readonly Incoherence<C>[]> {
      const tasks: BatchTask<C>[] = candidates.flatMap((candidate, i) =>
        chunk([...candidates.slice(i + 1), ...comparisonSet], config.batchSize).map((batch) => ({
          candidate,
          batch,
        })),
      );

      if (tasks.length === 0) {
        return [];
      }

      log.info(
        { ruleKind, candidates: candidates.length, comparisons: comparisonSet.length, batches: tasks.length },
        'Checking coherence',
      );

      await progress?.stretch(tasks.length);

      const perTask = await settleAll(
        tasks.map((task) => async (batchSignal: AbortSignal) => {
          const verdicts = await retryWithFixedInterval(
            () => classifier.classifyCoherence(task.candidate, task.batch, batchSignal),
            config.retry,
            `${ruleKind}:coherence`,
            batchSignal,
          );
          batchSignal.throwIfAborted();
          await progress?.increment();
          return toIncoherences(task, verdicts);
        }),
        signal,
      );

      const incoherences = perTask.flat();
      log.info({ ruleKind, incoherences: incoherences.length }, 'Coherence check complete');

      return incoherences;
    },
  };
}
