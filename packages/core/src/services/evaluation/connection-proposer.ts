import { createChildLogger } from '@tenet/shared/src/logger.js';
import { chunk } from '@tenet/shared/src/utils/collections.js';
import { settleAll } from '@tenet/shared/src/utils/settle-all.js';
import { guidelineKey } from '@tenet/shared/src/utils/rule-content.js';
import type { ConnectionKind, GuidelineContent } from '@tenet/shared/src/types/rule.types.js';
import type { EvaluationConfig } from '@tenet/schemas/src/evaluation-config.schema.js';
import type { ConnectionClassifier, ConnectionVerdict } from '../../agents/types.js';
import { retryWithFixedInterval } from '../../llm/retry.js';
import type { ProgressReport } from './progress-report.js';

const log = createChildLogger('evaluation:connection-proposer');

export interface ConnectionProposal {
  readonly source: GuidelineContent;
  readonly target: GuidelineContent;
  readonly kind: ConnectionKind;
  readonly score: number;
  readonly rationale: string;
}

export interface ConnectionProposer {
  propose(
    candidates: readonly GuidelineContent[],
    comparisonSet: readonly GuidelineContent[],
    progress?: ProgressReport,
    signal?: AbortSignal,
  ): Promise<readonly ConnectionProposal[]>;
}

export type ConnectionProposerConfig = Pick<EvaluationConfig, 'batchSize' | 'connection' | 'retry'>;

export function createConnectionProposer(
  classifier: ConnectionClassifier,
  config: ConnectionProposerConfig,
): ConnectionProposer {
  function toProposal(
    candidate: GuidelineContent,
    batch: readonly GuidelineContent[],
    verdict: ConnectionVerdict,
  ): ConnectionProposal | null {
    if (verdict.score < config.connection.minScore) {
      return null;
    }

    // Index 0 is the candidate itself.
    const listed = [candidate, ...batch];
    const { sourceIndex, targetIndex } = verdict;

    if (
      sourceIndex === targetIndex ||
      (sourceIndex !== 0 && targetIndex !== 0) ||
      sourceIndex < 0 ||
      targetIndex < 0 ||
      sourceIndex >= listed.length ||
      targetIndex >= listed.length
    ) {
      log.warn({ sourceIndex, targetIndex, listed: listed.length }, 'Discarding malformed connection');
      return null;
    }

    const source = listed[sourceIndex];
    const target = listed[targetIndex];

    if (guidelineKey(source) === guidelineKey(target)) {
      return null;
    }

    return { source, target, kind: verdict.kind, score: verdict.score, rationale: verdict.rationale };
  }

  return {
    async propose(
      candidates: readonly GuidelineContent[],
      comparisonSet: readonly GuidelineContent[],
      progress?: ProgressReport,
      signal?: AbortSignal,
    ): Promise<readonly ConnectionProposal[]> {
      const tasks = candidates.flatMap((candidate, i) =>
        chunk([...candidates.slice(i + 1), ...comparisonSet], config.batchSize).map((batch) => ({
          candidate,
          batch,
        })),
      );

      if (tasks.length === 0) {
        return [];
      }

      log.info(
        { candidates: candidates.length, comparisons: comparisonSet.length, batches: tasks.length },
        'Proposing connections',
      );

      await progress?.stretch(tasks.length);

      const perTask = await settleAll(
        tasks.map(({ candidate, batch }) => async (batchSignal: AbortSignal) => {
          const verdicts = await retryWithFixedInterval(
            () => classifier.classifyConnection(candidate, batch, batchSignal),
            config.retry,
            'guideline:connection',
            batchSignal,
          );
          batchSignal.throwIfAborted();
          await progress?.increment();
          return verdicts.flatMap((verdict) => {
            const proposal = toProposal(candidate, batch, verdict);
            return proposal ? [proposal] : [];
          });
        }),
        signal,
      );

      const seen = new Set<string>();
      const proposals: ConnectionProposal[] = [];

      for (const proposal of perTask.flat()) {
        const key = `${guidelineKey(proposal.source)}->${guidelineKey(proposal.target)}`;
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        proposals.push(proposal);
      }

      log.info({ proposals: proposals.length }, 'Connection proposal complete');

      return proposals;
    },
  };
}
