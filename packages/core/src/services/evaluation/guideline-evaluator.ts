import { createChildLogger } from '@tenet/shared/src/logger.js';
import { guidelineKey } from '@tenet/shared/src/utils/rule-content.js';
import { settleAll } from '@tenet/shared/src/utils/settle-all.js';
import type {
  ConnectionProposition,
  GuidelineCoherenceCheck,
  GuidelineInvoiceData,
  GuidelinePayload,
} from '@tenet/shared/src/types/evaluation.types.js';
import type { Guideline, GuidelineContent } from '@tenet/shared/src/types/rule.types.js';
import type { CoherenceChecker, Incoherence } from './coherence-checker.js';
import type { ConnectionProposal, ConnectionProposer } from './connection-proposer.js';
import type { ProgressReport } from './progress-report.js';
import { attributeFindings, excludeUpdatedRules, indexByKey } from './rule-batch.js';

const log = createChildLogger('evaluation:guideline-evaluator');

export interface GuidelineEvaluationInput {
  readonly ownerId: string;
  readonly payloads: readonly GuidelinePayload[];
  readonly existing: readonly Guideline[];
  readonly progress?: ProgressReport;
  readonly signal?: AbortSignal;
}

export interface GuidelineEvaluator {
  /** One invoice data entry per payload, in payload order. */
  evaluate(input: GuidelineEvaluationInput): Promise<readonly GuidelineInvoiceData[]>;
}

export interface GuidelineEvaluatorDeps {
  readonly coherenceChecker: CoherenceChecker<GuidelineContent>;
  readonly connectionProposer: ConnectionProposer;
}

export function createGuidelineEvaluator(deps: GuidelineEvaluatorDeps): GuidelineEvaluator {
  const { coherenceChecker, connectionProposer } = deps;

  return {
    async evaluate(input: GuidelineEvaluationInput): Promise<readonly GuidelineInvoiceData[]> {
      const { ownerId, payloads, existing, progress, signal } = input;

      if (payloads.length === 0) {
        return [];
      }

      const unaffected = excludeUpdatedRules(payloads, existing, 'Guideline', ownerId).map(
        (g) => g.content,
      );

      const toEvaluate = payloads.filter((p) => p.coherenceCheck).map((p) => p.content);
      const toSkip = payloads.filter((p) => !p.coherenceCheck).map((p) => p.content);
      const toPropose = payloads.filter((p) => p.connectionProposition).map((p) => p.content);
      const notProposing = payloads.filter((p) => !p.connectionProposition).map((p) => p.content);

      log.info(
        {
          ownerId,
          payloads: payloads.length,
          toEvaluate: toEvaluate.length,
          toPropose: toPropose.length,
          existing: unaffected.length,
        },
        'Evaluating guidelines',
      );

      let incoherences: readonly Incoherence<GuidelineContent>[] = [];
      let proposals: readonly ConnectionProposal[] = [];

      await settleAll<void>(
        [
          async (pairSignal) => {
            incoherences = await coherenceChecker.evaluate(
              toEvaluate,
              [...toSkip, ...unaffected],
              progress,
              pairSignal,
            );
          },
          async (pairSignal) => {
            proposals = await connectionProposer.propose(
              toPropose,
              [...notProposing, ...unaffected],
              progress,
              pairSignal,
            );
          },
        ],
        signal,
      );

      const index = indexByKey(
        payloads.map((p) => p.content),
        guidelineKey,
      );
      const locate = (a: GuidelineContent, b: GuidelineContent) =>
        [index.get(guidelineKey(a)), index.get(guidelineKey(b))] as const;

      const checksPerPayload = attributeFindings(
        payloads.length,
        incoherences,
        (i) => locate(i.first, i.second),
        (i) => payloads[i].coherenceCheck,
      );
      const connectionsPerPayload = attributeFindings(
        payloads.length,
        proposals,
        (p) => locate(p.source, p.target),
        (i) => payloads[i].connectionProposition,
      );

      return payloads.map((payload, i): GuidelineInvoiceData => {
        const coherenceChecks = checksPerPayload[i].map(
          ({ finding, againstEvaluated }): GuidelineCoherenceCheck => ({
            kind: againstEvaluated
              ? 'contradiction_with_another_evaluated_guideline'
              : 'contradiction_with_existing_guideline',
            first: finding.first,
            second: finding.second,
            issue: finding.issue,
            severity: finding.severity,
            incoherenceKind: finding.incoherenceKind,
          }),
        );

        const connectionPropositions = payload.connectionProposition
          ? connectionsPerPayload[i].map(
              ({ finding, againstEvaluated }): ConnectionProposition => ({
                checkKind: againstEvaluated
                  ? 'connection_with_another_evaluated_guideline'
                  : 'connection_with_existing_guideline',
                source: finding.source,
                target: finding.target,
                connectionKind: finding.kind,
              }),
            )
          : null;

        return { kind: 'guideline', coherenceChecks, connectionPropositions };
      });
    },
  };
}
