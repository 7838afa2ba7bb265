import { createChildLogger } from '@tenet/shared/src/logger.js';
import { styleGuideKey } from '@tenet/shared/src/utils/rule-content.js';
import type {
  StyleGuideCoherenceCheck,
  StyleGuideInvoiceData,
  StyleGuidePayload,
} from '@tenet/shared/src/types/evaluation.types.js';
import type { StyleGuide, StyleGuideContent } from '@tenet/shared/src/types/rule.types.js';
import type { CoherenceChecker } from './coherence-checker.js';
import type { ProgressReport } from './progress-report.js';
import { attributeFindings, excludeUpdatedRules, indexByKey } from './rule-batch.js';

const log = createChildLogger('evaluation:style-guide-evaluator');

export interface StyleGuideEvaluationInput {
  readonly ownerId: string;
  readonly payloads: readonly StyleGuidePayload[];
  readonly existing: readonly StyleGuide[];
  readonly progress?: ProgressReport;
  readonly signal?: AbortSignal;
}

export interface StyleGuideEvaluator {
  evaluate(input: StyleGuideEvaluationInput): Promise<readonly StyleGuideInvoiceData[]>;
}

export function createStyleGuideEvaluator(
  coherenceChecker: CoherenceChecker<StyleGuideContent>,
): StyleGuideEvaluator {
  return {
    async evaluate(input: StyleGuideEvaluationInput): Promise<readonly StyleGuideInvoiceData[]> {
      const { ownerId, payloads, existing, progress, signal } = input;

      if (payloads.length === 0) {
        return [];
      }

      const unaffected = excludeUpdatedRules(payloads, existing, 'StyleGuide', ownerId).map(
        (s) => s.content,
      );
      const toEvaluate = payloads.filter((p) => p.coherenceCheck).map((p) => p.content);
      const toSkip = payloads.filter((p) => !p.coherenceCheck).map((p) => p.content);

      log.info(
        { ownerId, payloads: payloads.length, toEvaluate: toEvaluate.length, existing: unaffected.length },
        'Evaluating style guides',
      );

      const incoherences = await coherenceChecker.evaluate(
        toEvaluate,
        [...toSkip, ...unaffected],
        progress,
        signal,
      );

      const index = indexByKey(
        payloads.map((p) => p.content),
        styleGuideKey,
      );
      const perPayload = attributeFindings(
        payloads.length,
        incoherences,
        (i) => [index.get(styleGuideKey(i.first)), index.get(styleGuideKey(i.second))] as const,
        (i) => payloads[i].coherenceCheck,
      );

      return perPayload.map(
        (findings): StyleGuideInvoiceData => ({
          kind: 'style_guide',
          coherenceChecks: findings.map(
            ({ finding, againstEvaluated }): StyleGuideCoherenceCheck => ({
              kind: againstEvaluated
                ? 'contradiction_with_another_evaluated_style_guide'
                : 'contradiction_with_existing_style_guide',
              first: finding.first,
              second: finding.second,
              issue: finding.issue,
              severity: finding.severity,
              incoherenceKind: finding.incoherenceKind,
            }),
          ),
        }),
      );
    },
  };
}
