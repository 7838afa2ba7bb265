import type {
  ConnectionKind,
  GuidelineContent,
  StyleGuideContent,
} from '@tenet/shared/src/types/rule.types.js';

export interface CoherenceVerdict {
  /** 0-based index into the comparisons passed to the classifier. */
  readonly comparisonIndex: number;
  /** How likely the two rules apply to the same situation, 1-10. */
  readonly relatednessSeverity: number;
  /** How strongly the two rules conflict when both apply, 1-10. */
  readonly contradictionSeverity: number;
  readonly rationale: string;
}

/**
 * Indices refer to `[candidate, ...comparisons]`: 0 is the candidate,
 * `i > 0` is `comparisons[i - 1]`.
 */
export interface ConnectionVerdict {
  readonly sourceIndex: number;
  readonly targetIndex: number;
  readonly score: number;
  readonly kind: ConnectionKind;
  readonly rationale: string;
}

export interface CoherenceClassifier<C> {
  classifyCoherence(
    candidate: C,
    comparisons: readonly C[],
    signal?: AbortSignal,
  ): Promise<readonly CoherenceVerdict[]>;
}

export interface ConnectionClassifier {
  classifyConnection(
    candidate: GuidelineContent,
    comparisons: readonly GuidelineContent[],
    signal?: AbortSignal,
  ): Promise<readonly ConnectionVerdict[]>;
}

export type GuidelineClassifier = CoherenceClassifier<GuidelineContent> & ConnectionClassifier;
export type StyleGuideClassifier = CoherenceClassifier<StyleGuideContent>;
