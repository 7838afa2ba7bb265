import type { ConnectionKind, GuidelineContent, StyleGuideContent } from './rule.types.js';

export type PayloadOperation = 'add' | 'update';

export interface GuidelinePayload {
  readonly kind: 'guideline';
  readonly content: GuidelineContent;
  readonly operation: PayloadOperation;
  readonly updatedId?: string;
  readonly coherenceCheck: boolean;
  readonly connectionProposition: boolean;
}

export interface StyleGuidePayload {
  readonly kind: 'style_guide';
  readonly content: StyleGuideContent;
  readonly operation: PayloadOperation;
  readonly updatedId?: string;
  readonly coherenceCheck: boolean;
}

export type Payload = GuidelinePayload | StyleGuidePayload;

export type GuidelineCoherenceCheckKind =
  | 'contradiction_with_existing_guideline'
  | 'contradiction_with_another_evaluated_guideline';

export type StyleGuideCoherenceCheckKind =
  | 'contradiction_with_existing_style_guide'
  | 'contradiction_with_another_evaluated_style_guide';

/**
 * `strict` when the two rules almost surely apply together,
 * `contingent` when the conflict depends on the situation.
 */
export type IncoherenceKind = 'strict' | 'contingent';

export interface CoherenceCheck<C, K extends string> {
  readonly kind: K;
  readonly first: C;
  readonly second: C;
  readonly issue: string;
  readonly severity: number;
  readonly incoherenceKind: IncoherenceKind;
}

export type GuidelineCoherenceCheck = CoherenceCheck<GuidelineContent, GuidelineCoherenceCheckKind>;
export type StyleGuideCoherenceCheck = CoherenceCheck<
  StyleGuideContent,
  StyleGuideCoherenceCheckKind
>;

export type ConnectionPropositionKind =
  | 'connection_with_existing_guideline'
  | 'connection_with_another_evaluated_guideline';

export interface ConnectionProposition {
  readonly checkKind: ConnectionPropositionKind;
  readonly source: GuidelineContent;
  readonly target: GuidelineContent;
  readonly connectionKind: ConnectionKind;
}

export interface GuidelineInvoiceData {
  readonly kind: 'guideline';
  readonly coherenceChecks: readonly GuidelineCoherenceCheck[];
  /** `null` when the payload did not ask for connection propositions. */
  readonly connectionPropositions: readonly ConnectionProposition[] | null;
}

export interface StyleGuideInvoiceData {
  readonly kind: 'style_guide';
  readonly coherenceChecks: readonly StyleGuideCoherenceCheck[];
}

export type InvoiceData = GuidelineInvoiceData | StyleGuideInvoiceData;

export interface GuidelineInvoice {
  readonly kind: 'guideline';
  readonly payload: GuidelinePayload;
  readonly checksum: string;
  readonly approved: boolean;
  readonly data: GuidelineInvoiceData | null;
  readonly error: string | null;
}

export interface StyleGuideInvoice {
  readonly kind: 'style_guide';
  readonly payload: StyleGuidePayload;
  readonly checksum: string;
  readonly approved: boolean;
  readonly data: StyleGuideInvoiceData | null;
  readonly error: string | null;
}

export type Invoice = GuidelineInvoice | StyleGuideInvoice;

export type EvaluationStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface Evaluation {
  readonly id: string;
  readonly ownerId: string;
  readonly createdAt: Date;
  readonly status: EvaluationStatus;
  readonly error: string | null;
  readonly invoices: readonly Invoice[];
  /** Percentage in [0, 100]. */
  readonly progress: number;
}
