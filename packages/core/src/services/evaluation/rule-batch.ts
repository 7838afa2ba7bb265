import { EvaluationError } from '@tenet/shared/src/utils/errors.js';
import type { PayloadOperation } from '@tenet/shared/src/types/evaluation.types.js';
import type { StoredRule } from '@tenet/shared/src/types/rule.types.js';

interface UpdateTarget {
  readonly operation: PayloadOperation;
  readonly updatedId?: string;
}

/**
 * Existing rules that no update payload in the batch replaces. Every
 * `updatedId` must name one of `existing`; leftovers fail the evaluation.
 */
export function excludeUpdatedRules<C>(
  payloads: readonly UpdateTarget[],
  existing: readonly StoredRule<C>[],
  ruleLabel: 'Guideline' | 'StyleGuide',
  ownerId: string,
): StoredRule<C>[] {
  const targeted = new Set(
    payloads.flatMap((p) => (p.operation === 'update' && p.updatedId ? [p.updatedId] : [])),
  );
  const missing = new Set(targeted);

  const unaffected = existing.filter((rule) => {
    if (targeted.has(rule.id)) {
      missing.delete(rule.id);
      return false;
    }
    return true;
  });

  if (missing.size > 0) {
    throw new EvaluationError(
      `${ruleLabel} ID(s): ${[...missing].join(', ')} in '${ownerId}' agent do not exist.`,
    );
  }

  return unaffected;
}

export function indexByKey<C>(contents: readonly C[], key: (content: C) => string): Map<string, number> {
  const index = new Map<string, number>();
  contents.forEach((content, i) => {
    index.set(key(content), i);
  });
  return index;
}

export interface AttributedFinding<F> {
  readonly finding: F;
  /** Whether the other endpoint is also part of the evaluated batch. */
  readonly againstEvaluated: boolean;
}

/**
 * Distributes two-ended findings over the payloads they involve. A
 * finding lands on each endpoint that is a payload accepting it.
 */
export function attributeFindings<F>(
  payloadCount: number,
  findings: readonly F[],
  locate: (finding: F) => readonly [number | undefined, number | undefined],
  accepts: (payloadIndex: number) => boolean,
): AttributedFinding<F>[][] {
  const perPayload: AttributedFinding<F>[][] = Array.from({ length: payloadCount }, () => []);

  for (const finding of findings) {
    const [first, second] = locate(finding);

    if (first !== undefined && accepts(first)) {
      perPayload[first].push({ finding, againstEvaluated: second !== undefined });
    }
    if (second !== undefined && accepts(second)) {
      perPayload[second].push({ finding, againstEvaluated: first !== undefined });
    }
  }

  return perPayload;
}
