import { describe, it, expect, vi } from 'vitest';
import type { StyleGuidePayload } from '@tenet/shared/src/types/evaluation.types.js';
import type { StyleGuideContent } from '@tenet/shared/src/types/rule.types.js';
import { createStyleGuideEvaluator } from './style-guide-evaluator.js';

const formal: StyleGuideContent = {
  principle: 'Address customers formally',
  examples: [
    {
      before: [{ source: 'customer', message: 'hey' }],
      after: [{ source: 'ai_agent', message: 'Good afternoon, how may I help you?' }],
      violation: 'Replying with "hey there"',
    },
  ],
};
const casual: StyleGuideContent = { principle: 'Keep a casual, chatty tone', examples: [] };

function payload(content: StyleGuideContent, coherenceCheck = true): StyleGuidePayload {
  return { kind: 'style_guide', content, operation: 'add', coherenceCheck };
}

describe('createStyleGuideEvaluator', () => {
  it('should turn incoherences into style guide coherence checks', async () => {
    const coherenceChecker = {
      evaluate: vi.fn().mockResolvedValue([
        {
          first: formal,
          second: casual,
          issue: 'opposite registers',
          severity: 8,
          relatednessSeverity: 9,
          incoherenceKind: 'strict',
        },
      ]),
    };
    const evaluator = createStyleGuideEvaluator(coherenceChecker);

    const result = await evaluator.evaluate({
      ownerId: 'agent-1',
      payloads: [payload(formal)],
      existing: [{ id: 's-1', ownerId: 'agent-1', content: casual, createdAt: new Date() }],
    });

    expect(result).toEqual([
      {
        kind: 'style_guide',
        coherenceChecks: [
          {
            kind: 'contradiction_with_existing_style_guide',
            first: formal,
            second: casual,
            issue: 'opposite registers',
            severity: 8,
            incoherenceKind: 'strict',
          },
        ],
      },
    ]);
  });

  it('should return empty checks without candidates', async () => {
    const coherenceChecker = { evaluate: vi.fn().mockResolvedValue([]) };
    const evaluator = createStyleGuideEvaluator(coherenceChecker);

    const result = await evaluator.evaluate({
      ownerId: 'agent-1',
      payloads: [payload(formal, false), payload(casual, false)],
      existing: [],
    });

    expect(result).toEqual([
      { kind: 'style_guide', coherenceChecks: [] },
      { kind: 'style_guide', coherenceChecks: [] },
    ]);
    expect(coherenceChecker.evaluate).toHaveBeenCalledWith([], [formal, casual], undefined, undefined);
  });
});
