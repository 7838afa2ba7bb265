import { describe, it, expect, vi } from 'vitest';
import type { StyleGuideContent } from '@tenet/shared/src/types/rule.types.js';
import type { LlmRequest } from '../llm/llm-client.js';
import { createStyleGuideClassifier } from './style-guide-classifier.js';

const friendly: StyleGuideContent = {
  principle: 'Use a warm, friendly tone',
  examples: [
    {
      before: [{ source: 'ai_agent', message: 'State your request.' }],
      after: [{ source: 'ai_agent', message: 'Happy to help! What do you need?' }],
      violation: 'Curt wording',
    },
  ],
};

const formal: StyleGuideContent = {
  principle: 'Keep replies strictly formal',
  examples: [],
};

describe('createStyleGuideClassifier', () => {
  it('should map scope overlap to relatedness', async () => {
    const invoke = vi.fn().mockResolvedValue({
      content: JSON.stringify({
        evaluations: [
          {
            comparisonId: 1,
            scopeOverlapSeverity: 8,
            contradictionSeverity: 7,
            rationale: 'Warmth and strict formality pull in opposite directions.',
          },
        ],
      }),
    });

    const verdicts = await createStyleGuideClassifier({ invoke }).classifyCoherence(friendly, [formal]);

    expect(verdicts).toEqual([
      {
        comparisonIndex: 0,
        relatednessSeverity: 8,
        contradictionSeverity: 7,
        rationale: 'Warmth and strict formality pull in opposite directions.',
      },
    ]);
  });

  it('should render examples in the prompt', async () => {
    const invoke = vi.fn().mockResolvedValue({ content: JSON.stringify({ evaluations: [] }) });

    await createStyleGuideClassifier({ invoke }).classifyCoherence(formal, [friendly]);

    const [[request]] = invoke.mock.calls as Array<[LlmRequest]>;
    expect(request.userMessage).toContain('Candidate:\nPrinciple: Keep replies strictly formal');
    expect(request.userMessage).toContain('[1] Principle: Use a warm, friendly tone');
    expect(request.userMessage).toContain('    ai_agent: State your request.');
    expect(request.userMessage).toContain('   Violation: Curt wording');
  });
});
