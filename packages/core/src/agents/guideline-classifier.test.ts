import { describe, it, expect, vi } from 'vitest';
import type { LlmClient, LlmRequest } from '../llm/llm-client.js';
import { createGuidelineClassifier } from './guideline-classifier.js';

const greetHello = { condition: 'the customer greets you', action: "greet them back with 'Hello'" };
const greetGoodbye = {
  condition: 'the customer greeting you',
  action: "greet them back with 'Good bye'",
};
const weather = { condition: 'the customer asks about the weather', action: 'provide weather update' };

function mockLlm(reply: Record<string, unknown>): LlmClient & { invoke: ReturnType<typeof vi.fn> } {
  return { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(reply) }) };
}

function firstRequest(llm: { invoke: ReturnType<typeof vi.fn> }): LlmRequest {
  const calls = llm.invoke.mock.calls as Array<[LlmRequest]>;
  return calls[0][0];
}

describe('createGuidelineClassifier', () => {
  describe('classifyCoherence', () => {
    it('should map 1-based comparison ids to 0-based indices', async () => {
      const llm = mockLlm({
        evaluations: [
          {
            comparisonId: 2,
            conditionOverlapSeverity: 9,
            actionContradictionSeverity: 8,
            rationale: 'Both answer a greeting differently.',
          },
        ],
      });

      const verdicts = await createGuidelineClassifier(llm).classifyCoherence(greetHello, [
        weather,
        greetGoodbye,
      ]);

      expect(verdicts).toEqual([
        {
          comparisonIndex: 1,
          relatednessSeverity: 9,
          contradictionSeverity: 8,
          rationale: 'Both answer a greeting differently.',
        },
      ]);
    });

    it('should list the candidate and numbered comparisons in the prompt', async () => {
      const llm = mockLlm({ evaluations: [] });

      await createGuidelineClassifier(llm).classifyCoherence(greetHello, [greetGoodbye]);

      const request = firstRequest(llm);
      expect(request.systemPrompt).toContain('coherence-checker');
      expect(request.userMessage).toBe(
        "Candidate: When the customer greets you, then greet them back with 'Hello'\n\nComparison guidelines:\n[1] When the customer greeting you, then greet them back with 'Good bye'",
      );
      expect(request.jsonSchema).toBeDefined();
    });

    it('should skip the model when there is nothing to compare', async () => {
      const llm = mockLlm({ evaluations: [] });

      const verdicts = await createGuidelineClassifier(llm).classifyCoherence(greetHello, []);

      expect(verdicts).toEqual([]);
      expect(llm.invoke).not.toHaveBeenCalled();
    });
  });

  describe('classifyConnection', () => {
    it('should number the candidate as 0 and pass verdicts through', async () => {
      const llm = mockLlm({
        connections: [
          {
            sourceId: 1,
            targetId: 0,
            kind: 'entails',
            score: 8,
            rationale: 'Providing the update makes the candidate condition true.',
          },
        ],
      });
      const candidate = { condition: 'providing the weather update', action: 'mention best time to walk' };

      const verdicts = await createGuidelineClassifier(llm).classifyConnection(candidate, [weather]);

      expect(verdicts).toEqual([
        {
          sourceIndex: 1,
          targetIndex: 0,
          score: 8,
          kind: 'entails',
          rationale: 'Providing the update makes the candidate condition true.',
        },
      ]);
      expect(firstRequest(llm).userMessage).toBe(
        'Guidelines:\n[0] When providing the weather update, then mention best time to walk\n[1] When the customer asks about the weather, then provide weather update',
      );
    });

    it('should reject a connection kind outside the schema after corrections', async () => {
      const llm = mockLlm({
        connections: [{ sourceId: 0, targetId: 1, kind: 'causes', score: 7, rationale: 'x' }],
      });

      await expect(
        createGuidelineClassifier(llm).classifyConnection(greetHello, [weather]),
      ).rejects.toThrow('GuidelineConnectionClassifier returned invalid output after 2 attempts');
    });
  });
});
