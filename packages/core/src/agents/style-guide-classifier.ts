import type { StyleGuideContent } from '@tenet/shared/src/types/rule.types.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import type { CoherenceVerdict, StyleGuideClassifier } from './types.js';
import {
  StyleGuideCoherenceResultJsonSchema,
  StyleGuideCoherenceResultSchema,
} from './rule-classifier.schemas.js';
import { formatNumbered, formatStyleGuide } from './rule-formatting.js';

const log = createChildLogger('agent:style-guide-classifier');

const SYSTEM_PROMPT = `You are a coherence-checker for the style guides of an AI agent.
A style guide is a principle about how the agent should phrase its replies, illustrated by
examples that show a reply before and after applying the principle.

You receive one candidate style guide and a numbered list of comparison style guides.
For EVERY comparison style guide, give two independent judgments:

1. scopeOverlapSeverity (1-10): how likely it is that both principles govern the same reply.
2. contradictionSeverity (1-10): assuming both apply, how strongly the principles conflict.
   1 = fully compatible, 10 = a reply cannot satisfy both.

Respond with a JSON object:
{"evaluations": [{"comparisonId": <number from the list>, "scopeOverlapSeverity": <1-10>, "contradictionSeverity": <1-10>, "rationale": "<one sentence>"}]}`;

export function createStyleGuideClassifier(llmClient: LlmClient): StyleGuideClassifier {
  return {
    async classifyCoherence(
      candidate: StyleGuideContent,
      comparisons: readonly StyleGuideContent[],
      signal?: AbortSignal,
    ): Promise<readonly CoherenceVerdict[]> {
      if (comparisons.length === 0) {
        return [];
      }

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Candidate:\n${formatStyleGuide(candidate)}\n\nComparison style guides:\n${formatNumbered(comparisons, formatStyleGuide, 1)}`,
          jsonSchema: StyleGuideCoherenceResultJsonSchema as Record<string, unknown>,
          signal,
        },
        schema: StyleGuideCoherenceResultSchema,
        agentName: 'StyleGuideCoherenceClassifier',
      });

      log.debug(
        { comparisons: comparisons.length, verdicts: result.evaluations.length },
        'Style guide coherence classified',
      );

      return result.evaluations.map((e) => ({
        comparisonIndex: e.comparisonId - 1,
        relatednessSeverity: e.scopeOverlapSeverity,
        contradictionSeverity: e.contradictionSeverity,
        rationale: e.rationale,
      }));
    },
  };
}
