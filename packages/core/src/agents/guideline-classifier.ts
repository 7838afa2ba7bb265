import type { GuidelineContent } from '@tenet/shared/src/types/rule.types.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import type { CoherenceVerdict, ConnectionVerdict, GuidelineClassifier } from './types.js';
import {
  GuidelineCoherenceResultJsonSchema,
  GuidelineCoherenceResultSchema,
  GuidelineConnectionResultJsonSchema,
  GuidelineConnectionResultSchema,
} from './rule-classifier.schemas.js';
import { formatGuideline, formatNumbered } from './rule-formatting.js';

const log = createChildLogger('agent:guideline-classifier');

const COHERENCE_SYSTEM_PROMPT = `You are a coherence-checker for the behavioral guidelines of an AI agent.
Every guideline has the form "When <condition>, then <action>".

You receive one candidate guideline and a numbered list of comparison guidelines.
For EVERY comparison guideline, give two independent judgments:

1. conditionOverlapSeverity (1-10): how likely it is that both conditions hold at the same time.
   1 = they can never apply together, 10 = whenever one applies the other does too.
2. actionContradictionSeverity (1-10): assuming both conditions hold, how strongly the two actions
   conflict. 1 = fully compatible, 10 = following one makes following the other impossible.

Judge the actions as an agent would have to carry them out in a single reply.
Different wording for the same behavior is NOT a contradiction.

Respond with a JSON object:
{"evaluations": [{"comparisonId": <number from the list>, "conditionOverlapSeverity": <1-10>, "actionContradictionSeverity": <1-10>, "rationale": "<one sentence>"}]}

Example:
Candidate: When the customer greets you, then greet them back with "Hello"
[1] When the customer greets you, then reply with "Good bye"
{"evaluations": [{"comparisonId": 1, "conditionOverlapSeverity": 10, "actionContradictionSeverity": 9, "rationale": "Both fire on a greeting but demand different, incompatible replies."}]}`;

const CONNECTION_SYSTEM_PROMPT = `You are a connection-proposer for the behavioral guidelines of an AI agent.
Every guideline has the form "When <condition>, then <action>".

You receive a numbered list of guidelines. Guideline [0] is the candidate; the others are comparisons.
Find directional connections that involve the candidate: guideline S connects to guideline T when
carrying out S's action makes T's condition true.

- kind "entails": T's condition always holds once S's action is performed.
- kind "suggests": T's condition is likely, but not certain, to hold once S's action is performed.
- score (1-10): your confidence that the connection is real.

Never connect a guideline to itself. Only report connections where [0] is the source or the target.

Respond with a JSON object:
{"connections": [{"sourceId": <number>, "targetId": <number>, "kind": "entails" | "suggests", "score": <1-10>, "rationale": "<one sentence>"}]}
Respond with {"connections": []} when there are none.`;

export function createGuidelineClassifier(llmClient: LlmClient): GuidelineClassifier {
  return {
    async classifyCoherence(
      candidate: GuidelineContent,
      comparisons: readonly GuidelineContent[],
      signal?: AbortSignal,
    ): Promise<readonly CoherenceVerdict[]> {
      if (comparisons.length === 0) {
        return [];
      }

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: COHERENCE_SYSTEM_PROMPT,
          userMessage: `Candidate: ${formatGuideline(candidate)}\n\nComparison guidelines:\n${formatNumbered(comparisons, formatGuideline, 1)}`,
          jsonSchema: GuidelineCoherenceResultJsonSchema as Record<string, unknown>,
          signal,
        },
        schema: GuidelineCoherenceResultSchema,
        agentName: 'GuidelineCoherenceClassifier',
      });

      const verdicts = result.evaluations.map((e) => ({
        comparisonIndex: e.comparisonId - 1,
        relatednessSeverity: e.conditionOverlapSeverity,
        contradictionSeverity: e.actionContradictionSeverity,
        rationale: e.rationale,
      }));

      log.debug(
        { comparisons: comparisons.length, verdicts: verdicts.length },
        'Guideline coherence classified',
      );

      return verdicts;
    },

    async classifyConnection(
      candidate: GuidelineContent,
      comparisons: readonly GuidelineContent[],
      signal?: AbortSignal,
    ): Promise<readonly ConnectionVerdict[]> {
      if (comparisons.length === 0) {
        return [];
      }

      const result = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: CONNECTION_SYSTEM_PROMPT,
          userMessage: `Guidelines:\n${formatNumbered([candidate, ...comparisons], formatGuideline, 0)}`,
          jsonSchema: GuidelineConnectionResultJsonSchema as Record<string, unknown>,
          signal,
        },
        schema: GuidelineConnectionResultSchema,
        agentName: 'GuidelineConnectionClassifier',
      });

      log.debug(
        { comparisons: comparisons.length, connections: result.connections.length },
        'Guideline connections classified',
      );

      return result.connections.map((c) => ({
        sourceIndex: c.sourceId,
        targetIndex: c.targetId,
        score: c.score,
        kind: c.kind,
        rationale: c.rationale,
      }));
    },
  };
}
