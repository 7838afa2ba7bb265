import { resolve } from 'node:path';
import { z } from 'zod';
import { loadConfig } from '@tenet/schemas/src/config-loader.js';
import { PayloadSchema } from '@tenet/schemas/src/rule.schema.js';
import { createLlmClient } from '@tenet/core/src/llm/llm-client.js';
import { createGuidelineClassifier } from '@tenet/core/src/agents/guideline-classifier.js';
import { createStyleGuideClassifier } from '@tenet/core/src/agents/style-guide-classifier.js';
import { createInMemoryEvaluationRepository } from '@tenet/core/src/repositories/in-memory-evaluation.repository.js';
import {
  createInMemoryGuidelineRepository,
  createInMemoryStyleGuideRepository,
} from '@tenet/core/src/repositories/in-memory-rule.repository.js';
import { createEvaluationServices } from '@tenet/core/src/services/evaluation/evaluation-services.js';
import type { Invoice } from '@tenet/shared/src/types/evaluation.types.js';

const OWNER_ID = 'demo-agent';

const samplePayloads = z.array(PayloadSchema).parse([
  {
    kind: 'guideline',
    content: { condition: 'the customer greets you', action: "greet them back with 'Hello'" },
  },
  {
    kind: 'guideline',
    content: {
      condition: 'the customer asks about the weather',
      action: 'provide the current weather update',
    },
  },
  {
    kind: 'style_guide',
    content: { principle: 'Keep replies under three sentences', examples: [] },
  },
]);

function describeInvoice(invoice: Invoice): string {
  switch (invoice.kind) {
    case 'guideline':
      return `When ${invoice.payload.content.condition}, then ${invoice.payload.content.action}`;
    case 'style_guide':
      return invoice.payload.content.principle;
  }
}

async function main(): Promise<void> {
  const configDir = process.argv[2] ?? resolve(process.cwd(), 'config');

  console.log('=== Tenet Evaluation Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Mock LLM: ${process.env['TENET_MOCK_LLM'] === 'true' ? 'yes' : 'no'}\n`);

  const startTime = Date.now();

  const config = await loadConfig(configDir);
  const llmClient = await createLlmClient();

  const { evaluator, backgroundTasks } = createEvaluationServices({
    evaluationRepository: createInMemoryEvaluationRepository(),
    guidelineRepository: createInMemoryGuidelineRepository(),
    styleGuideRepository: createInMemoryStyleGuideRepository(),
    guidelineClassifier: createGuidelineClassifier(llmClient),
    styleGuideClassifier: createStyleGuideClassifier(llmClient),
    config: config.evaluation,
  });

  console.log(`Submitting ${String(samplePayloads.length)} payloads...\n`);
  const evaluationId = await evaluator.createEvaluationTask(OWNER_ID, samplePayloads);
  await backgroundTasks.drain();

  const evaluation = await evaluator.readEvaluation(evaluationId);
  const elapsed = Date.now() - startTime;

  console.log(`Evaluation ${evaluation.id}: ${evaluation.status} (${String(evaluation.progress)}%)`);
  if (evaluation.error) {
    console.log(`  Error: ${evaluation.error}`);
  }

  for (const invoice of evaluation.invoices) {
    console.log(`\n--- ${invoice.kind}: ${describeInvoice(invoice)} ---`);
    console.log(`  Approved: ${invoice.approved ? 'yes' : 'no'}`);
    console.log(`  Checksum: ${invoice.checksum}`);
    for (const check of invoice.data?.coherenceChecks ?? []) {
      console.log(`  Conflict (${check.kind}, severity ${String(check.severity)}): ${check.issue}`);
    }
    if (invoice.data?.kind === 'guideline') {
      for (const proposition of invoice.data.connectionPropositions ?? []) {
        console.log(
          `  Connection (${proposition.connectionKind}): ${proposition.source.action} -> ${proposition.target.condition}`,
        );
      }
    }
  }

  console.log(`\nDone in ${String(elapsed)}ms`);
}

main().catch((error: unknown) => {
  console.error('Evaluation run failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
