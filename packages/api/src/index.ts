import { serve } from '@hono/node-server';
import { createFirestoreClient } from '@tenet/core/src/infrastructure/firestore-client.js';
import { createFirestoreEvaluationRepository } from '@tenet/core/src/infrastructure/firestore-evaluation.repository.js';
import { createFirestoreGuidelineConnectionRepository } from '@tenet/core/src/infrastructure/firestore-guideline-connection.repository.js';
import {
  createFirestoreGuidelineRepository,
  createFirestoreStyleGuideRepository,
} from '@tenet/core/src/infrastructure/firestore-rule.repository.js';
import { createInMemoryEvaluationRepository } from '@tenet/core/src/repositories/in-memory-evaluation.repository.js';
import { createInMemoryGuidelineConnectionRepository } from '@tenet/core/src/repositories/in-memory-guideline-connection.repository.js';
import {
  createInMemoryGuidelineRepository,
  createInMemoryStyleGuideRepository,
} from '@tenet/core/src/repositories/in-memory-rule.repository.js';
import type { EvaluationRepository } from '@tenet/core/src/repositories/evaluation.repository.js';
import type { GuidelineConnectionRepository } from '@tenet/core/src/repositories/guideline-connection.repository.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '@tenet/core/src/repositories/rule.repository.js';
import { createLlmClient } from '@tenet/core/src/llm/llm-client.js';
import { createGuidelineClassifier } from '@tenet/core/src/agents/guideline-classifier.js';
import { createStyleGuideClassifier } from '@tenet/core/src/agents/style-guide-classifier.js';
import { createEvaluationServices } from '@tenet/core/src/services/evaluation/evaluation-services.js';
import { createRuleCommitter } from '@tenet/core/src/services/commit/rule-committer.js';
import { loadConfig } from '@tenet/schemas/src/config-loader.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

interface Repositories {
  readonly evaluationRepository: EvaluationRepository;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly guidelineConnectionRepository: GuidelineConnectionRepository;
}

function createRepositories(mockMode: boolean): Repositories {
  if (mockMode) {
    log.info('Using in-memory repositories');
    return {
      evaluationRepository: createInMemoryEvaluationRepository(),
      guidelineRepository: createInMemoryGuidelineRepository(),
      styleGuideRepository: createInMemoryStyleGuideRepository(),
      guidelineConnectionRepository: createInMemoryGuidelineConnectionRepository(),
    };
  }

  const db = createFirestoreClient();
  return {
    evaluationRepository: createFirestoreEvaluationRepository(db),
    guidelineRepository: createFirestoreGuidelineRepository(db),
    styleGuideRepository: createFirestoreStyleGuideRepository(db),
    guidelineConnectionRepository: createFirestoreGuidelineConnectionRepository(db),
  };
}

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['TENET_CONFIG_DIR'] ?? 'config';

  const config = await loadConfig(configDir);
  const llmClient = await createLlmClient();
  const repositories = createRepositories(process.env['TENET_MOCK_LLM'] === 'true');

  const { evaluator, listener, backgroundTasks } = createEvaluationServices({
    ...repositories,
    guidelineClassifier: createGuidelineClassifier(llmClient),
    styleGuideClassifier: createStyleGuideClassifier(llmClient),
    config: config.evaluation,
  });

  const committer = createRuleCommitter(repositories);

  const app = createApp({
    evaluator,
    listener,
    committer,
    guidelineRepository: repositories.guidelineRepository,
    styleGuideRepository: repositories.styleGuideRepository,
    backgroundTasks,
  });

  log.info({ port, configDir }, 'Starting Tenet API server');

  const server = serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Tenet API server running');
  });

  process.once('SIGTERM', () => {
    log.info({ running: backgroundTasks.runningTags() }, 'Shutting down, draining evaluations');
    server.close();
    backgroundTasks
      .drain()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Failed to drain background tasks',
        );
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
