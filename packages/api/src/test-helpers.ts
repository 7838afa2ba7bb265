import type { OpenAPIHono } from '@hono/zod-openapi';
import type { GuidelineClassifier, StyleGuideClassifier } from '@tenet/core/src/agents/types.js';
import type { EvaluationRepository } from '@tenet/core/src/repositories/evaluation.repository.js';
import type { GuidelineConnectionRepository } from '@tenet/core/src/repositories/guideline-connection.repository.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '@tenet/core/src/repositories/rule.repository.js';
import { createInMemoryEvaluationRepository } from '@tenet/core/src/repositories/in-memory-evaluation.repository.js';
import { createInMemoryGuidelineConnectionRepository } from '@tenet/core/src/repositories/in-memory-guideline-connection.repository.js';
import {
  createInMemoryGuidelineRepository,
  createInMemoryStyleGuideRepository,
} from '@tenet/core/src/repositories/in-memory-rule.repository.js';
import type { BackgroundTaskService } from '@tenet/core/src/services/background-tasks/background-task-service.js';
import { createRuleCommitter } from '@tenet/core/src/services/commit/rule-committer.js';
import { createEvaluationServices } from '@tenet/core/src/services/evaluation/evaluation-services.js';
import { DEFAULT_EVALUATION_CONFIG } from '@tenet/schemas/src/evaluation-config.schema.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly backgroundTasks: BackgroundTaskService;
  readonly evaluationRepository: EvaluationRepository;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly guidelineConnectionRepository: GuidelineConnectionRepository;
}

export interface TestAppOptions {
  readonly guidelineClassifier?: GuidelineClassifier;
  readonly styleGuideClassifier?: StyleGuideClassifier;
}

const silentGuidelineClassifier: GuidelineClassifier = {
  classifyCoherence: () => Promise.resolve([]),
  classifyConnection: () => Promise.resolve([]),
};

const silentStyleGuideClassifier: StyleGuideClassifier = {
  classifyCoherence: () => Promise.resolve([]),
};

/**
 * Wires the app on in-memory repositories. Classifiers default to ones that
 * find nothing, so every evaluated payload is approved.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const evaluationRepository = createInMemoryEvaluationRepository();
  const guidelineRepository = createInMemoryGuidelineRepository();
  const styleGuideRepository = createInMemoryStyleGuideRepository();
  const guidelineConnectionRepository = createInMemoryGuidelineConnectionRepository();

  const { evaluator, listener, backgroundTasks } = createEvaluationServices({
    evaluationRepository,
    guidelineRepository,
    styleGuideRepository,
    guidelineClassifier: options.guidelineClassifier ?? silentGuidelineClassifier,
    styleGuideClassifier: options.styleGuideClassifier ?? silentStyleGuideClassifier,
    config: {
      ...DEFAULT_EVALUATION_CONFIG,
      retry: { maxAttempts: 1, intervalMs: 0 },
      listener: { pollIntervalMs: 5 },
    },
  });

  const committer = createRuleCommitter({
    guidelineRepository,
    styleGuideRepository,
    guidelineConnectionRepository,
  });

  const app = createApp({
    evaluator,
    listener,
    committer,
    guidelineRepository,
    styleGuideRepository,
    backgroundTasks,
  });

  return {
    app,
    backgroundTasks,
    evaluationRepository,
    guidelineRepository,
    styleGuideRepository,
    guidelineConnectionRepository,
  };
}
