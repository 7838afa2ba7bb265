import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { BackgroundTaskService } from '@tenet/core/src/services/background-tasks/background-task-service.js';
import type { RuleCommitter } from '@tenet/core/src/services/commit/rule-committer.js';
import type { BehavioralChangeEvaluator } from '@tenet/core/src/services/evaluation/behavioral-change-evaluator.js';
import type { EvaluationListener } from '@tenet/core/src/services/evaluation/evaluation-listener.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '@tenet/core/src/repositories/rule.repository.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createEvaluationRoutes } from './routes/evaluations.js';
import { createRuleSetRoutes } from './routes/rule-sets.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly evaluator: BehavioralChangeEvaluator;
  readonly listener: EvaluationListener;
  readonly committer: RuleCommitter;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly backgroundTasks: BackgroundTaskService;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(config.backgroundTasks));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Tenet API',
        version: '1.0.0',
        description: 'Coherence evaluation and commit of agent guidelines and style guides',
      },
    });
    return c.json(spec);
  });

  app.route(
    '/evaluations',
    createEvaluationRoutes({ evaluator: config.evaluator, listener: config.listener }),
  );
  app.route(
    '/rule-sets',
    createRuleSetRoutes({
      committer: config.committer,
      guidelineRepository: config.guidelineRepository,
      styleGuideRepository: config.styleGuideRepository,
    }),
  );

  return app;
}
