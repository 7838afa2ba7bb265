import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { BackgroundTaskService } from '@tenet/core/src/services/background-tasks/background-task-service.js';
import { createRouter, type AppEnv } from '../types.js';
import { HealthResponseSchema } from '../schemas/responses.js';

const SERVICE_VERSION = '0.1.0';

const healthRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Health'],
  summary: 'Health check with the number of background tasks in flight',
  responses: {
    200: {
      description: 'Service is healthy',
      content: {
        'application/json': {
          schema: HealthResponseSchema,
        },
      },
    },
  },
});

export function createHealthRoutes(backgroundTasks: BackgroundTaskService): OpenAPIHono<AppEnv> {
  const health = createRouter();

  health.openapi(healthRoute, (c) => {
    return c.json(
      {
        status: 'ok',
        version: SERVICE_VERSION,
        runningTasks: backgroundTasks.runningTags().length,
      },
      200,
    );
  });

  return health;
}
