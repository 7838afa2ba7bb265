import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { BehavioralChangeEvaluator } from '@tenet/core/src/services/evaluation/behavioral-change-evaluator.js';
import type { EvaluationListener } from '@tenet/core/src/services/evaluation/evaluation-listener.js';
import type { Evaluation } from '@tenet/shared/src/types/evaluation.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import { createRouter, type AppEnv } from '../types.js';
import { toEvaluationResponse } from '../dto.js';
import {
  CreateEvaluationRequestSchema,
  EvaluationIdParamSchema,
  ReadEvaluationQuerySchema,
} from '../schemas/requests.js';
import { ErrorResponseSchema, EvaluationResponseSchema } from '../schemas/responses.js';

export interface EvaluationRoutesDeps {
  readonly evaluator: BehavioralChangeEvaluator;
  readonly listener: EvaluationListener;
}

const createEvaluationRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Evaluations'],
  summary: 'Submit payloads for a background evaluation',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CreateEvaluationRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Evaluation created; it starts as pending',
      content: {
        'application/json': {
          schema: EvaluationResponseSchema,
        },
      },
    },
    400: {
      description: 'Malformed request body',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    422: {
      description: 'Payloads rejected by validation',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const readEvaluationRoute = createRoute({
  method: 'get',
  path: '/{evaluationId}',
  tags: ['Evaluations'],
  summary: 'Read an evaluation, optionally waiting for it to finish',
  request: {
    params: EvaluationIdParamSchema,
    query: ReadEvaluationQuerySchema,
  },
  responses: {
    200: {
      description: 'Evaluation with its invoices',
      content: {
        'application/json': {
          schema: EvaluationResponseSchema,
        },
      },
    },
    404: {
      description: 'Evaluation not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    504: {
      description: 'Evaluation did not finish within waitForCompletion seconds',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createEvaluationRoutes(deps: EvaluationRoutesDeps): OpenAPIHono<AppEnv> {
  const { evaluator, listener } = deps;
  const routes = createRouter();

  async function findEvaluation(id: string): Promise<Evaluation | null> {
    try {
      return await evaluator.readEvaluation(id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  routes.openapi(createEvaluationRoute, async (c) => {
    const body = c.req.valid('json');

    const evaluationId = await evaluator.createEvaluationTask(body.ownerId, body.payloads);
    const evaluation = await evaluator.readEvaluation(evaluationId);

    return c.json(toEvaluationResponse(evaluation), 201);
  });

  routes.openapi(readEvaluationRoute, async (c) => {
    const { evaluationId } = c.req.valid('param');
    const { waitForCompletion } = c.req.valid('query');

    const notFound = () =>
      c.json(
        {
          error: `Evaluation not found: ${evaluationId}`,
          code: 'EVALUATION_NOT_FOUND',
          requestId: c.get('requestId'),
        },
        404,
      );

    if ((await findEvaluation(evaluationId)) === null) {
      return notFound();
    }

    if (waitForCompletion !== undefined && waitForCompletion > 0) {
      const finished = await listener.waitForCompletion(evaluationId, waitForCompletion * 1000);
      if (!finished) {
        return c.json(
          {
            error: `Evaluation ${evaluationId} did not finish within ${String(waitForCompletion)}s`,
            code: 'EVALUATION_TIMEOUT',
            requestId: c.get('requestId'),
          },
          504,
        );
      }
    }

    const evaluation = await findEvaluation(evaluationId);
    if (!evaluation) {
      return notFound();
    }

    return c.json(toEvaluationResponse(evaluation), 200);
  });

  return routes;
}
