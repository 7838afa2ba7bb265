import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { RuleCommitter } from '@tenet/core/src/services/commit/rule-committer.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '@tenet/core/src/repositories/rule.repository.js';
import { createRouter, type AppEnv } from '../types.js';
import { toConnectionResponse, toGuidelineResponse, toStyleGuideResponse } from '../dto.js';
import { CommitInvoicesRequestSchema, OwnerIdParamSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  GuidelineCommitResponseSchema,
  GuidelineListResponseSchema,
  StyleGuideListResponseSchema,
} from '../schemas/responses.js';

export interface RuleSetRoutesDeps {
  readonly committer: RuleCommitter;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
}

const commitErrorResponses = {
  400: {
    description: 'Malformed request body',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
  404: {
    description: 'Updated rule not found',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
  409: {
    description: 'Invoice checksum does not match its payload',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
  422: {
    description: 'Invoice is not approved or not of this rule kind',
    content: { 'application/json': { schema: ErrorResponseSchema } },
  },
} as const;

const commitGuidelinesRoute = createRoute({
  method: 'post',
  path: '/{ownerId}/guidelines',
  tags: ['Rule sets'],
  summary: 'Commit approved guideline invoices',
  request: {
    params: OwnerIdParamSchema,
    body: {
      content: {
        'application/json': {
          schema: CommitInvoicesRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Committed guidelines and the connections created for them',
      content: {
        'application/json': {
          schema: GuidelineCommitResponseSchema,
        },
      },
    },
    ...commitErrorResponses,
  },
});

const commitStyleGuidesRoute = createRoute({
  method: 'post',
  path: '/{ownerId}/style-guides',
  tags: ['Rule sets'],
  summary: 'Commit approved style guide invoices',
  request: {
    params: OwnerIdParamSchema,
    body: {
      content: {
        'application/json': {
          schema: CommitInvoicesRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Committed style guides',
      content: {
        'application/json': {
          schema: StyleGuideListResponseSchema,
        },
      },
    },
    ...commitErrorResponses,
  },
});

const listGuidelinesRoute = createRoute({
  method: 'get',
  path: '/{ownerId}/guidelines',
  tags: ['Rule sets'],
  summary: "List an owner's guidelines",
  request: {
    params: OwnerIdParamSchema,
  },
  responses: {
    200: {
      description: 'Guidelines of the owner',
      content: {
        'application/json': {
          schema: GuidelineListResponseSchema,
        },
      },
    },
  },
});

const listStyleGuidesRoute = createRoute({
  method: 'get',
  path: '/{ownerId}/style-guides',
  tags: ['Rule sets'],
  summary: "List an owner's style guides",
  request: {
    params: OwnerIdParamSchema,
  },
  responses: {
    200: {
      description: 'Style guides of the owner',
      content: {
        'application/json': {
          schema: StyleGuideListResponseSchema,
        },
      },
    },
  },
});

export function createRuleSetRoutes(deps: RuleSetRoutesDeps): OpenAPIHono<AppEnv> {
  const { committer, guidelineRepository, styleGuideRepository } = deps;
  const routes = createRouter();

  routes.openapi(commitGuidelinesRoute, async (c) => {
    const { ownerId } = c.req.valid('param');
    const { invoices } = c.req.valid('json');

    const result = await committer.commitGuidelines(ownerId, invoices);

    return c.json(
      {
        guidelines: result.guidelines.map(toGuidelineResponse),
        connections: result.connections.map(toConnectionResponse),
      },
      201,
    );
  });

  routes.openapi(commitStyleGuidesRoute, async (c) => {
    const { ownerId } = c.req.valid('param');
    const { invoices } = c.req.valid('json');

    const styleGuides = await committer.commitStyleGuides(ownerId, invoices);

    return c.json({ styleGuides: styleGuides.map(toStyleGuideResponse) }, 201);
  });

  routes.openapi(listGuidelinesRoute, async (c) => {
    const { ownerId } = c.req.valid('param');
    const guidelines = await guidelineRepository.listByOwner(ownerId);
    return c.json({ guidelines: guidelines.map(toGuidelineResponse) }, 200);
  });

  routes.openapi(listStyleGuidesRoute, async (c) => {
    const { ownerId } = c.req.valid('param');
    const styleGuides = await styleGuideRepository.listByOwner(ownerId);
    return c.json({ styleGuides: styleGuides.map(toStyleGuideResponse) }, 200);
  });

  return routes;
}
