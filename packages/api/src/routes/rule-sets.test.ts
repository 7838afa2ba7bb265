import { describe, it, expect, beforeEach } from 'vitest';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { BackgroundTaskService } from '@tenet/core/src/services/background-tasks/background-task-service.js';
import { computePayloadChecksum } from '@tenet/shared/src/utils/invoice.js';
import { createTestApp } from '../test-helpers.js';
import type { TestApp } from '../test-helpers.js';
import type { AppEnv } from '../types.js';
import type { EvaluationResponse } from '../schemas/responses.js';

const askWeather = {
  condition: 'the customer asks about the weather',
  action: 'provide the current weather update',
};

function jsonPost(body: Record<string, unknown>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

describe('Rule Set Routes', () => {
  let testApp: TestApp;
  let app: OpenAPIHono<AppEnv>;
  let backgroundTasks: BackgroundTaskService;

  beforeEach(() => {
    testApp = createTestApp();
    app = testApp.app;
    backgroundTasks = testApp.backgroundTasks;
  });

  async function evaluate(payloads: readonly Record<string, unknown>[]): Promise<EvaluationResponse> {
    const created = await app.request(
      '/evaluations',
      jsonPost({ ownerId: 'agent-1', payloads }),
    );
    const { id } = (await created.json()) as EvaluationResponse;
    await backgroundTasks.drain();
    return (await (await app.request(`/evaluations/${id}`)).json()) as EvaluationResponse;
  }

  describe('POST /rule-sets/:ownerId/guidelines', () => {
    it('should commit approved invoices', async () => {
      const evaluation = await evaluate([{ kind: 'guideline', content: askWeather }]);

      const res = await app.request(
        '/rule-sets/agent-1/guidelines',
        jsonPost({ invoices: evaluation.invoices }),
      );

      expect(res.status).toBe(201);
      const body = (await res.json()) as {
        guidelines: { id: string; ownerId: string; content: unknown }[];
        connections: unknown[];
      };
      expect(body.guidelines).toHaveLength(1);
      expect(body.guidelines[0]).toMatchObject({ ownerId: 'agent-1', content: askWeather });
      expect(body.connections).toEqual([]);

      const list = await app.request('/rule-sets/agent-1/guidelines');
      expect(list.status).toBe(200);
      const listed = (await list.json()) as { guidelines: { id: string }[] };
      expect(listed.guidelines.map((g) => g.id)).toEqual([body.guidelines[0].id]);
    });

    it('should return 409 when a payload changed after evaluation', async () => {
      const evaluation = await evaluate([{ kind: 'guideline', content: askWeather }]);
      const [invoice] = evaluation.invoices;
      const tampered = {
        ...invoice,
        payload: { ...invoice.payload, content: { ...askWeather, action: 'say it will rain' } },
      };

      const res = await app.request(
        '/rule-sets/agent-1/guidelines',
        jsonPost({ invoices: [tampered] }),
      );

      expect(res.status).toBe(409);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body['code']).toBe('CHECKSUM_MISMATCH');
      expect(await testApp.guidelineRepository.listByOwner('agent-1')).toEqual([]);
    });

    it('should return 422 for an invoice that is not approved', async () => {
      const evaluation = await evaluate([{ kind: 'guideline', content: askWeather }]);

      const res = await app.request(
        '/rule-sets/agent-1/guidelines',
        jsonPost({ invoices: [{ ...evaluation.invoices[0], approved: false }] }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toMatchObject({ code: 'UNAPPROVED_INVOICE', error: 'Unapproved invoice.' });
    });

    it('should return 422 for style guide invoices', async () => {
      const evaluation = await evaluate([
        { kind: 'style_guide', content: { principle: 'Be brief', examples: [] } },
      ]);

      const res = await app.request(
        '/rule-sets/agent-1/guidelines',
        jsonPost({ invoices: evaluation.invoices }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body['error']).toBe('Expected guideline invoices, got a style_guide invoice.');
    });

    it('should return 400 for an empty invoice list', async () => {
      const res = await app.request('/rule-sets/agent-1/guidelines', jsonPost({ invoices: [] }));

      expect(res.status).toBe(400);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body['code']).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /rule-sets/:ownerId/style-guides', () => {
    it('should commit approved invoices and list them', async () => {
      const evaluation = await evaluate([
        { kind: 'style_guide', content: { principle: 'Be brief', examples: [] } },
      ]);

      const res = await app.request(
        '/rule-sets/agent-1/style-guides',
        jsonPost({ invoices: evaluation.invoices }),
      );

      expect(res.status).toBe(201);
      const body = (await res.json()) as { styleGuides: { content: unknown }[] };
      expect(body.styleGuides.map((s) => s.content)).toEqual([
        { principle: 'Be brief', examples: [] },
      ]);

      const list = await app.request('/rule-sets/agent-1/style-guides');
      const listed = (await list.json()) as { styleGuides: unknown[] };
      expect(listed.styleGuides).toHaveLength(1);
    });

    it('should return 404 when the updated style guide does not exist', async () => {
      const payload = {
        kind: 'style_guide' as const,
        content: { principle: 'Be very brief', examples: [] },
        operation: 'update' as const,
        updatedId: 'missing-id',
        coherenceCheck: true,
      };
      const invoice = {
        kind: 'style_guide',
        payload,
        checksum: computePayloadChecksum(payload),
        approved: true,
        data: { kind: 'style_guide', coherenceChecks: [] },
        error: null,
      };

      const res = await app.request(
        '/rule-sets/agent-1/style-guides',
        jsonPost({ invoices: [invoice] }),
      );

      expect(res.status).toBe(404);
      const body = (await res.json()) as Record<string, unknown>;
      expect(body).toMatchObject({ code: 'NOT_FOUND', error: 'Style guide not found: missing-id' });
    });
  });

  describe('GET /rule-sets/:ownerId/guidelines', () => {
    it('should return an empty list for an unknown owner', async () => {
      const res = await app.request('/rule-sets/nobody/guidelines');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ guidelines: [] });
    });
  });
});
