import { describe, it, expect } from 'vitest';
import { createTestApp } from '../test-helpers.js';

describe('Health Routes', () => {
  it('should report no running tasks on an idle app', async () => {
    const { app } = createTestApp();

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0', runningTasks: 0 });
  });

  it('should count an evaluation that has not settled yet', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { app, backgroundTasks } = createTestApp({
      styleGuideClassifier: {
        classifyCoherence: async () => {
          await gate;
          return [];
        },
      },
    });
    await app.request('/evaluations', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        ownerId: 'agent-1',
        payloads: [
          { kind: 'style_guide', content: { principle: 'Be brief', examples: [] } },
          { kind: 'style_guide', content: { principle: 'Never use emojis', examples: [] } },
        ],
      }),
    });

    const res = await app.request('/health');
    const body = (await res.json()) as Record<string, unknown>;

    expect(body['runningTasks']).toBe(1);
    release();
    await backgroundTasks.drain();
  });

  it('should serve the OpenAPI document', async () => {
    const { app } = createTestApp();

    const res = await app.request('/openapi.json');

    expect(res.status).toBe(200);
    const doc = (await res.json()) as { info: { title: string }; paths: Record<string, unknown> };
    expect(doc.info.title).toBe('Tenet API');
    expect(Object.keys(doc.paths)).toEqual(
      expect.arrayContaining([
        '/health',
        '/evaluations',
        '/evaluations/{evaluationId}',
        '/rule-sets/{ownerId}/guidelines',
        '/rule-sets/{ownerId}/style-guides',
      ]),
    );
  });
});
