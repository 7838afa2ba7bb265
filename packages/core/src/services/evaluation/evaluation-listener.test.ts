import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import { createInMemoryEvaluationRepository } from '../../repositories/in-memory-evaluation.repository.js';
import type { EvaluationRepository } from '../../repositories/evaluation.repository.js';
import { createEvaluationListener } from './evaluation-listener.js';

describe('createEvaluationListener', () => {
  let repo: EvaluationRepository;

  beforeEach(() => {
    repo = createInMemoryEvaluationRepository();
  });

  async function createEvaluation(): Promise<string> {
    const evaluation = await repo.create({
      ownerId: 'agent-1',
      payloads: [
        {
          kind: 'style_guide',
          content: { principle: 'Be concise', examples: [] },
          operation: 'add',
          coherenceCheck: true,
        },
      ],
    });
    return evaluation.id;
  }

  it('should resolve true right away for a finished evaluation', async () => {
    const id = await createEvaluation();
    await repo.update(id, { status: 'failed', error: 'boom' });

    const listener = createEvaluationListener(repo, 10);

    expect(await listener.waitForCompletion(id, 0)).toBe(true);
  });

  it('should resolve false when the evaluation is still pending at the deadline', async () => {
    const id = await createEvaluation();
    const listener = createEvaluationListener(repo, 5);

    expect(await listener.waitForCompletion(id, 20)).toBe(false);
  });

  it('should notice a completion while polling', async () => {
    const id = await createEvaluation();
    const listener = createEvaluationListener(repo, 5);

    setTimeout(() => {
      void repo.update(id, { status: 'completed', progress: 100 });
    }, 15);

    expect(await listener.waitForCompletion(id, 2000)).toBe(true);
  });

  it('should reject for an unknown evaluation', async () => {
    const listener = createEvaluationListener(repo, 5);

    await expect(listener.waitForCompletion('missing', 100)).rejects.toThrow(NotFoundError);
  });
});
