import { describe, it, expect, beforeEach } from 'vitest';
import { Firestore } from '@google-cloud/firestore';
import type { GuidelinePayload } from '@tenet/shared/src/types/evaluation.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import { computePayloadChecksum } from '@tenet/shared/src/utils/invoice.js';
import { createFirestoreEvaluationRepository } from './firestore-evaluation.repository.js';

const payload: GuidelinePayload = {
  kind: 'guideline',
  content: { condition: 'the customer greets you', action: "greet them back with 'Hello'" },
  operation: 'add',
  coherenceCheck: true,
  connectionProposition: true,
};

describe('FirestoreEvaluationRepository (integration)', () => {
  const db = new Firestore({ projectId: 'tenet-test', ignoreUndefinedProperties: true });
  const runBase = db.collection('test-runs').doc('evaluations');
  const repo = createFirestoreEvaluationRepository(runBase);

  beforeEach(async () => {
    const docs = await runBase.collection('evaluations').listDocuments();
    for (const doc of docs) {
      await doc.delete();
    }
  });

  it('should create and read a pending evaluation', async () => {
    const created = await repo.create({ ownerId: 'agent-1', payloads: [payload] });

    const loaded = await repo.read(created.id);
    expect(loaded.status).toBe('pending');
    expect(loaded.progress).toBe(0);
    expect(loaded.createdAt).toBeInstanceOf(Date);
    expect(loaded.invoices).toHaveLength(1);
    expect(loaded.invoices[0].checksum).toBe(computePayloadChecksum(payload));
  });

  it('should apply partial updates', async () => {
    const created = await repo.create({ ownerId: 'agent-1', payloads: [payload] });

    await repo.update(created.id, { progress: 40 });
    const updated = await repo.update(created.id, { status: 'failed', error: 'boom' });

    expect(updated.progress).toBe(40);
    expect(updated.status).toBe('failed');
    expect((await repo.read(created.id)).error).toBe('boom');
  });

  it('should reject unknown evaluations', async () => {
    await expect(repo.read('missing')).rejects.toThrow(NotFoundError);
    await expect(repo.update('missing', { progress: 10 })).rejects.toThrow(NotFoundError);
  });

  it('should let only one evaluation run at a time', async () => {
    const first = await repo.create({ ownerId: 'agent-1', payloads: [payload] });
    const second = await repo.create({ ownerId: 'agent-1', payloads: [payload] });

    const claimed = await repo.markRunning(first.id);
    const blocked = await repo.markRunning(second.id);

    expect(claimed.acquired).toBe(true);
    expect(blocked).toEqual({ acquired: false, runningEvaluationId: first.id });
    expect((await repo.read(second.id)).status).toBe('pending');
  });

  it('should list evaluations by creation time', async () => {
    const first = await repo.create({ ownerId: 'agent-1', payloads: [payload] });
    const second = await repo.create({ ownerId: 'agent-2', payloads: [payload] });

    const all = await repo.list();
    expect(all.map((e) => e.id)).toEqual([first.id, second.id]);
  });
});
