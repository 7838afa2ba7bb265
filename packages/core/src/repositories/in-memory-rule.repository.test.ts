import { describe, it, expect } from 'vitest';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import {
  createInMemoryGuidelineRepository,
  createInMemoryStyleGuideRepository,
} from './in-memory-rule.repository.js';

const weather = { condition: 'the customer asks about the weather', action: 'provide weather update' };

describe('InMemoryGuidelineRepository', () => {
  it('should create and retrieve a guideline', async () => {
    const repo = createInMemoryGuidelineRepository();
    const guideline = await repo.create({ ownerId: 'agent-1', content: weather });

    expect(guideline.id).toBeDefined();
    expect(guideline.ownerId).toBe('agent-1');
    expect(guideline.createdAt).toBeInstanceOf(Date);
    expect(await repo.getById(guideline.id)).toEqual(guideline);
  });

  it('should return null for a nonexistent guideline', async () => {
    const repo = createInMemoryGuidelineRepository();
    expect(await repo.getById('nonexistent')).toBeNull();
  });

  it('should list guidelines by owner only', async () => {
    const repo = createInMemoryGuidelineRepository();
    await repo.create({ ownerId: 'agent-1', content: weather });
    await repo.create({ ownerId: 'agent-2', content: weather });

    const listed = await repo.listByOwner('agent-1');
    expect(listed).toHaveLength(1);
    expect(listed[0].ownerId).toBe('agent-1');
  });

  it('should replace content on update and keep the id', async () => {
    const repo = createInMemoryGuidelineRepository();
    const guideline = await repo.create({ ownerId: 'agent-1', content: weather });

    const updated = await repo.update(guideline.id, { ...weather, action: 'provide a forecast' });

    expect(updated.id).toBe(guideline.id);
    expect(updated.content.action).toBe('provide a forecast');
    expect((await repo.getById(guideline.id))?.content.action).toBe('provide a forecast');
  });

  it('should reject updates and deletes of unknown ids', async () => {
    const repo = createInMemoryGuidelineRepository();

    await expect(repo.update('missing', weather)).rejects.toThrow(NotFoundError);
    await expect(repo.delete('missing')).rejects.toThrow('Guideline not found: missing');
  });

  it('should delete a guideline', async () => {
    const repo = createInMemoryGuidelineRepository();
    const guideline = await repo.create({ ownerId: 'agent-1', content: weather });

    await repo.delete(guideline.id);

    expect(await repo.getById(guideline.id)).toBeNull();
  });
});

describe('InMemoryStyleGuideRepository', () => {
  it('should label missing style guides in errors', async () => {
    const repo = createInMemoryStyleGuideRepository();

    await expect(repo.update('missing', { principle: 'Be brief', examples: [] })).rejects.toThrow(
      'Style guide not found: missing',
    );
  });
});
