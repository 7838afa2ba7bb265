import { describe, it, expect } from 'vitest';
import { createInMemoryGuidelineConnectionRepository } from './in-memory-guideline-connection.repository.js';

describe('InMemoryGuidelineConnectionRepository', () => {
  it('should create and filter connections by endpoint', async () => {
    const repo = createInMemoryGuidelineConnectionRepository();
    const ab = await repo.create({ source: 'a', target: 'b', kind: 'entails' });
    const bc = await repo.create({ source: 'b', target: 'c', kind: 'suggests' });

    expect(await repo.list({ source: 'a' })).toEqual([ab]);
    expect(await repo.list({ target: 'c' })).toEqual([bc]);
    expect(await repo.list({ source: 'a', target: 'c' })).toEqual([]);
    expect(await repo.list({})).toHaveLength(2);
  });

  it('should delete a connection', async () => {
    const repo = createInMemoryGuidelineConnectionRepository();
    const connection = await repo.create({ source: 'a', target: 'b', kind: 'entails' });

    await repo.delete(connection.id);

    expect(await repo.list({})).toEqual([]);
    await expect(repo.delete(connection.id)).rejects.toThrow(
      `Guideline connection not found: ${connection.id}`,
    );
  });
});
