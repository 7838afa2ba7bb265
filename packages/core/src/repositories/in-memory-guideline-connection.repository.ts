import { randomUUID } from 'node:crypto';
import type { GuidelineConnection } from '@tenet/shared/src/types/rule.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import type {
  CreateGuidelineConnectionInput,
  GuidelineConnectionRepository,
  ListGuidelineConnectionsFilter,
} from './guideline-connection.repository.js';

export function createInMemoryGuidelineConnectionRepository(): GuidelineConnectionRepository {
  const connections = new Map<string, GuidelineConnection>();

  return {
    create(input: CreateGuidelineConnectionInput): Promise<GuidelineConnection> {
      const connection: GuidelineConnection = {
        id: randomUUID(),
        source: input.source,
        target: input.target,
        kind: input.kind,
        createdAt: new Date(),
      };
      connections.set(connection.id, connection);
      return Promise.resolve(connection);
    },

    list(filter: ListGuidelineConnectionsFilter): Promise<readonly GuidelineConnection[]> {
      const result = [...connections.values()].filter(
        (c) =>
          (filter.source === undefined || c.source === filter.source) &&
          (filter.target === undefined || c.target === filter.target),
      );
      return Promise.resolve(result);
    },

    delete(id: string): Promise<void> {
      if (!connections.delete(id)) {
        return Promise.reject(new NotFoundError(`Guideline connection not found: ${id}`));
      }
      return Promise.resolve();
    },
  };
}
