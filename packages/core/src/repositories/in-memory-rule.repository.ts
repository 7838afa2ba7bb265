import { randomUUID } from 'node:crypto';
import type {
  GuidelineContent,
  StoredRule,
  StyleGuideContent,
} from '@tenet/shared/src/types/rule.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import type {
  CreateRuleInput,
  GuidelineRepository,
  RuleRepository,
  StyleGuideRepository,
} from './rule.repository.js';

function createInMemoryRuleRepository<C>(label: string): RuleRepository<C> {
  const rules = new Map<string, StoredRule<C>>();

  return {
    create(input: CreateRuleInput<C>): Promise<StoredRule<C>> {
      const rule: StoredRule<C> = {
        id: randomUUID(),
        ownerId: input.ownerId,
        content: input.content,
        createdAt: new Date(),
      };
      rules.set(rule.id, rule);
      return Promise.resolve(rule);
    },

    getById(id: string): Promise<StoredRule<C> | null> {
      return Promise.resolve(rules.get(id) ?? null);
    },

    listByOwner(ownerId: string): Promise<readonly StoredRule<C>[]> {
      return Promise.resolve([...rules.values()].filter((r) => r.ownerId === ownerId));
    },

    update(id: string, content: C): Promise<StoredRule<C>> {
      const existing = rules.get(id);
      if (!existing) {
        return Promise.reject(new NotFoundError(`${label} not found: ${id}`));
      }
      const updated: StoredRule<C> = { ...existing, content };
      rules.set(id, updated);
      return Promise.resolve(updated);
    },

    delete(id: string): Promise<void> {
      if (!rules.delete(id)) {
        return Promise.reject(new NotFoundError(`${label} not found: ${id}`));
      }
      return Promise.resolve();
    },
  };
}

export function createInMemoryGuidelineRepository(): GuidelineRepository {
  return createInMemoryRuleRepository<GuidelineContent>('Guideline');
}

export function createInMemoryStyleGuideRepository(): StyleGuideRepository {
  return createInMemoryRuleRepository<StyleGuideContent>('Style guide');
}
