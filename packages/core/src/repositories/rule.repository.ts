import type {
  GuidelineContent,
  StoredRule,
  StyleGuideContent,
} from '@tenet/shared/src/types/rule.types.js';

export interface CreateRuleInput<C> {
  readonly ownerId: string;
  readonly content: C;
}

export interface RuleRepository<C> {
  create(input: CreateRuleInput<C>): Promise<StoredRule<C>>;
  getById(id: string): Promise<StoredRule<C> | null>;
  listByOwner(ownerId: string): Promise<readonly StoredRule<C>[]>;
  /** Replaces the content; rejects with NotFoundError for an unknown id. */
  update(id: string, content: C): Promise<StoredRule<C>>;
  delete(id: string): Promise<void>;
}

export type GuidelineRepository = RuleRepository<GuidelineContent>;
export type StyleGuideRepository = RuleRepository<StyleGuideContent>;
