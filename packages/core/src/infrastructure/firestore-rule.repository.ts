import { Timestamp } from '@google-cloud/firestore';
import type {
  GuidelineContent,
  StoredRule,
  StyleGuideContent,
} from '@tenet/shared/src/types/rule.types.js';
import { NotFoundError, PersistenceError } from '@tenet/shared/src/utils/errors.js';
import type {
  CreateRuleInput,
  GuidelineRepository,
  RuleRepository,
  StyleGuideRepository,
} from '../repositories/rule.repository.js';
import type { FirestoreBase } from './firestore-types.js';

const GUIDELINES_COLLECTION = 'guidelines';
const STYLE_GUIDES_COLLECTION = 'style-guides';

interface RuleDocument<C> {
  ownerId: string;
  content: C;
  createdAt: Timestamp;
}

function ruleFromDoc<C>(id: string, data: RuleDocument<C>): StoredRule<C> {
  return {
    id,
    ownerId: data.ownerId,
    content: data.content,
    createdAt: data.createdAt.toDate(),
  };
}

function createFirestoreRuleRepository<C>(
  base: FirestoreBase,
  collection: string,
  label: string,
): RuleRepository<C> {
  const rulesRef = base.collection(collection);

  return {
    async create(input: CreateRuleInput<C>): Promise<StoredRule<C>> {
      const docData: RuleDocument<C> = {
        ownerId: input.ownerId,
        content: input.content,
        createdAt: Timestamp.now(),
      };

      const docRef = rulesRef.doc();
      try {
        await docRef.set(docData);
      } catch (error) {
        throw new PersistenceError(
          `Failed to create ${label.toLowerCase()}`,
          error instanceof Error ? error : undefined,
        );
      }

      return ruleFromDoc(docRef.id, docData);
    },

    async getById(id: string): Promise<StoredRule<C> | null> {
      const doc = await rulesRef.doc(id).get();
      if (!doc.exists) {
        return null;
      }
      return ruleFromDoc(id, doc.data() as RuleDocument<C>);
    },

    async listByOwner(ownerId: string): Promise<readonly StoredRule<C>[]> {
      // Sorted here so the owner filter needs no composite index.
      const snapshot = await rulesRef.where('ownerId', '==', ownerId).get();
      return snapshot.docs
        .map((doc) => ruleFromDoc(doc.id, doc.data() as RuleDocument<C>))
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    },

    async update(id: string, content: C): Promise<StoredRule<C>> {
      const docRef = rulesRef.doc(id);
      const doc = await docRef.get();
      if (!doc.exists) {
        throw new NotFoundError(`${label} not found: ${id}`);
      }

      try {
        await docRef.update({ content });
      } catch (error) {
        throw new PersistenceError(
          `Failed to update ${label.toLowerCase()} ${id}`,
          error instanceof Error ? error : undefined,
        );
      }

      return ruleFromDoc(id, { ...(doc.data() as RuleDocument<C>), content });
    },

    async delete(id: string): Promise<void> {
      const docRef = rulesRef.doc(id);
      const doc = await docRef.get();
      if (!doc.exists) {
        throw new NotFoundError(`${label} not found: ${id}`);
      }
      await docRef.delete();
    },
  };
}

export function createFirestoreGuidelineRepository(base: FirestoreBase): GuidelineRepository {
  return createFirestoreRuleRepository<GuidelineContent>(base, GUIDELINES_COLLECTION, 'Guideline');
}

export function createFirestoreStyleGuideRepository(base: FirestoreBase): StyleGuideRepository {
  return createFirestoreRuleRepository<StyleGuideContent>(
    base,
    STYLE_GUIDES_COLLECTION,
    'Style guide',
  );
}
