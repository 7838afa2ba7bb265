import { Timestamp } from '@google-cloud/firestore';
import type { Query } from '@google-cloud/firestore';
import type { ConnectionKind, GuidelineConnection } from '@tenet/shared/src/types/rule.types.js';
import { NotFoundError } from '@tenet/shared/src/utils/errors.js';
import type {
  CreateGuidelineConnectionInput,
  GuidelineConnectionRepository,
  ListGuidelineConnectionsFilter,
} from '../repositories/guideline-connection.repository.js';
import type { FirestoreBase } from './firestore-types.js';

const CONNECTIONS_COLLECTION = 'guideline-connections';

interface GuidelineConnectionDocument {
  source: string;
  target: string;
  kind: ConnectionKind;
  createdAt: Timestamp;
}

function connectionFromDoc(id: string, data: GuidelineConnectionDocument): GuidelineConnection {
  return {
    id,
    source: data.source,
    target: data.target,
    kind: data.kind,
    createdAt: data.createdAt.toDate(),
  };
}

export function createFirestoreGuidelineConnectionRepository(
  base: FirestoreBase,
): GuidelineConnectionRepository {
  const connectionsRef = base.collection(CONNECTIONS_COLLECTION);

  return {
    async create(input: CreateGuidelineConnectionInput): Promise<GuidelineConnection> {
      const docData: GuidelineConnectionDocument = {
        source: input.source,
        target: input.target,
        kind: input.kind,
        createdAt: Timestamp.now(),
      };
      const docRef = connectionsRef.doc();
      await docRef.set(docData);
      return connectionFromDoc(docRef.id, docData);
    },

    async list(filter: ListGuidelineConnectionsFilter): Promise<readonly GuidelineConnection[]> {
      let query: Query = connectionsRef;
      if (filter.source !== undefined) {
        query = query.where('source', '==', filter.source);
      }
      if (filter.target !== undefined) {
        query = query.where('target', '==', filter.target);
      }

      const snapshot = await query.get();
      return snapshot.docs.map((doc) =>
        connectionFromDoc(doc.id, doc.data() as GuidelineConnectionDocument),
      );
    },

    async delete(id: string): Promise<void> {
      const docRef = connectionsRef.doc(id);
      const doc = await docRef.get();
      if (!doc.exists) {
        throw new NotFoundError(`Guideline connection not found: ${id}`);
      }
      await docRef.delete();
    },
  };
}
