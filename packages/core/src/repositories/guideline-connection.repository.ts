import type {
  ConnectionKind,
  GuidelineConnection,
} from '@tenet/shared/src/types/rule.types.js';

export interface CreateGuidelineConnectionInput {
  readonly source: string;
  readonly target: string;
  readonly kind: ConnectionKind;
}

export interface ListGuidelineConnectionsFilter {
  readonly source?: string;
  readonly target?: string;
}

export interface GuidelineConnectionRepository {
  create(input: CreateGuidelineConnectionInput): Promise<GuidelineConnection>;
  /** Connections matching every given endpoint; both omitted lists all. */
  list(filter: ListGuidelineConnectionsFilter): Promise<readonly GuidelineConnection[]>;
  delete(id: string): Promise<void>;
}
