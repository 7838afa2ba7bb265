import type {
  GuidelineInvoice,
  Invoice,
  StyleGuideInvoice,
} from '@tenet/shared/src/types/evaluation.types.js';
import type {
  Guideline,
  GuidelineConnection,
  GuidelineContent,
  StyleGuide,
} from '@tenet/shared/src/types/rule.types.js';
import {
  ChecksumMismatchError,
  EvaluationValidationError,
  NotFoundError,
  UnapprovedInvoiceError,
} from '@tenet/shared/src/utils/errors.js';
import { computePayloadChecksum } from '@tenet/shared/src/utils/invoice.js';
import { guidelineKey } from '@tenet/shared/src/utils/rule-content.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { GuidelineConnectionRepository } from '../../repositories/guideline-connection.repository.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '../../repositories/rule.repository.js';

const log = createChildLogger('commit:rule-committer');

export interface RuleCommitterConfig {
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly guidelineConnectionRepository: GuidelineConnectionRepository;
}

export interface GuidelineCommitResult {
  readonly guidelines: readonly Guideline[];
  readonly connections: readonly GuidelineConnection[];
}

export interface RuleCommitter {
  /**
   * Applies approved guideline invoices and their connection propositions.
   * Every invoice is verified before the first write.
   */
  commitGuidelines(ownerId: string, invoices: readonly Invoice[]): Promise<GuidelineCommitResult>;
  commitStyleGuides(ownerId: string, invoices: readonly Invoice[]): Promise<readonly StyleGuide[]>;
}

function verifyInvoice(invoice: GuidelineInvoice | StyleGuideInvoice): void {
  if (!invoice.approved || invoice.data === null || invoice.data.coherenceChecks.length > 0) {
    throw new UnapprovedInvoiceError('Unapproved invoice.');
  }

  if (invoice.payload.operation === 'update' && !invoice.payload.updatedId) {
    throw new EvaluationValidationError('Update payload is missing updatedId.');
  }

  const actual = computePayloadChecksum(invoice.payload);
  if (actual !== invoice.checksum) {
    throw new ChecksumMismatchError(
      'Invoice checksum does not match its payload.',
      invoice.checksum,
      actual,
    );
  }
}

function verifyUpdateTargets(
  label: string,
  updatedIds: readonly string[],
  existingIds: ReadonlySet<string>,
): void {
  const missing = updatedIds.filter((id) => !existingIds.has(id));
  if (missing.length > 0) {
    throw new NotFoundError(`${label} not found: ${missing.join(', ')}`);
  }
}

function updatedIdsOf(invoices: readonly (GuidelineInvoice | StyleGuideInvoice)[]): string[] {
  return invoices.flatMap((i) =>
    i.payload.operation === 'update' && i.payload.updatedId ? [i.payload.updatedId] : [],
  );
}

function describeGuideline(content: GuidelineContent): string {
  return `When ${content.condition}, then ${content.action}`;
}

export function createRuleCommitter(config: RuleCommitterConfig): RuleCommitter {
  const { guidelineRepository, styleGuideRepository, guidelineConnectionRepository } = config;

  async function removeConnectionsOf(guidelineId: string): Promise<void> {
    const [outgoing, incoming] = await Promise.all([
      guidelineConnectionRepository.list({ source: guidelineId }),
      guidelineConnectionRepository.list({ target: guidelineId }),
    ]);
    const ids = new Set([...outgoing, ...incoming].map((c) => c.id));
    for (const id of ids) {
      await guidelineConnectionRepository.delete(id);
    }
  }

  return {
    async commitGuidelines(
      ownerId: string,
      invoices: readonly Invoice[],
    ): Promise<GuidelineCommitResult> {
      const guidelineInvoices = invoices.map((invoice): GuidelineInvoice => {
        if (invoice.kind !== 'guideline') {
          throw new EvaluationValidationError(
            `Expected guideline invoices, got a ${invoice.kind} invoice.`,
          );
        }
        verifyInvoice(invoice);
        return invoice;
      });

      const existing = await guidelineRepository.listByOwner(ownerId);
      const updatedIds = updatedIdsOf(guidelineInvoices);
      verifyUpdateTargets('Guideline', updatedIds, new Set(existing.map((g) => g.id)));

      const replaced = new Set(updatedIds);
      const unaffectedByKey = new Map(
        existing.filter((g) => !replaced.has(g.id)).map((g) => [guidelineKey(g.content), g.id]),
      );
      const payloadKeys = new Set(guidelineInvoices.map((i) => guidelineKey(i.payload.content)));

      const propositions = guidelineInvoices.flatMap((i) => i.data?.connectionPropositions ?? []);
      for (const proposition of propositions) {
        for (const endpoint of [proposition.source, proposition.target]) {
          const key = guidelineKey(endpoint);
          if (!payloadKeys.has(key) && !unaffectedByKey.has(key)) {
            throw new EvaluationValidationError(
              `Connection endpoint is not part of '${ownerId}' rule set: ${describeGuideline(endpoint)}`,
            );
          }
        }
      }

      const committed: Guideline[] = [];
      const committedByKey = new Map<string, string>();

      for (const invoice of guidelineInvoices) {
        const { payload } = invoice;
        let guideline: Guideline;

        if (payload.operation === 'update' && payload.updatedId) {
          if (payload.connectionProposition) {
            await removeConnectionsOf(payload.updatedId);
          }
          guideline = await guidelineRepository.update(payload.updatedId, payload.content);
        } else {
          guideline = await guidelineRepository.create({ ownerId, content: payload.content });
        }

        committed.push(guideline);
        committedByKey.set(guidelineKey(guideline.content), guideline.id);
      }

      const resolve = (content: GuidelineContent): string | undefined => {
        const key = guidelineKey(content);
        return committedByKey.get(key) ?? unaffectedByKey.get(key);
      };

      const connections: GuidelineConnection[] = [];
      const seenPairs = new Set<string>();

      for (const proposition of propositions) {
        const source = resolve(proposition.source);
        const target = resolve(proposition.target);
        if (source === undefined || target === undefined || source === target) {
          continue;
        }

        const pair = `${source}:${target}`;
        if (seenPairs.has(pair)) {
          continue;
        }
        seenPairs.add(pair);

        const stored = await guidelineConnectionRepository.list({ source, target });
        if (stored.length > 0) {
          continue;
        }

        connections.push(
          await guidelineConnectionRepository.create({
            source,
            target,
            kind: proposition.connectionKind,
          }),
        );
      }

      log.info(
        { ownerId, guidelines: committed.length, connections: connections.length },
        'Guidelines committed',
      );

      return { guidelines: committed, connections };
    },

    async commitStyleGuides(
      ownerId: string,
      invoices: readonly Invoice[],
    ): Promise<readonly StyleGuide[]> {
      const styleGuideInvoices = invoices.map((invoice): StyleGuideInvoice => {
        if (invoice.kind !== 'style_guide') {
          throw new EvaluationValidationError(
            `Expected style_guide invoices, got a ${invoice.kind} invoice.`,
          );
        }
        verifyInvoice(invoice);
        return invoice;
      });

      const existing = await styleGuideRepository.listByOwner(ownerId);
      verifyUpdateTargets(
        'Style guide',
        updatedIdsOf(styleGuideInvoices),
        new Set(existing.map((s) => s.id)),
      );

      const committed: StyleGuide[] = [];
      for (const { payload } of styleGuideInvoices) {
        committed.push(
          payload.operation === 'update' && payload.updatedId
            ? await styleGuideRepository.update(payload.updatedId, payload.content)
            : await styleGuideRepository.create({ ownerId, content: payload.content }),
        );
      }

      log.info({ ownerId, styleGuides: committed.length }, 'Style guides committed');

      return committed;
    },
  };
}
