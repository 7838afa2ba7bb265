import { describe, it, expect, beforeEach } from 'vitest';
import type {
  ConnectionProposition,
  GuidelineInvoice,
  GuidelinePayload,
  StyleGuideInvoice,
  StyleGuidePayload,
} from '@tenet/shared/src/types/evaluation.types.js';
import type { GuidelineContent } from '@tenet/shared/src/types/rule.types.js';
import {
  ChecksumMismatchError,
  EvaluationValidationError,
  NotFoundError,
  UnapprovedInvoiceError,
} from '@tenet/shared/src/utils/errors.js';
import { computePayloadChecksum } from '@tenet/shared/src/utils/invoice.js';
import type { GuidelineConnectionRepository } from '../../repositories/guideline-connection.repository.js';
import type { GuidelineRepository, StyleGuideRepository } from '../../repositories/rule.repository.js';
import { createInMemoryGuidelineConnectionRepository } from '../../repositories/in-memory-guideline-connection.repository.js';
import {
  createInMemoryGuidelineRepository,
  createInMemoryStyleGuideRepository,
} from '../../repositories/in-memory-rule.repository.js';
import { createRuleCommitter } from './rule-committer.js';
import type { RuleCommitter } from './rule-committer.js';

const OWNER = 'agent-1';

const askWeather: GuidelineContent = {
  condition: 'the customer asks about the weather',
  action: 'provide the current weather update',
};
const weatherFollowUp: GuidelineContent = {
  condition: 'providing the weather update',
  action: 'mention the best time to go for a walk',
};
const greetHello: GuidelineContent = {
  condition: 'the customer greets you',
  action: "greet them back with 'Hello'",
};

function guidelinePayload(
  content: GuidelineContent,
  overrides: Partial<GuidelinePayload> = {},
): GuidelinePayload {
  return {
    kind: 'guideline',
    content,
    operation: 'add',
    coherenceCheck: true,
    connectionProposition: true,
    ...overrides,
  };
}

function guidelineInvoice(
  payload: GuidelinePayload,
  connectionPropositions: readonly ConnectionProposition[] | null = [],
): GuidelineInvoice {
  return {
    kind: 'guideline',
    payload,
    checksum: computePayloadChecksum(payload),
    approved: true,
    data: { kind: 'guideline', coherenceChecks: [], connectionPropositions },
    error: null,
  };
}

function styleGuideInvoice(payload: StyleGuidePayload): StyleGuideInvoice {
  return {
    kind: 'style_guide',
    payload,
    checksum: computePayloadChecksum(payload),
    approved: true,
    data: { kind: 'style_guide', coherenceChecks: [] },
    error: null,
  };
}

const weatherLink: ConnectionProposition = {
  checkKind: 'connection_with_another_evaluated_guideline',
  source: askWeather,
  target: weatherFollowUp,
  connectionKind: 'entails',
};

describe('createRuleCommitter', () => {
  let guidelineRepository: GuidelineRepository;
  let styleGuideRepository: StyleGuideRepository;
  let connectionRepository: GuidelineConnectionRepository;
  let committer: RuleCommitter;

  beforeEach(() => {
    guidelineRepository = createInMemoryGuidelineRepository();
    styleGuideRepository = createInMemoryStyleGuideRepository();
    connectionRepository = createInMemoryGuidelineConnectionRepository();
    committer = createRuleCommitter({
      guidelineRepository,
      styleGuideRepository,
      guidelineConnectionRepository: connectionRepository,
    });
  });

  describe('commitGuidelines', () => {
    it('should create guidelines in invoice order and connect them once', async () => {
      const result = await committer.commitGuidelines(OWNER, [
        guidelineInvoice(guidelinePayload(askWeather), [weatherLink]),
        guidelineInvoice(guidelinePayload(weatherFollowUp), [weatherLink]),
      ]);

      expect(result.guidelines.map((g) => g.content)).toEqual([askWeather, weatherFollowUp]);
      expect(result.guidelines.every((g) => g.ownerId === OWNER)).toBe(true);

      const [ask, followUp] = result.guidelines;
      expect(result.connections).toHaveLength(1);
      expect(result.connections[0]).toMatchObject({
        source: ask.id,
        target: followUp.id,
        kind: 'entails',
      });
      expect(await connectionRepository.list({})).toHaveLength(1);
    });

    it('should connect a new guideline to an existing one', async () => {
      const existing = await guidelineRepository.create({ ownerId: OWNER, content: askWeather });

      const result = await committer.commitGuidelines(OWNER, [
        guidelineInvoice(guidelinePayload(weatherFollowUp), [
          { ...weatherLink, checkKind: 'connection_with_existing_guideline' },
        ]),
      ]);

      expect(result.connections).toHaveLength(1);
      expect(result.connections[0].source).toBe(existing.id);
      expect(result.connections[0].target).toBe(result.guidelines[0].id);
    });

    it('should skip connections that are already stored', async () => {
      const ask = await guidelineRepository.create({ ownerId: OWNER, content: askWeather });
      const followUp = await guidelineRepository.create({ ownerId: OWNER, content: weatherFollowUp });
      await connectionRepository.create({ source: ask.id, target: followUp.id, kind: 'entails' });

      const result = await committer.commitGuidelines(OWNER, [
        guidelineInvoice(guidelinePayload(greetHello), [weatherLink]),
      ]);

      expect(result.connections).toEqual([]);
      expect(await connectionRepository.list({})).toHaveLength(1);
    });

    it('should reject an unapproved invoice before writing anything', async () => {
      const rejected: GuidelineInvoice = {
        ...guidelineInvoice(guidelinePayload(weatherFollowUp)),
        approved: false,
      };

      await expect(
        committer.commitGuidelines(OWNER, [guidelineInvoice(guidelinePayload(askWeather)), rejected]),
      ).rejects.toThrow(new UnapprovedInvoiceError('Unapproved invoice.'));
      expect(await guidelineRepository.listByOwner(OWNER)).toEqual([]);
    });

    it('should reject an invoice that was never evaluated', async () => {
      const pending: GuidelineInvoice = {
        ...guidelineInvoice(guidelinePayload(askWeather)),
        data: null,
      };

      await expect(committer.commitGuidelines(OWNER, [pending])).rejects.toThrow(
        UnapprovedInvoiceError,
      );
    });

    it('should reject a payload edited after evaluation', async () => {
      const evaluated = guidelineInvoice(guidelinePayload(askWeather));
      const tampered: GuidelineInvoice = {
        ...evaluated,
        payload: { ...evaluated.payload, content: { ...askWeather, action: 'say it will rain' } },
      };

      const error: unknown = await committer.commitGuidelines(OWNER, [tampered]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ChecksumMismatchError);
      expect(error).toMatchObject({
        code: 'CHECKSUM_MISMATCH',
        expected: evaluated.checksum,
        actual: computePayloadChecksum(tampered.payload),
      });
      expect(await guidelineRepository.listByOwner(OWNER)).toEqual([]);
    });

    it('should reject style guide invoices', async () => {
      const invoice = styleGuideInvoice({
        kind: 'style_guide',
        content: { principle: 'Be brief', examples: [] },
        operation: 'add',
        coherenceCheck: true,
      });

      await expect(committer.commitGuidelines(OWNER, [invoice])).rejects.toThrow(
        new EvaluationValidationError('Expected guideline invoices, got a style_guide invoice.'),
      );
    });

    it('should replace an updated guideline and drop its old connections', async () => {
      const ask = await guidelineRepository.create({ ownerId: OWNER, content: askWeather });
      const followUp = await guidelineRepository.create({ ownerId: OWNER, content: weatherFollowUp });
      await connectionRepository.create({ source: ask.id, target: followUp.id, kind: 'suggests' });

      const revised: GuidelineContent = { ...askWeather, action: 'give a short forecast' };
      const result = await committer.commitGuidelines(OWNER, [
        guidelineInvoice(guidelinePayload(revised, { operation: 'update', updatedId: ask.id })),
      ]);

      expect(result.guidelines).toHaveLength(1);
      expect(result.guidelines[0].id).toBe(ask.id);
      expect((await guidelineRepository.getById(ask.id))?.content).toEqual(revised);
      expect(await connectionRepository.list({})).toEqual([]);
    });

    it('should keep old connections when the update did not ask for propositions', async () => {
      const ask = await guidelineRepository.create({ ownerId: OWNER, content: askWeather });
      const followUp = await guidelineRepository.create({ ownerId: OWNER, content: weatherFollowUp });
      await connectionRepository.create({ source: ask.id, target: followUp.id, kind: 'suggests' });

      await committer.commitGuidelines(OWNER, [
        guidelineInvoice(
          guidelinePayload(
            { ...askWeather, action: 'give a short forecast' },
            { operation: 'update', updatedId: ask.id, connectionProposition: false },
          ),
          null,
        ),
      ]);

      expect(await connectionRepository.list({})).toHaveLength(1);
    });

    it('should reject an update of a guideline owned by someone else', async () => {
      const foreign = await guidelineRepository.create({ ownerId: 'agent-2', content: askWeather });

      await expect(
        committer.commitGuidelines(OWNER, [
          guidelineInvoice(
            guidelinePayload(weatherFollowUp, { operation: 'update', updatedId: foreign.id }),
          ),
        ]),
      ).rejects.toThrow(new NotFoundError(`Guideline not found: ${foreign.id}`));
      expect((await guidelineRepository.getById(foreign.id))?.content).toEqual(askWeather);
    });

    it('should reject propositions whose endpoints are unknown', async () => {
      await expect(
        committer.commitGuidelines(OWNER, [
          guidelineInvoice(guidelinePayload(greetHello), [weatherLink]),
        ]),
      ).rejects.toThrow(
        "Connection endpoint is not part of 'agent-1' rule set: When the customer asks about the weather, then provide the current weather update",
      );
      expect(await guidelineRepository.listByOwner(OWNER)).toEqual([]);
    });
  });

  describe('commitStyleGuides', () => {
    it('should add and update style guides', async () => {
      const stored = await styleGuideRepository.create({
        ownerId: OWNER,
        content: { principle: 'Be brief', examples: [] },
      });

      const result = await committer.commitStyleGuides(OWNER, [
        styleGuideInvoice({
          kind: 'style_guide',
          content: { principle: 'Use the customer name', examples: [] },
          operation: 'add',
          coherenceCheck: true,
        }),
        styleGuideInvoice({
          kind: 'style_guide',
          content: { principle: 'Be very brief', examples: [] },
          operation: 'update',
          updatedId: stored.id,
          coherenceCheck: false,
        }),
      ]);

      expect(result.map((s) => s.content.principle)).toEqual(['Use the customer name', 'Be very brief']);
      expect(result[1].id).toBe(stored.id);
      expect(await styleGuideRepository.listByOwner(OWNER)).toHaveLength(2);
    });

    it('should reject guideline invoices', async () => {
      await expect(
        committer.commitStyleGuides(OWNER, [guidelineInvoice(guidelinePayload(askWeather))]),
      ).rejects.toThrow(EvaluationValidationError);
    });
  });
});
