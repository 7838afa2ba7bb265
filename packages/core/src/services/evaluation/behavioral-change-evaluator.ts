import type {
  Evaluation,
  GuidelineInvoiceData,
  GuidelinePayload,
  Invoice,
  Payload,
  StyleGuideInvoiceData,
  StyleGuidePayload,
} from '@tenet/shared/src/types/evaluation.types.js';
import { EvaluationError, EvaluationValidationError } from '@tenet/shared/src/utils/errors.js';
import { computePayloadChecksum } from '@tenet/shared/src/utils/invoice.js';
import { guidelineKey, styleGuideKey } from '@tenet/shared/src/utils/rule-content.js';
import { settleAll } from '@tenet/shared/src/utils/settle-all.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import type { EvaluationRepository } from '../../repositories/evaluation.repository.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '../../repositories/rule.repository.js';
import type { BackgroundTaskService } from '../background-tasks/background-task-service.js';
import type { GuidelineEvaluator } from './guideline-evaluator.js';
import type { StyleGuideEvaluator } from './style-guide-evaluator.js';
import { createMonotonicProgressListener, createProgressReport } from './progress-report.js';

const log = createChildLogger('evaluation:behavioral-change');

export interface BehavioralChangeEvaluatorConfig {
  readonly evaluationRepository: EvaluationRepository;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly guidelineEvaluator: GuidelineEvaluator;
  readonly styleGuideEvaluator: StyleGuideEvaluator;
  readonly backgroundTasks: BackgroundTaskService;
}

export interface BehavioralChangeEvaluator {
  /** Rejects with EvaluationValidationError for caller-fixable problems. */
  validatePayloads(ownerId: string, payloads: readonly Payload[]): Promise<void>;
  /** Persists a pending evaluation, schedules its run and returns its id. */
  createEvaluationTask(ownerId: string, payloads: readonly Payload[]): Promise<string>;
  runEvaluation(evaluation: Evaluation): Promise<void>;
  readEvaluation(id: string): Promise<Evaluation>;
}

function hasDuplicates(keys: readonly string[]): boolean {
  return new Set(keys).size < keys.length;
}

export function createBehavioralChangeEvaluator(
  config: BehavioralChangeEvaluatorConfig,
): BehavioralChangeEvaluator {
  const {
    evaluationRepository,
    guidelineRepository,
    styleGuideRepository,
    guidelineEvaluator,
    styleGuideEvaluator,
    backgroundTasks,
  } = config;

  async function validateGuidelines(
    ownerId: string,
    payloads: readonly GuidelinePayload[],
  ): Promise<void> {
    const keys = payloads.map((p) => guidelineKey(p.content));
    if (hasDuplicates(keys)) {
      throw new EvaluationValidationError('Duplicate guideline found among the provided guidelines.');
    }

    const seen = new Set(keys);
    const existing = await guidelineRepository.listByOwner(ownerId);
    const duplicate = existing.find((g) => seen.has(guidelineKey(g.content)));
    if (duplicate) {
      throw new EvaluationValidationError(
        `Duplicate guideline found against existing guideline: When ${duplicate.content.condition}, then ${duplicate.content.action} in '${ownerId}' rule set.`,
      );
    }
  }

  async function validateStyleGuides(
    ownerId: string,
    payloads: readonly StyleGuidePayload[],
  ): Promise<void> {
    const keys = payloads.map((p) => styleGuideKey(p.content));
    if (hasDuplicates(keys)) {
      throw new EvaluationValidationError(
        'Duplicate style guide found among the provided style guides.',
      );
    }

    const seen = new Set(keys);
    const existing = await styleGuideRepository.listByOwner(ownerId);
    const duplicate = existing.find((s) => seen.has(styleGuideKey(s.content)));
    if (duplicate) {
      throw new EvaluationValidationError(
        `Duplicate style guide found against existing style guide: ${duplicate.content.principle} in '${ownerId}' rule set.`,
      );
    }
  }

  async function evaluateInvoices(evaluation: Evaluation, signal: AbortSignal): Promise<Invoice[]> {
    const { id, ownerId } = evaluation;

    const progress = createProgressReport(
      createMonotonicProgressListener(async (percentage) => {
        if (signal.aborted) {
          return;
        }
        await evaluationRepository.update(id, { progress: percentage });
      }),
    );

    const [guidelines, styleGuides] = await Promise.all([
      guidelineRepository.listByOwner(ownerId),
      styleGuideRepository.listByOwner(ownerId),
    ]);

    const guidelineSlots: number[] = [];
    const guidelinePayloads: GuidelinePayload[] = [];
    const styleGuideSlots: number[] = [];
    const styleGuidePayloads: StyleGuidePayload[] = [];

    evaluation.invoices.forEach((invoice, slot) => {
      switch (invoice.kind) {
        case 'guideline':
          guidelineSlots.push(slot);
          guidelinePayloads.push(invoice.payload);
          break;
        case 'style_guide':
          styleGuideSlots.push(slot);
          styleGuidePayloads.push(invoice.payload);
          break;
      }
    });

    let guidelineData: readonly GuidelineInvoiceData[] = [];
    let styleGuideData: readonly StyleGuideInvoiceData[] = [];

    await settleAll<void>(
      [
        async (kindSignal) => {
          guidelineData = await guidelineEvaluator.evaluate({
            ownerId,
            payloads: guidelinePayloads,
            existing: guidelines,
            progress,
            signal: kindSignal,
          });
        },
        async (kindSignal) => {
          styleGuideData = await styleGuideEvaluator.evaluate({
            ownerId,
            payloads: styleGuidePayloads,
            existing: styleGuides,
            progress,
            signal: kindSignal,
          });
        },
      ],
      signal,
    );

    const invoices: Invoice[] = [...evaluation.invoices];

    guidelineSlots.forEach((slot, i) => {
      const payload = guidelinePayloads[i];
      const data = guidelineData[i];
      invoices[slot] = {
        kind: 'guideline',
        payload,
        checksum: computePayloadChecksum(payload),
        approved: data.coherenceChecks.length === 0,
        data,
        error: null,
      };
    });

    styleGuideSlots.forEach((slot, i) => {
      const payload = styleGuidePayloads[i];
      const data = styleGuideData[i];
      invoices[slot] = {
        kind: 'style_guide',
        payload,
        checksum: computePayloadChecksum(payload),
        approved: data.coherenceChecks.length === 0,
        data,
        error: null,
      };
    });

    return invoices;
  }

  const evaluator: BehavioralChangeEvaluator = {
    async validatePayloads(ownerId: string, payloads: readonly Payload[]): Promise<void> {
      if (payloads.length === 0) {
        throw new EvaluationValidationError('No payloads provided for the evaluation task.');
      }

      if (payloads.some((p) => p.operation === 'update' && !p.updatedId)) {
        throw new EvaluationValidationError('Update payload is missing updatedId.');
      }

      const guidelinePayloads = payloads.filter((p): p is GuidelinePayload => p.kind === 'guideline');
      const styleGuidePayloads = payloads.filter(
        (p): p is StyleGuidePayload => p.kind === 'style_guide',
      );

      if (guidelinePayloads.length > 0) {
        await validateGuidelines(ownerId, guidelinePayloads);
      }
      if (styleGuidePayloads.length > 0) {
        await validateStyleGuides(ownerId, styleGuidePayloads);
      }
    },

    async createEvaluationTask(ownerId: string, payloads: readonly Payload[]): Promise<string> {
      await evaluator.validatePayloads(ownerId, payloads);

      const evaluation = await evaluationRepository.create({ ownerId, payloads });
      backgroundTasks.start(() => evaluator.runEvaluation(evaluation), `evaluation(${evaluation.id})`);

      log.info(
        { evaluationId: evaluation.id, ownerId, payloads: payloads.length },
        'Evaluation task created',
      );

      return evaluation.id;
    },

    async runEvaluation(evaluation: Evaluation): Promise<void> {
      const { id } = evaluation;
      const controller = new AbortController();

      try {
        const claim = await evaluationRepository.markRunning(id);
        if (!claim.acquired) {
          throw new EvaluationError(
            `An evaluation task '${claim.runningEvaluationId}' is already running.`,
          );
        }

        log.info({ evaluationId: id, ownerId: evaluation.ownerId }, 'Evaluation started');

        const invoices = await evaluateInvoices(claim.evaluation, controller.signal);

        await evaluationRepository.update(id, { invoices, status: 'completed', progress: 100 });

        log.info(
          {
            evaluationId: id,
            invoices: invoices.length,
            approved: invoices.filter((i) => i.approved).length,
          },
          'Evaluation completed',
        );
      } catch (error) {
        controller.abort(error);
        const message = error instanceof Error ? error.message : String(error);
        const expected = error instanceof EvaluationError;

        if (expected) {
          log.info({ evaluationId: id, error: message }, 'Evaluation failed');
        } else {
          log.error(
            { evaluationId: id, error: message, stack: error instanceof Error ? error.stack : undefined },
            'Evaluation failed unexpectedly',
          );
        }

        try {
          await evaluationRepository.update(id, { status: 'failed', error: message });
        } catch (recordError) {
          log.error(
            {
              evaluationId: id,
              error: message,
              recordError: recordError instanceof Error ? recordError.message : String(recordError),
            },
            'Could not record evaluation failure',
          );
          throw error;
        }

        if (!expected) {
          throw error;
        }
      }
    },

    async readEvaluation(id: string): Promise<Evaluation> {
      return evaluationRepository.read(id);
    },
  };

  return evaluator;
}
