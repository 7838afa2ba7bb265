import type { EvaluationConfig } from '@tenet/schemas/src/evaluation-config.schema.js';
import type { GuidelineClassifier, StyleGuideClassifier } from '../../agents/types.js';
import type { EvaluationRepository } from '../../repositories/evaluation.repository.js';
import type {
  GuidelineRepository,
  StyleGuideRepository,
} from '../../repositories/rule.repository.js';
import type { BackgroundTaskService } from '../background-tasks/background-task-service.js';
import { createBackgroundTaskService } from '../background-tasks/background-task-service.js';
import type { BehavioralChangeEvaluator } from './behavioral-change-evaluator.js';
import { createBehavioralChangeEvaluator } from './behavioral-change-evaluator.js';
import { createCoherenceChecker } from './coherence-checker.js';
import { createConnectionProposer } from './connection-proposer.js';
import type { EvaluationListener } from './evaluation-listener.js';
import { createEvaluationListener } from './evaluation-listener.js';
import { createGuidelineEvaluator } from './guideline-evaluator.js';
import { createStyleGuideEvaluator } from './style-guide-evaluator.js';

export interface EvaluationServicesDeps {
  readonly evaluationRepository: EvaluationRepository;
  readonly guidelineRepository: GuidelineRepository;
  readonly styleGuideRepository: StyleGuideRepository;
  readonly guidelineClassifier: GuidelineClassifier;
  readonly styleGuideClassifier: StyleGuideClassifier;
  readonly config: EvaluationConfig;
  readonly backgroundTasks?: BackgroundTaskService;
}

export interface EvaluationServices {
  readonly evaluator: BehavioralChangeEvaluator;
  readonly listener: EvaluationListener;
  readonly backgroundTasks: BackgroundTaskService;
}

export function createEvaluationServices(deps: EvaluationServicesDeps): EvaluationServices {
  const { config } = deps;
  const backgroundTasks = deps.backgroundTasks ?? createBackgroundTaskService();

  const guidelineEvaluator = createGuidelineEvaluator({
    coherenceChecker: createCoherenceChecker(deps.guidelineClassifier, config, 'guideline'),
    connectionProposer: createConnectionProposer(deps.guidelineClassifier, config),
  });
  const styleGuideEvaluator = createStyleGuideEvaluator(
    createCoherenceChecker(deps.styleGuideClassifier, config, 'style_guide'),
  );

  const evaluator = createBehavioralChangeEvaluator({
    evaluationRepository: deps.evaluationRepository,
    guidelineRepository: deps.guidelineRepository,
    styleGuideRepository: deps.styleGuideRepository,
    guidelineEvaluator,
    styleGuideEvaluator,
    backgroundTasks,
  });

  return {
    evaluator,
    listener: createEvaluationListener(deps.evaluationRepository, config.listener.pollIntervalMs),
    backgroundTasks,
  };
}
