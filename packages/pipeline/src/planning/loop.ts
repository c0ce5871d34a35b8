import { noopLogger, type PipelineLogger } from '../logger';
import type { ModelConfig, NamespaceDescriptor } from '../schema';
import { ExecutionContext } from './context';
import type { IntegrationSelector } from './integrationSelector';
import type { Planner } from './planner';

/** Hard ceiling on executed steps per session; configuration can only lower it. */
export const MAX_PLANNING_STEPS = 7;

export type TerminationReason = 'completed' | 'no_next_step' | 'step_limit';

export type PlannedStep = {
  stepNumber: number;
  text: string;
  namespace: NamespaceDescriptor;
  reasoning: string;
};

export type StepOutcome<R> = {
  response: unknown;
  result: R;
  guidanceUsed: boolean;
};

export type StepRunner<R> = (step: PlannedStep, context: ExecutionContext) => Promise<StepOutcome<R>>;

export type LoopEvent<R> =
  | { type: 'step_start'; step: PlannedStep }
  | { type: 'step_complete'; step: PlannedStep; outcome: StepOutcome<R> }
  | { type: 'done'; reason: TerminationReason; executedSteps: number };

export type PlanningLoopOptions<R> = {
  planner: Planner;
  selector: IntegrationSelector;
  goal: string;
  namespaces: NamespaceDescriptor[];
  guidance: string | null;
  model: ModelConfig;
  runStep: StepRunner<R>;
  context?: ExecutionContext;
  maxSteps?: number;
  logger?: PipelineLogger;
};

export const resolveStepLimit = (requested?: number): number => {
  if (requested === undefined || !Number.isFinite(requested)) {
    return MAX_PLANNING_STEPS;
  }
  return Math.min(MAX_PLANNING_STEPS, Math.max(1, Math.trunc(requested)));
};

/**
 * Plans one step at a time from the accumulated context:
 * planning -> executing -> planning. A step returned together with
 * `isComplete` is executed as the final one; no step at all ends the loop
 * immediately. The step limit ends it otherwise. The last event is always
 * `done` carrying the reason.
 */
export async function* runPlanningLoop<R>(options: PlanningLoopOptions<R>): AsyncGenerator<LoopEvent<R>> {
  const { planner, selector, goal, namespaces, guidance, model, runStep } = options;
  const logger = options.logger ?? noopLogger;
  const context = options.context ?? new ExecutionContext();
  const limit = resolveStepLimit(options.maxSteps);

  for (let iteration = 1; iteration <= limit; iteration += 1) {
    const decision = await planner.nextStep(goal, context, guidance, model);
    if (!decision.nextStep) {
      const reason: TerminationReason = decision.isComplete ? 'completed' : 'no_next_step';
      logger.debug('Planner returned no further step', { iteration, reason, reasoning: decision.reasoning });
      yield { type: 'done', reason, executedSteps: iteration - 1 };
      return;
    }

    const namespace = await selector.select(decision.nextStep, namespaces, model);
    const step: PlannedStep = {
      stepNumber: iteration,
      text: decision.nextStep,
      namespace,
      reasoning: decision.reasoning
    };
    yield { type: 'step_start', step };

    const outcome = await runStep(step, context);
    context.append({
      step: step.text,
      namespace: namespace.id,
      response: outcome.response,
      reasoning: step.reasoning,
      guidanceUsed: outcome.guidanceUsed
    });
    yield { type: 'step_complete', step, outcome };

    if (decision.isComplete) {
      logger.debug('Planner marked its last step as completing the goal', { iteration });
      yield { type: 'done', reason: 'completed', executedSteps: iteration };
      return;
    }
  }

  logger.warn('Planning loop stopped at the step limit', { limit });
  yield { type: 'done', reason: 'step_limit', executedSteps: limit };
}
