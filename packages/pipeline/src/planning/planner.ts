import { noopLogger, type PipelineLogger } from '../logger';
import { decomposeGoalTask, nextStepTask } from '../oracle/tasks';
import type { Oracle } from '../oracle/types';
import type { ModelConfig } from '../schema';
import type { ExecutionContext } from './context';

export type NextStepDecision = {
  nextStep: string | null;
  isComplete: boolean;
  reasoning: string;
};

export interface PlannerOptions {
  oracle: Oracle;
  logger?: PipelineLogger;
}

const blankToNull = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export class Planner {
  private readonly oracle: Oracle;
  private readonly logger: PipelineLogger;

  constructor(options: PlannerOptions) {
    this.oracle = options.oracle;
    this.logger = options.logger ?? noopLogger;
  }

  /** Splits a goal into ordered single-platform steps in one call. */
  async decompose(goal: string, guidance: string | null, model: ModelConfig): Promise<string[]> {
    const result = await this.oracle.invoke(
      decomposeGoalTask,
      { goal, workflowInstructions: blankToNull(guidance) },
      model
    );
    const steps = result.steps.map((step) => step.trim()).filter((step) => step.length > 0);
    this.logger.debug('Decomposed goal', { steps: steps.length });
    return steps;
  }

  async nextStep(
    goal: string,
    context: ExecutionContext,
    guidance: string | null,
    model: ModelConfig
  ): Promise<NextStepDecision> {
    const result = await this.oracle.invoke(
      nextStepTask,
      {
        goal,
        previousSteps: context.describeForPlanning(),
        workflowInstructions: blankToNull(guidance)
      },
      model
    );
    return {
      nextStep: blankToNull(result.nextStep),
      isComplete: result.isComplete,
      reasoning: result.reasoning
    };
  }
}
