import { NoCandidateError } from '../errors';
import { loadWorkflowGuidance } from '../guidance';
import { finalResponseTask } from '../oracle/tasks';
import { ExecutionContext } from '../planning/context';
import { runPlanningLoop, type TerminationReason } from '../planning/loop';
import type { ModelConfig, NamespaceDescriptor } from '../schema';
import type { ActionResult, Pipeline } from '../session';

export type StepFailure = {
  error: string;
  message: string;
};

export type MetadataEvent = {
  type: 'metadata';
  query: string;
  namespaces: NamespaceDescriptor[];
  maxSteps: number;
};

export type StepStartEvent = {
  type: 'step_start';
  stepNumber: number;
  step: string;
  namespace: string;
  namespaceName: string;
  reasoning: string;
};

export type StepCompleteEvent = {
  type: 'step_complete';
  stepNumber: number;
  step: string;
  namespace: string;
  namespaceName: string;
  reasoning: string;
  response: ActionResult | StepFailure;
  naturalLanguageResponse: string;
  guidanceUsed: boolean;
};

export type FinalResponseEvent = {
  type: 'final_response';
  finalResponse: string;
  totalSteps: number;
  executedSteps: Array<{ step: string; namespace: string }>;
  terminationReason: TerminationReason;
  truncated: boolean;
};

export type CompleteEvent = {
  type: 'complete';
};

export type StreamEvent = MetadataEvent | StepStartEvent | StepCompleteEvent | FinalResponseEvent | CompleteEvent;

export type DeepRequest = {
  namespaces: string[];
  baseUrls: Record<string, string>;
  headers?: Record<string, Record<string, unknown>>;
  query: string;
  model: ModelConfig;
  rephrase?: boolean;
  rephraseInstructions?: string | null;
  naturalLanguage?: boolean;
};

/** One event per line. */
export function serializeEvent(event: StreamEvent): string {
  return `${JSON.stringify(event)}\n`;
}

type StepCompletion = {
  payload: ActionResult | StepFailure;
  naturalLanguageResponse: string;
};

/**
 * Runs the dynamic planning loop for one goal and reports its progress as
 * stream events: metadata, a start/complete pair per executed step, the final
 * answer, then complete. Credentials are checked before the first event. Any
 * other failure ends the sequence early by rejecting.
 */
export async function* runDeepSession(pipeline: Pipeline, request: DeepRequest): AsyncGenerator<StreamEvent> {
  pipeline.oracle.assertReady(request.model);

  const goal = pipeline.withTemporalContext(request.query);
  const namespaces = await pipeline.namespaces.describe(request.namespaces);
  const workflowGuidance = await loadWorkflowGuidance(pipeline.guidance, request.namespaces);
  const context = new ExecutionContext();
  const executedSteps: Array<{ step: string; namespace: string }> = [];

  yield {
    type: 'metadata',
    query: request.query,
    namespaces,
    maxSteps: pipeline.maxSteps
  };

  const loop = runPlanningLoop<StepCompletion>({
    planner: pipeline.planner,
    selector: pipeline.selector,
    goal,
    namespaces,
    guidance: workflowGuidance,
    model: request.model,
    context,
    maxSteps: pipeline.maxSteps,
    logger: pipeline.logger,
    runStep: async (step, stepContext) => {
      const guidance = await pipeline.guidance.load(step.namespace.id);
      try {
        const result = await pipeline.execute(
          {
            namespace: step.namespace.id,
            baseUrl: request.baseUrls[step.namespace.id] ?? '',
            headers: request.headers?.[step.namespace.id] ?? {},
            query: pipeline.withTemporalContext(step.text),
            model: request.model,
            rephrase: request.rephrase,
            rephraseInstructions: request.rephraseInstructions,
            naturalLanguage: request.naturalLanguage ?? true,
            context: stepContext
          },
          guidance
        );
        return {
          response: result.response,
          result: { payload: result, naturalLanguageResponse: result.naturalLanguageResponse ?? '' },
          guidanceUsed: guidance !== null
        };
      } catch (err) {
        if (!(err instanceof NoCandidateError)) {
          throw err;
        }
        pipeline.logger.warn('No operation matched a planned step', {
          namespace: step.namespace.id,
          stepNumber: step.stepNumber
        });
        const failure: StepFailure = { error: err.code, message: err.message };
        return {
          response: failure,
          result: { payload: failure, naturalLanguageResponse: '' },
          guidanceUsed: guidance !== null
        };
      }
    }
  });

  let terminationReason: TerminationReason = 'completed';
  for await (const event of loop) {
    if (event.type === 'step_start') {
      yield {
        type: 'step_start',
        stepNumber: event.step.stepNumber,
        step: event.step.text,
        namespace: event.step.namespace.id,
        namespaceName: event.step.namespace.name,
        reasoning: event.step.reasoning
      };
    } else if (event.type === 'step_complete') {
      const { step, outcome } = event;
      executedSteps.push({ step: step.text, namespace: step.namespace.id });
      yield {
        type: 'step_complete',
        stepNumber: step.stepNumber,
        step: step.text,
        namespace: step.namespace.id,
        namespaceName: step.namespace.name,
        reasoning: step.reasoning,
        response: outcome.result.payload,
        naturalLanguageResponse: outcome.result.naturalLanguageResponse,
        guidanceUsed: outcome.guidanceUsed
      };
    } else {
      terminationReason = event.reason;
    }
  }

  const answer = await pipeline.oracle.invoke(
    finalResponseTask,
    { query: goal, context: context.describeForAnswer() },
    request.model
  );

  yield {
    type: 'final_response',
    finalResponse: answer.response,
    totalSteps: executedSteps.length,
    executedSteps,
    terminationReason,
    truncated: terminationReason === 'step_limit'
  };

  yield { type: 'complete' };
}
