import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  ExecutionContext,
  IntegrationSelector,
  MAX_PLANNING_STEPS,
  Planner,
  ScriptedOracle,
  UnknownNamespaceError,
  SchemaViolationError,
  decomposeGoalTask,
  nextStepTask,
  resolveStepLimit,
  runPlanningLoop,
  selectNamespaceTask,
  type LoopEvent
} from '../src';
import { TEST_MODEL } from './helpers';

const namespaces = [
  { id: 'tracker', name: 'Issue tracker' },
  { id: 'calendar', name: 'Calendar' }
];

const collect = async <R>(events: AsyncGenerator<LoopEvent<R>>): Promise<LoopEvent<R>[]> => {
  const collected: LoopEvent<R>[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
};

const loopWith = (oracle: ScriptedOracle, maxSteps?: number) => {
  let executed = 0;
  const events = runPlanningLoop({
    planner: new Planner({ oracle }),
    selector: new IntegrationSelector({ oracle }),
    goal: 'sync everything',
    namespaces,
    guidance: null,
    model: TEST_MODEL,
    maxSteps,
    runStep: async (step) => {
      executed += 1;
      return { response: { ok: step.stepNumber }, result: step.stepNumber, guidanceUsed: false };
    }
  });
  return { events, executed: () => executed };
};

test('never executes more than seven steps when the planner never completes', async () => {
  const oracle = new ScriptedOracle()
    .on(nextStepTask, (_input, callIndex) => ({
      nextStep: `Fetch page ${callIndex + 1} from the tracker`,
      isComplete: false,
      reasoning: 'more pages'
    }))
    .on(selectNamespaceTask, () => ({ namespace: 'tracker' }));

  const loop = loopWith(oracle, 50);
  const events = await collect(loop.events);

  assert.equal(loop.executed(), MAX_PLANNING_STEPS);
  assert.equal(events.filter((event) => event.type === 'step_start').length, 7);
  assert.equal(oracle.callsFor('nextStep').length, 7);
  assert.deepEqual(events.at(-1), { type: 'done', reason: 'step_limit', executedSteps: 7 });
});

test('executes a final step returned together with completion', async () => {
  const oracle = new ScriptedOracle()
    .on(nextStepTask, () => ({ nextStep: 'List open issues in the tracker', isComplete: true, reasoning: 'one call' }))
    .on(selectNamespaceTask, () => ({ namespace: 'tracker' }));

  const loop = loopWith(oracle);
  const events = await collect(loop.events);

  assert.deepEqual(
    events.map((event) => event.type),
    ['step_start', 'step_complete', 'done']
  );
  assert.deepEqual(events.at(-1), { type: 'done', reason: 'completed', executedSteps: 1 });
});

test('stops before executing when the planner has nothing left', async () => {
  const completed = new ScriptedOracle().on(nextStepTask, () => ({ nextStep: null, isComplete: true, reasoning: 'done' }));
  assert.deepEqual(await collect(loopWith(completed).events), [{ type: 'done', reason: 'completed', executedSteps: 0 }]);

  const blank = new ScriptedOracle().on(nextStepTask, () => ({ nextStep: '   ', isComplete: false, reasoning: '?' }));
  assert.deepEqual(await collect(loopWith(blank).events), [{ type: 'done', reason: 'no_next_step', executedSteps: 0 }]);
});

test('passes accumulated results to the planner', async () => {
  const oracle = new ScriptedOracle()
    .on(nextStepTask, (_input, callIndex) =>
      callIndex === 0
        ? { nextStep: 'Find the sprint', isComplete: false, reasoning: 'first' }
        : { nextStep: null, isComplete: true, reasoning: 'done' }
    )
    .on(selectNamespaceTask, () => ({ namespace: 'tracker' }));

  await collect(loopWith(oracle).events);

  const inputs = oracle.callsFor('nextStep').map((call) => call.input);
  assert.deepEqual(inputs, [
    { goal: 'sync everything', previousSteps: null, workflowInstructions: null },
    {
      goal: 'sync everything',
      previousSteps: 'Find the sprint\nIntegration: tracker\nResult: {"ok":1}\n',
      workflowInstructions: null
    }
  ]);
});

test('an unknown namespace from the selector is fatal', async () => {
  const oracle = new ScriptedOracle()
    .on(nextStepTask, () => ({ nextStep: 'Email the team', isComplete: false, reasoning: 'notify' }))
    .on(selectNamespaceTask, () => ({ namespace: 'mail' }));

  await assert.rejects(collect(loopWith(oracle).events), (err: unknown) => {
    assert.ok(err instanceof UnknownNamespaceError);
    assert.ok(err instanceof SchemaViolationError);
    assert.deepEqual(err.known, ['tracker', 'calendar']);
    return true;
  });
});

test('decompose trims and drops blank steps', async () => {
  const oracle = new ScriptedOracle().on(decomposeGoalTask, () => ({
    steps: [' Find the meeting in Calendar ', '', 'Create an issue in the tracker']
  }));
  const planner = new Planner({ oracle });

  const steps = await planner.decompose('prepare the meeting', 'Calendar ids are emails.', TEST_MODEL);

  assert.deepEqual(steps, ['Find the meeting in Calendar', 'Create an issue in the tracker']);
  assert.deepEqual(oracle.calls[0].input, {
    goal: 'prepare the meeting',
    workflowInstructions: 'Calendar ids are emails.'
  });
});

test('step limit configuration can lower but never raise the cap', () => {
  assert.equal(resolveStepLimit(), 7);
  assert.equal(resolveStepLimit(3), 3);
  assert.equal(resolveStepLimit(99), 7);
  assert.equal(resolveStepLimit(0), 1);
});

test('execution context keys steps in order', () => {
  const context = new ExecutionContext();
  context.append({ step: 'a', namespace: 'x', response: 'plain', reasoning: '', guidanceUsed: true });
  context.append({ step: 'b', namespace: 'y', response: [1, 2], reasoning: '', guidanceUsed: false });

  assert.deepEqual(Object.keys(context.toJSON()), ['step_1', 'step_2']);
  assert.equal(context.toJSON().step_2.stepNumber, 2);
  assert.equal(context.describeForAnswer(), 'Step: a\nResult: plain\n\nStep: b\nResult: [1,2]\n');
});
