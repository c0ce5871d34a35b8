import { MissingCredentialError, OracleError } from '../errors';
import type { ModelConfig } from '../schema';
import type { Oracle, OracleTask } from './types';

export type ScriptedCall = {
  task: string;
  input: unknown;
  model: string;
};

type ScriptedHandler = (input: unknown, callIndex: number) => Promise<unknown>;

/**
 * Deterministic oracle: each task answers through a registered handler. Inputs
 * and outputs still pass through the task's zod contracts, so handlers see the
 * same shapes a live model would.
 */
export class ScriptedOracle implements Oracle {
  readonly calls: ScriptedCall[] = [];
  private readonly handlers = new Map<string, ScriptedHandler>();
  private readonly unavailableModels: Set<string>;

  constructor(options: { unavailableModels?: string[] } = {}) {
    this.unavailableModels = new Set(options.unavailableModels ?? []);
  }

  on<I, O>(task: OracleTask<I, O>, handler: (input: I, callIndex: number) => O | Promise<O>): this {
    this.handlers.set(task.name, async (input, callIndex) => handler(task.input.parse(input), callIndex));
    return this;
  }

  callsFor(taskName: string): ScriptedCall[] {
    return this.calls.filter((call) => call.task === taskName);
  }

  assertReady(model: ModelConfig): void {
    if (this.unavailableModels.has(model.model)) {
      throw new MissingCredentialError(model.model);
    }
  }

  async invoke<I, O>(task: OracleTask<I, O>, input: I, model: ModelConfig): Promise<O> {
    this.assertReady(model);
    const handler = this.handlers.get(task.name);
    const callIndex = this.callsFor(task.name).length;
    this.calls.push({ task: task.name, input, model: model.model });
    if (!handler) {
      throw new OracleError(task.name, 'no scripted response registered');
    }
    const result = task.output.safeParse(await handler(input, callIndex));
    if (!result.success) {
      throw new OracleError(task.name, 'scripted response did not match the task contract', result.error.issues);
    }
    return result.data;
  }
}
