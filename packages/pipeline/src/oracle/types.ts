import type { z } from 'zod';

import type { ModelConfig } from '../schema';

/**
 * A reasoning task: typed input record in, typed output record out. The
 * instructions are the only task-specific prompt text.
 */
export interface OracleTask<I, O> {
  name: string;
  instructions: string;
  input: z.ZodType<I>;
  output: z.ZodType<O>;
}

export type OracleTaskInput<T> = T extends { input: z.ZodType<infer I> } ? I : never;
export type OracleTaskOutput<T> = T extends { output: z.ZodType<infer O> } ? O : never;

export interface Oracle {
  /** Throws MissingCredentialError when the model cannot be called. */
  assertReady(model: ModelConfig): void;
  invoke<I, O>(task: OracleTask<I, O>, input: I, model: ModelConfig): Promise<O>;
}

export function defineTask<I, O>(task: OracleTask<I, O>): OracleTask<I, O> {
  return task;
}
