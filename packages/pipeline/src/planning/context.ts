export interface StepRecord {
  step: string;
  stepNumber: number;
  namespace: string;
  response: unknown;
  reasoning: string;
  guidanceUsed: boolean;
}

export type StepRecordInput = Omit<StepRecord, 'stepNumber'>;

export const formatResult = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'null';
  }
  return JSON.stringify(value);
};

/**
 * Results of the steps a session has executed so far, keyed `step_<n>` in
 * execution order. Append-only; one instance per session.
 */
export class ExecutionContext {
  private readonly records = new Map<string, StepRecord>();

  static fromEntries(entries: Record<string, StepRecordInput>): ExecutionContext {
    const context = new ExecutionContext();
    for (const entry of Object.values(entries)) {
      context.append(entry);
    }
    return context;
  }

  get size(): number {
    return this.records.size;
  }

  append(entry: StepRecordInput): StepRecord {
    const stepNumber = this.records.size + 1;
    const record: StepRecord = { ...entry, stepNumber };
    this.records.set(`step_${stepNumber}`, record);
    return record;
  }

  list(): StepRecord[] {
    return [...this.records.values()];
  }

  toJSON(): Record<string, StepRecord> {
    return Object.fromEntries(this.records);
  }

  /** Planner view: step, integration and result per step, or null before the first step. */
  describeForPlanning(): string | null {
    if (this.records.size === 0) {
      return null;
    }
    return this.list()
      .map((record) => `${record.step}\nIntegration: ${record.namespace}\nResult: ${formatResult(record.response)}\n`)
      .join('\n');
  }

  describeForExtraction(): string | null {
    if (this.records.size === 0) {
      return null;
    }
    const lines = this.list().map((record) => `${record.step}: ${formatResult(record.response)}`);
    return ['Previous steps results:', ...lines].join('\n');
  }

  describeForAnswer(): string {
    return this.list()
      .map((record) => `Step: ${record.step}\nResult: ${formatResult(record.response)}\n`)
      .join('\n');
  }
}
