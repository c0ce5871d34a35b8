import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface RouterMetrics {
  register: Registry;
  sessions: Counter<'mode'>;
  steps: Counter<'outcome'>;
  remoteCallSeconds: Histogram<'method' | 'status'>;
  documentsInserted: Counter<'namespace'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): RouterMetrics => {
  const register = new Registry();

  const sessions = new Counter({
    name: 'router_sessions_total',
    help: 'Sessions started per mode (identify, action, generate, deep)',
    registers: [register],
    labelNames: ['mode'] as const
  });

  const steps = new Counter({
    name: 'router_steps_total',
    help: 'Planned steps completed in deep sessions by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const remoteCallSeconds = new Histogram({
    name: 'router_remote_call_seconds',
    help: 'Latency of remote API operations invoked by the executor',
    registers: [register],
    labelNames: ['method', 'status'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30]
  });

  const documentsInserted = new Counter({
    name: 'router_documents_inserted_total',
    help: 'Catalog documents inserted through the service',
    registers: [register],
    labelNames: ['namespace'] as const
  });

  const readinessGauge = new Gauge({
    name: 'router_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    sessions,
    steps,
    remoteCallSeconds,
    documentsInserted,
    readinessGauge
  };
};
