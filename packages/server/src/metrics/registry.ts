import { collectDefaultMetrics, Counter, Gauge, Registry } from 'prom-client';

export interface MetricsBundle {
  registry: Registry;
  dependencyCalls: Counter<'dependency' | 'outcome'>;
  breakerState: Gauge<'dependency'>;
  offersCreated: Counter;
  offerTransitions: Counter<'status'>;
}

export const BREAKER_STATE_VALUES = {
  closed: 0,
  open: 1,
  half_open: 2,
} as const;

export const createMetricsBundle = (): MetricsBundle => {
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const dependencyCalls = new Counter({
    name: 'tradepost_dependency_calls_total',
    help: 'Count of resilient dependency calls by final outcome',
    labelNames: ['dependency', 'outcome'] as const,
    registers: [registry],
  });

  const breakerState = new Gauge({
    name: 'tradepost_circuit_breaker_state',
    help: 'Circuit breaker state per dependency (0=closed, 1=open, 2=half_open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
  });

  const offersCreated = new Counter({
    name: 'tradepost_offers_created_total',
    help: 'Count of trade offers created',
    registers: [registry],
  });

  const offerTransitions = new Counter({
    name: 'tradepost_offer_transitions_total',
    help: 'Count of committed trade offer status transitions',
    labelNames: ['status'] as const,
    registers: [registry],
  });

  return {
    registry,
    dependencyCalls,
    breakerState,
    offersCreated,
    offerTransitions,
  };
};
