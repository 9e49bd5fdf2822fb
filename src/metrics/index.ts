import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const tokensGeneratedTotal = new Counter({
  name: 'csrf_tokens_generated_total',
  help: 'Total tokens generated and registered',
  registers: [registry],
});

// Tokens dropped because the registry was at capacity
export const tokensEvictedTotal = new Counter({
  name: 'csrf_tokens_evicted_total',
  help: 'Total tokens evicted to make room for newer ones',
  registers: [registry],
});

export const tokenVerificationsTotal = new Counter({
  name: 'csrf_token_verifications_total',
  help: 'Token verifications by outcome',
  labelNames: ['result'] as const, // result=valid|invalid
  registers: [registry],
});

export const tokensClearedTotal = new Counter({
  name: 'csrf_tokens_cleared_total',
  help: 'Total tokens dropped by explicit clears',
  registers: [registry],
});

export const entropyFailuresTotal = new Counter({
  name: 'csrf_entropy_failures_total',
  help: 'Generate calls aborted because the random source failed',
  registers: [registry],
});

export const tokensLive = new Gauge({
  name: 'csrf_tokens_live',
  help: 'Tokens currently registered',
  registers: [registry],
});
