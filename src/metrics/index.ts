import { Counter, Histogram } from 'prom-client';

import { metricsRegistry } from './registry.js';

// Re-export the central registry
export { metricsRegistry as registry };

export const engineOperationsTotal = new Counter({
  name: 'synth_engine_operations_total',
  help: 'Engine entry point calls by operation and outcome',
  labelNames: ['operation', 'outcome'],
  registers: [metricsRegistry]
});

export const engineRejectionsTotal = new Counter({
  name: 'synth_engine_rejections_total',
  help: 'Failed engine operations by error code',
  labelNames: ['operation', 'code'],
  registers: [metricsRegistry]
});

export const engineRollbacksTotal = new Counter({
  name: 'synth_engine_rollbacks_total',
  help: 'Operations unwound after a failure, by completeness',
  labelNames: ['operation', 'status'],
  registers: [metricsRegistry]
});

export const oracleRejectionsTotal = new Counter({
  name: 'synth_engine_oracle_rejections_total',
  help: 'Quotes rejected by the strict oracle path',
  labelNames: ['asset', 'reason'],
  registers: [metricsRegistry]
});

export const liquidationsTotal = new Counter({
  name: 'synth_engine_liquidations_total',
  help: 'Completed liquidations',
  registers: [metricsRegistry]
});

export const liquidationSeizedUsdTotal = new Counter({
  name: 'synth_engine_liquidation_seized_usd_total',
  help: 'USD value of collateral moved to liquidators',
  labelNames: ['asset'],
  registers: [metricsRegistry]
});

export const healthFactorAfterOperation = new Histogram({
  name: 'synth_engine_health_factor_after_operation',
  help: 'Acting account health factor after a committed operation (no-debt positions excluded)',
  labelNames: ['operation'],
  buckets: [0.5, 0.8, 1, 1.1, 1.25, 1.5, 2, 3, 5, 10],
  registers: [metricsRegistry]
});

export const feedRefreshTotal = new Counter({
  name: 'synth_engine_feed_refresh_total',
  help: 'Aggregator feed refresh attempts',
  labelNames: ['feed', 'status'],
  registers: [metricsRegistry]
});
