import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

// One registry per process; its exposition is written next to the tables.
export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const apiRequestsTotal = new Counter({
  name: 'toxic_exposure_api_requests_total',
  help: 'GraphQL requests to the Morpho API by operation and outcome',
  labelNames: ['operation', 'status'],
  registers: [metricsRegistry]
});

export const apiRequestDuration = new Histogram({
  name: 'toxic_exposure_api_request_duration_seconds',
  help: 'GraphQL request latency including retries',
  labelNames: ['operation'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry]
});

export const apiRetriesTotal = new Counter({
  name: 'toxic_exposure_api_retries_total',
  help: 'Retried GraphQL requests by operation',
  labelNames: ['operation'],
  registers: [metricsRegistry]
});

export const budgetWaitSeconds = new Histogram({
  name: 'toxic_exposure_request_budget_wait_seconds',
  help: 'Time spent waiting for the shared request budget',
  buckets: [0, 0.05, 0.1, 0.3, 0.5, 1, 2, 5],
  registers: [metricsRegistry]
});

export const itemsSkippedTotal = new Counter({
  name: 'toxic_exposure_items_skipped_total',
  help: 'Records dropped or skipped by pipeline stage and reason',
  labelNames: ['stage', 'reason'],
  registers: [metricsRegistry]
});

export const rowsWrittenTotal = new Counter({
  name: 'toxic_exposure_rows_written_total',
  help: 'Rows written by the tabular sink per table',
  labelNames: ['table'],
  registers: [metricsRegistry]
});
