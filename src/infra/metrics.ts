/**
 * Prometheus registry for the correlation service.
 *
 * Request metrics share the `method`, `route` and `status_code` labels so
 * rejected requests (400 `CORRELATION_FAILED`) can be told apart by route.
 * Correlation outcomes are counted separately, per wire format.
 */
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { env } from '../config/env';

const REQUEST_LABELS = ['method', 'route', 'status_code'] as const;

// Correlation adds microseconds to a request; the low buckets matter most.
const LATENCY_BUCKETS = [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 1, 5];

export const register = new Registry();
register.setDefaultLabels({ service: env.SERVICE_NAME ?? 'http-correlation-service' });

collectDefaultMetrics({ register });

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Time from receiving a request to finishing its response, in seconds',
  labelNames: REQUEST_LABELS,
  buckets: LATENCY_BUCKETS,
  registers: [register],
});

export const httpRequestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Finished HTTP requests, correlated or rejected',
  labelNames: REQUEST_LABELS,
  registers: [register],
});

export const errorCounter = new Counter({
  name: 'http_errors_total',
  help: 'Finished HTTP requests answered with a 4xx or 5xx status',
  labelNames: REQUEST_LABELS,
  registers: [register],
});

export const correlationCounter = new Counter({
  name: 'http_correlation_total',
  help: 'Correlation attempts on incoming requests, by format and outcome',
  labelNames: ['format', 'outcome'] as const,
  registers: [register],
});
