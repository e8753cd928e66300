/**
 * Prometheus Metrics
 *
 * Metrics for assessment throughput, evidence availability and HTTP health.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const assessmentsCounter = new promClient.Counter({
  name: 'riskline_assessments_total',
  help: 'Total number of completed risk assessments',
  labelNames: ['tier', 'fourth_factor'],
  registers: [register],
});

export const complianceVerdictCounter = new promClient.Counter({
  name: 'riskline_compliance_verdicts_total',
  help: 'Compliance verdicts by outcome',
  labelNames: ['verdict'],
  registers: [register],
});

export const pipelineDurationHistogram = new promClient.Histogram({
  name: 'riskline_pipeline_duration_seconds',
  help: 'Duration of one pipeline run',
  labelNames: ['status'],
  buckets: [0.01, 0.1, 0.5, 1, 5, 10, 30, 60],
  registers: [register],
});

// ============================================================================
// Evidence Metrics
// ============================================================================

export const profileLookupsCounter = new promClient.Counter({
  name: 'riskline_profile_lookups_total',
  help: 'Profile lookups by platform and outcome',
  labelNames: ['platform', 'status'],
  registers: [register],
});

export const profileSearchDurationHistogram = new promClient.Histogram({
  name: 'riskline_profile_search_duration_seconds',
  help: 'Duration of profile search requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'riskline_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'riskline_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}
