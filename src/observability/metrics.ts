/**
 * Prometheus Metrics
 *
 * Counters for the abuse-prevention layer, exposed on GET /metrics.
 *
 * ## Usage
 *
 * ```typescript
 * import { rateLimitDecisionsTotal } from '../observability/metrics';
 *
 * rateLimitDecisionsTotal.inc({ subject: 'otp', stage: 'email', outcome: 'denied' });
 * ```
 */

import { Counter, Histogram, collectDefaultMetrics, register as defaultRegister } from 'prom-client';
import { createLogger } from '../utils/logger';

const log = createLogger('METRICS');

const registry = defaultRegister;

// =============================================================================
// HTTP Metrics
// =============================================================================

export const httpRequestDuration = new Histogram({
  name: 'offramp_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: 'offramp_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

// =============================================================================
// Abuse Prevention Metrics
// =============================================================================

/**
 * Rate limit decisions by subject, deciding stage and outcome.
 * stage is 'none' for requests that passed every stage.
 */
export const rateLimitDecisionsTotal = new Counter({
  name: 'offramp_rate_limit_decisions_total',
  help: 'Rate limit decisions by subject, stage and outcome',
  labelNames: ['subject', 'stage', 'outcome'] as const,
  registers: [registry],
});

/**
 * Checks for a subject without a registered policy (allowed through).
 * Alert on any increase: it means a misconfigured or probed subject.
 */
export const rateLimitPolicyMissingTotal = new Counter({
  name: 'offramp_rate_limit_policy_missing_total',
  help: 'Rate limit checks for subjects without a policy (fail-open)',
  labelNames: ['subject'] as const,
  registers: [registry],
});

export const lockOperationsTotal = new Counter({
  name: 'offramp_lock_operations_total',
  help: 'Distributed lock operations by category, operation and outcome',
  labelNames: ['category', 'operation', 'outcome'] as const,
  registers: [registry],
});

/**
 * Collapse identifiers in a path to keep label cardinality bounded
 */
export function normalizePath(path: string): string {
  return path
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
    .replace(/\/\d+/g, '/:id');
}

let defaultMetricsEnabled = false;

export const metricsService = {
  /**
   * Start collecting Node.js process metrics (call once at startup)
   */
  enableDefaultMetrics(): void {
    if (defaultMetricsEnabled) return;
    collectDefaultMetrics({ register: registry, prefix: 'offramp_' });
    defaultMetricsEnabled = true;
    log.debug('Default process metrics enabled');
  },

  getMetrics(): Promise<string> {
    return registry.metrics();
  },

  getContentType(): string {
    return registry.contentType;
  },
};
