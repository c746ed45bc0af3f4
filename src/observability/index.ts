/**
 * Observability Module
 *
 * @module observability
 */

export {
  metricsService,
  httpRequestDuration,
  httpRequestsTotal,
  normalizePath,
  rateLimitDecisionsTotal,
  rateLimitPolicyMissingTotal,
  lockOperationsTotal,
} from './metrics';
