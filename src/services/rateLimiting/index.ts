/**
 * Rate Limiting Module
 */

export * from './types';
export { RateLimitPolicyRegistry, MissingPolicyError, createPolicyRegistry } from './policies';
export { rateLimitKeys } from './keys';
export { EmailWindowLimiter, describeWindow } from './emailWindowLimiter';
export { IpTokenBucketLimiter } from './ipTokenBucketLimiter';
export { ProgressiveDelayLimiter } from './progressiveDelayLimiter';
export { GlobalCounterLimiter } from './globalCounterLimiter';
export { RateLimitCoordinator } from './rateLimitCoordinator';
