/**
 * Rate Limiting Types
 *
 * Policies and stage results for the off-ramp rate limit coordinator.
 */

/**
 * Coordinator stages, in evaluation order
 */
export type RateLimitStage = 'email' | 'ip' | 'progressive-delay' | 'global';

/**
 * Sliding window per identifying e-mail
 */
export interface EmailWindowPolicy {
  /** Maximum requests inside the window */
  count: number;
  windowSeconds: number;
  keyTtlSeconds: number;
}

/**
 * Token bucket per client IP
 */
export interface IpBucketPolicy {
  capacity: number;
  refillPerHour: number;
  keyTtlSeconds: number;
}

/**
 * Escalating mandatory wait between attempts by one identifier
 */
export interface ProgressiveDelayPolicy {
  /** attempt number -> seconds since the last allowed attempt */
  delays: ReadonlyMap<number, number>;
  /** Used for attempt numbers without an explicit entry */
  defaultDelaySeconds: number;
  attemptsKeyTtlSeconds: number;
  lastTimeKeyTtlSeconds: number;
}

/**
 * Fixed-window cap across all identifiers of a subject
 */
export interface GlobalCounterPolicy {
  count: number;
  windowSeconds: number;
}

export interface RateLimitPolicy {
  subject: string;
  email: EmailWindowPolicy;
  ip: IpBucketPolicy;
  progressiveDelay: ProgressiveDelayPolicy;
  global: GlobalCounterPolicy;
}

export type StageResult = { allowed: true } | { allowed: false; message: string };

export type IpStageResult = { allowed: true } | { allowed: false; message: string; retryAfter: number };

export type ProgressiveStageResult =
  | { allowed: true; attempt: number }
  | { allowed: false; message: string; attempt: number };

/**
 * Result of RateLimitCoordinator.checkLimit
 */
export interface RateLimitDecision {
  allowed: boolean;
  /** User-facing reason (denials only) */
  message?: string;
  /** Progressive-delay attempt number */
  attempt?: number;
  /** Seconds until the IP bucket holds a token again */
  retryAfter?: number;
  /** Stage that denied */
  stage?: RateLimitStage;
}

/**
 * What the HTTP interceptor depends on
 */
export interface IRateLimitCoordinator {
  checkLimit(subject: string, email: string, ip: string): Promise<RateLimitDecision>;
}
