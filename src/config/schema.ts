/**
 * Configuration Validation Schema
 *
 * Zod schemas for runtime validation of application configuration.
 * Provides detailed error messages when configuration is invalid.
 */

import { z } from 'zod';

// =============================================================================
// Basic Type Schemas
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

const positiveInt = z.number().int().min(1);

// =============================================================================
// Rate Limit Policy Schemas
// =============================================================================

export const EmailWindowPolicySchema = z.object({
  count: positiveInt,
  windowSeconds: positiveInt,
  keyTtlSeconds: positiveInt,
});

export const IpBucketPolicySchema = z.object({
  capacity: positiveInt,
  refillPerHour: positiveInt,
  keyTtlSeconds: positiveInt,
});

export const ProgressiveDelayPolicySchema = z.object({
  /** attempt number -> mandatory seconds since the last allowed attempt */
  delays: z.record(z.string().regex(/^[1-9]\d*$/, 'attempt numbers start at 1'), z.number().int().min(0)),
  defaultDelaySeconds: z.number().int().min(0),
  attemptsKeyTtlSeconds: positiveInt,
  lastTimeKeyTtlSeconds: positiveInt,
});

export const GlobalCounterPolicySchema = z.object({
  count: positiveInt,
  windowSeconds: positiveInt,
});

export const RateLimitPolicySchema = z.object({
  email: EmailWindowPolicySchema,
  ip: IpBucketPolicySchema,
  progressiveDelay: ProgressiveDelayPolicySchema,
  global: GlobalCounterPolicySchema,
});

// =============================================================================
// Component Schemas
// =============================================================================

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(1).max(65535),
  trustProxy: z.boolean(),
  /** Allowed browser origins outside development */
  corsOrigins: z.array(z.string().url()),
});

export const RedisConfigSchema = z.object({
  url: z.string(),
  enabled: z.boolean(),
});

export const RateLimitConfigSchema = z.object({
  policies: z.record(z.string().min(1), RateLimitPolicySchema),
});

export const LockConfigSchema = z.object({
  ttlSeconds: positiveInt,
});

export const AccountLockoutConfigSchema = z.object({
  maxFailedAttempts: z.number().int().min(1).max(100),
  lockoutMinutes: z.number().int().min(1).max(24 * 60),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  redis: RedisConfigSchema,
  rateLimit: RateLimitConfigSchema,
  locks: LockConfigSchema,
  accountLockout: AccountLockoutConfigSchema,
  logging: LoggingConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type RateLimitPolicyConfig = z.infer<typeof RateLimitPolicySchema>;

// =============================================================================
// Validation Functions
// =============================================================================

export type ConfigValidationResult =
  | { success: true; config: AppConfig; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return detailed errors
 */
export function validateConfigSchema(config: unknown): ConfigValidationResult {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, config: result.data, errors: [] };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { success: false, errors };
}

/**
 * Validate configuration and throw if invalid
 */
export function assertValidConfig(config: unknown): AppConfig {
  const result = validateConfigSchema(config);

  if (!result.success) {
    console.error('');
    console.error('================================================================================');
    console.error('CONFIGURATION VALIDATION FAILED');
    console.error('================================================================================');
    for (const error of result.errors) {
      console.error(`  - ${error}`);
    }
    console.error('Please check your .env file and environment variables.');
    console.error('================================================================================');

    throw new Error(`Configuration validation failed: ${result.errors.join('; ')}`);
  }

  return result.config;
}
