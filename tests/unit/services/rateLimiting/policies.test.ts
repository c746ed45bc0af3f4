/**
 * Rate Limit Policies Tests
 *
 * Registry lookups and conversion from validated configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  createPolicyRegistry,
  MissingPolicyError,
  RateLimitPolicyRegistry,
} from '../../../../src/services/rateLimiting/policies';
import { DEFAULT_RATE_LIMIT_POLICIES } from '../../../../src/config/defaults';

describe('Rate Limit Policies', () => {
  const registry = createPolicyRegistry(DEFAULT_RATE_LIMIT_POLICIES);

  describe('createPolicyRegistry', () => {
    it('registers one policy per configured subject', () => {
      expect(registry.subjects().sort()).toEqual(['otp', 'withdrawal']);
    });

    it('converts delay tables into numeric attempt maps', () => {
      const delays = registry.get('otp').progressiveDelay.delays;

      expect(delays.get(1)).toBe(0);
      expect(delays.get(3)).toBe(30);
      expect(delays.get(5)).toBe(900);
      expect(delays.get(6)).toBeUndefined();
    });

    it('carries the subject on each policy', () => {
      expect(registry.get('withdrawal').subject).toBe('withdrawal');
      expect(registry.get('otp').email).toEqual({ count: 5, windowSeconds: 3600, keyTtlSeconds: 7200 });
    });

    it('freezes policies', () => {
      expect(Object.isFrozen(registry.get('otp'))).toBe(true);
      expect(Object.isFrozen(registry.get('otp').ip)).toBe(true);
      expect(Object.isFrozen(registry)).toBe(true);
    });
  });

  describe('lookups', () => {
    it('has() and find() report unknown subjects without throwing', () => {
      expect(registry.has('otp')).toBe(true);
      expect(registry.has('unknown')).toBe(false);
      expect(registry.find('unknown')).toBeUndefined();
    });

    it('get() throws MissingPolicyError for unknown subjects', () => {
      expect(() => registry.get('unknown')).toThrow(MissingPolicyError);
      expect(() => registry.get('unknown')).toThrow('No rate limit policy registered for subject: unknown');
    });

    it('keeps the last policy when a subject is registered twice', () => {
      const first = registry.get('otp');
      const second = { ...registry.get('withdrawal'), subject: 'otp' };

      const duplicated = new RateLimitPolicyRegistry([first, second]);

      expect(duplicated.get('otp')).toBe(second);
      expect(duplicated.subjects()).toEqual(['otp']);
    });
  });
});
