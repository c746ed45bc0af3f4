/**
 * Vitest Setup
 *
 * Runs before each test file. Pins the environment and keeps logger output
 * out of the test report.
 */

import { beforeEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';
delete process.env.REDIS_URL;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});
