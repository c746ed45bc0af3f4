/**
 * Validation Schemas
 */

export * from './common';
export * from './offramp';
export { parseBody, formatZodError } from './validation';
