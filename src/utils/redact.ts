/**
 * Sensitive Data Redaction Utility
 *
 * Keeps OTP codes, tokens and raw e-mail addresses out of log lines.
 *
 * Usage:
 *   import { redactObject, maskEmail } from '../utils/redact';
 *
 *   log.debug('Request body', redactObject(req.body));
 *   log.info('OTP requested', { email: maskEmail(email) });
 */

export const REDACTED = '[REDACTED]';

/** Fields that are always redacted (compared lower-case) */
const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'credentials',
  'otp',
  'code',
  'pin',
  'privatekey',
  'private_key',
  'mnemonic',
]);

const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /credential/i,
];

function isSensitiveField(fieldName: string): boolean {
  if (SENSITIVE_FIELDS.has(fieldName.toLowerCase())) {
    return true;
  }
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

/**
 * Redact a single value, keeping only whether it was set
 *
 * @example
 * redact('123456'); // '[REDACTED]'
 * redact('');       // '[NOT SET]'
 */
export function redact(value: unknown): string {
  if (value === null || value === undefined || value === '') {
    return '[NOT SET]';
  }
  return REDACTED;
}

/**
 * Redact sensitive fields from an object, recursing into nested objects
 *
 * @example
 * redactObject({ email: 'alice@example.com', code: '123456' });
 * // { email: 'a***e@example.com', code: '[REDACTED]' }
 */
export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveField(key)) {
      result[key] = redact(value);
    } else if (key.toLowerCase() === 'email' && typeof value === 'string') {
      result[key] = maskEmail(value);
    } else if (isPlainRecord(value)) {
      result[key] = redactObject(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create a safe error object for logging
 */
export function safeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { message: String(error) };
}

/**
 * Mask a string, showing only the first and last N characters
 *
 * @example
 * mask('0f4c9a7b2d1e8f33'); // '0f4c***8f33'
 */
export function mask(value: string, visibleChars: number = 4): string {
  if (!value || value.length <= visibleChars * 2) {
    return REDACTED;
  }

  const start = value.substring(0, visibleChars);
  const end = value.substring(value.length - visibleChars);
  return `${start}***${end}`;
}

/**
 * Mask the local part of an e-mail address
 *
 * @example
 * maskEmail('alice@example.com'); // 'a***e@example.com'
 * maskEmail('bo@example.com');    // '***@example.com'
 */
export function maskEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at <= 0) {
    return REDACTED;
  }

  const local = email.substring(0, at);
  const domain = email.substring(at + 1);
  if (local.length <= 2) {
    return `***@${domain}`;
  }
  return `${local[0]}***${local[local.length - 1]}@${domain}`;
}
