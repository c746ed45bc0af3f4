/**
 * Store keys, namespaced subject:mechanism:identifier
 */
export const rateLimitKeys = {
  email: (subject: string, email: string) => `rate-limit:${subject}:email:${email}`,
  ip: (subject: string, ip: string) => `rate-limit:${subject}:ip:${ip}`,
  attempts: (subject: string, identifier: string) => `rate-limit:${subject}:attempts:${identifier}`,
  lastTime: (subject: string, identifier: string) => `rate-limit:${subject}:last:${identifier}`,
  global: (subject: string) => `rate-limit:${subject}:global`,
};

/**
 * Store timestamps are fractional epoch seconds
 */
export function toEpochSeconds(ms: number): number {
  return ms / 1000;
}
