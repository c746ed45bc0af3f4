/**
 * Development Collaborators
 *
 * Stand-ins for the OTP delivery and withdrawal services so the server can
 * run on its own in development. Codes are logged instead of e-mailed.
 * startServer refuses them in production.
 */

import crypto from 'crypto';
import type { OtpIssuer, WithdrawalProcessor, WithdrawalReceipt, WithdrawalRequest } from '../api/types';
import type { KeyValueStore } from '../infrastructure/store';
import { createLogger } from '../utils/logger';
import { maskEmail } from '../utils/redact';

const log = createLogger('DEV');

const OTP_TTL_SECONDS = 300;

export class LoggingOtpIssuer implements OtpIssuer {
  constructor(private readonly store: KeyValueStore) {}

  private key(email: string): string {
    return `dev-otp:${email}`;
  }

  async issue(email: string): Promise<void> {
    const code = crypto.randomInt(0, 1_000_000).toString().padStart(6, '0');
    await this.store.set(this.key(email), code, OTP_TTL_SECONDS);
    log.info('Development OTP', { email: maskEmail(email), code });
  }

  async verify(email: string, code: string): Promise<boolean> {
    const expected = await this.store.get(this.key(email));
    if (expected === null || expected.length !== code.length) {
      return false;
    }
    if (!crypto.timingSafeEqual(Buffer.from(expected), Buffer.from(code))) {
      return false;
    }
    await this.store.del(this.key(email));
    return true;
  }
}

export class AcceptingWithdrawalProcessor implements WithdrawalProcessor {
  async initiate(request: WithdrawalRequest): Promise<WithdrawalReceipt> {
    const withdrawalId = crypto.randomUUID();
    log.info('Development withdrawal accepted', { walletId: request.walletId, amount: request.amount, withdrawalId });
    return { withdrawalId, status: 'pending' };
  }
}
