/**
 * Collaborators behind the HTTP endpoints
 *
 * OTP delivery and withdrawal execution live outside this service; the
 * routes only see these interfaces.
 */

import type { WithdrawalRequestInput } from './schemas/offramp';

export interface OtpIssuer {
  /** Generate and deliver a one-time code */
  issue(email: string): Promise<void>;
  /** true when the code is valid for the address (consumes it) */
  verify(email: string, code: string): Promise<boolean>;
}

export type WithdrawalRequest = WithdrawalRequestInput;

export interface WithdrawalReceipt {
  withdrawalId: string;
  status: string;
}

export interface WithdrawalProcessor {
  /** Runs while the wallet's withdrawal lock is held */
  initiate(request: WithdrawalRequest): Promise<WithdrawalReceipt>;
}
