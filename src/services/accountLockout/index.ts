export {
  AccountLockoutService,
  SubjectLockout,
  type AccountLockoutOptions,
  type FailedAttemptResult,
  type LockoutStatus,
} from './accountLockoutService';
