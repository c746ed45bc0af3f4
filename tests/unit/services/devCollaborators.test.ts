import { describe, it, expect } from 'vitest';
import { AcceptingWithdrawalProcessor, LoggingOtpIssuer } from '../../../src/services/devCollaborators';
import { MemoryStore } from '../../../src/infrastructure/memoryStore';

describe('LoggingOtpIssuer', () => {
  it('stores a six digit code that verifies once', async () => {
    const store = new MemoryStore();
    const issuer = new LoggingOtpIssuer(store);

    await issuer.issue('alice@example.com');
    const code = await store.get('dev-otp:alice@example.com');

    expect(code).toMatch(/^\d{6}$/);
    expect(store.ttl('dev-otp:alice@example.com')).toBe(300);
    await expect(issuer.verify('alice@example.com', code ?? '')).resolves.toBe(true);
    await expect(issuer.verify('alice@example.com', code ?? '')).resolves.toBe(false);
  });

  it('rejects a wrong code and keeps the issued one', async () => {
    const store = new MemoryStore();
    const issuer = new LoggingOtpIssuer(store);

    await issuer.issue('alice@example.com');
    const code = (await store.get('dev-otp:alice@example.com')) ?? '';
    const wrong = code === '000000' ? '111111' : '000000';

    await expect(issuer.verify('alice@example.com', wrong)).resolves.toBe(false);
    await expect(issuer.verify('alice@example.com', '12345')).resolves.toBe(false);
    await expect(issuer.verify('alice@example.com', code)).resolves.toBe(true);
  });

  it('rejects verification without an issued code', async () => {
    const issuer = new LoggingOtpIssuer(new MemoryStore());

    await expect(issuer.verify('bob@example.com', '123456')).resolves.toBe(false);
  });
});

describe('AcceptingWithdrawalProcessor', () => {
  it('returns a pending receipt with a fresh ID', async () => {
    const processor = new AcceptingWithdrawalProcessor();
    const request = { email: 'alice@example.com', walletId: 'wallet-1', amount: '10' };

    const first = await processor.initiate(request);
    const second = await processor.initiate(request);

    expect(first.status).toBe('pending');
    expect(first.withdrawalId).toMatch(/^[0-9a-f-]{36}$/);
    expect(second.withdrawalId).not.toBe(first.withdrawalId);
  });
});
