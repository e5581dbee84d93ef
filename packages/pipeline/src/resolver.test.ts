import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PaymentResolver } from './resolver.js';
import { ConfigError, PaymentRejectedError, SignerError, SpendLimitExceededError } from './errors.js';
import { getNetwork } from './networks.js';
import { SpendGuard } from './spend-guard.js';
import type { SpendHold } from './spend-guard.js';
import type { PaymentChallenge } from './types.js';
import { FakeRelaySigner, PAYER, jsonResponse, makeChallenge } from './test-helpers.js';

const NOW = new Date('2026-05-01T12:00:00.000Z');

function guardedAuthorize(guard: SpendGuard) {
  return vi.fn(async (challenge: PaymentChallenge): Promise<SpendHold> => {
    const decision = await guard.authorize({
      amount: BigInt(challenge.amount),
      asset: challenge.assetSymbol,
      network: challenge.network,
      decimals: challenge.decimals,
    });
    if (!decision.allowed) {
      throw new SpendLimitExceededError(
        decision.asset, decision.reason, decision.limit, decision.spent, decision.requested, decision.remaining,
      );
    }
    return decision.hold;
  });
}

describe('PaymentResolver', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('relay mode', () => {
    it('should pay through the signer and hand back the hold', async () => {
      const signer = new FakeRelaySigner();
      const guard = new SpendGuard({ limits: { window: { USDC: '1.00' } }, clock: () => NOW });
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      const resolution = await resolver.resolve(makeChallenge(), { authorize: guardedAuthorize(guard) });

      expect(resolution.reused).toBe(false);
      expect(resolution.hold?.status).toBe('pending');
      expect(resolution.proof).toMatchObject({
        mode: 'relay',
        challengeId: 'nonce:test-1',
        token: 'relay-token-1',
        payer: PAYER,
        clientTransaction: { network: 'base', hash: '0xclient1' },
        facilitatorTransaction: null,
        paidAt: NOW.toISOString(),
      });
      expect(signer.calls).toEqual(['nonce:test-1']);
    });

    it('should pay a challenge once when callers race on it', async () => {
      const signer = new FakeRelaySigner();
      const guard = new SpendGuard({ limits: { window: { USDC: '5.00' } }, clock: () => NOW });
      const authorize = guardedAuthorize(guard);
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      const [first, second] = await Promise.all([
        resolver.resolve(makeChallenge(), { authorize }),
        resolver.resolve(makeChallenge(), { authorize }),
      ]);

      expect(signer.calls).toHaveLength(1);
      expect(authorize).toHaveBeenCalledTimes(1);
      expect(second.proof).toBe(first.proof);
      expect(first.reused).toBe(false);
      expect(first.hold).not.toBeNull();
      expect(second.reused).toBe(true);
      expect(second.hold).toBeNull();
      expect(guard.status('USDC', 6).pending).toBe('0.60');
    });

    it('should reuse a settled resolution for a repeated challenge', async () => {
      const signer = new FakeRelaySigner();
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      const first = await resolver.resolve(makeChallenge());
      const again = await resolver.resolve(makeChallenge());

      expect(again).toEqual({ proof: first.proof, hold: null, reused: true });
      expect(signer.calls).toHaveLength(1);
    });

    it('should pay again once the cached challenge has expired', async () => {
      const signer = new FakeRelaySigner();
      let now = NOW;
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => now });
      const challenge = makeChallenge({ expiresAt: '2026-05-01T12:05:00.000Z' });

      await resolver.resolve(challenge);
      now = new Date('2026-05-01T12:05:00.000Z');
      const later = await resolver.resolve(challenge);

      expect(later.reused).toBe(false);
      expect(later.proof.token).toBe('relay-token-2');
      expect(signer.calls).toHaveLength(2);
    });

    it('should pay again after clear()', async () => {
      const signer = new FakeRelaySigner();
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      await resolver.resolve(makeChallenge());
      resolver.clear();
      await resolver.resolve(makeChallenge());

      expect(signer.calls).toHaveLength(2);
    });

    it('should release the hold and evict the entry when payment fails', async () => {
      const submit = vi.fn()
        .mockRejectedValueOnce(new Error('nonce too low'))
        .mockResolvedValueOnce({
          payer: PAYER,
          clientTxHash: '0xretry',
          facilitatorTxHash: '0xfacilitator',
          paymentHeader: 'retry-token',
        });
      const signer = new FakeRelaySigner(PAYER, submit);
      const guard = new SpendGuard({ limits: { window: { USDC: '1.00' } }, clock: () => NOW });
      const authorize = guardedAuthorize(guard);
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      await expect(resolver.resolve(makeChallenge(), { authorize }))
        .rejects.toThrow(new SignerError('nonce too low'));
      expect(guard.status('USDC', 6)).toMatchObject({ spent: '0.00', pending: '0.00' });

      const retried = await resolver.resolve(makeChallenge(), { authorize });
      expect(retried.reused).toBe(false);
      expect(retried.proof).toMatchObject({
        token: 'retry-token',
        facilitatorTransaction: { network: 'base', hash: '0xfacilitator' },
      });
      expect(authorize).toHaveBeenCalledTimes(2);
    });

    it('should pass facilitator rejections through unchanged', async () => {
      const rejection = new PaymentRejectedError('insufficient_funds');
      const signer = new FakeRelaySigner(PAYER, () => Promise.reject(rejection));
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      await expect(resolver.resolve(makeChallenge())).rejects.toBe(rejection);
    });

    it('should not contact any facilitator when authorization is refused', async () => {
      const signer = new FakeRelaySigner();
      const guard = new SpendGuard({ limits: { window: { USDC: '0.50' } }, clock: () => NOW });
      const resolver = new PaymentResolver({ kind: 'relay', signers: [signer] }, { clock: () => NOW });

      await expect(resolver.resolve(makeChallenge(), { authorize: guardedAuthorize(guard) }))
        .rejects.toBeInstanceOf(SpendLimitExceededError);
      expect(signer.calls).toEqual([]);
    });

    it('should refuse a network with no signer before authorizing', async () => {
      const authorize = vi.fn();
      const resolver = new PaymentResolver({ kind: 'relay', signers: [new FakeRelaySigner()] });

      await expect(resolver.resolve(makeChallenge({ network: 'solana', family: 'solana' }), { authorize }))
        .rejects.toThrow('Signer error: no signer configured for solana network solana');
      expect(authorize).not.toHaveBeenCalled();
    });

    it('should report which networks the signers can pay on', () => {
      const resolver = new PaymentResolver({ kind: 'relay', signers: [new FakeRelaySigner()] });
      expect(resolver.canPay(getNetwork('base'))).toBe(true);
      expect(resolver.canPay(getNetwork('solana'))).toBe(false);
    });
  });

  describe('proxy mode', () => {
    it('should pay through the proxy endpoint', async () => {
      const fetchSpy = vi.fn().mockResolvedValue(
        jsonResponse({ success: true, receiptId: 'rcpt_9', paymentHeader: 'proxy-token' }),
      );
      const resolver = new PaymentResolver(
        { kind: 'proxy', apiKey: 'test-api-key', endpoint: 'https://proxy.example.com/' },
        { fetch: fetchSpy, clock: () => NOW },
      );

      const { proof } = await resolver.resolve(makeChallenge());

      expect(fetchSpy.mock.calls[0]?.[0]).toBe('https://proxy.example.com/pay');
      expect(proof).toMatchObject({ mode: 'proxy', receiptId: 'rcpt_9', token: 'proxy-token' });
    });

    it('should accept any network', () => {
      const resolver = new PaymentResolver({ kind: 'proxy', apiKey: 'test-api-key', endpoint: 'https://proxy.example.com' });
      expect(resolver.canPay(getNetwork('solana'))).toBe(true);
    });

    it('should reject a private proxy endpoint', () => {
      expect(() => new PaymentResolver({ kind: 'proxy', apiKey: 'test-api-key', endpoint: 'https://localhost:8443' }))
        .toThrow(ConfigError);
    });
  });
});
