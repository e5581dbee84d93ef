import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { payViaProxy } from './proxy.js';
import { AuthError, InsufficientBalanceError, PaymentRejectedError, TransportError } from './errors.js';
import { jsonResponse, makeChallenge } from './test-helpers.js';

const ACCOUNT = { apiKey: 'test-api-key', endpoint: 'https://proxy.example.com' };

describe('payViaProxy', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('should POST the challenge to /pay with the bearer credential', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(
      jsonResponse({ success: true, receiptId: 'rcpt_42', paymentHeader: 'proxy-token' }),
    );
    globalThis.fetch = fetchSpy;
    const challenge = makeChallenge();

    const proof = await payViaProxy(challenge, ACCOUNT, {
      clock: () => new Date('2026-05-01T00:00:00.000Z'),
    });

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0] ?? [];
    expect(url).toBe('https://proxy.example.com/pay');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-api-key' },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      x402Version: 1,
      challengeId: 'nonce:test-1',
      resource: 'https://api.example.com/data',
      requirements: challenge.requirements,
    });

    expect(proof).toEqual({
      mode: 'proxy',
      challengeId: 'nonce:test-1',
      amount: '600000',
      asset: challenge.asset,
      assetSymbol: 'USDC',
      decimals: 6,
      network: 'base',
      payTo: challenge.payTo,
      token: 'proxy-token',
      paidAt: '2026-05-01T00:00:00.000Z',
      receiptId: 'rcpt_42',
    });
  });

  it.each([401, 403])('should map HTTP %i to AuthError', async (status) => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ success: false, error: 'invalid_key' }, status));
    await expect(payViaProxy(makeChallenge(), ACCOUNT)).rejects.toBeInstanceOf(AuthError);
  });

  it('should map HTTP 402 to InsufficientBalanceError', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ success: false }, 402));
    await expect(payViaProxy(makeChallenge(), ACCOUNT)).rejects.toBeInstanceOf(InsufficientBalanceError);
  });

  it('should map an insufficient_balance error body to InsufficientBalanceError', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      jsonResponse({ success: false, error: 'insufficient_balance', message: 'balance 0.10 USDC' }, 400),
    );
    await expect(payViaProxy(makeChallenge(), ACCOUNT))
      .rejects.toThrow('Account balance is insufficient: balance 0.10 USDC');
  });

  it('should map other failures to PaymentRejectedError', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('upstream down', { status: 502 }));
    await expect(payViaProxy(makeChallenge(), ACCOUNT))
      .rejects.toThrow(new PaymentRejectedError('proxy returned HTTP 502'));
  });

  it('should reject a success response without a payment header', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(jsonResponse({ success: true, receiptId: 'rcpt_1' }));
    await expect(payViaProxy(makeChallenge(), ACCOUNT))
      .rejects.toThrow('proxy response is missing the receipt or payment header');
  });

  it('should map network failures to TransportError', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const error: unknown = await payViaProxy(makeChallenge(), ACCOUNT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError && error.message).toBe('Proxy /pay failed: fetch failed');
    expect(error instanceof TransportError && error.retryable).toBe(true);
  });
});
