import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createPaymentClient, createPaymentMode } from './client.js';
import type { ClientConfig } from './config.js';
import { ConfigError } from './errors.js';
import type { PaymentEvent } from './executor.js';
import { SpendGuard } from './spend-guard.js';
import { FakeRelaySigner, challengeResponse, jsonResponse } from './test-helpers.js';

const NOW = new Date('2026-05-01T12:00:00.000Z');

function makeConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    mode: 'relay',
    limits: { USDC: '1.00' },
    perRequestLimits: {},
    window: 'day',
    preferredNetworks: [],
    timeoutMs: 30_000,
    privateKey: null,
    apiKey: null,
    relayUrl: null,
    proxyUrl: null,
    ...overrides,
  };
}

describe('createPaymentMode', () => {
  it('should build an EVM signer from a private key', () => {
    const mode = createPaymentMode(makeConfig({
      privateKey: `0x${'11'.repeat(32)}`,
      relayUrl: 'https://relay.example.com',
    }));

    expect(mode.kind).toBe('relay');
    if (mode.kind !== 'relay') return;
    expect(mode.signers).toHaveLength(1);
    expect(mode.signers[0]?.family).toBe('evm');
  });

  it('should require a relay URL alongside a private key', () => {
    expect(() => createPaymentMode(makeConfig({ privateKey: `0x${'11'.repeat(32)}` })))
      .toThrow(new ConfigError('Relay mode requires a relay URL (X402_PIPELINE_RELAY_URL or --relay-url)'));
  });

  it('should require some signer in relay mode', () => {
    expect(() => createPaymentMode(makeConfig()))
      .toThrow('Relay mode requires a private key (X402_PIPELINE_PRIVATE_KEY or --private-key)');
  });

  it('should accept injected signers without a key', () => {
    const signer = new FakeRelaySigner();
    expect(createPaymentMode(makeConfig(), { signers: [signer] })).toEqual({ kind: 'relay', signers: [signer] });
  });

  it('should require an API key and endpoint in proxy mode', () => {
    expect(() => createPaymentMode(makeConfig({ mode: 'proxy', proxyUrl: 'https://proxy.example.com' })))
      .toThrow('Proxy mode requires an API key (X402_PIPELINE_API_KEY or --api-key)');
    expect(() => createPaymentMode(makeConfig({ mode: 'proxy', apiKey: 'test-api-key' })))
      .toThrow('Proxy mode requires a proxy URL (X402_PIPELINE_PROXY_URL or --proxy-url)');
  });

  it('should build a proxy mode', () => {
    expect(createPaymentMode(makeConfig({
      mode: 'proxy',
      apiKey: 'test-api-key',
      proxyUrl: 'https://proxy.example.com',
    }))).toEqual({ kind: 'proxy', apiKey: 'test-api-key', endpoint: 'https://proxy.example.com' });
  });
});

describe('createPaymentClient', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fetch and pay with the configured limits', async () => {
    const fetchSpy = vi.fn()
      .mockResolvedValueOnce(challengeResponse())
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const events: PaymentEvent[] = [];
    const client = createPaymentClient(makeConfig(), {
      fetch: fetchSpy,
      clock: () => NOW,
      signers: [new FakeRelaySigner()],
      onPayment: (event) => events.push(event),
    });

    const result = await client.fetch({ url: 'https://api.example.com/data' });

    expect(result.charged).toBe(true);
    expect(events).toHaveLength(1);
    expect(client.guard.status('USDC', 6).remaining).toBe('0.40');
  });

  it('should run pipelines against the same guard', async () => {
    const fetchSpy = vi.fn()
      .mockResolvedValueOnce(challengeResponse('600000', 'run-1'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }))
      .mockResolvedValueOnce(challengeResponse('600000', 'run-2'));
    const client = createPaymentClient(makeConfig(), {
      fetch: fetchSpy,
      clock: () => NOW,
      signers: [new FakeRelaySigner()],
    });

    const summary = await client.run([
      { name: 'first', request: () => ({ url: 'https://api.example.com/a' }) },
      { name: 'second', request: () => ({ url: 'https://api.example.com/b' }) },
    ]);

    expect(summary.results.map((r) => r.status)).toEqual(['succeeded', 'failed']);
    expect(summary.totals).toEqual([{ asset: 'USDC', amount: '0.60', payments: 1 }]);
  });

  it('should share an injected guard between clients', async () => {
    const guard = new SpendGuard({ limits: { window: { USDC: '1.00' } }, clock: () => NOW });
    const first = createPaymentClient(makeConfig(), { guard, signers: [new FakeRelaySigner()] });
    const second = createPaymentClient(makeConfig(), { guard, signers: [new FakeRelaySigner()] });

    expect(first.guard).toBe(second.guard);
  });
});
