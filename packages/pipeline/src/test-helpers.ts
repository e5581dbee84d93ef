import type { PaymentRequirements } from '@x402/core/types';
import type { PaymentChallenge, ProxyProof, RelayProof, RelaySigner, RelaySubmission } from './types.js';

export const BASE_USDC = '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913';
export const PAY_TO = '0x2222222222222222222222222222222222222222';
export const PAYER = '0x3333333333333333333333333333333333333333';

export function makeChallenge(overrides: Partial<PaymentChallenge> = {}): PaymentChallenge {
  const requirements: PaymentRequirements = {
    scheme: 'exact',
    network: 'eip155:8453',
    asset: BASE_USDC,
    amount: '600000',
    payTo: PAY_TO,
    maxTimeoutSeconds: 300,
    extra: { name: 'USD Coin', version: '2' },
  };
  return {
    id: 'nonce:test-1',
    x402Version: 1,
    scheme: 'exact',
    amount: '600000',
    asset: BASE_USDC,
    assetSymbol: 'USDC',
    decimals: 6,
    network: 'base',
    family: 'evm',
    payTo: PAY_TO,
    resource: 'https://api.example.com/data',
    description: '',
    maxTimeoutSeconds: 300,
    expiresAt: '2100-01-01T00:00:00.000Z',
    nonce: 'test-1',
    extra: { name: 'USD Coin', version: '2' },
    offered: 1,
    requirements,
    ...overrides,
  };
}

export function makeRelayProof(overrides: Partial<RelayProof> = {}): RelayProof {
  return {
    mode: 'relay',
    challengeId: 'nonce:test-1',
    amount: '600000',
    asset: BASE_USDC,
    assetSymbol: 'USDC',
    decimals: 6,
    network: 'base',
    payTo: PAY_TO,
    token: 'relay-token',
    paidAt: '2026-01-01T00:00:00.000Z',
    payer: PAYER,
    clientTransaction: { network: 'base', hash: '0xclient' },
    facilitatorTransaction: null,
    ...overrides,
  };
}

export function makeProxyProof(overrides: Partial<ProxyProof> = {}): ProxyProof {
  return {
    mode: 'proxy',
    challengeId: 'nonce:test-1',
    amount: '600000',
    asset: BASE_USDC,
    assetSymbol: 'USDC',
    decimals: 6,
    network: 'base',
    payTo: PAY_TO,
    token: 'proxy-token',
    paidAt: '2026-01-01T00:00:00.000Z',
    receiptId: 'rcpt_1',
    ...overrides,
  };
}

/**
 * In-process relay signer that records instructions and answers with
 * sequential transaction hashes.
 */
export class FakeRelaySigner implements RelaySigner {
  readonly family = 'evm' as const;
  readonly identity: string;
  readonly calls: string[] = [];
  private count = 0;

  constructor(
    identity = PAYER,
    private readonly submit?: () => Promise<RelaySubmission>,
  ) {
    this.identity = identity;
  }

  supports(network: { readonly family: string }): boolean {
    return network.family === 'evm';
  }

  async signAndSubmit(instruction: { readonly challengeId: string }): Promise<RelaySubmission> {
    this.calls.push(instruction.challengeId);
    if (this.submit) return this.submit();
    this.count += 1;
    return {
      payer: this.identity,
      clientTxHash: `0xclient${this.count}`,
      facilitatorTxHash: null,
      paymentHeader: `relay-token-${this.count}`,
    };
  }
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

/** x402 v1 402 response for a Base USDC payment. */
export function challengeResponse(amount = '600000', nonce = 'test-1'): Response {
  return jsonResponse({
    x402Version: 1,
    error: 'payment required',
    accepts: [{
      scheme: 'exact',
      network: 'base',
      maxAmountRequired: amount,
      asset: BASE_USDC,
      payTo: PAY_TO,
      maxTimeoutSeconds: 300,
      resource: 'https://api.example.com/data',
      extra: { name: 'USD Coin', version: '2', nonce },
    }],
  }, 402);
}


/** 200 response whose body stream fails after the headers arrived. */
export function brokenBodyResponse(reason = 'connection reset'): Response {
  return new Response(new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new Error(reason));
    },
  }), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

/** 200 response whose body never finishes until `signal` aborts. */
export function stalledBodyResponse(signal: AbortSignal | null | undefined): Response {
  return new Response(new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"partial":'));
      signal?.addEventListener('abort', () => controller.error(new Error('aborted')), { once: true });
    },
  }), { status: 200, headers: { 'Content-Type': 'application/json' } });
}
