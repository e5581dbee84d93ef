import { describe, it, expect, vi, afterEach } from 'vitest';
import { completeProof, readSettlement } from './settlement.js';
import { makeProxyProof, makeRelayProof, PAYER } from './test-helpers.js';

function encode(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64');
}

describe('readSettlement', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return null when no settlement headers are present', () => {
    expect(readSettlement(new Headers({ 'content-type': 'application/json' }))).toBeNull();
  });

  it('should capture both headers verbatim and decode the payment response', () => {
    const paymentResponse = encode({ success: true, transaction: '0xfacilitator', network: 'base', payer: PAYER });
    const settlement = readSettlement(new Headers({
      'x-client-payment': '0xclient',
      'x-payment-response': paymentResponse,
    }));

    expect(settlement).toEqual({
      headers: { 'x-client-payment': '0xclient', 'x-payment-response': paymentResponse },
      clientPayment: '0xclient',
      paymentResponse: { success: true, transaction: '0xfacilitator', network: 'base', payer: PAYER },
    });
  });

  it('should accept the x402 v2 payment-response header name', () => {
    const value = encode({ success: true, transaction: '0xv2', network: 'eip155:8453' });
    const settlement = readSettlement(new Headers({ 'payment-response': value }));

    expect(settlement?.headers).toEqual({ 'payment-response': value });
    expect(settlement?.clientPayment).toBeNull();
    expect(settlement?.paymentResponse).toEqual({
      success: true,
      transaction: '0xv2',
      network: 'eip155:8453',
      payer: null,
    });
  });

  it('should keep an undecodable payment response as a raw header only', () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const settlement = readSettlement(new Headers({ 'x-payment-response': 'not base64 json' }));

    expect(settlement?.headers).toEqual({ 'x-payment-response': 'not base64 json' });
    expect(settlement?.paymentResponse).toBeNull();
  });
});

describe('completeProof', () => {
  const settled = {
    headers: {},
    clientPayment: null,
    paymentResponse: { success: true, transaction: '0xfacilitator', network: 'base', payer: null },
  };

  it('should fill the facilitator transaction of a relay proof', () => {
    const proof = completeProof(makeRelayProof(), settled);
    expect(proof.mode === 'relay' ? proof.facilitatorTransaction : undefined).toEqual({
      network: 'base',
      hash: '0xfacilitator',
    });
  });

  it('should not overwrite a facilitator transaction reported by the relay', () => {
    const original = makeRelayProof({ facilitatorTransaction: { network: 'base', hash: '0xrelay' } });
    expect(completeProof(original, settled)).toBe(original);
  });

  it('should leave proxy proofs and missing settlements unchanged', () => {
    const proxy = makeProxyProof();
    expect(completeProof(proxy, settled)).toBe(proxy);

    const relay = makeRelayProof();
    expect(completeProof(relay, null)).toBe(relay);
  });
});
