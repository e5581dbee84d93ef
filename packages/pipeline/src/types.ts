import type { PaymentRequirements } from '@x402/core/types';
import type { ChainFamily, NetworkInfo } from './networks.js';

export type { ChainFamily };

/**
 * A parsed 402 challenge. Immutable; a fresh one is produced per 402 response.
 */
export interface PaymentChallenge {
  /** Nonce supplied by the server, or a content hash of the request and terms. */
  readonly id: string;
  readonly x402Version: number;
  readonly scheme: string;
  /** Atomic units, exactly as sent. */
  readonly amount: string;
  readonly asset: string;
  readonly assetSymbol: string;
  readonly decimals: number;
  readonly network: string;
  readonly family: ChainFamily;
  readonly payTo: string;
  readonly resource: string;
  readonly description: string;
  readonly maxTimeoutSeconds: number;
  readonly expiresAt: string;
  readonly nonce: string | null;
  readonly extra: Readonly<Record<string, unknown>>;
  readonly offered: number;
  /** The selected option in the v2 wire shape. */
  readonly requirements: PaymentRequirements;
}

/**
 * What a relay signer is asked to pay.
 */
export interface PaymentInstruction {
  readonly challengeId: string;
  readonly x402Version: number;
  readonly scheme: string;
  readonly network: string;
  readonly amount: string;
  readonly asset: string;
  readonly payTo: string;
  readonly resource: string;
  readonly extra: Readonly<Record<string, unknown>>;
}

export interface TransactionRef {
  readonly network: string;
  readonly hash: string;
}

interface ProofTerms {
  readonly challengeId: string;
  readonly amount: string;
  readonly asset: string;
  readonly assetSymbol: string;
  readonly decimals: number;
  readonly network: string;
  readonly payTo: string;
  /** Value attached to the resent request. */
  readonly token: string;
  readonly paidAt: string;
}

export interface RelayProof extends ProofTerms {
  readonly mode: 'relay';
  readonly payer: string;
  /** Caller → facilitator. */
  readonly clientTransaction: TransactionRef;
  /** Facilitator → upstream; null until observable. */
  readonly facilitatorTransaction: TransactionRef | null;
}

export interface ProxyProof extends ProofTerms {
  readonly mode: 'proxy';
  readonly receiptId: string;
}

export type PaymentProof = RelayProof | ProxyProof;

/**
 * Result of a relay signer's sign-and-submit.
 */
export interface RelaySubmission {
  readonly payer: string;
  readonly clientTxHash: string;
  readonly facilitatorTxHash: string | null;
  readonly paymentHeader: string;
}

/**
 * Signing and broadcast collaborator for relay mode, keyed by chain family.
 * Implementations that are not safe under concurrent use are serialized per
 * `identity` by the resolver.
 */
export interface RelaySigner {
  readonly family: ChainFamily;
  /** Stable identity for serialization and logs, e.g. the payer address. */
  readonly identity: string;
  supports(network: NetworkInfo): boolean;
  signAndSubmit(
    instruction: PaymentInstruction,
    options: { readonly signal?: AbortSignal },
  ): Promise<RelaySubmission>;
}

export type PaymentMode =
  | { readonly kind: 'relay'; readonly signers: readonly RelaySigner[] }
  | { readonly kind: 'proxy'; readonly apiKey: string; readonly endpoint: string };

/**
 * Log-safe rendering of a payment mode. Never includes key material.
 */
export function describeMode(mode: PaymentMode): string {
  switch (mode.kind) {
    case 'relay':
      return `relay (${mode.signers.map((s) => `${s.family}:${s.identity}`).join(', ') || 'no signers'})`;
    case 'proxy':
      return `proxy (${mode.endpoint})`;
  }
}

/**
 * Outbound request. Bodies are strings so the request can be re-sent once
 * after payment.
 */
export interface PaymentRequest {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}
