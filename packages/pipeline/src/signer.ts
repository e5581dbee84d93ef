/**
 * EVM relay signer: pays the relay facilitator, which pays the upstream API.
 *
 * 1. GET  <relay>/supported  x402 supported kinds + the relay's signer addresses
 * 2. Sign an EIP-3009 TransferWithAuthorization from the caller to the relay
 *    for the challenge amount (viem, EIP-712 typed data)
 * 3. POST <relay>/relay      instruction + signed authorization; the relay
 *    settles both legs and returns their transaction hashes together with the
 *    header token the upstream expects
 */

import * as crypto from 'node:crypto';
import { isAddress, isHex } from 'viem';
import type { Address, Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { z } from 'zod';
import { PaymentRejectedError, SignerError, X402Error, errorMessage } from './errors.js';
import { parseJson, send } from './http.js';
import type { FetchLike } from './http.js';
import { log } from './logger.js';
import { findAsset, findNetwork } from './networks.js';
import type { NetworkInfo } from './networks.js';
import type { PaymentInstruction, RelaySigner, RelaySubmission } from './types.js';
import { facilitatorBaseUrl } from './url-validation.js';

const DEFAULT_VALIDITY_SECONDS = 300;

/**
 * EIP-712 type definition for TransferWithAuthorization.
 */
const TRANSFER_WITH_AUTHORIZATION_TYPES = {
  TransferWithAuthorization: [
    { name: 'from', type: 'address' },
    { name: 'to', type: 'address' },
    { name: 'value', type: 'uint256' },
    { name: 'validAfter', type: 'uint256' },
    { name: 'validBefore', type: 'uint256' },
    { name: 'nonce', type: 'bytes32' },
  ],
} as const;

const supportedSchema = z.object({
  kinds: z.array(z.object({
    scheme: z.string(),
    network: z.string(),
    extra: z.record(z.unknown()).nullish(),
  })),
  signers: z.record(z.array(z.string())).optional(),
});

const relayResponseSchema = z.object({
  success: z.boolean(),
  payer: z.string().optional(),
  clientTransaction: z.string().optional(),
  facilitatorTransaction: z.string().nullish(),
  paymentHeader: z.string().optional(),
  errorReason: z.string().optional(),
});

type SupportedResponse = z.infer<typeof supportedSchema>;
type Account = ReturnType<typeof privateKeyToAccount>;

export interface TransferDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
}

export interface TransferTerms {
  readonly to: Address;
  readonly value: string;
  readonly validitySeconds?: number;
}

export interface SignedAuthorization {
  readonly signature: Hex;
  readonly authorization: {
    readonly from: Address;
    readonly to: Address;
    readonly value: string;
    readonly validAfter: string;
    readonly validBefore: string;
    readonly nonce: Hex;
  };
}

export interface EvmRelaySignerOptions {
  /** Hex private key, with or without 0x. Held in memory only; never logged. */
  readonly privateKey: string;
  readonly relayUrl: string;
  readonly fetch?: FetchLike;
  readonly validitySeconds?: number;
}

/**
 * Sign an EIP-3009 TransferWithAuthorization.
 */
export async function signTransferAuthorization(
  account: Account,
  domain: TransferDomain,
  terms: TransferTerms,
): Promise<SignedAuthorization> {
  const nonce: Hex = `0x${crypto.randomBytes(32).toString('hex')}`;
  const validAfter = 0n;
  const validBefore = BigInt(Math.floor(Date.now() / 1000) + (terms.validitySeconds ?? DEFAULT_VALIDITY_SECONDS));

  const signature = await account.signTypedData({
    domain: {
      name: domain.name,
      version: domain.version,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
    },
    types: TRANSFER_WITH_AUTHORIZATION_TYPES,
    primaryType: 'TransferWithAuthorization',
    message: {
      from: account.address,
      to: terms.to,
      value: BigInt(terms.value),
      validAfter,
      validBefore,
      nonce,
    },
  });

  return {
    signature,
    authorization: {
      from: account.address,
      to: terms.to,
      value: terms.value,
      validAfter: validAfter.toString(),
      validBefore: validBefore.toString(),
      nonce,
    },
  };
}

export class EvmRelaySigner implements RelaySigner {
  readonly family = 'evm' as const;
  readonly identity: string;
  private readonly account: Account;
  private readonly relayUrl: string;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly validitySeconds: number;
  private supported: Promise<SupportedResponse> | null = null;

  constructor(options: EvmRelaySignerOptions) {
    this.relayUrl = facilitatorBaseUrl(options.relayUrl, 'Relay URL');
    this.account = toAccount(options.privateKey);
    this.identity = this.account.address;
    this.fetchImpl = options.fetch;
    this.validitySeconds = options.validitySeconds ?? DEFAULT_VALIDITY_SECONDS;
  }

  supports(network: NetworkInfo): boolean {
    return network.family === 'evm' && network.chainId !== undefined;
  }

  async signAndSubmit(
    instruction: PaymentInstruction,
    options: { readonly signal?: AbortSignal } = {},
  ): Promise<RelaySubmission> {
    const network = findNetwork(instruction.network);
    if (!network || !this.supports(network) || network.chainId === undefined) {
      throw new SignerError(`network mismatch: ${instruction.network} is not an EVM network`);
    }
    if (!isAddress(instruction.asset)) {
      throw new SignerError(`asset ${instruction.asset} is not an EVM address`);
    }

    const supported = await this.loadSupported(options.signal);
    const kind = supported.kinds.find(
      (k) => k.scheme === instruction.scheme && (k.network === network.id || k.network === network.caip2),
    );
    if (!kind) {
      throw new PaymentRejectedError(`relay does not support ${instruction.scheme} payments on ${network.id}`);
    }

    const relayAddress = findRelayAddress(supported, network);
    if (!relayAddress) {
      throw new PaymentRejectedError(`relay published no signer address for ${network.id}`);
    }

    const domain = resolveDomain(instruction, network, kind.extra ?? {});
    if (!domain) {
      throw new SignerError(`no EIP-712 domain for asset ${instruction.asset} on ${network.id}`);
    }

    log(`Signing ${instruction.amount} atomic units to relay ${relayAddress} on ${network.id}`);
    let signed: SignedAuthorization;
    try {
      signed = await signTransferAuthorization(
        this.account,
        { ...domain, chainId: network.chainId, verifyingContract: instruction.asset },
        { to: relayAddress, value: instruction.amount, validitySeconds: this.validitySeconds },
      );
    } catch (error: unknown) {
      throw new SignerError(errorMessage(error), { cause: error });
    }

    const { response, text } = await send(`${this.relayUrl}/relay`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        x402Version: instruction.x402Version,
        instruction,
        paymentPayload: {
          x402Version: instruction.x402Version,
          scheme: instruction.scheme,
          network: network.id,
          payload: signed,
        },
      }),
      signal: options.signal,
    }, { fetch: this.fetchImpl, label: 'Relay /relay' });

    const parsed = relayResponseSchema.safeParse(parseJson(text));
    if (!response.ok || !parsed.success || !parsed.data.success) {
      const reason = parsed.success && parsed.data.errorReason
        ? parsed.data.errorReason
        : `relay /relay returned HTTP ${response.status}`;
      throw new PaymentRejectedError(reason);
    }

    const { clientTransaction, facilitatorTransaction, paymentHeader, payer } = parsed.data;
    if (!clientTransaction || !paymentHeader) {
      throw new PaymentRejectedError('relay response is missing the client transaction or payment header');
    }

    return {
      payer: payer ?? this.account.address,
      clientTxHash: clientTransaction,
      facilitatorTxHash: facilitatorTransaction ?? null,
      paymentHeader,
    };
  }

  private loadSupported(signal: AbortSignal | undefined): Promise<SupportedResponse> {
    if (!this.supported) {
      this.supported = this.fetchSupported(signal).catch((error: unknown) => {
        this.supported = null;
        throw error;
      });
    }
    return this.supported;
  }

  private async fetchSupported(signal: AbortSignal | undefined): Promise<SupportedResponse> {
    const { response, text } = await send(`${this.relayUrl}/supported`, { method: 'GET', signal }, {
      fetch: this.fetchImpl,
      label: 'Relay /supported',
    });
    if (!response.ok) {
      throw new PaymentRejectedError(`relay /supported returned HTTP ${response.status}`);
    }

    const parsed = supportedSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new PaymentRejectedError('relay /supported response is malformed');
    }
    return parsed.data;
  }
}

// -- Internal Helpers ---

function toAccount(privateKey: string): Account {
  const key = privateKey.startsWith('0x') ? privateKey : `0x${privateKey}`;
  if (!isHex(key) || key.length !== 66) {
    throw new SignerError('private key must be 32 bytes of hex');
  }
  try {
    return privateKeyToAccount(key);
  } catch (error: unknown) {
    if (error instanceof X402Error) throw error;
    throw new SignerError('private key is not a valid secp256k1 key', { cause: error });
  }
}

function findRelayAddress(supported: SupportedResponse, network: NetworkInfo): Address | null {
  const signers = supported.signers ?? {};
  const candidates = [
    ...(signers[network.caip2] ?? []),
    ...(signers[network.id] ?? []),
    ...(signers['eip155:*'] ?? []),
  ];
  return candidates.find((address): address is Address => isAddress(address)) ?? null;
}

/**
 * EIP-712 domain for the token: the challenge's own `extra` first, then the
 * relay's supported kind, then the built-in registry.
 */
function resolveDomain(
  instruction: PaymentInstruction,
  network: NetworkInfo,
  kindExtra: Record<string, unknown>,
): { name: string; version: string } | null {
  for (const extra of [instruction.extra, kindExtra]) {
    const name = extra['name'];
    const version = extra['version'];
    if (typeof name === 'string' && typeof version === 'string') {
      return { name, version };
    }
  }
  return findAsset(network, instruction.asset)?.eip712 ?? null;
}
