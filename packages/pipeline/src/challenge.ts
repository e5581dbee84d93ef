/**
 * Parser for x402 payment challenges carried by HTTP 402 responses.
 *
 * Decoding is delegated to `x402HTTPClient.getPaymentRequiredResponse`, which
 * reads the v2 PAYMENT-REQUIRED header or a v1 JSON body. This module ranks
 * the offered options, resolves the token and derives the challenge id.
 *
 * Side-effect free: the caller supplies the body text and the clock.
 */

import { createHash } from 'node:crypto';
import { x402Client, x402HTTPClient } from '@x402/fetch';
import type { PaymentRequired, PaymentRequirements } from '@x402/core/types';
import { z } from 'zod';
import { findAsset, findNetwork } from './networks.js';
import type { NetworkInfo } from './networks.js';
import { isAtomic } from './units.js';
import type { PaymentChallenge } from './types.js';

const DEFAULT_SCHEMES: readonly string[] = ['exact'];
const DEFAULT_TIMEOUT_SECONDS = 300;

const httpClient = new x402HTTPClient(new x402Client());

// v1 options carry maxAmountRequired, v2 options carry amount.
const acceptedOptionSchema = z.object({
  scheme: z.string().min(1),
  network: z.string().min(1),
  amount: z.string().optional(),
  maxAmountRequired: z.string().optional(),
  asset: z.string().min(1),
  payTo: z.string().min(1),
  maxTimeoutSeconds: z.number().int().positive().optional(),
  resource: z.string().optional(),
  description: z.string().optional(),
  extra: z.record(z.unknown()).nullish(),
});

type AcceptedOption = z.infer<typeof acceptedOptionSchema>;

export interface ChallengeInput {
  readonly headers: Headers;
  readonly body: string;
  /** The request that was answered with 402; part of the challenge identity. */
  readonly request: {
    readonly method: string;
    readonly url: string;
    readonly body?: string;
  };
}

export interface ChallengePreferences {
  /** Networks to prefer, most preferred first (slug or CAIP-2). */
  readonly preferredNetworks?: readonly string[];
  /** Accepted schemes. Defaults to ["exact"]. */
  readonly schemes?: readonly string[];
  /** Whether the active payment mode can pay on a network. */
  readonly canPay?: (network: NetworkInfo) => boolean;
}

export type ParseResult =
  | { readonly ok: true; readonly challenge: PaymentChallenge }
  | { readonly ok: false; readonly reason: string };

interface Candidate {
  readonly option: AcceptedOption;
  readonly requirements: PaymentRequirements;
  readonly network: NetworkInfo;
  readonly symbol: string;
  readonly decimals: number;
  readonly rank: number;
  readonly order: number;
}

/**
 * Parse a 402 response into a payment challenge, selecting one of the offered
 * options by preference order.
 */
export function parseChallenge(
  input: ChallengeInput,
  preferences: ChallengePreferences = {},
  now: Date = new Date(),
): ParseResult {
  const envelope = readEnvelope(input);
  if (!envelope) {
    return { ok: false, reason: 'no x402 payment requirements found in headers or body' };
  }

  const accepts: readonly unknown[] = Array.isArray(envelope.accepts) ? envelope.accepts : [];
  if (accepts.length === 0) {
    const serverError = 'error' in envelope && typeof envelope.error === 'string' ? envelope.error : undefined;
    return { ok: false, reason: serverError ?? 'challenge offers no payment options' };
  }

  const schemes = preferences.schemes ?? DEFAULT_SCHEMES;
  const preferred = (preferences.preferredNetworks ?? [])
    .map((n) => findNetwork(n)?.id ?? n);

  const candidates: Candidate[] = [];
  const seenNetworks: string[] = [];

  accepts.forEach((raw, order) => {
    const parsed = acceptedOptionSchema.safeParse(raw);
    if (!parsed.success) return;
    const option = parsed.data;
    seenNetworks.push(option.network);

    if (!schemes.includes(option.scheme)) return;

    const network = findNetwork(option.network);
    if (!network) return;
    if (preferences.canPay && !preferences.canPay(network)) return;

    const requirements = toRequirements(option, network);
    if (!requirements) return;

    const asset = resolveAsset(network, requirements);
    if (!asset) return;

    const index = preferred.indexOf(network.id);
    candidates.push({
      option,
      requirements,
      network,
      symbol: asset.symbol,
      decimals: asset.decimals,
      rank: index === -1 ? Number.POSITIVE_INFINITY : index,
      order,
    });
  });

  candidates.sort((a, b) => (a.rank - b.rank) || (a.order - b.order));
  const selected = candidates[0];

  if (!selected) {
    const networks = seenNetworks.length > 0 ? ` (networks: ${seenNetworks.join(', ')})` : '';
    return {
      ok: false,
      reason: `none of ${accepts.length} payment option(s) is payable${networks}`,
    };
  }

  return {
    ok: true,
    challenge: buildChallenge(input, envelope, accepts.length, selected, now),
  };
}

// -- Internal Helpers ---

function readEnvelope(input: ChallengeInput): PaymentRequired | null {
  const body = input.body.trim().length > 0 ? tryParseJson(input.body) : undefined;
  try {
    return httpClient.getPaymentRequiredResponse((name) => input.headers.get(name), body);
  } catch {
    return null;
  }
}

/**
 * Wire requirements in the v2 shape, with the amount and asset exactly as
 * the server sent them.
 */
function toRequirements(option: AcceptedOption, network: NetworkInfo): PaymentRequirements | null {
  const amount = option.amount ?? option.maxAmountRequired;
  if (amount === undefined || !isAtomic(amount) || BigInt(amount) === 0n) {
    return null;
  }

  return {
    scheme: option.scheme,
    network: network.caip2,
    asset: option.asset,
    amount,
    payTo: option.payTo,
    maxTimeoutSeconds: option.maxTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    extra: option.extra ?? {},
  };
}

function resolveAsset(
  network: NetworkInfo,
  requirements: PaymentRequirements,
): { symbol: string; decimals: number } | null {
  const known = findAsset(network, requirements.asset);
  if (known) {
    return { symbol: known.symbol, decimals: known.decimals };
  }

  const decimals = requirements.extra?.['decimals'];
  if (typeof decimals !== 'number' || !Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    return null;
  }
  const symbol = requirements.extra?.['symbol'];
  return {
    symbol: typeof symbol === 'string' && symbol.length > 0 ? symbol : requirements.asset,
    decimals,
  };
}

function buildChallenge(
  input: ChallengeInput,
  envelope: PaymentRequired,
  offered: number,
  selected: Candidate,
  now: Date,
): PaymentChallenge {
  const { option, requirements, network } = selected;
  const extra = requirements.extra ?? {};
  const nonceValue = extra['nonce'];
  const nonce = typeof nonceValue === 'string' && nonceValue.length > 0 ? nonceValue : null;
  const maxTimeoutSeconds = requirements.maxTimeoutSeconds;

  // v1 bodies have no envelope resource.
  const envelopeResource: unknown = envelope.resource;
  const resourceUrl = typeof envelopeResource === 'object' && envelopeResource !== null && 'url' in envelopeResource
    && typeof envelopeResource.url === 'string' ? envelopeResource.url : undefined;

  return {
    id: nonce !== null ? `nonce:${nonce}` : contentHash(input, network.id, requirements),
    x402Version: envelope.x402Version,
    scheme: requirements.scheme,
    amount: requirements.amount,
    asset: requirements.asset,
    assetSymbol: selected.symbol,
    decimals: selected.decimals,
    network: network.id,
    family: network.family,
    payTo: requirements.payTo,
    resource: option.resource ?? resourceUrl ?? input.request.url,
    description: option.description ?? '',
    maxTimeoutSeconds,
    expiresAt: new Date(now.getTime() + maxTimeoutSeconds * 1000).toISOString(),
    nonce,
    extra,
    offered,
    requirements,
  };
}

function contentHash(input: ChallengeInput, networkId: string, requirements: PaymentRequirements): string {
  const bodyDigest = createHash('sha256').update(input.request.body ?? '').digest('hex');
  const identity = JSON.stringify([
    input.request.method.toUpperCase(),
    input.request.url,
    bodyDigest,
    requirements.scheme,
    networkId,
    requirements.amount,
    requirements.asset,
    requirements.payTo,
  ]);
  return `sha256:${createHash('sha256').update(identity).digest('hex')}`;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}
