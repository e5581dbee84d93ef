/**
 * Proxy mode: a custodial account pays on the caller's behalf.
 *
 * POST <endpoint>/pay with a bearer credential and the selected requirements.
 * The account answers with a receipt and the header token for the upstream.
 */

import { z } from 'zod';
import {
  AuthError,
  InsufficientBalanceError,
  PaymentRejectedError,
} from './errors.js';
import { parseJson, send } from './http.js';
import type { FetchLike } from './http.js';
import { log } from './logger.js';
import type { PaymentChallenge, ProxyProof } from './types.js';

const payResponseSchema = z.object({
  success: z.boolean(),
  receiptId: z.string().optional(),
  paymentHeader: z.string().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});

export interface ProxyAccount {
  readonly apiKey: string;
  /** Base URL, already validated and without a trailing slash. */
  readonly endpoint: string;
}

export interface ProxyPaymentOptions {
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly clock?: () => Date;
}

export async function payViaProxy(
  challenge: PaymentChallenge,
  account: ProxyAccount,
  options: ProxyPaymentOptions = {},
): Promise<ProxyProof> {
  log(`Proxy payment ${challenge.amount} ${challenge.assetSymbol} on ${challenge.network} via ${account.endpoint}`);

  const { response, text } = await send(`${account.endpoint}/pay`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${account.apiKey}`,
    },
    body: JSON.stringify({
      x402Version: challenge.x402Version,
      challengeId: challenge.id,
      resource: challenge.resource,
      requirements: challenge.requirements,
    }),
    signal: options.signal,
  }, { fetch: options.fetch, timeoutMs: options.timeoutMs, label: 'Proxy /pay' });

  const parsed = payResponseSchema.safeParse(parseJson(text));
  const body = parsed.success ? parsed.data : null;
  const reason = body?.message ?? body?.error ?? `proxy returned HTTP ${response.status}`;

  if (response.status === 401 || response.status === 403) {
    throw new AuthError(`API credential was rejected: ${reason}`);
  }
  if (response.status === 402 || body?.error === 'insufficient_balance') {
    throw new InsufficientBalanceError(`Account balance is insufficient: ${reason}`);
  }
  if (!response.ok || !body?.success) {
    throw new PaymentRejectedError(reason);
  }
  if (!body.receiptId || !body.paymentHeader) {
    throw new PaymentRejectedError('proxy response is missing the receipt or payment header');
  }

  const paidAt = (options.clock ?? (() => new Date()))();
  return {
    mode: 'proxy',
    challengeId: challenge.id,
    amount: challenge.amount,
    asset: challenge.asset,
    assetSymbol: challenge.assetSymbol,
    decimals: challenge.decimals,
    network: challenge.network,
    payTo: challenge.payTo,
    token: body.paymentHeader,
    paidAt: paidAt.toISOString(),
    receiptId: body.receiptId,
  };
}
