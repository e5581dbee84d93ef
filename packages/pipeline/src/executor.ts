/**
 * Payment-aware request executor.
 *
 * Sends a request; on HTTP 402 parses the challenge, authorizes spend, pays
 * through the resolver and resends exactly once with the proof attached.
 *
 *   not 402        → returned as is, no payment
 *   402, resend ok → spend hold committed, proof returned
 *   402, resend 402→ hold released, PaymentNotAcceptedError (no second payment)
 *   resend failed  → hold committed (payment presumed spent), TransportError
 *                    carrying the proof; this includes a failed or timed out
 *                    read of the paid response body
 */

import { parseChallenge } from './challenge.js';
import {
  ChallengeUnrecognizedError,
  PaymentNotAcceptedError,
  SpendLimitExceededError,
  TransportError,
  errorMessage,
} from './errors.js';
import { send } from './http.js';
import type { FetchLike, HttpReply } from './http.js';
import { log } from './logger.js';
import type { PaymentResolver } from './resolver.js';
import { completeProof, readSettlement } from './settlement.js';
import type { SettlementAudit } from './settlement.js';
import type { SpendGuard, SpendHold } from './spend-guard.js';
import type { PaymentChallenge, PaymentProof, PaymentRequest } from './types.js';
import { fromAtomic } from './units.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export const V1_PAYMENT_HEADER = 'X-PAYMENT';
export const V2_PAYMENT_HEADER = 'PAYMENT-SIGNATURE';

export interface ExecutionResult {
  readonly url: string;
  /** The final response; its body has already been read into `body`. */
  readonly response: Response;
  readonly status: number;
  readonly contentType: string;
  readonly body: string;
  /** Body parsed as JSON when it is JSON, otherwise the text. */
  readonly payload: unknown;
  readonly payment: PaymentProof | null;
  /** Whether this call committed the payment to the spend ledger. */
  readonly charged: boolean;
  readonly settlement: SettlementAudit | null;
}

export interface PaymentEvent {
  readonly url: string;
  readonly proof: PaymentProof;
}

export interface ExecutorOptions {
  readonly resolver: PaymentResolver;
  readonly guard: SpendGuard;
  readonly fetch?: FetchLike;
  readonly timeoutMs?: number;
  readonly preferredNetworks?: readonly string[];
  readonly schemes?: readonly string[];
  readonly clock?: () => Date;
  /** Called for every payment committed to the ledger. */
  readonly onPayment?: (event: PaymentEvent) => void;
}

export class PaymentExecutor {
  private readonly resolver: PaymentResolver;
  private readonly guard: SpendGuard;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly timeoutMs: number;
  private readonly options: ExecutorOptions;
  private readonly clock: () => Date;

  constructor(options: ExecutorOptions) {
    this.resolver = options.resolver;
    this.guard = options.guard;
    this.fetchImpl = options.fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
    this.options = options;
  }

  async execute(request: PaymentRequest): Promise<ExecutionResult> {
    const method = (request.method ?? 'GET').toUpperCase();
    log(`${method} ${request.url}`);

    const first = await this.send(request, method, null);
    if (first.response.status !== 402) {
      return finish(request.url, first, null, false);
    }

    const parsed = parseChallenge(
      {
        headers: first.response.headers,
        body: first.text,
        request: { method, url: request.url, body: request.body },
      },
      {
        preferredNetworks: this.options.preferredNetworks,
        schemes: this.options.schemes,
        canPay: (network) => this.resolver.canPay(network),
      },
      this.clock(),
    );
    if (!parsed.ok) {
      throw new ChallengeUnrecognizedError(parsed.reason);
    }

    const challenge = parsed.challenge;
    log(
      `Payment required: ${fromAtomic(challenge.amount, challenge.decimals)} ${challenge.assetSymbol} ` +
      `on ${challenge.network} (${challenge.offered} option(s) offered)`,
    );

    const { proof, hold, reused } = await this.resolver.resolve(challenge, {
      authorize: (c) => this.authorize(c),
      timeoutMs: this.timeoutMs,
    });

    const headerName = challenge.x402Version >= 2 ? V2_PAYMENT_HEADER : V1_PAYMENT_HEADER;
    let retry: HttpReply;
    try {
      retry = await this.send(request, method, { name: headerName, value: proof.token });
    } catch (error: unknown) {
      const charged = await this.commit(request.url, proof, hold);
      if (error instanceof TransportError) {
        throw new TransportError(`${error.message} (after payment)`, { cause: error, payment: proof, charged });
      }
      throw error;
    }

    if (retry.response.status === 402) {
      await hold?.release();
      throw new PaymentNotAcceptedError(request.url, { payment: proof, charged: false });
    }

    const charged = await this.commit(request.url, proof, hold);
    if (reused) {
      log(`Resent with payment from an earlier resolution of challenge ${challenge.id}`);
    }
    return finish(request.url, retry, proof, charged);
  }

  private async authorize(challenge: PaymentChallenge): Promise<SpendHold> {
    const decision = await this.guard.authorize({
      amount: BigInt(challenge.amount),
      asset: challenge.assetSymbol,
      network: challenge.network,
      decimals: challenge.decimals,
    });
    if (!decision.allowed) {
      log(`Spend limit: ${decision.reason} (requested ${decision.requested} ${decision.asset}, remaining ${decision.remaining})`);
      throw new SpendLimitExceededError(
        decision.asset,
        decision.reason,
        decision.limit,
        decision.spent,
        decision.requested,
        decision.remaining,
      );
    }
    return decision.hold;
  }

  private async commit(url: string, proof: PaymentProof, hold: SpendHold | null): Promise<boolean> {
    if (!hold) return false;
    await hold.commit();
    if (this.options.onPayment) {
      try {
        this.options.onPayment({ url, proof });
      } catch (error: unknown) {
        log(`Warning: payment listener failed: ${errorMessage(error)}`);
      }
    }
    return true;
  }

  private send(
    request: PaymentRequest,
    method: string,
    payment: { readonly name: string; readonly value: string } | null,
  ): Promise<HttpReply> {
    const headers = new Headers(request.headers);
    if (payment) {
      headers.set(payment.name, payment.value);
    }
    return send(request.url, {
      method,
      headers,
      body: method === 'GET' || method === 'HEAD' ? undefined : request.body,
    }, { fetch: this.fetchImpl, timeoutMs: this.timeoutMs, label: `${method} ${request.url}` });
  }
}

function finish(
  url: string,
  reply: HttpReply,
  payment: PaymentProof | null,
  charged: boolean,
): ExecutionResult {
  const { response, text: body } = reply;
  const contentType = response.headers.get('content-type') ?? '';
  const settlement = readSettlement(response.headers);

  return {
    url,
    response,
    status: response.status,
    contentType,
    body,
    payload: parsePayload(body, contentType),
    payment: payment ? completeProof(payment, settlement) : null,
    charged,
    settlement,
  };
}

function parsePayload(body: string, contentType: string): unknown {
  const looksJson = contentType.includes('json') || /^\s*[[{]/.test(body);
  if (!looksJson) return body;
  try {
    return JSON.parse(body) as unknown;
  } catch {
    return body;
  }
}
