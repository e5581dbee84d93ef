/**
 * Turns a parsed challenge into a payment proof using the active mode.
 *
 * Resolutions are cached by challenge id until the challenge expires, so a
 * challenge is paid at most once per resolver even when several callers race
 * on it. Only the first caller authorizes spend and receives the hold; later
 * callers get the same proof with no hold. Failures are evicted so a later
 * attempt starts fresh.
 */

import { SignerError } from './errors.js';
import type { FetchLike } from './http.js';
import { log } from './logger.js';
import { KeyedMutex } from './mutex.js';
import type { NetworkInfo } from './networks.js';
import { payViaProxy } from './proxy.js';
import { payViaRelay, selectSigner } from './relay.js';
import type { SpendHold } from './spend-guard.js';
import type { PaymentChallenge, PaymentMode, PaymentProof } from './types.js';
import { describeMode } from './types.js';
import { facilitatorBaseUrl } from './url-validation.js';

export interface ResolveOptions {
  /**
   * Gate run once per new challenge before any facilitator is contacted.
   * Returns the spend hold to settle later, or throws to stop the payment.
   */
  readonly authorize?: (challenge: PaymentChallenge) => Promise<SpendHold | null>;
  readonly timeoutMs?: number;
}

export interface Resolution {
  readonly proof: PaymentProof;
  /** Null when the proof was reused from an earlier resolution. */
  readonly hold: SpendHold | null;
  readonly reused: boolean;
}

export interface PaymentResolverOptions {
  readonly fetch?: FetchLike;
  readonly clock?: () => Date;
}

interface CacheEntry {
  readonly promise: Promise<PaymentProof>;
  readonly expiresAt: number;
}

export class PaymentResolver {
  readonly mode: PaymentMode;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly clock: () => Date;
  private readonly locks = new KeyedMutex();
  private readonly resolutions = new Map<string, CacheEntry>();

  constructor(mode: PaymentMode, options: PaymentResolverOptions = {}) {
    this.mode = mode.kind === 'proxy'
      ? { ...mode, endpoint: facilitatorBaseUrl(mode.endpoint, 'Proxy URL') }
      : mode;
    this.fetchImpl = options.fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Whether the active mode can pay on a network at all. */
  canPay(network: NetworkInfo): boolean {
    switch (this.mode.kind) {
      case 'relay':
        return this.mode.signers.some((s) => s.family === network.family && s.supports(network));
      case 'proxy':
        return true;
    }
  }

  async resolve(challenge: PaymentChallenge, options: ResolveOptions = {}): Promise<Resolution> {
    this.prune();

    const cached = this.resolutions.get(challenge.id);
    if (cached) {
      log(`Reusing payment for challenge ${challenge.id}`);
      return { proof: await cached.promise, hold: null, reused: true };
    }

    // Filled in by the first caller once authorization succeeds.
    const slot: { hold: SpendHold | null } = { hold: null };
    const promise = this.pay(challenge, options, slot);
    this.resolutions.set(challenge.id, {
      promise,
      expiresAt: Date.parse(challenge.expiresAt),
    });

    try {
      return { proof: await promise, hold: slot.hold, reused: false };
    } catch (error: unknown) {
      if (this.resolutions.get(challenge.id)?.promise === promise) {
        this.resolutions.delete(challenge.id);
      }
      throw error;
    }
  }

  /** Drop all cached resolutions. */
  clear(): void {
    this.resolutions.clear();
  }

  private async pay(
    challenge: PaymentChallenge,
    options: ResolveOptions,
    slot: { hold: SpendHold | null },
  ): Promise<PaymentProof> {
    if (this.mode.kind === 'relay' && !selectSigner(this.mode.signers, challenge)) {
      // Checked before authorizing so a hopeless payment holds no budget.
      throw new SignerError(`no signer configured for ${challenge.family} network ${challenge.network}`);
    }

    slot.hold = options.authorize ? await options.authorize(challenge) : null;
    log(`Paying ${challenge.amount} ${challenge.assetSymbol} (${describeMode(this.mode)})`);

    try {
      return await this.dispatch(challenge, options.timeoutMs);
    } catch (error: unknown) {
      await slot.hold?.release();
      throw error;
    }
  }

  private dispatch(challenge: PaymentChallenge, timeoutMs: number | undefined): Promise<PaymentProof> {
    const mode = this.mode;
    switch (mode.kind) {
      case 'relay':
        return payViaRelay(challenge, mode.signers, {
          locks: this.locks,
          signal: timeoutMs !== undefined && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
          clock: this.clock,
        });
      case 'proxy':
        return payViaProxy(challenge, mode, {
          fetch: this.fetchImpl,
          timeoutMs,
          clock: this.clock,
        });
    }
  }

  private prune(): void {
    const now = this.clock().getTime();
    for (const [id, entry] of this.resolutions) {
      if (entry.expiresAt <= now) {
        this.resolutions.delete(id);
      }
    }
  }
}
