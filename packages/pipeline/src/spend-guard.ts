/**
 * Spend limits for payments, checked before anything is signed.
 *
 * The ledger counts committed spend per window (UTC day by default) keyed by
 * asset and network. Authorization reserves the amount as a pending hold
 * inside a critical section, so concurrent pipelines sharing one guard cannot
 * jointly pass checks that together exceed a limit. Holds are committed once
 * the upstream accepts the payment, or released if it never happened.
 */

import { ConfigError, errorMessage } from './errors.js';
import { Mutex } from './mutex.js';
import { fromAtomic, toAtomic } from './units.js';

export type SpendWindow = 'day' | 'hour';

export interface SpendLimits {
  /** Ceiling per window, as a decimal string per asset symbol, e.g. { USDC: '1.00' }. */
  readonly window: Readonly<Record<string, string>>;
  /** Optional ceiling for a single payment, per asset symbol. */
  readonly perRequest?: Readonly<Record<string, string>>;
}

export interface Charge {
  /** Atomic units. */
  readonly amount: bigint;
  readonly asset: string;
  readonly network: string;
  readonly decimals: number;
}

export interface LedgerEntry {
  readonly asset: string;
  readonly network: string;
  readonly amount: bigint;
}

export interface SpendDenial {
  readonly allowed: false;
  readonly reason: 'window' | 'per_request' | 'no_limit';
  readonly asset: string;
  readonly limit: string;
  readonly spent: string;
  readonly requested: string;
  readonly remaining: string;
}

export type SpendDecision =
  | { readonly allowed: true; readonly hold: SpendHold }
  | SpendDenial;

export interface SpendStatus {
  readonly asset: string;
  readonly window: SpendWindow;
  readonly windowKey: string;
  readonly limit: string | null;
  readonly spent: string;
  readonly pending: string;
  readonly remaining: string | null;
}

export interface SpendGuardOptions {
  readonly limits: SpendLimits;
  readonly window?: SpendWindow;
  readonly ledger?: SpendLedger;
  readonly clock?: () => Date;
}

/**
 * Key identifying the spend window that contains `at`.
 */
export function windowKey(window: SpendWindow, at: Date): string {
  const iso = at.toISOString();
  return window === 'day' ? iso.slice(0, 10) : iso.slice(0, 13);
}

/**
 * Process-scoped running totals for the active window.
 */
export class SpendLedger {
  readonly window: SpendWindow;
  private currentKey: string | null = null;
  private readonly spent = new Map<string, LedgerEntry>();
  private readonly pending = new Map<number, Charge>();
  private nextHoldId = 1;

  constructor(window: SpendWindow = 'day') {
    this.window = window;
  }

  /**
   * Reset committed totals when the window has rolled over. In-flight holds
   * carry into the new window.
   */
  roll(now: Date): string {
    const key = windowKey(this.window, now);
    if (key !== this.currentKey) {
      this.spent.clear();
      this.currentKey = key;
    }
    return key;
  }

  spentFor(asset: string, now: Date): bigint {
    this.roll(now);
    let total = 0n;
    for (const entry of this.spent.values()) {
      if (entry.asset === asset) total += entry.amount;
    }
    return total;
  }

  pendingFor(asset: string): bigint {
    let total = 0n;
    for (const charge of this.pending.values()) {
      if (charge.asset === asset) total += charge.amount;
    }
    return total;
  }

  entries(now: Date): readonly LedgerEntry[] {
    this.roll(now);
    return [...this.spent.values()];
  }

  /**
   * Restore committed spend, e.g. from a payment history file. Records outside
   * the current window are ignored.
   */
  restore(records: Iterable<LedgerEntry & { readonly at: Date }>, now: Date): void {
    const key = this.roll(now);
    for (const record of records) {
      if (windowKey(this.window, record.at) === key) {
        this.add({ asset: record.asset.toUpperCase(), network: record.network, amount: record.amount });
      }
    }
  }

  /** @internal Used by SpendGuard inside its critical section. */
  reserve(charge: Charge): number {
    const id = this.nextHoldId++;
    this.pending.set(id, charge);
    return id;
  }

  /** @internal */
  commit(holdId: number, now: Date): boolean {
    const charge = this.pending.get(holdId);
    if (!charge) return false;
    this.pending.delete(holdId);
    this.roll(now);
    this.add(charge);
    return true;
  }

  /** @internal */
  release(holdId: number): boolean {
    return this.pending.delete(holdId);
  }

  reset(): void {
    this.spent.clear();
    this.pending.clear();
    this.currentKey = null;
  }

  private add(entry: LedgerEntry): void {
    const key = `${entry.asset}@${entry.network}`;
    const existing = this.spent.get(key);
    this.spent.set(key, {
      asset: entry.asset,
      network: entry.network,
      amount: (existing?.amount ?? 0n) + entry.amount,
    });
  }
}

/**
 * A reservation against the ledger. Commit and release are idempotent and
 * mutually exclusive: whichever happens first wins.
 */
export class SpendHold {
  private state: 'pending' | 'committed' | 'released' = 'pending';

  constructor(
    readonly charge: Charge,
    private readonly id: number,
    private readonly guard: SpendGuard,
  ) {}

  get status(): 'pending' | 'committed' | 'released' {
    return this.state;
  }

  async commit(): Promise<void> {
    if (this.state !== 'pending') return;
    this.state = 'committed';
    await this.guard.settleHold(this.id, 'commit');
  }

  async release(): Promise<void> {
    if (this.state !== 'pending') return;
    this.state = 'released';
    await this.guard.settleHold(this.id, 'release');
  }
}

export class SpendGuard {
  readonly ledger: SpendLedger;
  private readonly limits: SpendLimits;
  private readonly clock: () => Date;
  private readonly mutex = new Mutex();

  constructor(options: SpendGuardOptions) {
    this.limits = normalizeLimits(options.limits);
    this.ledger = options.ledger ?? new SpendLedger(options.window ?? 'day');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check a charge against the limits and reserve it if allowed.
   */
  async authorize(charge: Charge): Promise<SpendDecision> {
    return this.mutex.runExclusive<SpendDecision>(() => {
      const asset = charge.asset.toUpperCase();
      const now = this.clock();
      const requested = fromAtomic(charge.amount, charge.decimals);
      const spent = this.ledger.spentFor(asset, now);
      const pending = this.ledger.pendingFor(asset);
      const format = (value: bigint) => fromAtomic(value < 0n ? 0n : value, charge.decimals);

      const perRequest = this.limits.perRequest?.[asset];
      if (perRequest !== undefined) {
        const perRequestLimit = this.toLimit(perRequest, charge);
        if (charge.amount > perRequestLimit) {
          return {
            allowed: false,
            reason: 'per_request',
            asset,
            limit: perRequest,
            spent: format(spent),
            requested,
            remaining: format(perRequestLimit),
          };
        }
      }

      const windowLimitText = this.limits.window[asset];
      if (windowLimitText === undefined) {
        return {
          allowed: false,
          reason: 'no_limit',
          asset,
          limit: '0',
          spent: format(spent),
          requested,
          remaining: format(0n),
        };
      }

      const windowLimit = this.toLimit(windowLimitText, charge);
      const committedAndPending = spent + pending;
      if (committedAndPending + charge.amount > windowLimit) {
        return {
          allowed: false,
          reason: 'window',
          asset,
          limit: windowLimitText,
          spent: format(committedAndPending),
          requested,
          remaining: format(windowLimit - committedAndPending),
        };
      }

      const normalized: Charge = { ...charge, asset };
      const id = this.ledger.reserve(normalized);
      return { allowed: true, hold: new SpendHold(normalized, id, this) };
    });
  }

  /**
   * Remaining-limit visibility for an asset.
   */
  status(asset: string, decimals: number): SpendStatus {
    const symbol = asset.toUpperCase();
    const now = this.clock();
    const spent = this.ledger.spentFor(symbol, now);
    const pending = this.ledger.pendingFor(symbol);
    const limitText = this.limits.window[symbol] ?? null;

    let remaining: string | null = null;
    if (limitText !== null) {
      const left = toAtomic(limitText, decimals) - spent - pending;
      remaining = fromAtomic(left < 0n ? 0n : left, decimals);
    }

    return {
      asset: symbol,
      window: this.ledger.window,
      windowKey: windowKey(this.ledger.window, now),
      limit: limitText,
      spent: fromAtomic(spent, decimals),
      pending: fromAtomic(pending, decimals),
      remaining,
    };
  }

  /** @internal Called by SpendHold. */
  async settleHold(id: number, action: 'commit' | 'release'): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (action === 'commit') {
        this.ledger.commit(id, this.clock());
      } else {
        this.ledger.release(id);
      }
    });
  }

  private toLimit(limit: string, charge: Charge): bigint {
    try {
      return toAtomic(limit, charge.decimals);
    } catch (error: unknown) {
      throw new ConfigError(`Invalid spend limit for ${charge.asset}: ${errorMessage(error)}`);
    }
  }
}

function normalizeLimits(limits: SpendLimits): SpendLimits {
  const upper = (record: Readonly<Record<string, string>>) =>
    Object.fromEntries(Object.entries(record).map(([k, v]) => [k.toUpperCase(), v]));
  return {
    window: upper(limits.window),
    perRequest: limits.perRequest ? upper(limits.perRequest) : undefined,
  };
}
