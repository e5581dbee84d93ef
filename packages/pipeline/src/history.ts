import { z } from 'zod';
import type { PaymentEvent } from './executor.js';
import type { LedgerEntry } from './spend-guard.js';
import { appendJsonlFile, readJsonlFile } from './storage.js';
import { fromAtomic } from './units.js';

const HISTORY_FILENAME = 'history.jsonl';
const DEFAULT_RECENT_COUNT = 20;

const historyEntrySchema = z.object({
  ts: z.string().datetime(),
  url: z.string(),
  amount: z.string().regex(/^\d+$/),
  asset: z.string(),
  decimals: z.number().int().nonnegative(),
  network: z.string(),
  mode: z.enum(['relay', 'proxy']),
  challengeId: z.string(),
  txHash: z.string().nullable(),
  facilitatorTxHash: z.string().nullable(),
  receiptId: z.string().nullable(),
});

export type HistoryEntry = z.infer<typeof historyEntrySchema>;

export interface AssetTotals {
  readonly asset: string;
  /** Decimal amounts. */
  readonly today: string;
  readonly lifetime: string;
  readonly count: number;
}

/**
 * Append a payment entry to history.jsonl.
 */
export function appendPayment(entry: HistoryEntry): void {
  appendJsonlFile(HISTORY_FILENAME, entry);
}

export function toHistoryEntry(event: PaymentEvent): HistoryEntry {
  const { proof } = event;
  return {
    ts: proof.paidAt,
    url: event.url,
    amount: proof.amount,
    asset: proof.assetSymbol,
    decimals: proof.decimals,
    network: proof.network,
    mode: proof.mode,
    challengeId: proof.challengeId,
    txHash: proof.mode === 'relay' ? proof.clientTransaction.hash : null,
    facilitatorTxHash: proof.mode === 'relay' ? proof.facilitatorTransaction?.hash ?? null : null,
    receiptId: proof.mode === 'proxy' ? proof.receiptId : null,
  };
}

/**
 * Every valid entry, oldest first. Lines that do not match the entry shape
 * (e.g. written by an older version) are ignored.
 */
export function readHistory(): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const raw of readJsonlFile(HISTORY_FILENAME)) {
    const parsed = historyEntrySchema.safeParse(raw);
    if (parsed.success) {
      entries.push(parsed.data);
    }
  }
  return entries;
}

/**
 * Read recent history entries, returning the last N (default 20).
 */
export function getRecent(count?: number): HistoryEntry[] {
  const entries = readHistory();
  const n = count ?? DEFAULT_RECENT_COUNT;

  if (entries.length <= n) {
    return entries;
  }

  return entries.slice(entries.length - n);
}

/**
 * History as ledger records, for restoring committed spend across runs.
 */
export function getLedgerRecords(): (LedgerEntry & { readonly at: Date })[] {
  return readHistory().map((entry) => ({
    asset: entry.asset,
    network: entry.network,
    amount: BigInt(entry.amount),
    at: new Date(entry.ts),
  }));
}

/**
 * Today's (UTC) and lifetime spend per asset.
 */
export function getSpendingTotals(now: Date = new Date()): AssetTotals[] {
  const todayStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const totals = new Map<string, { today: bigint; lifetime: bigint; decimals: number; count: number }>();

  for (const entry of readHistory()) {
    const amount = BigInt(entry.amount);
    const current = totals.get(entry.asset) ?? { today: 0n, lifetime: 0n, decimals: entry.decimals, count: 0 };
    totals.set(entry.asset, {
      today: current.today + (Date.parse(entry.ts) >= todayStart ? amount : 0n),
      lifetime: current.lifetime + amount,
      decimals: current.decimals,
      count: current.count + 1,
    });
  }

  return [...totals].map(([asset, t]) => ({
    asset,
    today: fromAtomic(t.today, t.decimals),
    lifetime: fromAtomic(t.lifetime, t.decimals),
    count: t.count,
  }));
}
