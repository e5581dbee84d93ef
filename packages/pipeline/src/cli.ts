#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { Command } from 'commander';
import { createPaymentClient } from './client.js';
import type { PaymentClient } from './client.js';
import { readFileConfig, resolveClientConfig, saveFileConfig, parseLimits } from './config.js';
import type { CliOptions } from './config.js';
import { X402Error } from './errors.js';
import { appendPayment, getLedgerRecords, getRecent, getSpendingTotals, toHistoryEntry } from './history.js';
import { log } from './logger.js';
import { listNetworks } from './networks.js';
import { outputJson, outputError } from './output.js';
import { loadPipelineFile, toStepSpecs } from './pipeline-file.js';
import { SpendGuard, SpendLedger } from './spend-guard.js';
import { fromAtomic } from './units.js';

const DEFAULT_DECIMALS = 6;

interface FetchCommandOptions extends CliOptions {
  readonly method?: string;
  readonly data?: string;
  readonly header: string[];
}

// -- Internal Helpers ---

function handleError(error: unknown, defaultCode: string): void {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof X402Error ? error.code : defaultCode;
  outputError(code, message, getExitCode(code));
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withClientOptions(command: Command): Command {
  return command
    .option('--mode <mode>', 'Payment mode: relay or proxy')
    .option('--daily-limit <limits>', 'Spend limit per window, e.g. USDC=1.00')
    .option('--per-request-limit <limits>', 'Spend limit per payment, e.g. USDC=0.10')
    .option('--window <window>', 'Spend window: day or hour')
    .option('--preferred-chain <networks>', 'Preferred networks, most preferred first (comma separated)')
    .option('--private-key <hex>', 'Payer private key for relay mode')
    .option('--api-key <key>', 'Account credential for proxy mode')
    .option('--relay-url <url>', 'Relay facilitator base URL')
    .option('--proxy-url <url>', 'Proxy account endpoint base URL')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds');
}

/**
 * Client whose spend ledger starts from the payment history of the current
 * window, and which appends every committed payment to that history.
 */
function createCliClient(options: CliOptions): PaymentClient {
  const config = resolveClientConfig(options);
  const now = new Date();

  const ledger = new SpendLedger(config.window);
  ledger.restore(getLedgerRecords(), now);
  const guard = new SpendGuard({
    limits: { window: config.limits, perRequest: config.perRequestLimits },
    ledger,
  });

  return createPaymentClient(config, {
    guard,
    onPayment: (event) => appendPayment(toHistoryEntry(event)),
  });
}

function parseHeaders(values: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const index = value.indexOf(':');
    if (index <= 0) {
      throw new Error(`Invalid header "${value}": expected "Name: value"`);
    }
    headers[value.slice(0, index).trim()] = value.slice(index + 1).trim();
  }
  return headers;
}

function decimalsFor(symbol: string): number {
  for (const network of listNetworks()) {
    const asset = network.assets.find((a) => a.symbol === symbol);
    if (asset) return asset.decimals;
  }
  return DEFAULT_DECIMALS;
}

// -- Public API ---

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('x402-pipeline')
    .version('0.1.0')
    .description('Pay-per-call HTTP client and pipeline runner for x402 APIs');

  // ── Fetch command ───────────────────────────────────────────

  withClientOptions(
    program
      .command('fetch')
      .description('Fetch a URL, paying an x402 challenge if one is returned')
      .argument('<url>', 'URL to fetch (http:// or https://)')
      .option('-X, --method <method>', 'HTTP method')
      .option('-d, --data <body>', 'Request body (sent as is)')
      .option('-H, --header <header>', 'Request header "Name: value" (repeatable)', collect, []),
  ).action(async (url: string, options: FetchCommandOptions) => {
    try {
      const client = createCliClient(options);
      const result = await client.fetch({
        url,
        method: options.method ?? (options.data !== undefined ? 'POST' : 'GET'),
        headers: parseHeaders(options.header),
        body: options.data,
      });

      outputJson({
        ok: result.status >= 200 && result.status < 300,
        url,
        statusCode: result.status,
        contentType: result.contentType,
        content: result.body,
        payment: result.payment,
        settlement: result.settlement,
      });
      if (result.status < 200 || result.status >= 300) {
        process.exitCode = 1;
      }
    } catch (error: unknown) {
      if (error instanceof X402Error && error.payment) {
        log(`A payment was made before the failure: ${error.payment.challengeId}`);
      }
      handleError(error, 'fetch_failed');
    }
  });

  // ── Run command ─────────────────────────────────────────────

  withClientOptions(
    program
      .command('run')
      .description('Run a pipeline file, paying each step as needed')
      .argument('<file>', 'Pipeline JSON file'),
  ).action(async (file: string, options: CliOptions) => {
    try {
      const steps = toStepSpecs(loadPipelineFile(file));
      const client = createCliClient(options);

      const controller = new AbortController();
      const cancel = () => {
        log('Cancelling after the current step...');
        controller.abort();
      };
      process.once('SIGINT', cancel);

      try {
        const summary = await client.run(steps, {
          signal: controller.signal,
          onStep: (result) => log(`Step "${result.name}" ${result.status}`),
        });
        outputJson(summary);

        const failed = summary.results.find((r) => r.status === 'failed');
        if (failed && failed.status === 'failed') {
          process.exitCode = getExitCode(failed.error instanceof X402Error ? failed.error.code : 'step_failed');
        } else if (summary.haltedBy === 'cancelled') {
          process.exitCode = 130;
        }
      } finally {
        process.removeListener('SIGINT', cancel);
      }
    } catch (error: unknown) {
      handleError(error, 'run_failed');
    }
  });

  // ── History command ──────────────────────────────────────────

  program
    .command('history')
    .description('Show payment history')
    .option('--last <count>', 'Show only last N entries', '20')
    .action((options: { last: string }) => {
      try {
        const count = parseInt(options.last, 10);
        const entries = getRecent(Number.isNaN(count) ? undefined : count);

        const payments = entries.map((entry) => ({
          timestamp: entry.ts,
          url: entry.url,
          amount: entry.amount,
          amountFormatted: fromAtomic(entry.amount, entry.decimals),
          asset: entry.asset,
          network: entry.network,
          mode: entry.mode,
          txHash: entry.txHash,
          facilitatorTxHash: entry.facilitatorTxHash,
          receiptId: entry.receiptId,
        }));

        outputJson({
          ok: true,
          payments,
          totals: getSpendingTotals(),
        });
      } catch (error: unknown) {
        handleError(error, 'history_error');
      }
    });

  // ── Limits commands ──────────────────────────────────────────

  const limits = program
    .command('limits')
    .description('Show spend limits and what is left in the current window')
    .option('--daily-limit <limits>', 'Override window limits, e.g. USDC=1.00')
    .action((options: CliOptions) => {
      try {
        const config = resolveClientConfig(options);
        const ledger = new SpendLedger(config.window);
        ledger.restore(getLedgerRecords(), new Date());
        const guard = new SpendGuard({
          limits: { window: config.limits, perRequest: config.perRequestLimits },
          ledger,
        });

        const assets = new Set(Object.keys(config.limits).map((a) => a.toUpperCase()));
        for (const entry of ledger.entries(new Date())) {
          assets.add(entry.asset);
        }

        outputJson({
          ok: true,
          window: config.window,
          perRequest: config.perRequestLimits,
          limits: [...assets].map((asset) => guard.status(asset, decimalsFor(asset))),
        });
      } catch (error: unknown) {
        handleError(error, 'limits_error');
      }
    });

  limits
    .command('set')
    .description('Save spend limits to config.json')
    .option('--daily <limits>', 'Window limits, e.g. USDC=1.00')
    .option('--per-request <limits>', 'Per-payment limits, e.g. USDC=0.10')
    .option('--window <window>', 'Spend window: day or hour')
    .action((options: { daily?: string; perRequest?: string; window?: string }) => {
      try {
        if (!options.daily && !options.perRequest && !options.window) {
          outputError('invalid_args', 'At least one of --daily, --per-request or --window must be provided', 1);
          return;
        }

        const existing = readFileConfig();
        const window = options.window === 'day' || options.window === 'hour' ? options.window : undefined;
        if (options.window !== undefined && window === undefined) {
          outputError('invalid_args', `Unknown spend window "${options.window}". Valid windows: day, hour`, 1);
          return;
        }

        const saved = saveFileConfig({
          limits: options.daily
            ? { ...existing.limits, ...parseLimits(options.daily, 'daily limit') }
            : undefined,
          perRequestLimits: options.perRequest
            ? { ...existing.perRequestLimits, ...parseLimits(options.perRequest, 'per-request limit') }
            : undefined,
          window,
        });
        outputJson({ ok: true, config: saved });
      } catch (error: unknown) {
        handleError(error, 'limits_set_failed');
      }
    });

  return program;
}

/**
 * Map error codes to exit codes.
 */
export function getExitCode(errorCode: string): number {
  switch (errorCode) {
    case 'spend_limit_exceeded':
    case 'challenge_unrecognized':
    case 'insufficient_balance':
      return 2;
    case 'auth_error':
    case 'signer_error':
    case 'config_error':
      return 3;
    default:
      return 1;
  }
}

// Only parse when run directly (not imported in tests).
// Resolve symlinks so `x402-pipeline` (a symlink to dist/cli.js) is detected.
const resolvedArgv = process.argv[1] ? realpathSync(process.argv[1]) : '';
const isDirectRun = resolvedArgv.endsWith('cli.ts') || resolvedArgv.endsWith('cli.js');

if (isDirectRun) {
  const program = buildProgram();
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    outputError('unexpected_error', message, 1);
  });
}
