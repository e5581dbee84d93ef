/**
 * Client configuration: CLI flags > environment > ~/.x402-pipeline/config.json
 * > defaults. Credentials come from flags or the environment only; the config
 * file never holds them.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { findNetwork } from './networks.js';
import type { SpendWindow } from './spend-guard.js';
import { readJsonFile, writeJsonFile } from './storage.js';

export const CONFIG_FILENAME = 'config.json';
const DEFAULT_TIMEOUT_MS = 30_000;

export type ModeName = 'relay' | 'proxy';

export interface CliOptions {
  readonly mode?: string;
  readonly dailyLimit?: string;
  readonly perRequestLimit?: string;
  readonly window?: string;
  readonly preferredChain?: string;
  readonly privateKey?: string;
  readonly apiKey?: string;
  readonly relayUrl?: string;
  readonly proxyUrl?: string;
  readonly timeout?: string;
}

export interface ClientConfig {
  readonly mode: ModeName;
  /** Window limits per asset symbol, decimal strings. */
  readonly limits: Readonly<Record<string, string>>;
  readonly perRequestLimits: Readonly<Record<string, string>>;
  readonly window: SpendWindow;
  readonly preferredNetworks: readonly string[];
  readonly timeoutMs: number;
  readonly privateKey: string | null;
  readonly apiKey: string | null;
  readonly relayUrl: string | null;
  readonly proxyUrl: string | null;
}

const limitsSchema = z.record(z.string().regex(/^\d+(\.\d+)?$/, 'must be a decimal amount'));

const fileConfigSchema = z.object({
  mode: z.enum(['relay', 'proxy']).optional(),
  limits: limitsSchema.optional(),
  perRequestLimits: limitsSchema.optional(),
  window: z.enum(['day', 'hour']).optional(),
  preferredNetworks: z.array(z.string()).optional(),
  relayUrl: z.string().url().optional(),
  proxyUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function readFileConfig(): FileConfig {
  let raw: unknown;
  try {
    raw = readJsonFile(CONFIG_FILENAME);
  } catch (error: unknown) {
    throw new ConfigError(`${CONFIG_FILENAME} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (raw === null) return {};

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge a partial update into config.json and return the result.
 */
export function saveFileConfig(partial: FileConfig): FileConfig {
  const merged: Record<string, unknown> = { ...readFileConfig() };
  for (const [key, value] of Object.entries(partial)) {
    if (value !== undefined) merged[key] = value;
  }
  const parsed = fileConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  writeJsonFile(CONFIG_FILENAME, parsed.data);
  return parsed.data;
}

export function resolveClientConfig(
  cli: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const file = readFileConfig();

  const mode = parseMode(cli.mode ?? env['X402_PIPELINE_MODE'] ?? file.mode ?? 'relay');

  const limitsText = cli.dailyLimit ?? env['X402_PIPELINE_DAILY_LIMIT'];
  const limits = limitsText !== undefined ? parseLimits(limitsText, 'daily limit') : (file.limits ?? {});

  const perRequestText = cli.perRequestLimit ?? env['X402_PIPELINE_PER_REQUEST_LIMIT'];
  const perRequestLimits = perRequestText !== undefined
    ? parseLimits(perRequestText, 'per-request limit')
    : (file.perRequestLimits ?? {});

  const window = parseWindow(cli.window ?? env['X402_PIPELINE_WINDOW'] ?? file.window ?? 'day');

  const preferredText = cli.preferredChain ?? env['X402_PIPELINE_PREFERRED_CHAIN'];
  const preferredNetworks = preferredText !== undefined
    ? splitList(preferredText)
    : (file.preferredNetworks ?? []);
  for (const network of preferredNetworks) {
    if (!findNetwork(network)) {
      throw new ConfigError(`Unsupported preferred chain: "${network}"`);
    }
  }

  const timeoutText = cli.timeout ?? env['X402_PIPELINE_TIMEOUT_MS'];
  const timeoutMs = timeoutText !== undefined
    ? parseTimeout(timeoutText)
    : (file.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  return {
    mode,
    limits,
    perRequestLimits,
    window,
    preferredNetworks,
    timeoutMs,
    privateKey: nonEmpty(cli.privateKey ?? env['X402_PIPELINE_PRIVATE_KEY']),
    apiKey: nonEmpty(cli.apiKey ?? env['X402_PIPELINE_API_KEY']),
    relayUrl: nonEmpty(cli.relayUrl ?? env['X402_PIPELINE_RELAY_URL'] ?? file.relayUrl),
    proxyUrl: nonEmpty(cli.proxyUrl ?? env['X402_PIPELINE_PROXY_URL'] ?? file.proxyUrl),
  };
}

/**
 * Parse "USDC=1.00,EURC=0.50". A bare amount ("1.00") applies to USDC.
 */
export function parseLimits(text: string, label: string): Record<string, string> {
  const limits: Record<string, string> = {};
  for (const part of splitList(text)) {
    const [left, right] = part.includes('=') ? part.split('=', 2) : ['USDC', part];
    const asset = (left ?? '').trim().toUpperCase();
    const amount = (right ?? '').trim();
    if (asset.length === 0 || !/^\d+(\.\d+)?$/.test(amount)) {
      throw new ConfigError(`Invalid ${label} "${part}": expected ASSET=AMOUNT, e.g. USDC=1.00`);
    }
    limits[asset] = amount;
  }
  return limits;
}

// -- Internal Helpers ---

function parseMode(value: string): ModeName {
  if (value === 'relay' || value === 'proxy') return value;
  throw new ConfigError(`Unknown mode "${value}". Valid modes: relay, proxy`);
}

function parseWindow(value: string): SpendWindow {
  if (value === 'day' || value === 'hour') return value;
  throw new ConfigError(`Unknown spend window "${value}". Valid windows: day, hour`);
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigError(`Invalid timeout "${value}": expected a positive number of milliseconds`);
  }
  return ms;
}

function splitList(text: string): string[] {
  return text.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim().length > 0 ? value.trim() : null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
