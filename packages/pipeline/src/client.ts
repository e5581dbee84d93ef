import type { ClientConfig } from './config.js';
import { ConfigError } from './errors.js';
import { PaymentExecutor } from './executor.js';
import type { ExecutionResult, PaymentEvent } from './executor.js';
import type { FetchLike } from './http.js';
import { log } from './logger.js';
import { PipelineRunner } from './pipeline.js';
import type { PipelineSummary, RunOptions, StepSpec } from './pipeline.js';
import { PaymentResolver } from './resolver.js';
import { EvmRelaySigner } from './signer.js';
import { SpendGuard, SpendLedger } from './spend-guard.js';
import type { PaymentMode, PaymentRequest, RelaySigner } from './types.js';
import { describeMode } from './types.js';

export interface PaymentClientOptions {
  readonly fetch?: FetchLike;
  readonly clock?: () => Date;
  /** Share one guard between clients so their pipelines share one limit. */
  readonly guard?: SpendGuard;
  /** Extra relay signers, e.g. for non-EVM chains. */
  readonly signers?: readonly RelaySigner[];
  readonly onPayment?: (event: PaymentEvent) => void;
}

export interface PaymentClient {
  readonly mode: PaymentMode;
  readonly guard: SpendGuard;
  readonly resolver: PaymentResolver;
  readonly executor: PaymentExecutor;
  fetch(request: PaymentRequest): Promise<ExecutionResult>;
  run(steps: readonly StepSpec[], options?: RunOptions): Promise<PipelineSummary>;
}

export function createPaymentMode(
  config: ClientConfig,
  options: Pick<PaymentClientOptions, 'fetch' | 'signers'> = {},
): PaymentMode {
  switch (config.mode) {
    case 'relay': {
      const signers: RelaySigner[] = [...(options.signers ?? [])];
      if (config.privateKey !== null) {
        if (config.relayUrl === null) {
          throw new ConfigError('Relay mode requires a relay URL (X402_PIPELINE_RELAY_URL or --relay-url)');
        }
        signers.push(new EvmRelaySigner({
          privateKey: config.privateKey,
          relayUrl: config.relayUrl,
          fetch: options.fetch,
        }));
      }
      if (signers.length === 0) {
        throw new ConfigError('Relay mode requires a private key (X402_PIPELINE_PRIVATE_KEY or --private-key)');
      }
      return { kind: 'relay', signers };
    }
    case 'proxy': {
      if (config.apiKey === null) {
        throw new ConfigError('Proxy mode requires an API key (X402_PIPELINE_API_KEY or --api-key)');
      }
      if (config.proxyUrl === null) {
        throw new ConfigError('Proxy mode requires a proxy URL (X402_PIPELINE_PROXY_URL or --proxy-url)');
      }
      return { kind: 'proxy', apiKey: config.apiKey, endpoint: config.proxyUrl };
    }
  }
}

export function createPaymentClient(
  config: ClientConfig,
  options: PaymentClientOptions = {},
): PaymentClient {
  const mode = createPaymentMode(config, options);
  const guard = options.guard ?? new SpendGuard({
    limits: { window: config.limits, perRequest: config.perRequestLimits },
    ledger: new SpendLedger(config.window),
    clock: options.clock,
  });
  const resolver = new PaymentResolver(mode, { fetch: options.fetch, clock: options.clock });
  const executor = new PaymentExecutor({
    resolver,
    guard,
    fetch: options.fetch,
    timeoutMs: config.timeoutMs,
    preferredNetworks: config.preferredNetworks,
    clock: options.clock,
    onPayment: options.onPayment,
  });
  const runner = new PipelineRunner(executor);

  log(`Payment mode: ${describeMode(resolver.mode)}`);

  return {
    mode: resolver.mode,
    guard,
    resolver,
    executor,
    fetch: (request) => executor.execute(request),
    run: (steps, runOptions) => runner.run(steps, runOptions),
  };
}
