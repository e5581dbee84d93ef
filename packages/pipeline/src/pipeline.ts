/**
 * Sequential multi-step pipelines over the payment-aware executor.
 *
 * Each step builds its request from the outputs of earlier steps. The first
 * fatal error ends the run: the failing step is recorded with whatever
 * payment it made, later steps are listed as skipped, and the summary is
 * returned rather than thrown. Nothing is retried here.
 */

import { ConfigError, HttpStatusError, StepBuildError, X402Error, errorMessage } from './errors.js';
import type { ExecutionResult, PaymentExecutor } from './executor.js';
import { log } from './logger.js';
import type { SettlementAudit } from './settlement.js';
import type { PaymentProof, PaymentRequest } from './types.js';
import { fromAtomic } from './units.js';

export interface StepContext {
  /** Outputs of every earlier step (and any seeded outputs), by step name. */
  readonly outputs: Readonly<Record<string, unknown>>;
  readonly index: number;
}

export interface StepSpec {
  readonly name: string;
  request(ctx: StepContext): PaymentRequest | Promise<PaymentRequest>;
  /** Derive the step's output from the response payload. Defaults to the payload. */
  output?(payload: unknown, ctx: StepContext): unknown;
}

interface StepResultBase {
  readonly name: string;
  readonly index: number;
  readonly payment: PaymentProof | null;
  readonly charged: boolean;
  readonly durationMs: number;
}

export interface StepSucceeded extends StepResultBase {
  readonly status: 'succeeded';
  readonly httpStatus: number;
  readonly output: unknown;
  readonly settlement: SettlementAudit | null;
}

export interface StepFailed extends StepResultBase {
  readonly status: 'failed';
  readonly error: Error;
}

export type StepResult = StepSucceeded | StepFailed;

export interface PipelineTotal {
  readonly asset: string;
  /** Decimal amount. */
  readonly amount: string;
  readonly payments: number;
}

export interface PipelineSummary {
  readonly ok: boolean;
  readonly results: readonly StepResult[];
  /** Names of steps never attempted. */
  readonly skipped: readonly string[];
  readonly haltedBy: 'failure' | 'cancelled' | null;
  readonly outputs: Readonly<Record<string, unknown>>;
  /** Payments committed during this run, per asset symbol. */
  readonly totals: readonly PipelineTotal[];
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
}

export interface RunOptions {
  /** Checked between steps; an in-flight step always runs to completion. */
  readonly signal?: AbortSignal;
  /** Outputs of steps completed in an earlier run. */
  readonly outputs?: Readonly<Record<string, unknown>>;
  readonly onStep?: (result: StepResult) => void;
}

export class PipelineRunner {
  constructor(private readonly executor: PaymentExecutor) {}

  async run(steps: readonly StepSpec[], options: RunOptions = {}): Promise<PipelineSummary> {
    assertUniqueNames(steps);

    const started = Date.now();
    const outputs: Record<string, unknown> = { ...options.outputs };
    const results: StepResult[] = [];
    let haltedBy: PipelineSummary['haltedBy'] = null;
    let next = 0;

    while (next < steps.length) {
      const step = steps[next];
      if (!step) break;

      if (options.signal?.aborted) {
        log(`Pipeline cancelled before step "${step.name}"`);
        haltedBy = 'cancelled';
        break;
      }

      const result = await this.runStep(step, next, outputs);
      results.push(result);
      options.onStep?.(result);
      next += 1;

      if (result.status === 'failed') {
        log(`Step "${step.name}" failed: ${result.error.message}`);
        haltedBy = 'failure';
        break;
      }
      outputs[step.name] = result.output;
    }

    const finished = Date.now();
    return {
      ok: haltedBy === null,
      results,
      skipped: steps.slice(next).map((s) => s.name),
      haltedBy,
      outputs,
      totals: sumPayments(results),
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
    };
  }

  private async runStep(
    step: StepSpec,
    index: number,
    outputs: Readonly<Record<string, unknown>>,
  ): Promise<StepResult> {
    const started = Date.now();
    const ctx: StepContext = { outputs: { ...outputs }, index };
    const failed = (error: Error, payment: PaymentProof | null, charged: boolean): StepFailed => ({
      status: 'failed',
      name: step.name,
      index,
      error,
      payment,
      charged,
      durationMs: Date.now() - started,
    });

    let request: PaymentRequest;
    try {
      request = await step.request(ctx);
    } catch (error: unknown) {
      return failed(new StepBuildError(step.name, `request: ${errorMessage(error)}`, { cause: error }), null, false);
    }

    log(`Step ${index + 1} "${step.name}"`);
    let execution: ExecutionResult;
    try {
      execution = await this.executor.execute(request);
    } catch (error: unknown) {
      if (error instanceof X402Error) {
        return failed(error, error.payment, error.charged);
      }
      return failed(error instanceof Error ? error : new Error(String(error)), null, false);
    }

    const { payment, charged } = execution;
    if (execution.status < 200 || execution.status >= 300) {
      return failed(new HttpStatusError(execution.status, request.url, { payment, charged }), payment, charged);
    }

    let output: unknown;
    try {
      output = step.output ? step.output(execution.payload, ctx) : execution.payload;
    } catch (error: unknown) {
      return failed(
        new StepBuildError(step.name, `output: ${errorMessage(error)}`, { cause: error, payment, charged }),
        payment,
        charged,
      );
    }

    return {
      status: 'succeeded',
      name: step.name,
      index,
      httpStatus: execution.status,
      output,
      payment,
      charged,
      settlement: execution.settlement,
      durationMs: Date.now() - started,
    };
  }
}

function assertUniqueNames(steps: readonly StepSpec[]): void {
  const seen = new Set<string>();
  for (const step of steps) {
    if (step.name.length === 0) {
      throw new ConfigError('Pipeline step names must not be empty');
    }
    if (seen.has(step.name)) {
      throw new ConfigError(`Duplicate pipeline step name: "${step.name}"`);
    }
    seen.add(step.name);
  }
}

function sumPayments(results: readonly StepResult[]): PipelineTotal[] {
  const totals = new Map<string, { amount: bigint; decimals: number; payments: number }>();
  for (const result of results) {
    if (!result.payment || !result.charged) continue;
    const { assetSymbol, amount, decimals } = result.payment;
    const entry = totals.get(assetSymbol) ?? { amount: 0n, decimals, payments: 0 };
    totals.set(assetSymbol, {
      amount: entry.amount + BigInt(amount),
      decimals: entry.decimals,
      payments: entry.payments + 1,
    });
  }
  return [...totals].map(([asset, t]) => ({
    asset,
    amount: fromAtomic(t.amount, t.decimals),
    payments: t.payments,
  }));
}
