import type { PaymentProof } from './types.js';

export type ErrorCode =
  | 'challenge_unrecognized'
  | 'spend_limit_exceeded'
  | 'signer_error'
  | 'payment_rejected'
  | 'insufficient_balance'
  | 'auth_error'
  | 'payment_not_accepted'
  | 'transport_error'
  | 'http_error'
  | 'step_build_failed'
  | 'config_error';

export interface ErrorDetails {
  readonly cause?: unknown;
  /** Proof of a payment made before the failure, if any. */
  readonly payment?: PaymentProof | null;
  /** Whether that payment was committed to the spend ledger. */
  readonly charged?: boolean;
}

/** Base class for every error this package raises. */
export class X402Error extends Error {
  readonly code: ErrorCode;
  readonly payment: PaymentProof | null;
  readonly charged: boolean;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'X402Error';
    this.code = code;
    this.payment = details.payment ?? null;
    this.charged = details.charged ?? false;
  }

  /** Only transport failures may be retried, and only by the caller. */
  get retryable(): boolean {
    return this.code === 'transport_error';
  }
}

/** The 402 response carried no payment option this client can use. */
export class ChallengeUnrecognizedError extends X402Error {
  constructor(
    public readonly reason: string,
    details?: ErrorDetails,
  ) {
    super('challenge_unrecognized', `Unrecognized payment challenge: ${reason}`, details);
    this.name = 'ChallengeUnrecognizedError';
  }
}

/** Payment would exceed a configured spend limit. */
export class SpendLimitExceededError extends X402Error {
  constructor(
    public readonly asset: string,
    public readonly limitType: 'window' | 'per_request' | 'no_limit',
    public readonly limit: string,
    public readonly spent: string,
    public readonly requested: string,
    public readonly remaining: string,
  ) {
    super(
      'spend_limit_exceeded',
      limitType === 'no_limit'
        ? `No spend limit configured for ${asset}`
        : `Spend limit exceeded: ${limitType} limit is ${limit} ${asset}, ` +
          `already spent ${spent} ${asset}, payment requires ${requested} ${asset}`,
    );
    this.name = 'SpendLimitExceededError';
  }
}

/** The signing collaborator could not produce a valid signature. */
export class SignerError extends X402Error {
  constructor(message: string, details?: ErrorDetails) {
    super('signer_error', `Signer error: ${message}`, details);
    this.name = 'SignerError';
  }
}

/** The facilitator declined to pay. */
export class PaymentRejectedError extends X402Error {
  constructor(
    public readonly reason: string,
    details?: ErrorDetails,
  ) {
    super('payment_rejected', `Payment rejected: ${reason}`, details);
    this.name = 'PaymentRejectedError';
  }
}

/** The proxy account lacks funds. */
export class InsufficientBalanceError extends X402Error {
  constructor(message = 'Account balance is insufficient', details?: ErrorDetails) {
    super('insufficient_balance', message, details);
    this.name = 'InsufficientBalanceError';
  }
}

/** The proxy credential is invalid or expired. */
export class AuthError extends X402Error {
  constructor(message = 'API credential was rejected', details?: ErrorDetails) {
    super('auth_error', message, details);
    this.name = 'AuthError';
  }
}

/** The upstream answered 402 again after the proof was attached. */
export class PaymentNotAcceptedError extends X402Error {
  constructor(url: string, details?: ErrorDetails) {
    super('payment_not_accepted', `Payment was not accepted by ${url}`, details);
    this.name = 'PaymentNotAcceptedError';
  }
}

/** Network-level failure. The only error a caller may choose to retry. */
export class TransportError extends X402Error {
  constructor(message: string, details?: ErrorDetails) {
    super('transport_error', message, details);
    this.name = 'TransportError';
  }
}

/** The final response was not a success. */
export class HttpStatusError extends X402Error {
  constructor(
    public readonly status: number,
    url: string,
    details?: ErrorDetails,
  ) {
    super('http_error', `HTTP ${status} from ${url}`, details);
    this.name = 'HttpStatusError';
  }
}

/** A pipeline step could not build its request or derive its output. */
export class StepBuildError extends X402Error {
  constructor(step: string, message: string, details?: ErrorDetails) {
    super('step_build_failed', `Step "${step}": ${message}`, details);
    this.name = 'StepBuildError';
  }
}

export class ConfigError extends X402Error {
  constructor(message: string) {
    super('config_error', message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
