// -- Client ---

export { createPaymentClient, createPaymentMode } from './client.js';
export type { PaymentClient, PaymentClientOptions } from './client.js';
export { resolveClientConfig, readFileConfig, saveFileConfig, parseLimits } from './config.js';
export type { ClientConfig, CliOptions, FileConfig, ModeName } from './config.js';

// -- Pipeline ---

export { PipelineRunner } from './pipeline.js';
export type {
  PipelineSummary,
  PipelineTotal,
  RunOptions,
  StepContext,
  StepFailed,
  StepResult,
  StepSpec,
  StepSucceeded,
} from './pipeline.js';
export { loadPipelineFile, parsePipelineFile, toStepSpecs, selectPath, resolveTemplates } from './pipeline-file.js';
export type { PipelineFile, PipelineFileStep } from './pipeline-file.js';

// -- Payment Flow ---

export { PaymentExecutor, V1_PAYMENT_HEADER, V2_PAYMENT_HEADER } from './executor.js';
export type { ExecutionResult, ExecutorOptions, PaymentEvent } from './executor.js';
export { parseChallenge } from './challenge.js';
export type { ChallengeInput, ChallengePreferences, ParseResult } from './challenge.js';
export { PaymentResolver } from './resolver.js';
export type { Resolution, ResolveOptions, PaymentResolverOptions } from './resolver.js';
export { buildInstruction, payViaRelay } from './relay.js';
export { payViaProxy } from './proxy.js';
export type { ProxyAccount } from './proxy.js';
export { EvmRelaySigner, signTransferAuthorization } from './signer.js';
export type { EvmRelaySignerOptions, SignedAuthorization } from './signer.js';
export { readSettlement, completeProof, CLIENT_PAYMENT_HEADER, PAYMENT_RESPONSE_HEADER } from './settlement.js';
export type { SettlementAudit, DecodedPaymentResponse } from './settlement.js';

// -- Spend Limits ---

export { SpendGuard, SpendLedger, SpendHold, windowKey } from './spend-guard.js';
export type {
  Charge,
  LedgerEntry,
  SpendDecision,
  SpendDenial,
  SpendLimits,
  SpendStatus,
  SpendWindow,
} from './spend-guard.js';

// -- Types, Errors, Utilities ---

export type {
  PaymentChallenge,
  PaymentInstruction,
  PaymentMode,
  PaymentProof,
  PaymentRequest,
  ProxyProof,
  RelayProof,
  RelaySigner,
  RelaySubmission,
  TransactionRef,
} from './types.js';
export { describeMode } from './types.js';
export {
  X402Error,
  ChallengeUnrecognizedError,
  SpendLimitExceededError,
  SignerError,
  PaymentRejectedError,
  InsufficientBalanceError,
  AuthError,
  PaymentNotAcceptedError,
  TransportError,
  HttpStatusError,
  StepBuildError,
  ConfigError,
} from './errors.js';
export type { ErrorCode, ErrorDetails } from './errors.js';
export { findNetwork, getNetwork, listNetworks } from './networks.js';
export type { AssetInfo, ChainFamily, NetworkInfo } from './networks.js';
export { toAtomic, fromAtomic } from './units.js';
export { Mutex, KeyedMutex } from './mutex.js';
export type { FetchLike } from './http.js';
