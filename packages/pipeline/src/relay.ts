import { SignerError, X402Error, errorMessage } from './errors.js';
import { log } from './logger.js';
import type { KeyedMutex } from './mutex.js';
import { getNetwork } from './networks.js';
import type { PaymentChallenge, PaymentInstruction, RelayProof, RelaySigner } from './types.js';

export interface RelayPaymentOptions {
  readonly locks: KeyedMutex;
  readonly signal?: AbortSignal;
  readonly clock?: () => Date;
}

/**
 * Instruction for the relay. Amount, asset and recipient are copied verbatim
 * from the challenge so the relay pays exactly what the upstream asked for.
 */
export function buildInstruction(challenge: PaymentChallenge): PaymentInstruction {
  return {
    challengeId: challenge.id,
    x402Version: challenge.x402Version,
    scheme: challenge.scheme,
    network: challenge.network,
    amount: challenge.amount,
    asset: challenge.asset,
    payTo: challenge.payTo,
    resource: challenge.resource,
    extra: challenge.extra,
  };
}

export function selectSigner(
  signers: readonly RelaySigner[],
  challenge: PaymentChallenge,
): RelaySigner | null {
  const network = getNetwork(challenge.network);
  return signers.find((s) => s.family === network.family && s.supports(network)) ?? null;
}

/**
 * Pay through the relay facilitator. Calls for the same signer identity are
 * serialized, since wallet nonces and relay sessions are per identity.
 */
export async function payViaRelay(
  challenge: PaymentChallenge,
  signers: readonly RelaySigner[],
  options: RelayPaymentOptions,
): Promise<RelayProof> {
  const signer = selectSigner(signers, challenge);
  if (!signer) {
    throw new SignerError(`no signer configured for ${challenge.family} network ${challenge.network}`);
  }

  const instruction = buildInstruction(challenge);
  const lockKey = `${signer.family}:${signer.identity}`;

  const submission = await options.locks.runExclusive(lockKey, async () => {
    log(`Relay payment ${challenge.amount} ${challenge.assetSymbol} on ${challenge.network} via ${lockKey}`);
    try {
      return await signer.signAndSubmit(instruction, { signal: options.signal });
    } catch (error: unknown) {
      if (error instanceof X402Error) throw error;
      throw new SignerError(errorMessage(error), { cause: error });
    }
  });

  const paidAt = (options.clock ?? (() => new Date()))();
  return {
    mode: 'relay',
    challengeId: challenge.id,
    amount: challenge.amount,
    asset: challenge.asset,
    assetSymbol: challenge.assetSymbol,
    decimals: challenge.decimals,
    network: challenge.network,
    payTo: challenge.payTo,
    token: submission.paymentHeader,
    paidAt: paidAt.toISOString(),
    payer: submission.payer,
    clientTransaction: { network: challenge.network, hash: submission.clientTxHash },
    facilitatorTransaction: submission.facilitatorTxHash === null
      ? null
      : { network: challenge.network, hash: submission.facilitatorTxHash },
  };
}
