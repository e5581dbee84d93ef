/**
 * Audit headers on a paid response.
 *
 *   x-client-payment    caller → facilitator transaction (relay payments)
 *   x-payment-response  base64 JSON settlement of facilitator → upstream
 *                       (`payment-response` in x402 v2)
 */

import { decodePaymentResponseHeader } from '@x402/fetch';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import type { PaymentProof } from './types.js';

export const CLIENT_PAYMENT_HEADER = 'x-client-payment';
export const PAYMENT_RESPONSE_HEADER = 'x-payment-response';

export interface DecodedPaymentResponse {
  readonly success: boolean;
  readonly transaction: string;
  readonly network: string;
  readonly payer: string | null;
}

export interface SettlementAudit {
  /** Header values exactly as received, by the name they arrived under. */
  readonly headers: Readonly<Record<string, string>>;
  readonly clientPayment: string | null;
  readonly paymentResponse: DecodedPaymentResponse | null;
}

/**
 * Capture and decode the settlement headers of a response.
 * Returns null when the response carries none.
 */
export function readSettlement(headers: Headers): SettlementAudit | null {
  const captured: Record<string, string> = {};

  const clientPayment = headers.get(CLIENT_PAYMENT_HEADER);
  if (clientPayment !== null) {
    captured[CLIENT_PAYMENT_HEADER] = clientPayment;
  }

  let paymentResponseRaw = headers.get(PAYMENT_RESPONSE_HEADER);
  if (paymentResponseRaw !== null) {
    captured[PAYMENT_RESPONSE_HEADER] = paymentResponseRaw;
  } else {
    paymentResponseRaw = headers.get('payment-response');
    if (paymentResponseRaw !== null) {
      captured['payment-response'] = paymentResponseRaw;
    }
  }

  if (clientPayment === null && paymentResponseRaw === null) {
    return null;
  }

  return {
    headers: captured,
    clientPayment,
    paymentResponse: paymentResponseRaw === null ? null : decodePaymentResponse(paymentResponseRaw),
  };
}

/**
 * Fill in the facilitator → upstream transaction of a relay proof once the
 * upstream reports it. Other proofs are returned unchanged.
 */
export function completeProof(proof: PaymentProof, settlement: SettlementAudit | null): PaymentProof {
  if (proof.mode !== 'relay' || proof.facilitatorTransaction !== null) {
    return proof;
  }

  const settled = settlement?.paymentResponse;
  if (!settled || settled.transaction.length === 0) {
    return proof;
  }

  return {
    ...proof,
    facilitatorTransaction: {
      network: settled.network.length > 0 ? settled.network : proof.network,
      hash: settled.transaction,
    },
  };
}

function decodePaymentResponse(value: string): DecodedPaymentResponse | null {
  try {
    const decoded = decodePaymentResponseHeader(value);
    return {
      success: decoded.success,
      transaction: decoded.transaction ?? '',
      network: decoded.network ?? '',
      payer: decoded.payer ?? null,
    };
  } catch (error: unknown) {
    log(`Warning: could not decode payment response header: ${errorMessage(error)}`);
    return null;
  }
}
