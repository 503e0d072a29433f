/**
 * Payment gateway port, implemented by the Squad and Paystack adapters.
 */

import type { GatewayName } from '../types/tables';

export interface InitiatePaymentParams {
  reference: string;
  email: string;
  customerName: string;
  amountSubunit: number; // kobo / cents
  currency: string;
  callbackUrl: string;
  metadata: Record<string, string>;
}

export interface InitiatedPayment {
  checkoutUrl: string;
  reference: string;
}

export interface VerifiedTransaction {
  reference: string;
  /** Lower-cased gateway status, e.g. 'success', 'failed', 'abandoned'. */
  status: string;
  amountSubunit: number;
  currency: string;
  paidAt?: string;
  channel?: string;
  metadata: Record<string, unknown>;
  raw: Record<string, unknown>;
}

export interface PaymentGatewayPort {
  readonly name: GatewayName;
  initiatePayment(params: InitiatePaymentParams): Promise<InitiatedPayment>;
  /** Throws GatewayError when unreachable or the gateway rejects the lookup. */
  verifyTransaction(reference: string): Promise<VerifiedTransaction>;
}

/** A gateway-reported payment result, normalized for the reconciler. */
export interface GatewayPaymentEvent {
  gateway: GatewayName;
  reference: string;
  outcome: 'success' | 'failed';
  amountSubunit: number;
  currency: string;
  metadata: Record<string, unknown>;
  paidAt?: string;
  channel?: string;
  rawPayload: Record<string, unknown>;
}

export function toPaymentEvent(gateway: GatewayName, verified: VerifiedTransaction): GatewayPaymentEvent | null {
  const outcome = verified.status === 'success' ? 'success' : verified.status === 'failed' ? 'failed' : null;
  if (!outcome) return null;
  return {
    gateway,
    reference: verified.reference,
    outcome,
    amountSubunit: verified.amountSubunit,
    currency: verified.currency,
    metadata: verified.metadata,
    paidAt: verified.paidAt,
    channel: verified.channel,
    rawPayload: verified.raw,
  };
}
