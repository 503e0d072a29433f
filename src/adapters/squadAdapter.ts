/**
 * Squad gateway adapter: hosted checkout initiation, transaction verification and
 * webhook payload parsing.
 */

import { z } from 'zod';
import { GatewayError, ValidationError } from '../lib/errors';
import type {
  GatewayPaymentEvent,
  InitiatePaymentParams,
  InitiatedPayment,
  PaymentGatewayPort,
  VerifiedTransaction,
} from '../ports/paymentGateway';
import { bearer, fetchJson } from './http';

export const SQUAD_PAYMENT_CHANNELS = ['card', 'bank', 'ussd', 'transfer'];

const metadataSchema = z.record(z.unknown()).nullish();

const initiateResponseSchema = z
  .object({
    status: z.number().optional(),
    message: z.string().optional(),
    data: z.object({ checkout_url: z.string().optional() }).passthrough().nullish(),
  })
  .passthrough();

const verifyResponseSchema = z
  .object({
    status: z.number().optional(),
    success: z.boolean().optional(),
    message: z.string().optional(),
    data: z
      .object({
        transaction_ref: z.string().optional(),
        transaction_status: z.string(),
        transaction_amount: z.coerce.number(),
        transaction_currency_id: z.string().optional(),
        currency: z.string().optional(),
        created_at: z.string().optional(),
        transaction_type: z.string().optional(),
        meta: metadataSchema,
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const webhookSchema = z
  .object({
    Event: z.string(),
    TransactionRef: z.string().optional(),
    Body: z
      .object({
        transaction_ref: z.string().optional(),
        transaction_status: z.string().optional(),
        amount: z.coerce.number().optional(),
        currency: z.string().optional(),
        meta: metadataSchema,
        created_at: z.string().optional(),
        transaction_type: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type SquadWebhookResult = { kind: 'ignored'; event: string } | { kind: 'payment'; event: GatewayPaymentEvent };

export class SquadAdapter implements PaymentGatewayPort {
  readonly name = 'squad';

  constructor(
    private readonly baseUrl: string,
    private readonly secretKey: string,
    private readonly timeoutMs: number
  ) {}

  async initiatePayment(params: InitiatePaymentParams): Promise<InitiatedPayment> {
    this.assertConfigured();
    const res = await fetchJson(
      'Squad',
      `${this.baseUrl}/transaction/initiate`,
      {
        method: 'POST',
        headers: { Authorization: bearer(this.secretKey) },
        body: {
          email: params.email,
          amount: String(params.amountSubunit),
          currency: params.currency,
          initiate_type: 'inline',
          transaction_ref: params.reference,
          customer_name: params.customerName,
          callback_url: params.callbackUrl,
          payment_channels: SQUAD_PAYMENT_CHANNELS,
          metadata: params.metadata,
          pass_charge: false,
        },
      },
      this.timeoutMs
    );
    const parsed = initiateResponseSchema.safeParse(res.body);
    const checkoutUrl = parsed.success ? parsed.data.data?.checkout_url : undefined;
    if (!res.ok || !parsed.success || parsed.data.status !== 200 || !checkoutUrl) {
      const message = parsed.success ? parsed.data.message : undefined;
      throw new GatewayError(`Squad initiate failed: ${message ?? `HTTP ${res.status}`}`, res.status);
    }
    return { checkoutUrl, reference: params.reference };
  }

  async verifyTransaction(reference: string): Promise<VerifiedTransaction> {
    this.assertConfigured();
    const res = await fetchJson(
      'Squad',
      `${this.baseUrl}/transaction/verify/${encodeURIComponent(reference)}`,
      { method: 'GET', headers: { Authorization: bearer(this.secretKey) } },
      this.timeoutMs
    );
    const parsed = verifyResponseSchema.safeParse(res.body);
    if (!res.ok || !parsed.success || parsed.data.status !== 200 || !parsed.data.success || !parsed.data.data) {
      const message = parsed.success ? parsed.data.message : undefined;
      throw new GatewayError(`Squad verification failed: ${message ?? `HTTP ${res.status}`}`, res.status);
    }
    const tx = parsed.data.data;
    return {
      reference: tx.transaction_ref ?? reference,
      status: tx.transaction_status.toLowerCase(),
      amountSubunit: tx.transaction_amount,
      currency: tx.transaction_currency_id || tx.currency || 'NGN',
      paidAt: tx.created_at,
      channel: tx.transaction_type,
      metadata: tx.meta ?? {},
      raw: tx,
    };
  }

  private assertConfigured(): void {
    if (!this.secretKey) throw new GatewayError('Squad is not configured');
  }
}

/**
 * Normalize a Squad webhook body. Only charge_successful is acted upon; its
 * transaction_status decides between success and failure.
 * Throws ValidationError for a malformed payload or a missing reference.
 */
export function parseSquadWebhook(payload: unknown): SquadWebhookResult {
  const parsed = webhookSchema.safeParse(payload);
  if (!parsed.success) throw new ValidationError('Malformed Squad webhook payload', parsed.error.flatten());
  const { Event: event, Body: body } = parsed.data;
  if (event !== 'charge_successful') return { kind: 'ignored', event };
  const reference = body.transaction_ref || parsed.data.TransactionRef;
  if (!reference) throw new ValidationError('Missing transaction reference');
  return {
    kind: 'payment',
    event: {
      gateway: 'squad',
      reference,
      outcome: body.transaction_status?.toLowerCase() === 'success' ? 'success' : 'failed',
      amountSubunit: body.amount ?? 0,
      currency: body.currency ?? 'NGN',
      metadata: body.meta ?? {},
      paidAt: body.created_at,
      channel: body.transaction_type,
      rawPayload: body,
    },
  };
}
