/**
 * Paystack gateway adapter: transaction initialize/verify, webhook signature check
 * (HMAC-SHA512 of the raw body, hex) and webhook payload parsing.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
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

export const PAYSTACK_SIGNATURE_HEADER = 'x-paystack-signature';

const transactionSchema = z
  .object({
    reference: z.string().optional(),
    status: z.string(),
    amount: z.coerce.number(),
    currency: z.string().optional(),
    paid_at: z.string().nullish(),
    channel: z.string().nullish(),
    metadata: z.union([z.record(z.unknown()), z.string(), z.number()]).nullish(),
  })
  .passthrough();

const initializeResponseSchema = z
  .object({
    status: z.boolean(),
    message: z.string().optional(),
    data: z.object({ authorization_url: z.string(), reference: z.string().optional() }).passthrough().nullish(),
  })
  .passthrough();

const verifyResponseSchema = z
  .object({
    status: z.boolean(),
    message: z.string().optional(),
    data: transactionSchema.nullish(),
  })
  .passthrough();

const webhookSchema = z
  .object({
    event: z.string(),
    data: transactionSchema.partial({ status: true, amount: true }).default({}),
  })
  .passthrough();

export type PaystackWebhookResult = { kind: 'ignored'; event: string } | { kind: 'payment'; event: GatewayPaymentEvent };

function toRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

/** Paystack sends metadata as an object, or as a JSON string when set from some SDKs. */
function metadataObject(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string') return toRecord(raw);
  try {
    return toRecord(JSON.parse(raw));
  } catch {
    return {};
  }
}

export function computePaystackSignature(rawBody: string | Buffer, secretKey: string): string {
  return createHmac('sha512', secretKey).update(rawBody).digest('hex');
}

/** Constant-time check of the x-paystack-signature header against the raw request body. */
export function verifyPaystackSignature(rawBody: string | Buffer, signature: string | undefined, secretKey: string): boolean {
  if (!secretKey || !signature) return false;
  const expected = Buffer.from(computePaystackSignature(rawBody, secretKey), 'utf8');
  const given = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  return expected.length === given.length && timingSafeEqual(expected, given);
}

export class PaystackAdapter implements PaymentGatewayPort {
  readonly name = 'paystack';

  constructor(
    private readonly baseUrl: string,
    private readonly secretKey: string,
    private readonly timeoutMs: number
  ) {}

  verifyWebhookSignature(rawBody: string | Buffer, signature: string | undefined): boolean {
    return verifyPaystackSignature(rawBody, signature, this.secretKey);
  }

  async initiatePayment(params: InitiatePaymentParams): Promise<InitiatedPayment> {
    this.assertConfigured();
    const res = await fetchJson(
      'Paystack',
      `${this.baseUrl}/transaction/initialize`,
      {
        method: 'POST',
        headers: { Authorization: bearer(this.secretKey) },
        body: {
          email: params.email,
          amount: params.amountSubunit,
          currency: params.currency,
          reference: params.reference,
          callback_url: params.callbackUrl,
          metadata: { ...params.metadata, customer_name: params.customerName },
        },
      },
      this.timeoutMs
    );
    const parsed = initializeResponseSchema.safeParse(res.body);
    const data = parsed.success ? parsed.data.data : undefined;
    if (!res.ok || !parsed.success || !parsed.data.status || !data) {
      const message = parsed.success ? parsed.data.message : undefined;
      throw new GatewayError(`Paystack initialize failed: ${message ?? `HTTP ${res.status}`}`, res.status);
    }
    return { checkoutUrl: data.authorization_url, reference: data.reference ?? params.reference };
  }

  async verifyTransaction(reference: string): Promise<VerifiedTransaction> {
    this.assertConfigured();
    const res = await fetchJson(
      'Paystack',
      `${this.baseUrl}/transaction/verify/${encodeURIComponent(reference)}`,
      { method: 'GET', headers: { Authorization: bearer(this.secretKey) } },
      this.timeoutMs
    );
    const parsed = verifyResponseSchema.safeParse(res.body);
    if (!res.ok || !parsed.success || !parsed.data.status || !parsed.data.data) {
      const message = parsed.success ? parsed.data.message : undefined;
      throw new GatewayError(`Paystack verification failed: ${message ?? `HTTP ${res.status}`}`, res.status);
    }
    const tx = parsed.data.data;
    return {
      reference: tx.reference ?? reference,
      status: tx.status.toLowerCase(),
      amountSubunit: tx.amount,
      currency: tx.currency ?? 'NGN',
      paidAt: tx.paid_at ?? undefined,
      channel: tx.channel ?? undefined,
      metadata: metadataObject(tx.metadata),
      raw: tx,
    };
  }

  private assertConfigured(): void {
    if (!this.secretKey) throw new GatewayError('Paystack is not configured');
  }
}

/**
 * Normalize a Paystack webhook body. Only charge.success is acted upon.
 * Throws ValidationError for a malformed payload or a missing reference.
 */
export function parsePaystackWebhook(payload: unknown): PaystackWebhookResult {
  const parsed = webhookSchema.safeParse(payload);
  if (!parsed.success) throw new ValidationError('Malformed Paystack webhook payload', parsed.error.flatten());
  const { event, data } = parsed.data;
  if (event !== 'charge.success') return { kind: 'ignored', event };
  if (!data.reference) throw new ValidationError('Missing transaction reference');
  return {
    kind: 'payment',
    event: {
      gateway: 'paystack',
      reference: data.reference,
      outcome: (data.status ?? 'success').toLowerCase() === 'success' ? 'success' : 'failed',
      amountSubunit: data.amount ?? 0,
      currency: data.currency ?? 'NGN',
      metadata: metadataObject(data.metadata),
      paidAt: data.paid_at ?? undefined,
      channel: data.channel ?? undefined,
      rawPayload: data,
    },
  };
}
