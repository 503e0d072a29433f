import type { APIGatewayProxyResult } from 'aws-lambda';
import { PAYSTACK_SIGNATURE_HEADER, parsePaystackWebhook } from '../adapters/paystackAdapter';
import { reconcilePaymentEvent } from '../domain/payments/reconciler';
import { getConfig } from '../lib/config';
import { type HttpEvent, getHeader, withMiddyHttp } from '../lib/middyMiddlewares';
import { buildReconcilerDeps, getPaystackAdapter } from '../lib/services';
import { parseJson, rawBody, reconciledText, text, webhookFailure } from '../lib/webhook';

async function paystackWebhookHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  try {
    const config = getConfig();
    const body = rawBody(event);
    const signature = getHeader(event.headers, PAYSTACK_SIGNATURE_HEADER);
    if (!getPaystackAdapter(config).verifyWebhookSignature(body, signature)) {
      console.warn(JSON.stringify({ level: 'WARN', message: 'Paystack webhook signature rejected' }));
      return text(401, 'Invalid signature');
    }
    const parsed = parseJson(body.toString('utf8'));
    if (!parsed.ok) return text(400, 'Invalid JSON');

    const webhook = parsePaystackWebhook(parsed.value);
    if (webhook.kind === 'ignored') {
      console.info(JSON.stringify({ level: 'INFO', message: 'Paystack webhook ignored', event: webhook.event }));
      return text(200, 'Event not handled');
    }
    const result = await reconcilePaymentEvent(webhook.event, await buildReconcilerDeps(config));
    return text(200, reconciledText(result));
  } catch (err) {
    return webhookFailure('Paystack', err);
  }
}

export const handler = withMiddyHttp(paystackWebhookHandler, 'paystackWebhookHandler');
