import type { APIGatewayProxyResult } from 'aws-lambda';
import { parseSquadWebhook } from '../adapters/squadAdapter';
import { reconcilePaymentEvent } from '../domain/payments/reconciler';
import { getConfig } from '../lib/config';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { buildReconcilerDeps } from '../lib/services';
import { parseJson, rawBody, reconciledText, text, webhookFailure } from '../lib/webhook';

async function squadWebhookHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const parsed = parseJson(rawBody(event).toString('utf8'));
  if (!parsed.ok) return text(400, 'Invalid JSON');
  try {
    const webhook = parseSquadWebhook(parsed.value);
    if (webhook.kind === 'ignored') {
      console.info(JSON.stringify({ level: 'INFO', message: 'Squad webhook ignored', event: webhook.event }));
      return text(200, 'Event not handled');
    }
    const result = await reconcilePaymentEvent(webhook.event, await buildReconcilerDeps(getConfig()));
    return text(200, reconciledText(result));
  } catch (err) {
    return webhookFailure('Squad', err);
  }
}

export const handler = withMiddyHttp(squadWebhookHandler, 'squadWebhookHandler');
