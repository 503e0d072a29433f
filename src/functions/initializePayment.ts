import type { APIGatewayProxyResult } from 'aws-lambda';
import { initializePayment } from '../domain/payments/initiation';
import { getConfig } from '../lib/config';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json, readJsonBody } from '../lib/responses';
import { buildInitiationDeps } from '../lib/services';

async function initializePaymentHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const body = readJsonBody(event);
  const started = await initializePayment(body, await buildInitiationDeps(getConfig()));
  return json(201, {
    registrationId: started.registrationId,
    reference: started.reference,
    checkoutUrl: started.checkoutUrl,
    paymentType: started.paymentType,
    amountUsd: (started.amountUsdCents / 100).toFixed(2),
  });
}

export const handler = withMiddyHttp(initializePaymentHandler, 'initializePayment');
