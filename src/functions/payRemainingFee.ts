import type { APIGatewayProxyResult } from 'aws-lambda';
import { payRemainingFee } from '../domain/payments/initiation';
import { getConfig } from '../lib/config';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json, readJsonBody, requirePathParam } from '../lib/responses';
import { buildInitiationDeps } from '../lib/services';

async function payRemainingFeeHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const registrationId = requirePathParam(event, 'registrationId');
  const started = await payRemainingFee(registrationId, readJsonBody(event), await buildInitiationDeps(getConfig()));
  return json(200, {
    registrationId: started.registrationId,
    reference: started.reference,
    checkoutUrl: started.checkoutUrl,
    paymentType: started.paymentType,
    amountUsd: (started.amountUsdCents / 100).toFixed(2),
  });
}

export const handler = withMiddyHttp(payRemainingFeeHandler, 'payRemainingFee');
