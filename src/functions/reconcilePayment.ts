import type { APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { reconcileManually } from '../domain/payments/reconciler';
import { getConfig } from '../lib/config';
import { ValidationError } from '../lib/errors';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json, readJsonBody } from '../lib/responses';
import { buildReconcilerDeps } from '../lib/services';

const bodySchema = z.object({
  reference: z.string().trim().min(1, 'reference is required'),
  gateway: z.enum(['squad', 'paystack']).optional(),
});

async function reconcilePaymentHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const parsed = bodySchema.safeParse(readJsonBody(event));
  if (!parsed.success) throw new ValidationError('Body must include reference and an optional gateway (squad or paystack)');
  const config = getConfig();
  const result = await reconcileManually(parsed.data, await buildReconcilerDeps(config));
  return json(200, result);
}

export const handler = withMiddyHttp(reconcilePaymentHandler, 'reconcilePayment', {
  staffApiKey: () => getConfig().staffApiKey,
});
