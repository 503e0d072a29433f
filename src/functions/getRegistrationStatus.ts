import type { APIGatewayProxyResult } from 'aws-lambda';
import { lookupRegistrationStatus } from '../domain/registrations/status';
import { getConfig } from '../lib/config';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json } from '../lib/responses';
import { getRegistrationStore } from '../lib/services';

async function getRegistrationStatusHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const query = event.queryStringParameters ?? {};
  const view = await lookupRegistrationStatus(
    { reference: query.reference, email: query.email },
    getRegistrationStore(getConfig())
  );
  return json(200, view);
}

export const handler = withMiddyHttp(getRegistrationStatusHandler, 'getRegistrationStatus');
