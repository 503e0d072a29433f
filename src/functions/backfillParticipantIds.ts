import type { APIGatewayProxyResult } from 'aws-lambda';
import { backfillParticipantIds } from '../domain/participants/allocator';
import { getConfig } from '../lib/config';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json } from '../lib/responses';
import { buildAllocatorDeps } from '../lib/services';

async function backfillParticipantIdsHandler(_event: HttpEvent): Promise<APIGatewayProxyResult> {
  const result = await backfillParticipantIds(buildAllocatorDeps(getConfig()));
  console.info(JSON.stringify({
    level: 'INFO',
    message: 'Participant ID backfill finished',
    allocated: result.allocated.length,
    errors: result.errors.length,
  }));
  return json(200, result);
}

export const handler = withMiddyHttp(backfillParticipantIdsHandler, 'backfillParticipantIds', {
  staffApiKey: () => getConfig().staffApiKey,
});
