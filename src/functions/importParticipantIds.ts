import type { APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { importParticipantIds } from '../domain/participants/importIds';
import { getConfig } from '../lib/config';
import { ValidationError } from '../lib/errors';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json, readJsonBody } from '../lib/responses';
import { getCatalogStore, getRegistrationStore } from '../lib/services';

const cell = z.union([z.string(), z.number()]).nullish().transform((v) => (v == null ? '' : String(v).trim()));

const bodySchema = z.object({
  rows: z.array(z.object({ name: cell, participantId: cell })).min(1, 'rows must not be empty'),
});

async function importParticipantIdsHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const parsed = bodySchema.safeParse(readJsonBody(event));
  if (!parsed.success) {
    throw new ValidationError('Body must include rows: [{ name, participantId }]', parsed.error.flatten().fieldErrors);
  }
  const config = getConfig();
  const result = await importParticipantIds(parsed.data.rows, {
    store: getRegistrationStore(config),
    catalog: getCatalogStore(config),
  });
  console.info(JSON.stringify({
    level: 'INFO',
    message: 'Participant ID import finished',
    updated: result.updated,
    skippedNoMatch: result.skippedNoMatch.length,
    skippedMultiple: result.skippedMultiple.length,
    skippedInvalidId: result.skippedInvalidId.length,
    errors: result.errors.length,
  }));
  return json(200, result);
}

export const handler = withMiddyHttp(importParticipantIdsHandler, 'importParticipantIds', {
  staffApiKey: () => getConfig().staffApiKey,
});
