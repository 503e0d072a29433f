import type { APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { allocateParticipantId } from '../domain/participants/allocator';
import { getConfig } from '../lib/config';
import { RegistrationNotFoundError, ValidationError, errorMessage } from '../lib/errors';
import { buildDomainEvent } from '../lib/eventbridge';
import { type HttpEvent, withMiddyHttp } from '../lib/middyMiddlewares';
import { json, readJsonBody, requirePathParam } from '../lib/responses';
import { buildAllocatorDeps, getNotifier, getPublisher, loadProgramSettings } from '../lib/services';

const bodySchema = z.object({ sendEmail: z.boolean().optional() });

async function generateParticipantIdHandler(event: HttpEvent): Promise<APIGatewayProxyResult> {
  const registrationId = requirePathParam(event, 'registrationId');
  const parsed = bodySchema.safeParse(readJsonBody(event));
  if (!parsed.success) throw new ValidationError('sendEmail must be a boolean');
  const config = getConfig();
  const deps = buildAllocatorDeps(config);

  const before = await deps.store.getRegistration(registrationId);
  if (!before) throw new RegistrationNotFoundError(registrationId);
  const participantId = await allocateParticipantId(registrationId, deps);
  if (!participantId) throw new ValidationError('Registration has no cohort; assign one before generating a participant ID');
  const allocated = before.participantId !== participantId;

  const publish = getPublisher(config);
  if (allocated && publish) {
    try {
      await publish(buildDomainEvent('participant_id.allocated', { registrationId, participantId }));
    } catch (err) {
      console.error(JSON.stringify({ level: 'ERROR', message: 'Domain event publish failed', registrationId, error: errorMessage(err) }));
    }
  }

  let emailSent = false;
  if (parsed.data.sendEmail) {
    try {
      await getNotifier(config, await loadProgramSettings(config)).sendParticipantId(before, participantId);
      emailSent = true;
    } catch (err) {
      console.error(JSON.stringify({ level: 'ERROR', message: 'Participant ID email failed', registrationId, error: errorMessage(err) }));
    }
  }

  return json(200, { registrationId, participantId, allocated, emailSent });
}

export const handler = withMiddyHttp(generateParticipantIdHandler, 'generateParticipantId', {
  staffApiKey: () => getConfig().staffApiKey,
});
