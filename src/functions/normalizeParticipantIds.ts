import { normalizeParticipantIds, type NormalizeResult } from '../domain/participants/normalize';
import { getConfig } from '../lib/config';
import { withMiddy } from '../lib/middyMiddlewares';
import { getCatalogStore, getRegistrationStore } from '../lib/services';

export interface NormalizeParticipantIdsEvent {
  dryRun?: boolean;
}

/** Directly invoked job; run with { dryRun: true } first to review the changes. */
async function normalizeParticipantIdsHandler(event: NormalizeParticipantIdsEvent | null): Promise<NormalizeResult> {
  const config = getConfig();
  const result = await normalizeParticipantIds(
    { store: getRegistrationStore(config), catalog: getCatalogStore(config) },
    { dryRun: event?.dryRun === true }
  );
  console.info(JSON.stringify({
    level: 'INFO',
    message: result.dryRun ? 'Participant ID normalization dry run' : 'Participant ID normalization finished',
    updated: result.updated,
    alreadyCanonical: result.alreadyCanonical,
    invalid: result.invalid,
    conflicts: result.conflicts,
    claimsCreated: result.claimsCreated,
    errors: result.errors.length,
  }));
  return result;
}

export const handler = withMiddy<NormalizeParticipantIdsEvent | null, NormalizeResult>(
  normalizeParticipantIdsHandler,
  'normalizeParticipantIds'
);
