/**
 * Participant ID allocation: read the highest sequence for the cohort, over both the
 * claims and the IDs already stored on registrations, then claim max+1 in the same DynamoDB transaction as the registration update.
 * A lost race surfaces as a conflict and is retried with a fresh maximum.
 */

import { ConflictError, RegistrationNotFoundError, errorMessage } from '../../lib/errors';
import type { ParticipantClaim, RegistrationStore } from '../../ports/registrationStore';
import type { RegistrationRecord } from '../../types/tables';
import { formatParticipantIdCanonical, parseParticipantId, participantIdPrefix } from './participantId';

export interface AllocatorDeps {
  store: RegistrationStore;
  maxRetries: number;
}

/** Highest sequence written on any registration under the cohort's prefix, including IDs stored without a claim. */
async function highestStoredSequence(store: RegistrationStore, cohort: string): Promise<number> {
  let max = 0;
  for (const id of await store.listParticipantIdsWithPrefix(participantIdPrefix(cohort))) {
    const parsed = parseParticipantId(id, [cohort]);
    if (parsed && parsed.cohortCode === cohort && parsed.sequence > max) max = parsed.sequence;
  }
  return max;
}

export async function planParticipantClaim(store: RegistrationStore, cohortCode: string): Promise<ParticipantClaim> {
  const cohort = cohortCode.trim().toUpperCase();
  const [claimed, stored] = await Promise.all([
    store.getMaxParticipantSequence(cohort),
    highestStoredSequence(store, cohort),
  ]);
  const sequence = Math.max(claimed, stored) + 1;
  return { cohortCode: cohort, sequence, participantId: formatParticipantIdCanonical(cohort, sequence) };
}

/**
 * Returns the registration's participant ID, allocating one if it has none.
 * Null when the registration has no cohort.
 */
export async function allocateParticipantId(registrationId: string, deps: AllocatorDeps): Promise<string | null> {
  for (let attempt = 0; attempt < deps.maxRetries; attempt++) {
    const registration = await deps.store.getRegistration(registrationId);
    if (!registration) throw new RegistrationNotFoundError(registrationId);
    if (registration.participantId) return registration.participantId;
    if (!registration.cohortCode) return null;

    const claim = await planParticipantClaim(deps.store, registration.cohortCode);
    const result = await deps.store.assignParticipantId({
      registration,
      participantId: claim.participantId,
      claim: { cohortCode: claim.cohortCode, sequence: claim.sequence },
      requireUnassigned: true,
    });
    if (result === 'committed') return claim.participantId;
  }
  throw new ConflictError(`Participant ID allocation for ${registrationId} failed after ${deps.maxRetries} attempts`);
}

export interface BackfillResult {
  allocated: Array<{ registrationId: string; participantId: string }>;
  errors: Array<{ registrationId: string; error: string }>;
}

function needsParticipantId(r: RegistrationRecord): boolean {
  return !r.participantId && Boolean(r.cohortCode);
}

/** Allocate IDs for every cohort-assigned registration without one, oldest first. */
export async function backfillParticipantIds(deps: AllocatorDeps): Promise<BackfillResult> {
  const pending = (await deps.store.listRegistrations())
    .filter(needsParticipantId)
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  const result: BackfillResult = { allocated: [], errors: [] };
  for (const registration of pending) {
    try {
      const participantId = await allocateParticipantId(registration.registrationId, deps);
      if (participantId) result.allocated.push({ registrationId: registration.registrationId, participantId });
    } catch (err) {
      console.error('backfillParticipantIds', registration.registrationId, err);
      result.errors.push({ registrationId: registration.registrationId, error: errorMessage(err) });
    }
  }
  return result;
}
