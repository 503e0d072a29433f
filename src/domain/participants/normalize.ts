/**
 * One-off rewrite of legacy participant IDs (ET/ASPIR/C1/0001, ET/ASPIR/C1/S/0016, ...)
 * to the canonical ET/ASPIR/<cohort>/<nnn> form, backfilling sequence claims as it goes.
 *
 * Registrations are processed oldest first. An existing claim always wins; among
 * unclaimed IDs the earlier registration keeps the canonical sequence and later
 * ones are moved to the next free sequence of the cohort.
 */

import { errorMessage } from '../../lib/errors';
import type { CatalogStore } from '../../ports/catalogStore';
import type { RegistrationStore } from '../../ports/registrationStore';
import type { RegistrationRecord } from '../../types/tables';
import { formatParticipantIdCanonical, parseParticipantId } from './participantId';

export interface NormalizeDeps {
  store: RegistrationStore;
  catalog: CatalogStore;
}

export interface NormalizeChange {
  registrationId: string;
  fullName: string;
  from: string;
  to: string;
  reassigned: boolean;
}

export interface NormalizeResult {
  dryRun: boolean;
  updated: number;
  alreadyCanonical: number;
  invalid: number;
  conflicts: number;
  claimsCreated: number;
  changes: NormalizeChange[];
  errors: Array<{ registrationId: string; error: string }>;
}

function slotKey(cohortCode: string, sequence: number): string {
  return `${cohortCode}#${sequence}`;
}

export async function normalizeParticipantIds(
  deps: NormalizeDeps,
  options: { dryRun?: boolean } = {}
): Promise<NormalizeResult> {
  const dryRun = options.dryRun ?? false;
  const { store } = deps;
  const registrations = await store.listRegistrations();

  const cohortCodes = new Set((await deps.catalog.listCohorts()).map((c) => c.code.toUpperCase()));
  for (const r of registrations) if (r.cohortCode) cohortCodes.add(r.cohortCode.toUpperCase());

  const withIds = registrations
    .filter((r): r is RegistrationRecord & { participantId: string } => Boolean(r.participantId?.trim()))
    .sort((a, b) => a.createdAt.localeCompare(b.createdAt));

  // Highest sequence currently written on any registration, claimed or not.
  const highestInUse = new Map<string, number>();
  for (const r of withIds) {
    const parsed = parseParticipantId(r.participantId, cohortCodes);
    if (parsed) highestInUse.set(parsed.cohortCode, Math.max(highestInUse.get(parsed.cohortCode) ?? 0, parsed.sequence));
  }

  // Slots decided during this run, including dry runs.
  const reserved = new Map<string, string>();

  const isTaken = async (cohortCode: string, sequence: number, registrationId: string): Promise<boolean> => {
    const owner = reserved.get(slotKey(cohortCode, sequence));
    if (owner !== undefined) return owner !== registrationId;
    const claim = await store.getParticipantClaim(cohortCode, sequence);
    return claim !== null && claim.registrationId !== registrationId;
  };

  const nextFreeSequence = async (cohortCode: string, registrationId: string): Promise<number> => {
    let sequence = Math.max(await store.getMaxParticipantSequence(cohortCode), highestInUse.get(cohortCode) ?? 0) + 1;
    while (await isTaken(cohortCode, sequence, registrationId)) sequence++;
    highestInUse.set(cohortCode, sequence);
    return sequence;
  };

  const result: NormalizeResult = {
    dryRun,
    updated: 0,
    alreadyCanonical: 0,
    invalid: 0,
    conflicts: 0,
    claimsCreated: 0,
    changes: [],
    errors: [],
  };

  for (const registration of withIds) {
    const current = registration.participantId;
    const parsed = parseParticipantId(current, cohortCodes);
    if (!parsed) {
      result.invalid++;
      console.warn(JSON.stringify({ level: 'WARN', message: 'Invalid participant ID skipped', registrationId: registration.registrationId, participantId: current }));
      continue;
    }

    const { cohortCode } = parsed;
    let sequence = parsed.sequence;
    const canonical = formatParticipantIdCanonical(cohortCode, sequence);
    const conflict = await isTaken(cohortCode, sequence, registration.registrationId);
    if (conflict) sequence = await nextFreeSequence(cohortCode, registration.registrationId);
    const target = formatParticipantIdCanonical(cohortCode, sequence);
    reserved.set(slotKey(cohortCode, sequence), registration.registrationId);

    if (target === current) {
      result.alreadyCanonical++;
      const claim = await store.getParticipantClaim(cohortCode, sequence);
      if (claim) continue;
      result.claimsCreated++;
    } else {
      result.updated++;
      if (conflict) {
        result.conflicts++;
        console.warn(JSON.stringify({ level: 'WARN', message: 'Participant ID reassigned', registrationId: registration.registrationId, from: current, canonical, to: target }));
      }
      result.changes.push({ registrationId: registration.registrationId, fullName: registration.fullName, from: current, to: target, reassigned: conflict });
    }
    if (dryRun) continue;

    try {
      const outcome = await store.assignParticipantId({
        registration,
        participantId: target,
        claim: { cohortCode, sequence },
        requireUnassigned: false,
      });
      if (outcome === 'conflict') {
        result.errors.push({ registrationId: registration.registrationId, error: 'Registration or claim changed concurrently; re-run the normalization' });
      }
    } catch (err) {
      console.error('normalizeParticipantIds', registration.registrationId, err);
      result.errors.push({ registrationId: registration.registrationId, error: errorMessage(err) });
    }
  }

  return result;
}
