/**
 * Apply participant IDs from a staff spreadsheet (already parsed to rows) by
 * matching applicant names against registrations.
 */

import { errorMessage } from '../../lib/errors';
import type { CatalogStore } from '../../ports/catalogStore';
import type { RegistrationStore } from '../../ports/registrationStore';
import type { RegistrationRecord } from '../../types/tables';
import {
  looksLikeParticipantId,
  normalizeParticipantIdString,
  parseParticipantId,
  formatParticipantIdCanonical,
} from './participantId';

export interface ImportRow {
  name: string;
  participantId: string;
}

export interface ImportDeps {
  store: RegistrationStore;
  catalog: CatalogStore;
}

export interface ImportResult {
  updated: number;
  skippedNoMatch: string[];
  skippedMultiple: string[];
  skippedInvalidId: string[];
  errors: string[];
}

export function normalizeName(name: string): string {
  return name.trim().split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

/** Exact (case-insensitive), then whitespace-normalized, then containment either way. */
export function matchRegistrationsByName(name: string, registrations: RegistrationRecord[]): RegistrationRecord[] {
  const lowered = name.trim().toLowerCase();
  const exact = registrations.filter((r) => r.fullName.trim().toLowerCase() === lowered);
  if (exact.length > 0) return exact;
  const wanted = normalizeName(name);
  const normalized = registrations.filter((r) => normalizeName(r.fullName) === wanted);
  if (normalized.length > 0) return normalized;
  return registrations.filter((r) => {
    const candidate = normalizeName(r.fullName);
    return candidate.length > 0 && (candidate.includes(wanted) || wanted.includes(candidate));
  });
}

export async function importParticipantIds(rows: ImportRow[], deps: ImportDeps): Promise<ImportResult> {
  const { store } = deps;
  const cohorts = await deps.catalog.listCohorts();
  const cohortCodes = cohorts.map((c) => c.code.toUpperCase());
  const activeCohorts = new Set(cohorts.filter((c) => c.isActive).map((c) => c.code.toUpperCase()));
  const registrations = await store.listRegistrations();
  const result: ImportResult = { updated: 0, skippedNoMatch: [], skippedMultiple: [], skippedInvalidId: [], errors: [] };

  for (const row of rows) {
    const rawId = normalizeParticipantIdString(row.participantId);
    const name = row.name.trim();
    if (!rawId) continue;
    if (!looksLikeParticipantId(rawId, cohortCodes)) {
      result.skippedInvalidId.push(`${name || '(no name)'}: "${rawId}"`);
      continue;
    }
    if (!normalizeName(name)) {
      result.skippedNoMatch.push('(no name)');
      continue;
    }

    const parsed = parseParticipantId(rawId, cohortCodes);
    const cohortCode = parsed && activeCohorts.has(parsed.cohortCode) ? parsed.cohortCode : undefined;

    let candidates = matchRegistrationsByName(name, registrations);
    if (candidates.length === 0) {
      result.skippedNoMatch.push(name);
      continue;
    }
    if (candidates.length > 1 && cohortCode) {
      candidates = candidates.filter((r) => r.cohortCode?.toUpperCase() === cohortCode);
    }
    if (candidates.length !== 1) {
      result.skippedMultiple.push(name);
      continue;
    }

    const [listed] = candidates;
    const registration = (await store.getRegistration(listed.registrationId)) ?? listed;
    const participantId = parsed ? formatParticipantIdCanonical(parsed.cohortCode, parsed.sequence) : rawId;
    const previous = registration.participantId ? parseParticipantId(registration.participantId, cohortCodes) : null;
    try {
      const outcome = await store.assignParticipantId({
        registration,
        participantId,
        claim: parsed ? { cohortCode: parsed.cohortCode, sequence: parsed.sequence } : null,
        requireUnassigned: false,
        cohortCode,
        releaseClaim: previous ?? undefined,
      });
      if (outcome === 'conflict') {
        result.errors.push(`${name}: ${participantId} is already claimed by another registration`);
        continue;
      }
      result.updated++;
    } catch (err) {
      console.error('importParticipantIds', registration.registrationId, err);
      result.errors.push(`${name}: ${errorMessage(err)}`);
    }
  }

  return result;
}
