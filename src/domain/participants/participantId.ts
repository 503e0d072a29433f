/**
 * Participant ID format: ET/ASPIR/<cohort>/<sequence>, sequence zero-padded to 3 digits.
 * Legacy IDs (variable-width sequence, extra dimension segment) are parsed leniently.
 */

export const PARTICIPANT_ID_PREFIX = 'ET/ASPIR';

const SEQUENCE_WIDTH = 3;
const ALTERNATE_SLASHES = /[\\／∕⁄]/g;
const NUMERIC = /^\d+$/;

export interface ParsedParticipantId {
  cohortCode: string;
  sequence: number;
}

export function formatParticipantIdCanonical(cohortCode: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new RangeError(`Participant sequence must be a positive integer, got ${sequence}`);
  }
  return `${PARTICIPANT_ID_PREFIX}/${cohortCode.trim().toUpperCase()}/${String(sequence).padStart(SEQUENCE_WIDTH, '0')}`;
}

export function participantIdPrefix(cohortCode: string): string {
  return `${PARTICIPANT_ID_PREFIX}/${cohortCode.trim().toUpperCase()}/`;
}

/** Unify slash variants, trim segments and drop empty ones. Returns '' for blank input. */
export function normalizeParticipantIdString(raw: unknown): string {
  if (raw === null || raw === undefined) return '';
  const s = String(raw).trim();
  if (!s) return '';
  return s
    .replace(ALTERNATE_SLASHES, '/')
    .split('/')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .join('/');
}

/**
 * Find the first token equal to a known cohort code, then the next purely numeric
 * token after it. Anything else (ET, ASPIR, an obsolete dimension code) is ignored.
 */
export function parseParticipantId(raw: unknown, knownCohortCodes: Iterable<string>): ParsedParticipantId | null {
  const s = normalizeParticipantIdString(raw);
  if (!s) return null;
  const cohorts = new Set(Array.from(knownCohortCodes, (c) => c.toUpperCase()));
  const tokens = s.split('/').map((t) => t.toUpperCase());
  const cohortIndex = tokens.findIndex((t) => cohorts.has(t));
  if (cohortIndex === -1) return null;
  const seqToken = tokens.slice(cohortIndex + 1).find((t) => NUMERIC.test(t));
  if (!seqToken) return null;
  const sequence = parseInt(seqToken, 10);
  if (sequence < 1) return null;
  return { cohortCode: tokens[cohortIndex], sequence };
}

export function parseParticipantIdToCanonical(raw: unknown, knownCohortCodes: Iterable<string>): string | null {
  const parsed = parseParticipantId(raw, knownCohortCodes);
  return parsed ? formatParticipantIdCanonical(parsed.cohortCode, parsed.sequence) : null;
}

/** Loose check used by the spreadsheet import: ET/ASPIR/... or anything carrying a cohort token. */
export function looksLikeParticipantId(raw: unknown, knownCohortCodes: Iterable<string>): boolean {
  const s = normalizeParticipantIdString(raw);
  if (!s) return false;
  const tokens = s.split('/').map((t) => t.toUpperCase());
  if (tokens.includes('ET') && tokens.includes('ASPIR')) return true;
  const cohorts = new Set(Array.from(knownCohortCodes, (c) => c.toUpperCase()));
  return tokens.some((t) => cohorts.has(t));
}
