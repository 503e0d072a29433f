import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { normalizeParticipantIds } from '../../src/domain/participants/normalize';
import type { RegistrationRecord } from '../../src/types/tables';
import { InMemoryRegistrationStore } from '../support/inMemoryRegistrationStore';
import { InMemoryCatalogStore, makeRegistration } from '../support/fakes';

describe('normalizeParticipantIds', () => {
  let a: RegistrationRecord;
  let b: RegistrationRecord;
  let c: RegistrationRecord;
  let d: RegistrationRecord;
  let e: RegistrationRecord;
  let f: RegistrationRecord;
  let store: InMemoryRegistrationStore;
  let catalog: InMemoryCatalogStore;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    a = makeRegistration({ participantId: 'ET/ASPIR/C1/0001', createdAt: '2024-01-01T00:00:00.000Z' });
    b = makeRegistration({ participantId: 'ET/ASPIR/C1/S/0001', createdAt: '2024-01-02T00:00:00.000Z' });
    c = makeRegistration({ participantId: 'ET/ASPIR/C1/003', createdAt: '2024-01-03T00:00:00.000Z' });
    d = makeRegistration({ participantId: 'garbage', createdAt: '2024-01-04T00:00:00.000Z' });
    e = makeRegistration({ cohortCode: 'C2', participantId: 'ET/ASPIR/C2/005', createdAt: '2024-01-05T00:00:00.000Z' });
    f = makeRegistration({ cohortCode: 'C2', participantId: 'ET/ASPIR/C2/5', createdAt: '2024-01-06T00:00:00.000Z' });
    const noId = makeRegistration({ createdAt: '2024-01-07T00:00:00.000Z' });
    store = new InMemoryRegistrationStore().seed(f, e, d, c, b, a, noId).seedClaim('C2', 5, 'ET/ASPIR/C2/005', e.registrationId);
    catalog = new InMemoryCatalogStore().addCohort('C1').addCohort('C2');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rewrites legacy IDs, keeps the earlier holder of a sequence and backfills claims', async () => {
    const result = await normalizeParticipantIds({ store, catalog });

    expect(result).toEqual({
      dryRun: false,
      updated: 3,
      alreadyCanonical: 2,
      invalid: 1,
      conflicts: 2,
      claimsCreated: 1,
      changes: [
        { registrationId: a.registrationId, fullName: a.fullName, from: 'ET/ASPIR/C1/0001', to: 'ET/ASPIR/C1/001', reassigned: false },
        { registrationId: b.registrationId, fullName: b.fullName, from: 'ET/ASPIR/C1/S/0001', to: 'ET/ASPIR/C1/004', reassigned: true },
        { registrationId: f.registrationId, fullName: f.fullName, from: 'ET/ASPIR/C2/5', to: 'ET/ASPIR/C2/006', reassigned: true },
      ],
      errors: [],
    });
    expect(store.registrations.get(a.registrationId)?.participantId).toBe('ET/ASPIR/C1/001');
    expect(store.registrations.get(b.registrationId)?.participantId).toBe('ET/ASPIR/C1/004');
    expect(store.registrations.get(d.registrationId)?.participantId).toBe('garbage');
    expect(store.claimsFor('C1')).toEqual([
      [1, a.registrationId],
      [3, c.registrationId],
      [4, b.registrationId],
    ]);
    expect(store.claimsFor('C2')).toEqual([
      [5, e.registrationId],
      [6, f.registrationId],
    ]);
  });

  it('reports the same plan on a dry run without writing', async () => {
    const result = await normalizeParticipantIds({ store, catalog }, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.changes.map((ch) => ch.to)).toEqual(['ET/ASPIR/C1/001', 'ET/ASPIR/C1/004', 'ET/ASPIR/C2/006']);
    expect(store.registrations.get(a.registrationId)?.participantId).toBe('ET/ASPIR/C1/0001');
    expect(store.claimsFor('C1')).toEqual([]);
  });

  it('is a no-op on a second run', async () => {
    await normalizeParticipantIds({ store, catalog });
    const again = await normalizeParticipantIds({ store, catalog });
    expect(again).toMatchObject({ updated: 0, alreadyCanonical: 5, invalid: 1, conflicts: 0, claimsCreated: 0, changes: [] });
  });
});
