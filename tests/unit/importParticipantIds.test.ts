import { describe, it, expect, beforeEach } from 'vitest';
import { importParticipantIds, matchRegistrationsByName, normalizeName } from '../../src/domain/participants/importIds';
import type { RegistrationRecord } from '../../src/types/tables';
import { InMemoryRegistrationStore } from '../support/inMemoryRegistrationStore';
import { InMemoryCatalogStore, makeRegistration } from '../support/fakes';

describe('matchRegistrationsByName', () => {
  const regs = [
    makeRegistration({ fullName: 'Ada Obi' }),
    makeRegistration({ fullName: 'Mary  Jane Smith' }),
    makeRegistration({ fullName: 'Tunde Bakare' }),
  ];

  it('normalizes whitespace and case', () => {
    expect(normalizeName('  Mary   Jane\tSMITH ')).toBe('mary jane smith');
  });

  it('tries exact, then normalized, then containment', () => {
    expect(matchRegistrationsByName('ADA OBI', regs).map((r) => r.fullName)).toEqual(['Ada Obi']);
    expect(matchRegistrationsByName('Mary Jane Smith', regs).map((r) => r.fullName)).toEqual(['Mary  Jane Smith']);
    expect(matchRegistrationsByName('Tunde', regs).map((r) => r.fullName)).toEqual(['Tunde Bakare']);
    expect(matchRegistrationsByName('Dr Tunde Bakare PhD', regs).map((r) => r.fullName)).toEqual(['Tunde Bakare']);
    expect(matchRegistrationsByName('Nobody', regs)).toEqual([]);
  });
});

describe('importParticipantIds', () => {
  let ada: RegistrationRecord;
  let johnC1: RegistrationRecord;
  let johnC2: RegistrationRecord;
  let mary: RegistrationRecord;
  let chidi: RegistrationRecord;
  let store: InMemoryRegistrationStore;
  let catalog: InMemoryCatalogStore;

  beforeEach(() => {
    ada = makeRegistration({ fullName: 'Ada Obi', cohortCode: undefined });
    johnC1 = makeRegistration({ fullName: 'John Doe', cohortCode: 'C1' });
    johnC2 = makeRegistration({ fullName: 'John Doe', cohortCode: 'C2' });
    mary = makeRegistration({ fullName: 'Mary  Jane Smith', cohortCode: 'C1', participantId: 'ET/ASPIR/C1/002' });
    chidi = makeRegistration({ fullName: 'Chidi Okafor', cohortCode: 'C1' });
    const janeA = makeRegistration({ fullName: 'Jane Roe', cohortCode: 'C1' });
    const janeB = makeRegistration({ fullName: 'Jane Roe', cohortCode: 'C1' });
    store = new InMemoryRegistrationStore()
      .seed(ada, johnC1, johnC2, mary, chidi, janeA, janeB)
      .seedClaim('C1', 2, 'ET/ASPIR/C1/002', mary.registrationId)
      .seedClaim('C1', 7, 'ET/ASPIR/C1/007', 'another-registration');
    catalog = new InMemoryCatalogStore().addCohort('C1').addCohort('C2').addCohort('C3', { isActive: false });
  });

  it('matches rows to registrations and reports every skip', async () => {
    const result = await importParticipantIds(
      [
        { name: 'ada obi', participantId: 'ET/ASPIR/C1/S/0010' },
        { name: 'John Doe', participantId: 'ET/ASPIR/C2/003' },
        { name: 'Mary Jane Smith', participantId: 'ET/ASPIR/C1/012' },
        { name: 'Jane Roe', participantId: 'ET/ASPIR/C1/011' },
        { name: 'Nobody Here', participantId: 'ET/ASPIR/C1/013' },
        { name: 'Chidi Okafor', participantId: 'hello' },
        { name: '', participantId: 'ET/ASPIR/C1/014' },
        { name: 'Someone', participantId: '' },
        { name: 'Chidi Okafor', participantId: 'ET/ASPIR/C1/007' },
      ],
      { store, catalog }
    );

    expect(result).toEqual({
      updated: 3,
      skippedNoMatch: ['Nobody Here', '(no name)'],
      skippedMultiple: ['Jane Roe'],
      skippedInvalidId: ['Chidi Okafor: "hello"'],
      errors: ['Chidi Okafor: ET/ASPIR/C1/007 is already claimed by another registration'],
    });
    expect(store.registrations.get(ada.registrationId)).toMatchObject({ participantId: 'ET/ASPIR/C1/010', cohortCode: 'C1' });
    expect(store.registrations.get(johnC2.registrationId)?.participantId).toBe('ET/ASPIR/C2/003');
    expect(store.registrations.get(johnC1.registrationId)?.participantId).toBeUndefined();
    expect(store.registrations.get(mary.registrationId)?.participantId).toBe('ET/ASPIR/C1/012');
    expect(store.registrations.get(chidi.registrationId)?.participantId).toBeUndefined();
    expect(store.claimsFor('C1')).toEqual([
      [7, 'another-registration'],
      [10, ada.registrationId],
      [12, mary.registrationId],
    ]);
  });

  it('does not move a registration into an inactive cohort', async () => {
    await importParticipantIds([{ name: 'Ada Obi', participantId: 'ET/ASPIR/C3/004' }], { store, catalog });
    const saved = store.registrations.get(ada.registrationId);
    expect(saved?.participantId).toBe('ET/ASPIR/C3/004');
    expect(saved?.cohortCode).toBeUndefined();
    expect(store.claimsFor('C3')).toEqual([[4, ada.registrationId]]);
  });

  it('stores an ID it cannot canonicalize as given, without a claim', async () => {
    const result = await importParticipantIds([{ name: 'Ada Obi', participantId: 'ET/ASPIR/X9/1' }], { store, catalog });
    expect(result.updated).toBe(1);
    expect(store.registrations.get(ada.registrationId)?.participantId).toBe('ET/ASPIR/X9/1');
    expect(store.claims.size).toBe(2);
  });
});
