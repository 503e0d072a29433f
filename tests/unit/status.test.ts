import { describe, it, expect } from 'vitest';
import { lookupRegistrationStatus } from '../../src/domain/registrations/status';
import { ReferenceResolutionError, RegistrationNotFoundError, ValidationError } from '../../src/lib/errors';
import { InMemoryRegistrationStore } from '../support/inMemoryRegistrationStore';
import { makeRegistration } from '../support/fakes';

describe('lookupRegistrationStatus', () => {
  const older = makeRegistration({ email: 'kemi@example.com', createdAt: '2024-02-01T00:00:00.000Z' });
  const newer = makeRegistration({
    email: 'Kemi@Example.com',
    createdAt: '2024-04-01T00:00:00.000Z',
    registrationFeePaid: true,
    participantId: 'ET/ASPIR/C1/003',
  });
  const store = new InMemoryRegistrationStore().seed(older, newer);

  it('looks up by payment reference first', async () => {
    const view = await lookupRegistrationStatus(
      { reference: `ASPIR-REG-${older.registrationId}-12345678`, email: 'kemi@example.com' },
      store
    );
    expect(view).toEqual({
      registrationId: older.registrationId,
      fullName: older.fullName,
      status: 'PENDING',
      registrationFeePaid: false,
      courseFeePaid: false,
      remainingBalanceCents: 15000,
      cohortCode: 'C1',
      participantId: undefined,
    });
  });

  it('returns the most recent registration for an email, ignoring case', async () => {
    const view = await lookupRegistrationStatus({ email: ' KEMI@example.com ' }, store);
    expect(view).toMatchObject({
      registrationId: newer.registrationId,
      remainingBalanceCents: 10000,
      participantId: 'ET/ASPIR/C1/003',
    });
  });

  it('distinguishes an unknown reference, an unknown email and an empty query', async () => {
    await expect(lookupRegistrationStatus({ reference: 'NOPE' }, store)).rejects.toBeInstanceOf(ReferenceResolutionError);
    await expect(lookupRegistrationStatus({ email: 'nobody@example.com' }, store)).rejects.toBeInstanceOf(RegistrationNotFoundError);
    await expect(lookupRegistrationStatus({ reference: ' ', email: '' }, store)).rejects.toBeInstanceOf(ValidationError);
  });
});
