/**
 * Integration tests for the registration store (require DynamoDB Local or real tables).
 * Skip in CI unless DDB_TABLE_REGISTRATIONS is set.
 */
import { describe, it, expect } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { makeRegistration } from '../support/fakes';

const registrationsTableName = process.env.DDB_TABLE_REGISTRATIONS ?? '';
const transactionsTableName = process.env.DDB_TABLE_TRANSACTIONS ?? '';
const paymentActivityTableName = process.env.DDB_TABLE_PAYMENT_ACTIVITY ?? '';

describe('Registration store integration', () => {
  it.skipIf(!registrationsTableName)('commits a payment once and reports the replay as a duplicate', async () => {
    const { DynamoRegistrationStore } = await import('../../src/adapters/dynamoRegistrationStore');
    const store = new DynamoRegistrationStore({ registrationsTableName, transactionsTableName, paymentActivityTableName });
    const registration = makeRegistration({ registrationId: uuidv4() });
    const reference = `ASPIR-REG-${registration.registrationId}`;
    await store.createRegistration(registration);

    const now = new Date().toISOString();
    const commit = {
      registration,
      registrationFeePaid: true,
      courseFeePaid: false,
      status: 'PENDING' as const,
      transaction: {
        PK: `TRANSACTION#${reference}`,
        SK: 'METADATA',
        reference,
        registrationId: registration.registrationId,
        amountCents: 5000,
        currency: 'USD',
        paidAt: now,
        gateway: 'squad' as const,
        rawPayload: {},
        createdAt: now,
      },
      activity: {
        PK: registration.PK,
        SK: `ACTIVITY#${now}#integration`,
        registrationId: registration.registrationId,
        reference,
        status: 'success' as const,
        paymentType: 'registration_fee' as const,
        amountCents: 5000,
        currency: 'USD',
        gateway: 'squad' as const,
        createdAt: now,
      },
    };

    expect(await store.commitPaymentOutcome(commit)).toBe('committed');
    expect(await store.hasTransaction(reference)).toBe(true);

    const reloaded = await store.getRegistration(registration.registrationId);
    expect(reloaded?.version).toBe(1);
    expect(await store.commitPaymentOutcome({ ...commit, registration: reloaded ?? registration })).toBe('duplicate_transaction');
  });
});
