import { describe, it, expect } from 'vitest';
import {
  buildPaymentReference,
  newAttemptSuffix,
  parsePaymentReference,
  resolvePaymentType,
} from '../../src/domain/references/references';
import { resolveRegistration } from '../../src/domain/references/resolver';
import { ReferenceResolutionError } from '../../src/lib/errors';
import { InMemoryRegistrationStore } from '../support/inMemoryRegistrationStore';
import { makeRegistration } from '../support/fakes';

const ID = '3f2b8c1e-9a4d-4e6f-8b7a-1c2d3e4f5a6b';

describe('parsePaymentReference', () => {
  it('reads kind and registration id from a bare prefixed reference', () => {
    expect(parsePaymentReference(`ASPIR-REG-${ID}`)).toEqual({
      kind: 'registration_fee',
      reference: `ASPIR-REG-${ID}`,
      registrationId: ID,
    });
  });

  it('splits off the attempt suffix', () => {
    expect(parsePaymentReference(`ASPIR-COURSE-${ID}-a1b2c3d4`)).toEqual({
      kind: 'course_fee',
      reference: `ASPIR-COURSE-${ID}-a1b2c3d4`,
      registrationId: ID,
      attemptSuffix: 'a1b2c3d4',
    });
  });

  it('lower-cases the embedded id and trims whitespace', () => {
    const parsed = parsePaymentReference(`  ASPIR-FULL-${ID.toUpperCase()}  `);
    expect(parsed).toEqual({ kind: 'full_payment', reference: `ASPIR-FULL-${ID.toUpperCase()}`, registrationId: ID });
  });

  it('treats unprefixed and malformed references as legacy', () => {
    expect(parsePaymentReference('SQ-LEGACY-991')).toEqual({ kind: 'legacy', reference: 'SQ-LEGACY-991' });
    expect(parsePaymentReference('ASPIR-REG-not-a-uuid')).toEqual({ kind: 'legacy', reference: 'ASPIR-REG-not-a-uuid' });
    expect(parsePaymentReference(`ASPIR-REG-${ID}x`)).toEqual({ kind: 'legacy', reference: `ASPIR-REG-${ID}x` });
    expect(parsePaymentReference(`ASPIR-REG-${ID}-`)).toEqual({ kind: 'legacy', reference: `ASPIR-REG-${ID}-` });
  });
});

describe('buildPaymentReference', () => {
  it('appends an 8 character attempt suffix by default', () => {
    const ref = buildPaymentReference('full_payment', ID);
    expect(ref).toMatch(new RegExp(`^ASPIR-FULL-${ID}-[0-9a-f]{8}$`));
    expect(parsePaymentReference(ref).kind).toBe('full_payment');
  });

  it('omits the suffix when given null', () => {
    expect(buildPaymentReference('course_fee', ID, null)).toBe(`ASPIR-COURSE-${ID}`);
  });

  it('produces distinct suffixes', () => {
    expect(newAttemptSuffix()).not.toBe(newAttemptSuffix());
  });
});

describe('resolvePaymentType', () => {
  it('prefers the prefix over metadata', () => {
    expect(resolvePaymentType(parsePaymentReference(`ASPIR-REG-${ID}`), 'course_fee')).toBe('registration_fee');
  });

  it('falls back to metadata, then full_payment, for legacy references', () => {
    const legacy = parsePaymentReference('OLD-1');
    expect(resolvePaymentType(legacy, 'course_fee')).toBe('course_fee');
    expect(resolvePaymentType(legacy, 'bogus')).toBe('full_payment');
    expect(resolvePaymentType(legacy)).toBe('full_payment');
  });
});

describe('resolveRegistration', () => {
  it('resolves by the embedded registration id', async () => {
    const reg = makeRegistration({ registrationId: ID });
    const store = new InMemoryRegistrationStore().seed(reg);
    const { registration, intent } = await resolveRegistration(`ASPIR-REG-${ID}-abc12345`, store);
    expect(registration.registrationId).toBe(ID);
    expect(intent.kind).toBe('registration_fee');
  });

  it('falls back to the stored Squad then Paystack reference', async () => {
    const squad = makeRegistration({ squadReference: 'LEGACY-SQ-1' });
    const paystack = makeRegistration({ paystackReference: 'LEGACY-PS-1' });
    const store = new InMemoryRegistrationStore().seed(squad, paystack);
    expect((await resolveRegistration('LEGACY-SQ-1', store)).registration.registrationId).toBe(squad.registrationId);
    expect((await resolveRegistration('LEGACY-PS-1', store)).registration.registrationId).toBe(paystack.registrationId);
  });

  it('throws ReferenceResolutionError when nothing matches', async () => {
    const store = new InMemoryRegistrationStore();
    await expect(resolveRegistration('NOPE', store)).rejects.toBeInstanceOf(ReferenceResolutionError);
    await expect(resolveRegistration(`ASPIR-FULL-${ID}`, store)).rejects.toThrow(`No registration found for reference: ASPIR-FULL-${ID}`);
  });
});
