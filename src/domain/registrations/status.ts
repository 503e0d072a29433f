/**
 * Applicant-facing registration status lookup by payment reference or email.
 */

import { ValidationError, RegistrationNotFoundError } from '../../lib/errors';
import type { RegistrationStore } from '../../ports/registrationStore';
import type { RegistrationRecord, RegistrationStatus } from '../../types/tables';
import { remainingBalance } from '../payments/transitions';
import { resolveRegistration } from '../references/resolver';

export interface RegistrationStatusView {
  registrationId: string;
  fullName: string;
  status: RegistrationStatus;
  registrationFeePaid: boolean;
  courseFeePaid: boolean;
  remainingBalanceCents: number;
  cohortCode?: string;
  participantId?: string;
}

export function toStatusView(r: RegistrationRecord): RegistrationStatusView {
  return {
    registrationId: r.registrationId,
    fullName: r.fullName,
    status: r.status,
    registrationFeePaid: r.registrationFeePaid,
    courseFeePaid: r.courseFeePaid,
    remainingBalanceCents: remainingBalance(r, r),
    cohortCode: r.cohortCode,
    participantId: r.participantId,
  };
}

export async function lookupRegistrationStatus(
  query: { reference?: string; email?: string },
  store: RegistrationStore
): Promise<RegistrationStatusView> {
  const reference = query.reference?.trim();
  const email = query.email?.trim();
  if (reference) {
    const { registration } = await resolveRegistration(reference, store);
    return toStatusView(registration);
  }
  if (email) {
    const registration = await store.findLatestByEmail(email);
    if (!registration) throw new RegistrationNotFoundError(email);
    return toStatusView(registration);
  }
  throw new ValidationError('Provide a payment reference or an email address');
}
