/**
 * Registration fee state machine. Pure: the flags are the source of truth and the
 * status is derived from them after every transition.
 */

import type { PaymentType, RegistrationStatus } from '../../types/tables';

export type PaymentOutcome = 'success' | 'failed';

export interface FeeState {
  registrationFeePaid: boolean;
  courseFeePaid: boolean;
  status: RegistrationStatus;
}

export function isFullyPaid(state: Pick<FeeState, 'registrationFeePaid' | 'courseFeePaid'>): boolean {
  return state.registrationFeePaid && state.courseFeePaid;
}

export function deriveStatus(state: Pick<FeeState, 'registrationFeePaid' | 'courseFeePaid'>): RegistrationStatus {
  return isFullyPaid(state) ? 'PAID' : 'PENDING';
}

export function applyPaymentOutcome(state: FeeState, paymentType: PaymentType, outcome: PaymentOutcome): FeeState {
  if (outcome === 'failed') {
    // A late failure for a stray attempt cannot un-pay a settled registration.
    return {
      registrationFeePaid: state.registrationFeePaid,
      courseFeePaid: state.courseFeePaid,
      status: isFullyPaid(state) ? 'PAID' : 'FAILED',
    };
  }
  let registrationFeePaid = state.registrationFeePaid;
  let courseFeePaid = state.courseFeePaid;
  switch (paymentType) {
    case 'registration_fee':
      registrationFeePaid = true;
      break;
    case 'course_fee':
      courseFeePaid = true;
      break;
    case 'full_payment':
      registrationFeePaid = true;
      courseFeePaid = true;
      break;
  }
  return { registrationFeePaid, courseFeePaid, status: deriveStatus({ registrationFeePaid, courseFeePaid }) };
}

/** Remaining balance in cents given the fee amounts on the registration. */
export function remainingBalance(
  state: Pick<FeeState, 'registrationFeePaid' | 'courseFeePaid'>,
  fees: { registrationFeeAmount: number; courseFeeAmount: number }
): number {
  return (state.registrationFeePaid ? 0 : fees.registrationFeeAmount) + (state.courseFeePaid ? 0 : fees.courseFeeAmount);
}
