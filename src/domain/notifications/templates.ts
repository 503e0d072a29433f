/**
 * Plain-text email bodies for participant and staff notifications.
 */

import type { RegistrationRecord } from '../../types/tables';
import { formatUsd } from '../payments/amounts';
import type { ProgramSettings } from '../settings/settings';

export type ParticipantEmailKind = 'registration_confirmed' | 'course_fee_received' | 'welcome';

export interface EmailContent {
  subject: string;
  bodyText: string;
}

function signOff(settings: ProgramSettings): string {
  return [
    '',
    `Check your registration status any time at ${settings.siteUrl}/check-status/`,
    `Questions? Reply to this email or write to ${settings.supportEmail}.`,
    '',
    settings.siteName,
  ].join('\n');
}

export function participantEmail(
  kind: ParticipantEmailKind,
  registration: RegistrationRecord,
  settings: ProgramSettings
): EmailContent {
  const greeting = `Dear ${registration.fullName},`;
  switch (kind) {
    case 'registration_confirmed':
      return {
        subject: `Registration Confirmed - ${settings.siteName}`,
        bodyText: [
          greeting,
          '',
          `We have received your registration fee of ${formatUsd(registration.registrationFeeAmount)}. Your place is reserved.`,
          `The course fee of ${formatUsd(registration.courseFeeAmount)} is still outstanding; you can pay it from the status page.`,
          signOff(settings),
        ].join('\n'),
      };
    case 'course_fee_received':
      return {
        subject: `Course Fee Payment Received - ${settings.siteName}`,
        bodyText: [
          greeting,
          '',
          `We have received your course fee of ${formatUsd(registration.courseFeeAmount)}.`,
          `Your registration fee of ${formatUsd(registration.registrationFeeAmount)} is still outstanding.`,
          signOff(settings),
        ].join('\n'),
      };
    case 'welcome':
      return {
        subject: `Payment Complete - Welcome to ${settings.siteName}!`,
        bodyText: [
          greeting,
          '',
          `Your payment of ${formatUsd(registration.amount)} is complete. Welcome to the program!`,
          ...(registration.participantId ? [`Your participant ID is ${registration.participantId}.`] : []),
          signOff(settings),
        ].join('\n'),
      };
  }
}

export function participantIdEmail(registration: RegistrationRecord, participantId: string, settings: ProgramSettings): EmailContent {
  return {
    subject: `Your Participant ID - ${settings.siteName}`,
    bodyText: [
      `Dear ${registration.fullName},`,
      '',
      `Your participant ID is ${participantId}. Please quote it in all program correspondence.`,
      signOff(settings),
    ].join('\n'),
  };
}

export function staffPaymentEmail(
  registration: RegistrationRecord,
  payment: { reference: string; amountCents: number; fullyPaid: boolean; paymentLabel: string }
): EmailContent {
  const scope = payment.fullyPaid ? 'FULL' : 'PARTIAL';
  return {
    subject: `[${scope}] Payment received: ${registration.fullName} (${formatUsd(payment.amountCents)})`,
    bodyText: [
      `Payer: ${registration.fullName} <${registration.email}>`,
      `Phone: ${registration.phone}`,
      `Cohort: ${registration.cohortCode ?? 'unassigned'}`,
      `Payment: ${payment.paymentLabel}`,
      `Amount: ${formatUsd(payment.amountCents)}`,
      `Reference: ${payment.reference}`,
      `Status: ${payment.fullyPaid ? 'fully paid' : 'partially paid'}`,
      ...(registration.participantId ? [`Participant ID: ${registration.participantId}`] : []),
    ].join('\n'),
  };
}
